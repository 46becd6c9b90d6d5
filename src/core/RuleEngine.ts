import type {
  BaseContext,
  BasicRuleNode,
  ClassifiedProgram,
  EngineState,
  ForeachRuleLeaf,
  IterationNode,
  Rule,
} from "../types/internal.js";
import type { RuleOutput } from "../types/document.js";
import type { XmlElement } from "../parsing/xml.js";
import type { PathResolver } from "../resolvers/PathResolver.js";
import { EngineStateError, RuleExecutionError } from "./Errors.js";
import {
  readAmbiguousElements,
  readBaseSource,
  readSource,
  writeBaseDestination,
  writeDestination,
  writeNewAmbiguousElement,
} from "./DocumentAccess.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface RuleEngineOptions {
  /** resolves paths read from the source tree */
  sourcePaths: PathResolver;
  /** resolves paths written into the destination tree */
  destinationPaths: PathResolver;
  logger?: Logger;
}

/**
 * Applies a classified program to one source tree, building one destination
 * tree. Single use: PENDING -> EXECUTING -> DONE, or FAILED on any error.
 */
export class RuleEngine {
  private _state: EngineState = "PENDING";
  private readonly applied: string[] = [];
  private readonly logger: Logger;
  private destination: XmlElement | undefined;

  constructor(
    private readonly program: ClassifiedProgram,
    private readonly opts: RuleEngineOptions,
  ) {
    this.logger = opts.logger ?? silentLogger;
  }

  get state(): EngineState {
    return this._state;
  }

  /** rule names in application order; a rule inside an iteration appears once per repetition */
  get appliedRules(): ReadonlyArray<string> {
    return this.applied;
  }

  /** Returns the destination root, or `undefined` when no rule wrote anything. */
  execute(source: XmlElement): XmlElement | undefined {
    if (this._state !== "PENDING") throw new EngineStateError(this._state);
    this._state = "EXECUTING";

    try {
      for (const node of this.program) {
        if (node.kind === "basic") this.runBasic(source, node);
        else this.runIteration(source, node, [], []);
      }
    } catch (e) {
      this._state = "FAILED";
      this.destination = undefined;
      throw e;
    }

    this._state = "DONE";
    return this.destination;
  }

  private runBasic(source: XmlElement, node: BasicRuleNode) {
    const { rule } = node;
    this.logger.info(`Applying ${rule.name}`);

    const args = rule.sources.map((p) => readSource(source, this.opts.sourcePaths.resolve(p)));
    const out = this.invoke(rule, args);
    if (out === undefined) return;

    this.destination = writeDestination(
      this.destination,
      this.opts.destinationPaths.resolve(rule.destination),
      out,
    );
  }

  /**
   * One repetition per source element at `sourceBase` (document order),
   * each with a fresh destination base element.
   */
  private runIteration(
    source: XmlElement,
    node: IterationNode,
    srcBases: BaseContext,
    dstBases: BaseContext,
  ) {
    const srcBase = this.opts.sourcePaths.resolve(node.sourceBase);
    const dstBase = this.opts.destinationPaths.resolve(node.destinationBase);
    const matches = readAmbiguousElements(source, srcBase, srcBases);
    this.logger.debug(`Iterating ${node.sourceBase}: ${matches.length} element(s)`);

    for (const match of matches) {
      const created = writeNewAmbiguousElement(this.destination, dstBase, dstBases);
      this.destination = created.root;

      const innerSrc = [...srcBases, match];
      const innerDst = [...dstBases, created.element];
      for (const child of node.children) {
        if (child.kind === "iteration") this.runIteration(source, child, innerSrc, innerDst);
        else this.runForeachRule(source, child, innerSrc, innerDst);
      }
    }
  }

  private runForeachRule(
    source: XmlElement,
    leaf: ForeachRuleLeaf,
    srcBases: BaseContext,
    dstBases: BaseContext,
  ) {
    const { rule } = leaf;
    this.logger.info(`Applying ${rule.name}`);

    const args = rule.sources.map((p) =>
      readBaseSource(source, this.opts.sourcePaths.resolve(p), srcBases),
    );
    const out = this.invoke(rule, args);
    if (out === undefined) return;

    this.destination = writeBaseDestination(
      this.destination,
      this.opts.destinationPaths.resolve(rule.destination),
      out,
      dstBases,
    );
  }

  /** Call the implementation; `undefined` means nothing is written. */
  private invoke(rule: Rule, args: string[]): string | undefined {
    this.logger.debug(`Applying ${rule.name} with arguments ${JSON.stringify(args)}`);
    this.applied.push(rule.name);

    let out: RuleOutput;
    try {
      out = rule.apply(...args);
    } catch (e) {
      throw new RuleExecutionError(rule.name, e);
    }
    return out === null || out === undefined ? undefined : String(out);
  }
}
