import type { ClassifiedProgram, EngineState, Rule, RunMeta } from "../types/internal.js";
import type { RuleDocumentV1 } from "../types/document.js";
import type { MapperContext, RuleFunctionRegistry } from "../types/functions.js";
import type { MapMeta, MapResult } from "../types/result.js";
import { parseXml, serializeXml, type XmlElement } from "../parsing/xml.js";
import { PathResolver } from "../resolvers/PathResolver.js";
import { EmptyOutputError, toMapError } from "./Errors.js";
import { classifyRules } from "./Classifier.js";
import { loadRules } from "./RuleLoader.js";
import { RuleEngine } from "./RuleEngine.js";
import { checkRequiredPaths } from "./RequiredPaths.js";
import { readAmbiguousElements } from "./DocumentAccess.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface MapperOptions {
  rules: RuleDocumentV1;
  functions?: RuleFunctionRegistry;
  logger?: Logger;
  /** include run metadata in results */
  debug?: boolean;
}

export interface RunOptions {
  logger?: Logger;
  /** source file name for required-content errors */
  filename?: string;
}

interface RunContext {
  program: ClassifiedProgram;
  meta: RunMeta;
  sourcePaths: PathResolver;
  destinationPaths: PathResolver;
  logger: Logger;
}

interface RunTrace {
  state: EngineState;
  applied: string[];
  documents: number;
}

/**
 * Rules are loaded, validated and classified once; every call then maps one
 * source document (or one per batch match) independently.
 */
export class XmlMapper {
  readonly rules: ReadonlyArray<Rule>;
  readonly meta: RunMeta;
  private readonly ctx: RunContext;
  private readonly debug: boolean;

  constructor(opts: MapperOptions) {
    const logger = opts.logger ?? silentLogger;
    this.debug = opts.debug ?? false;

    const loaded = loadRules(opts.rules, opts.functions, logger);
    this.rules = loaded.rules;
    this.meta = loaded.meta;
    this.ctx = createContext(loaded.rules, loaded.meta, logger);
  }

  /** Map one source tree; throws on any definition, path or content error. */
  run(source: XmlElement, filename?: string): XmlElement {
    return runOne(this.ctx, source, filename, newTrace());
  }

  /** One destination tree per element matched by `basePath`, in document order. */
  runBatch(source: XmlElement, basePath: string, filename?: string): XmlElement[] {
    return runMany(this.ctx, source, basePath, filename, newTrace());
  }

  /** Parse, map and serialize; never throws. */
  map(xml: string, ctx: MapperContext = {}): MapResult<string> {
    const trace = newTrace();
    try {
      const out = runOne(this.ctx, parseXml(xml), ctx.filename, trace);
      return this.finalize({ ok: true, value: this.serialize(out) }, trace);
    } catch (e) {
      return this.finalize({ ok: false, error: toMapError(e) }, trace);
    }
  }

  mapBatch(xml: string, basePath: string, ctx: MapperContext = {}): MapResult<string[]> {
    const trace = newTrace();
    try {
      const outs = runMany(this.ctx, parseXml(xml), basePath, ctx.filename, trace);
      return this.finalize({ ok: true, value: outs.map((o) => this.serialize(o)) }, trace);
    } catch (e) {
      return this.finalize({ ok: false, error: toMapError(e) }, trace);
    }
  }

  serialize(root: XmlElement): string {
    return serializeXml(root, { encoding: this.meta.outputEncoding });
  }

  private finalize<T>(result: MapResult<T>, trace: RunTrace): MapResult<T> {
    if (!this.debug) return result;
    const meta: MapMeta = { ...trace };
    return { ...result, meta };
  }
}

/** Single-document entry point over already loaded rules. */
export function run(
  source: XmlElement,
  rules: ReadonlyArray<Rule>,
  meta: RunMeta,
  opts: RunOptions = {},
): XmlElement {
  const ctx = createContext(rules, meta, opts.logger ?? silentLogger);
  return runOne(ctx, source, opts.filename, newTrace());
}

/** `run` once per element matched by `basePath`, in document order. */
export function runBatch(
  source: XmlElement,
  rules: ReadonlyArray<Rule>,
  meta: RunMeta,
  basePath: string,
  opts: RunOptions = {},
): XmlElement[] {
  const ctx = createContext(rules, meta, opts.logger ?? silentLogger);
  return runMany(ctx, source, basePath, opts.filename, newTrace());
}

function createContext(rules: ReadonlyArray<Rule>, meta: RunMeta, logger: Logger): RunContext {
  return {
    program: classifyRules(rules),
    meta,
    sourcePaths: new PathResolver(meta.inputNamespaces),
    destinationPaths: new PathResolver(meta.outputNamespaces),
    logger,
  };
}

function newTrace(): RunTrace {
  return { state: "PENDING", applied: [], documents: 0 };
}

/** Input requirements, rule execution, output requirements. */
function runOne(
  ctx: RunContext,
  source: XmlElement,
  filename: string | undefined,
  trace: RunTrace,
): XmlElement {
  const { meta } = ctx;
  checkRequiredPaths(
    source,
    { required: meta.inputRequired, nonempty: meta.inputNonempty },
    ctx.sourcePaths,
    filename,
  );

  const engine = new RuleEngine(ctx.program, {
    sourcePaths: ctx.sourcePaths,
    destinationPaths: ctx.destinationPaths,
    logger: ctx.logger,
  });

  let out: XmlElement | undefined;
  try {
    out = engine.execute(source);
  } finally {
    trace.state = engine.state;
    trace.applied.push(...engine.appliedRules);
  }
  if (!out) throw new EmptyOutputError();

  checkRequiredPaths(
    out,
    { required: meta.outputRequired, nonempty: meta.outputNonempty },
    ctx.destinationPaths,
  );
  trace.documents++;
  return out;
}

function runMany(
  ctx: RunContext,
  source: XmlElement,
  basePath: string,
  filename: string | undefined,
  trace: RunTrace,
): XmlElement[] {
  const bases = readAmbiguousElements(source, ctx.sourcePaths.resolve(basePath), []);
  ctx.logger.info(`Batch base ${basePath} matched ${bases.length} element(s)`);
  return bases.map((element) => runOne(ctx, element, filename, trace));
}
