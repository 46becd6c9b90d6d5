import type { RuleFn } from "./document.js";
import type { XmlElement } from "../parsing/xml.js";

/** `(scopePath, prefix, uri)`; prefix `""` is the default namespace */
export interface NamespaceBinding {
  scope: string;
  prefix: string;
  uri: string;
}

export type NamespaceTable = ReadonlyArray<NamespaceBinding>;

export interface PathSegment {
  /** `null` when unprefixed */
  prefix: string | null;
  local: string;
}

export interface PathExpression {
  source: string;
  segments: ReadonlyArray<PathSegment>;
  attribute?: PathSegment;
}

/** A path whose names are resolved to Clark notation (`{uri}local`). */
export interface QualifiedPath {
  source: string;
  segments: ReadonlyArray<string>;
  attribute?: string;
  /** declarations in effect for this path, used when creating elements */
  prefixMap: Readonly<Record<string, string>>;
}

export type ForeachPair = readonly [sourceBase: string, destinationBase: string];

/** A validated rule; immutable once loaded. */
export interface Rule {
  readonly name: string;
  readonly sources: ReadonlyArray<string>;
  readonly destination: string;
  readonly foreach: ReadonlyArray<ForeachPair>;
  readonly order?: number;
  readonly apply: RuleFn;
}

export interface RunMeta {
  inputRequired: ReadonlyArray<string>;
  inputNonempty: ReadonlyArray<string>;
  outputRequired: ReadonlyArray<string>;
  outputNonempty: ReadonlyArray<string>;
  inputNamespaces: NamespaceTable;
  outputNamespaces: NamespaceTable;
  outputEncoding: string;
}

export interface BasicRuleNode {
  kind: "basic";
  rule: Rule;
  order: OrderKey;
}

export interface ForeachRuleLeaf {
  kind: "foreach-rule";
  rule: Rule;
  order: OrderKey;
}

export interface IterationNode {
  kind: "iteration";
  sourceBase: string;
  destinationBase: string;
  children: Array<IterationNode | ForeachRuleLeaf>;
  /** smallest key of any rule below this node */
  order: OrderKey;
}

export type ProgramNode = BasicRuleNode | IterationNode | ForeachRuleLeaf;

/** `[order, declarationIndex]`, compared lexicographically */
export type OrderKey = readonly [number, number];

export type ClassifiedProgram = ReadonlyArray<BasicRuleNode | IterationNode>;

/** Enclosing iteration anchors, outermost first. */
export type BaseContext = ReadonlyArray<XmlElement>;

export type EngineState = "PENDING" | "EXECUTING" | "DONE" | "FAILED";
