export type {
  RuleDocumentV1,
  RuleEntryV1,
  RuleFn,
  RuleOutput,
  NamespaceTableInput,
  NamespaceTriple,
} from "./types/document.js";
export type { MapResult, MapMeta, MapError, MapErrorCode } from "./types/result.js";
export type { RuleFunctionRegistry, MapperContext } from "./types/functions.js";
export type {
  Rule,
  RunMeta,
  NamespaceBinding,
  PathExpression,
  QualifiedPath,
  ProgramNode,
  IterationNode,
  ForeachRuleLeaf,
  BasicRuleNode,
  ClassifiedProgram,
  BaseContext,
  EngineState,
} from "./types/internal.js";

export { XmlMapper, run, runBatch } from "./core/Mapper.js";
export type { MapperOptions, RunOptions } from "./core/Mapper.js";
export { RuleEngine } from "./core/RuleEngine.js";
export { classifyRules, buildIterationForest, assignOrderKeys } from "./core/Classifier.js";
export { validateRules, validateRule } from "./core/RuleValidator.js";
export { loadRules } from "./core/RuleLoader.js";
export { loadRuleModule } from "./core/RuleModule.js";
export { asRuleDocumentV1, asFunctionRegistry } from "./core/validateDocument.js";
export { checkRequiredPaths } from "./core/RequiredPaths.js";
export * from "./core/Errors.js";
export {
  parsePath,
  resolveNamespaces,
  qualify,
  normalizePath,
  normalizeBindings,
  isBasePrefix,
  PathResolver,
} from "./resolvers/PathResolver.js";
export { XmlElement, parseXml, serializeXml, encodeXml, XML_NS } from "./parsing/xml.js";
export { createConsoleLogger, silentLogger } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";

import { XmlMapper, type MapperOptions } from "./core/Mapper.js";

export function createMapper(opts: MapperOptions): XmlMapper {
  return new XmlMapper(opts);
}
