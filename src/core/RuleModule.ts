import path from "path";
import { pathToFileURL } from "url";
import type { RuleDocumentV1 } from "../types/document.js";
import type { RuleFunctionRegistry } from "../types/functions.js";
import { asFunctionRegistry, asRuleDocumentV1 } from "./validateDocument.js";

export interface RuleModule {
  rules: RuleDocumentV1;
  functions: RuleFunctionRegistry;
}

/**
 * Load a rules ES module: the default export is the rule document, an
 * optional named `functions` export supplies referenced implementations.
 */
export async function loadRuleModule(file: string): Promise<RuleModule> {
  const mod: unknown = await import(pathToFileURL(path.resolve(file)).href);
  if (typeof mod !== "object" || mod === null) {
    throw new TypeError(`Rules module ${file} did not load as a module`);
  }

  const exports = new Map(Object.entries(mod));
  return {
    rules: asRuleDocumentV1(exports.get("default")),
    functions: asFunctionRegistry(exports.get("functions")),
  };
}
