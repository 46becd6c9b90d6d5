import type { RuleFn } from "./document.js";

export interface MapperContext {
  /** source file name, used in required-content error messages */
  filename?: string;
}

export type RuleFunctionRegistry = Record<string, RuleFn>;
