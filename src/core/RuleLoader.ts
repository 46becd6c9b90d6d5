import type { Rule, RunMeta } from "../types/internal.js";
import type { RuleDocumentV1 } from "../types/document.js";
import type { RuleFunctionRegistry } from "../types/functions.js";
import { EmptyRulesError, MissingRuleFunctionError } from "./Errors.js";
import { validateRules } from "./RuleValidator.js";
import { normalizeBindings } from "../resolvers/PathResolver.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface LoadedRules {
  /** declaration order */
  rules: ReadonlyArray<Rule>;
  meta: RunMeta;
}

/**
 * Turn a rule document into validated, immutable rules plus run metadata.
 * Implementations come from the entry itself (`apply`) or from `functions`.
 */
export function loadRules(
  doc: RuleDocumentV1,
  functions: RuleFunctionRegistry = {},
  logger: Logger = silentLogger,
): LoadedRules {
  if (doc.rules.length === 0) throw new EmptyRulesError(doc.name);

  const shapes = validateRules(doc.rules);

  const rules = shapes.map((shape, i): Rule => {
    const entry = doc.rules[i];
    const apply = entry?.apply ?? (entry?.function ? functions[entry.function] : undefined);
    if (!apply) throw new MissingRuleFunctionError(shape.name, entry?.function);
    logger.info(`Found ${shape.name}`);
    return Object.freeze({ ...shape, apply });
  });

  const count = (key: string, n: number) =>
    logger.info(`Found ${key} with ${n} paths`);

  const meta: RunMeta = {
    inputRequired: doc.inputRequired ?? [],
    inputNonempty: doc.inputNonempty ?? [],
    outputRequired: doc.outputRequired ?? [],
    outputNonempty: doc.outputNonempty ?? [],
    inputNamespaces: normalizeBindings(doc.inputXmlNamespaces, logger),
    outputNamespaces: normalizeBindings(doc.outputXmlNamespaces, logger),
    outputEncoding: doc.outputEncoding ?? "utf-8",
  };

  count("inputRequired", meta.inputRequired.length);
  count("inputNonempty", meta.inputNonempty.length);
  count("outputRequired", meta.outputRequired.length);
  count("outputNonempty", meta.outputNonempty.length);
  logger.debug(`metadata found: ${JSON.stringify(meta)}`);

  return { rules, meta };
}
