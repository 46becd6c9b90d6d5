import type {
  NamespaceTableInput,
  NamespaceTriple,
  RuleDocumentV1,
  RuleEntryV1,
  RuleFn,
} from "../types/document.js";
import type { RuleFunctionRegistry } from "../types/functions.js";
import { InvalidRuleDocumentError } from "./Errors.js";

const RULE_ENTRY_ALLOWED_KEYS = new Set([
  "name",
  "sources",
  "destination",
  "foreach",
  "order",
  "apply",
  "function",
]);

const DOCUMENT_ALLOWED_KEYS = new Set([
  "version",
  "name",
  "rules",
  "inputRequired",
  "inputNonempty",
  "outputRequired",
  "outputNonempty",
  "inputXmlNamespaces",
  "outputXmlNamespaces",
  "outputEncoding",
]);

/**
 * Structural check of an untyped rule document (parsed JSON or a loaded
 * module's default export). Rule semantics are checked later by the
 * rule validator; this only guarantees the shape.
 */
export function asRuleDocumentV1(doc: unknown): RuleDocumentV1 {
  if (!isObject(doc)) throw new InvalidRuleDocumentError("Rule document must be an object");
  assertNoUnknownKeys(doc, DOCUMENT_ALLOWED_KEYS, "document");

  if (doc.version !== "1.0") {
    throw new InvalidRuleDocumentError(
      `Unsupported rule document version: ${String(doc.version)}`,
    );
  }
  if (!Array.isArray(doc.rules)) {
    throw new InvalidRuleDocumentError("Rule document rules must be an array");
  }

  const rules = doc.rules.map((entry, i) => asRuleEntry(entry, `rules[${i}]`));

  return {
    version: "1.0",
    name: optionalString(doc.name, "name"),
    rules,
    inputRequired: optionalStrings(doc.inputRequired, "inputRequired"),
    inputNonempty: optionalStrings(doc.inputNonempty, "inputNonempty"),
    outputRequired: optionalStrings(doc.outputRequired, "outputRequired"),
    outputNonempty: optionalStrings(doc.outputNonempty, "outputNonempty"),
    inputXmlNamespaces: optionalNamespaces(doc.inputXmlNamespaces, "inputXmlNamespaces"),
    outputXmlNamespaces: optionalNamespaces(doc.outputXmlNamespaces, "outputXmlNamespaces"),
    outputEncoding: optionalString(doc.outputEncoding, "outputEncoding"),
  };
}

function asRuleEntry(entry: unknown, path: string): RuleEntryV1 {
  if (!isObject(entry)) throw new InvalidRuleDocumentError(`${path} must be an object`);
  assertNoUnknownKeys(entry, RULE_ENTRY_ALLOWED_KEYS, path);

  const name = entry.name;
  if (typeof name !== "string" || name === "") {
    throw new InvalidRuleDocumentError(`${path}.name must be a non-empty string`);
  }

  const rawDestination = entry.destination;
  const destination =
    rawDestination === undefined || typeof rawDestination === "string"
      ? rawDestination
      : strings(rawDestination, `${path}.destination`);

  const rawForeach = entry.foreach;
  let foreach: string[][] | undefined;
  if (rawForeach !== undefined) {
    if (!Array.isArray(rawForeach)) {
      throw new InvalidRuleDocumentError(`${path}.foreach must be an array of pairs`);
    }
    foreach = rawForeach.map((pair, i) => strings(pair, `${path}.foreach[${i}]`));
  }

  const rawOrder = entry.order;
  let order: number | undefined;
  if (typeof rawOrder === "number") order = rawOrder;
  else if (rawOrder !== undefined) {
    throw new InvalidRuleDocumentError(`${path}.order must be a number`);
  }

  const rawApply = entry.apply;
  let apply: RuleFn | undefined;
  if (typeof rawApply === "function") apply = toRuleFn(rawApply);
  else if (rawApply !== undefined) {
    throw new InvalidRuleDocumentError(`${path}.apply must be a function`);
  }

  return {
    name,
    sources: optionalStrings(entry.sources, `${path}.sources`),
    destination,
    foreach,
    order,
    apply,
    function: optionalString(entry.function, `${path}.function`),
  };
}

/** Registry of rule implementations from an untyped module export. */
export function asFunctionRegistry(v: unknown): RuleFunctionRegistry {
  if (v === undefined) return {};
  if (!isObject(v)) throw new InvalidRuleDocumentError("functions must be an object of functions");

  const out: RuleFunctionRegistry = {};
  for (const [name, fn] of Object.entries(v)) {
    if (typeof fn !== "function") {
      throw new InvalidRuleDocumentError(`functions.${name} must be a function`);
    }
    out[name] = toRuleFn(fn);
  }
  return out;
}

function toRuleFn(fn: Function): RuleFn {
  return (...args) => {
    const out: unknown = Reflect.apply(fn, undefined, args);
    if (
      out === null ||
      out === undefined ||
      typeof out === "string" ||
      typeof out === "number" ||
      typeof out === "boolean"
    ) {
      return out;
    }
    throw new TypeError(`rule returned ${typeof out}; expected a string or nothing`);
  };
}

function optionalNamespaces(v: unknown, path: string): NamespaceTableInput | undefined {
  if (v === undefined) return undefined;

  if (Array.isArray(v)) {
    return v.map((t, i): NamespaceTriple => {
      if (
        Array.isArray(t) &&
        t.length === 3 &&
        typeof t[0] === "string" &&
        (t[1] === null || typeof t[1] === "string") &&
        typeof t[2] === "string"
      ) {
        return [t[0], t[1], t[2]];
      }
      throw new InvalidRuleDocumentError(
        `${path}[${i}] must be a [scopePath, prefix, uri] triple`,
      );
    });
  }

  if (isObject(v)) {
    const out: Record<string, string> = {};
    for (const [prefix, uri] of Object.entries(v)) {
      if (typeof uri !== "string") {
        throw new InvalidRuleDocumentError(`${path}.${prefix} must be a namespace URI string`);
      }
      out[prefix] = uri;
    }
    return out;
  }

  throw new InvalidRuleDocumentError(`${path} must be a list of triples or a prefix map`);
}

function strings(v: unknown, path: string): string[] {
  if (!Array.isArray(v) || !v.every((s): s is string => typeof s === "string")) {
    throw new InvalidRuleDocumentError(`${path} must be an array of strings`);
  }
  return v;
}

function optionalStrings(v: unknown, path: string): string[] | undefined {
  return v === undefined ? undefined : strings(v, path);
}

function optionalString(v: unknown, path: string): string | undefined {
  if (v === undefined || typeof v === "string") return v;
  throw new InvalidRuleDocumentError(`${path} must be a string`);
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function assertNoUnknownKeys(
  obj: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  path: string,
) {
  const unknown = Object.keys(obj).filter((k) => !allowed.has(k));
  if (unknown.length === 0) return;

  const hints: string[] = [];
  if (unknown.includes("source")) hints.push(`Did you mean "sources"?`);
  if (unknown.includes("destinations")) hints.push(`Did you mean "destination"?`);

  throw new InvalidRuleDocumentError(
    `Invalid entry at ${path}: unknown key(s): ${unknown
      .map((k) => `"${k}"`)
      .join(", ")}. Allowed keys: ${Array.from(allowed)
      .map((k) => `"${k}"`)
      .join(", ")}${hints.length ? `. ${hints.join(" ")}` : ""}`,
  );
}
