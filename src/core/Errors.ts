import type { MapError, MapErrorCode } from "../types/result.js";

export class RuleMapError extends Error {
  readonly code: MapErrorCode;
  readonly details?: Record<string, unknown>;
  readonly field?: string;

  constructor(
    code: MapErrorCode,
    message: string,
    opts: { details?: Record<string, unknown>; field?: string; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = opts.details;
    this.field = opts.field;
  }
}

// -------------------- definition errors --------------------

export class InvalidRuleDocumentError extends RuleMapError {
  constructor(message: string) {
    super("INVALID_RULE_DOCUMENT", message);
  }
}

export class DuplicateRuleError extends RuleMapError {
  constructor(rule: string, first: number, second: number) {
    super(
      "DUPLICATE_RULE",
      `Rule name ${rule} is defined multiple times (entries ${first} and ${second})`,
      { field: rule, details: { first, second } },
    );
  }
}

export class MissingRuleFunctionError extends RuleMapError {
  constructor(rule: string, fn?: string) {
    super(
      "MISSING_RULE_FUNCTION",
      fn
        ? `Rule ${rule} references unknown function: ${fn}`
        : `Rule ${rule} has no implementation (neither "apply" nor "function" given)`,
      { field: rule },
    );
  }
}

export class EmptyRulesError extends RuleMapError {
  constructor(name?: string) {
    super(
      "EMPTY_RULES",
      `Expected at least one rule definition, none given${name ? ` in ${name}` : ""}`,
    );
  }
}

export class MissingDestinationError extends RuleMapError {
  constructor(rule: string) {
    super(
      "MISSING_DESTINATION",
      `Rule ${rule} requires at least a destination declaration`,
      { field: rule },
    );
  }
}

export class DestinationCountError extends RuleMapError {
  constructor(rule: string, count: number) {
    super(
      "DESTINATION_COUNT",
      `A rule must have exactly 1 destination. ${rule} has ${count}`,
      { field: rule, details: { count } },
    );
  }
}

export class ForeachArityError extends RuleMapError {
  constructor(rule: string, message: string) {
    super("FOREACH_ARITY", message, { field: rule });
  }
}

export class ForeachNestingError extends RuleMapError {
  constructor(rule: string, outer: string, inner: string) {
    super(
      "FOREACH_NESTING",
      `Outer foreach source base '${outer}' must be prefix of inner foreach source base '${inner}' (rule ${rule})`,
      { field: rule, details: { outer, inner } },
    );
  }
}

// -------------------- path errors --------------------

export class UnknownNamespaceError extends RuleMapError {
  constructor(prefix: string, path: string) {
    super("UNKNOWN_NAMESPACE", `Unknown namespace ${prefix} in path ${path}`, {
      details: { prefix, path },
    });
  }
}

export class PathKindMismatchError extends RuleMapError {
  constructor(path: string, attribute: string) {
    super(
      "PATH_KIND_MISMATCH",
      `Expected path ${path} to refer to an element; refers to attribute ${attribute}`,
      { details: { path, attribute } },
    );
  }
}

export class MalformedPathError extends RuleMapError {
  constructor(path: string, reason: string) {
    super("MALFORMED_PATH", `Malformed path '${path}': ${reason}`, {
      details: { path },
    });
  }
}

// -------------------- document / run errors --------------------

export class XmlParseError extends RuleMapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PAYLOAD_PARSE_ERROR", message, { details });
  }
}

export class RequiredPathError extends RuleMapError {
  constructor(message: string, path: string, filename?: string) {
    super("MISSING_REQUIRED_FIELD", message, {
      field: path,
      details: filename ? { path, filename } : { path },
    });
  }
}

export class RuleExecutionError extends RuleMapError {
  constructor(rule: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("RULE_EXECUTION_ERROR", `Rule ${rule} failed: ${reason}`, {
      field: rule,
      cause,
    });
  }
}

export class EmptyOutputError extends RuleMapError {
  constructor() {
    super("EMPTY_OUTPUT", "No rule produced any output; destination document is empty");
  }
}

export class UnsupportedEncodingError extends RuleMapError {
  constructor(encoding: string) {
    super("UNSUPPORTED_ENCODING", `Unsupported output encoding: ${encoding}`, {
      details: { encoding },
    });
  }
}

export class EngineStateError extends RuleMapError {
  constructor(state: string) {
    super("INVALID_ENGINE_STATE", `Rule engine cannot run in state ${state}`);
  }
}

export function err(
  code: MapError["code"],
  message: string,
  details?: Record<string, unknown>,
  field?: string,
): MapError {
  return { code, message, details, field };
}

/** Convert anything thrown during a run into the result-record form. */
export function toMapError(e: unknown): MapError {
  if (e instanceof RuleMapError) return err(e.code, e.message, e.details, e.field);
  const message = e instanceof Error ? e.message : String(e);
  return err("RULE_EXECUTION_ERROR", message, { cause: e });
}
