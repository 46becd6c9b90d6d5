import type { EngineState } from "./internal.js";

export type MapResult<T = string> =
  | { ok: true; value: T; meta?: MapMeta }
  | { ok: false; error: MapError; meta?: MapMeta };

export interface MapMeta {
  state: EngineState;
  /** rule names in the order they were applied */
  applied: string[];
  /** number of destination documents produced */
  documents: number;
}

export type MapErrorCode =
  | "INVALID_RULE_DOCUMENT"
  | "DUPLICATE_RULE"
  | "MISSING_RULE_FUNCTION"
  | "EMPTY_RULES"
  | "MISSING_DESTINATION"
  | "DESTINATION_COUNT"
  | "FOREACH_ARITY"
  | "FOREACH_NESTING"
  | "UNKNOWN_NAMESPACE"
  | "PATH_KIND_MISMATCH"
  | "MALFORMED_PATH"
  | "PAYLOAD_PARSE_ERROR"
  | "MISSING_REQUIRED_FIELD"
  | "RULE_EXECUTION_ERROR"
  | "EMPTY_OUTPUT"
  | "UNSUPPORTED_ENCODING"
  | "INVALID_ENGINE_STATE";

export interface MapError {
  code: MapErrorCode;
  message: string;
  field?: string;
  details?: Record<string, unknown>;
}
