/** `null`/`undefined` means "write nothing"; numbers and booleans are written as text. */
export type RuleOutput = string | number | boolean | null | undefined;

/** A rule implementation: positional string inputs, optional output. */
export type RuleFn = (...args: string[]) => RuleOutput;

/**
 * Namespace tables accept two forms:
 * - list of `[scopePath, prefix, uri]` triples (`null` or `""` prefix = default namespace)
 * - legacy `{ prefix: uri }` map, every binding global (`/`)
 */
export type NamespaceTriple = readonly [string, string | null, string];
export type NamespaceTableInput =
  | ReadonlyArray<NamespaceTriple>
  | Readonly<Record<string, string>>;

export interface RuleEntryV1 {
  name: string;
  /** Order matches the implementation's positional parameters */
  sources?: ReadonlyArray<string>;
  /** Exactly one destination is valid; a list is accepted so the count can be checked */
  destination?: string | ReadonlyArray<string>;
  /** `[sourceBase, destinationBase]` pairs, outermost first */
  foreach?: ReadonlyArray<ReadonlyArray<string>>;
  order?: number;

  /** inline implementation */
  apply?: RuleFn;
  /** implementation looked up in the function registry */
  function?: string;
}

export interface RuleDocumentV1 {
  version: "1.0";
  name?: string;

  rules: ReadonlyArray<RuleEntryV1>;

  inputRequired?: ReadonlyArray<string>;
  inputNonempty?: ReadonlyArray<string>;
  outputRequired?: ReadonlyArray<string>;
  outputNonempty?: ReadonlyArray<string>;

  inputXmlNamespaces?: NamespaceTableInput;
  outputXmlNamespaces?: NamespaceTableInput;

  /** default: "utf-8" */
  outputEncoding?: string;
}
