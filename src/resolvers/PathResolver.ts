import type {
  NamespaceBinding,
  NamespaceTable,
  PathExpression,
  PathSegment,
  QualifiedPath,
} from "../types/internal.js";
import type { NamespaceTableInput, NamespaceTriple } from "../types/document.js";
import { MalformedPathError, UnknownNamespaceError } from "../core/Errors.js";
import { XML_NS, clark } from "../parsing/xml.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/**
 * Parse `/p:elem1/elem2[@[p:]attr]`.
 * - at most one `@`; everything after it names the attribute
 * - empty segments are ignored, so `/a//b/` equals `/a/b`
 * - a segment starting with `:` is unprefixed (`/:a` equals `/a`)
 */
export function parsePath(path: string): PathExpression {
  const parts = path.split("@");
  if (parts.length > 2) {
    throw new MalformedPathError(path, "only one @ symbol allowed in paths");
  }

  const [base = "", attr] = parts;
  const segments = base
    .split("/")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => parseName(s, path));

  if (attr === undefined) return { source: path, segments };

  const name = attr.trim();
  if (!name) throw new MalformedPathError(path, "empty attribute name");
  if (name.includes("/")) {
    throw new MalformedPathError(path, "attribute reference must be the last step");
  }
  return { source: path, segments, attribute: parseName(name, path) };
}

function parseName(raw: string, path: string): PathSegment {
  if (raw.startsWith(":")) return checked({ prefix: null, local: raw.slice(1) }, path);

  const parts = raw.split(":");
  if (parts.length > 2) {
    throw new MalformedPathError(path, `only one namespace prefix allowed in '${raw}'`);
  }
  if (parts.length === 2) return checked({ prefix: parts[0] ?? "", local: parts[1] ?? "" }, path);
  return checked({ prefix: null, local: raw }, path);
}

function checked(seg: PathSegment, path: string): PathSegment {
  if (!seg.local || seg.prefix === "") {
    throw new MalformedPathError(path, "empty name or prefix");
  }
  return seg;
}

/**
 * Collect the bindings whose scope path is a segment-wise prefix of `scope`
 * (the global scope `/` always applies). An unprefixed scope step matches a
 * path step by local name alone. Later bindings win per prefix.
 */
export function resolveNamespaces(
  scope: ReadonlyArray<PathSegment>,
  table: NamespaceTable,
): Record<string, string> {
  const map: Record<string, string> = {};
  for (const binding of table) {
    const ref = parsePath(binding.scope).segments;
    if (ref.length > scope.length) continue;
    const applies = ref.every((r, i) => {
      const step = scope[i];
      return step !== undefined && r.local === step.local && (r.prefix === null || r.prefix === step.prefix);
    });
    if (applies) map[binding.prefix] = binding.uri;
  }
  return map;
}

/**
 * Clark name for a path step. A default namespace (prefix `""`) applies
 * to elements only, never to attributes.
 */
export function qualify(
  prefix: string | null,
  local: string,
  prefixMap: Readonly<Record<string, string>>,
  path: string,
  kind: "element" | "attribute" = "element",
): string {
  if (prefix === "xml") return clark(XML_NS, local);
  if (prefix) {
    const uri = prefixMap[prefix];
    if (uri === undefined) throw new UnknownNamespaceError(prefix, path);
    return clark(uri, local);
  }
  return kind === "element" ? clark(prefixMap[""], local) : local;
}

export function normalizePath(path: string, table: NamespaceTable): QualifiedPath {
  const expr = parsePath(path);
  const prefixMap = resolveNamespaces(expr.segments, table);
  const segments = expr.segments.map((s) => qualify(s.prefix, s.local, prefixMap, path));
  const attribute = expr.attribute
    ? qualify(expr.attribute.prefix, expr.attribute.local, prefixMap, path, "attribute")
    : undefined;
  return { source: path, segments, attribute, prefixMap };
}

/**
 * Textual prefix test on slash-trimmed base paths; `a` is a prefix of `ab`.
 * Used for foreach nesting and iteration grouping.
 */
export function isBasePrefix(outer: string, inner: string): boolean {
  return trimSlashes(inner).startsWith(trimSlashes(outer));
}

function trimSlashes(p: string): string {
  return p.split("/").filter(Boolean).join("/");
}

function isTripleList(t: NamespaceTableInput): t is ReadonlyArray<NamespaceTriple> {
  return Array.isArray(t);
}

/**
 * Bring a namespace table into canonical form:
 * - legacy `{ prefix: uri }` maps become global bindings
 * - `xml` is forced to the XML namespace (warns on redeclaration)
 * - `xmlns` bindings are dropped
 * - a global `xml` binding is appended when missing
 */
export function normalizeBindings(
  input: NamespaceTableInput | undefined,
  logger: Logger = silentLogger,
): NamespaceTable {
  const raw: NamespaceBinding[] = !input
    ? []
    : isTripleList(input)
      ? input.map(([scope, prefix, uri]) => ({ scope, prefix: prefix ?? "", uri }))
      : Object.entries(input).map(([prefix, uri]) => ({ scope: "/", prefix, uri }));

  const out: NamespaceBinding[] = [];
  for (const b of raw) {
    if (b.prefix === "xmlns") {
      logger.error(`namespace prefix 'xmlns' is illegal, binding for ${b.uri} removed`);
      continue;
    }
    if (b.prefix === "xml") {
      logger.warn("xml namespace is defined per default");
      if (b.uri !== XML_NS) logger.warn("xml namespace is non-standard, will be replaced");
      out.push({ ...b, uri: XML_NS });
      continue;
    }
    out.push(b);
  }

  const hasGlobalXml = out.some(
    (b) => b.prefix === "xml" && parsePath(b.scope).segments.length === 0,
  );
  if (!hasGlobalXml) out.push({ scope: "/", prefix: "xml", uri: XML_NS });
  return out;
}

/** Resolves path strings against one namespace table, memoized per path. */
export class PathResolver {
  private cache = new Map<string, QualifiedPath>();

  constructor(readonly table: NamespaceTable) {}

  resolve(path: string): QualifiedPath {
    let q = this.cache.get(path);
    if (!q) {
      q = normalizePath(path, this.table);
      this.cache.set(path, q);
    }
    return q;
  }
}
