import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { UnsupportedEncodingError, XmlParseError } from "../core/Errors.js";

export const XML_NS = "http://www.w3.org/XML/1998/namespace";

const ATTR = "@_";

/**
 * Mutable element tree.
 * - tags and attribute names are Clark names: `{uri}local`, or `local` without namespace
 * - `text` is the text before the first child element
 * - `namespaces` holds the declarations made on this element (`""` = default namespace)
 */
export class XmlElement {
  readonly tag: string;
  readonly attributes = new Map<string, string>();
  readonly children: XmlElement[] = [];
  readonly namespaces: Map<string, string>;
  text?: string;
  parent?: XmlElement;

  constructor(tag: string, namespaces: Readonly<Record<string, string>> = {}) {
    this.tag = tag;
    this.namespaces = new Map(Object.entries(namespaces));
  }

  append(child: XmlElement): XmlElement {
    child.parent = this;
    this.children.push(child);
    return child;
  }

  childrenNamed(tag: string): XmlElement[] {
    return this.children.filter((c) => c.tag === tag);
  }
}

export function clark(uri: string | undefined, local: string): string {
  return uri ? `{${uri}}${local}` : local;
}

export function splitClark(name: string): { uri?: string; local: string } {
  if (!name.startsWith("{")) return { local: name };
  const end = name.indexOf("}");
  return { uri: name.slice(1, end), local: name.slice(end + 1) };
}

// --------------------
// Parsing
// --------------------

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  parseTagValue: false,
  parseAttributeValue: false,
  // attribute values keep their whitespace; whitespace-only text is dropped below
  trimValues: false,
  // decodes character references (`&#233;`, `&#xE9;`) besides the predefined entities
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

/**
 * Parse XML text into an element tree rooted at the document element.
 * Namespace prefixes are resolved while walking; `xml:` is always bound.
 */
export function parseXml(text: string): XmlElement {
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    throw new XmlParseError(
      `Invalid XML: ${valid.err.msg} (line ${valid.err.line}, column ${valid.err.col})`,
      { code: valid.err.code, line: valid.err.line, col: valid.err.col },
    );
  }

  const parsed: unknown = parser.parse(text);
  const nodes = Array.isArray(parsed) ? parsed : [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const root = toElement(node, { xml: XML_NS });
    if (root) return root;
  }
  throw new XmlParseError("XML document has no root element");
}

function toElement(
  node: Record<string, unknown>,
  inherited: Readonly<Record<string, string>>,
): XmlElement | undefined {
  const rawTag = Object.keys(node).find(
    (k) => k !== ":@" && k !== "#text" && !k.startsWith("?"),
  );
  if (rawTag === undefined) return undefined;

  const rawAttrs: Array<[string, string]> = [];
  const attrMap = node[":@"];
  if (isRecord(attrMap)) {
    for (const [k, v] of Object.entries(attrMap)) {
      if (k.startsWith(ATTR)) rawAttrs.push([k.slice(ATTR.length), String(v)]);
    }
  }

  const declared: Record<string, string> = {};
  for (const [name, value] of rawAttrs) {
    if (name === "xmlns") declared[""] = value;
    else if (name.startsWith("xmlns:")) declared[name.slice("xmlns:".length)] = value;
  }
  const scope = { ...inherited, ...declared };

  const el = new XmlElement(qualifyRaw(rawTag, scope, true), declared);
  for (const [name, value] of rawAttrs) {
    if (name === "xmlns" || name.startsWith("xmlns:")) continue;
    el.attributes.set(qualifyRaw(name, scope, false), value);
  }

  const content = node[rawTag];
  const textParts: string[] = [];
  for (const child of Array.isArray(content) ? content : []) {
    if (!isRecord(child)) continue;
    if ("#text" in child) {
      // tails after child elements are not kept
      if (el.children.length === 0) textParts.push(String(child["#text"]));
      continue;
    }
    const sub = toElement(child, scope);
    if (sub) el.append(sub);
  }

  const text = textParts.join("");
  if (text.trim() !== "") el.text = text;
  return el;
}

function qualifyRaw(
  raw: string,
  scope: Readonly<Record<string, string>>,
  useDefault: boolean,
): string {
  const i = raw.indexOf(":");
  if (i < 0) return clark(useDefault ? scope[""] : undefined, raw);

  const prefix = raw.slice(0, i);
  const uri = scope[prefix];
  if (uri === undefined) {
    throw new XmlParseError(`Undeclared namespace prefix '${prefix}' in name '${raw}'`, {
      prefix,
    });
  }
  return clark(uri, raw.slice(i + 1));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// --------------------
// Serialization
// --------------------

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
});

type OrderedNode = Record<string, unknown>;

export interface SerializeOptions {
  /** written into the declaration; default "utf-8" */
  encoding?: string;
}

/** Serialize with a declaration, two-space indentation and stable prefixes. */
export function serializeXml(root: XmlElement, opts: SerializeOptions = {}): string {
  const encoding = opts.encoding ?? "utf-8";
  const body = String(builder.build([toOrdered(root, { xml: XML_NS }, { next: 0 })]));
  return `<?xml version="1.0" encoding="${encoding}"?>\n${body.trim()}\n`;
}

const ENCODINGS: Record<string, BufferEncoding> = {
  "utf-8": "utf8",
  utf8: "utf8",
  latin1: "latin1",
  "latin-1": "latin1",
  "iso-8859-1": "latin1",
  ascii: "ascii",
  "us-ascii": "ascii",
  "utf-16le": "utf16le",
  utf16le: "utf16le",
};

/** highest code point a single-byte encoding can hold */
const CODE_POINT_LIMIT: Partial<Record<BufferEncoding, number>> = {
  latin1: 0xff,
  ascii: 0x7f,
};

/** Characters outside the encoding are written as character references. */
export function encodeXml(root: XmlElement, encoding = "utf-8"): Buffer {
  const bufferEncoding = ENCODINGS[encoding.toLowerCase()];
  if (!bufferEncoding) throw new UnsupportedEncodingError(encoding);

  const xml = serializeXml(root, { encoding });
  const limit = CODE_POINT_LIMIT[bufferEncoding];
  return Buffer.from(limit === undefined ? xml : toCharRefs(xml, limit), bufferEncoding);
}

function toCharRefs(xml: string, limit: number): string {
  let out = "";
  for (const ch of xml) {
    const cp = ch.codePointAt(0) ?? 0;
    out += cp > limit ? `&#${cp};` : ch;
  }
  return out;
}

function toOrdered(
  el: XmlElement,
  parentScope: Readonly<Record<string, string>>,
  counter: { next: number },
): OrderedNode {
  const scope: Record<string, string> = { ...parentScope };
  const attrs: Record<string, string> = {};

  const declare = (prefix: string, uri: string) => {
    scope[prefix] = uri;
    attrs[prefix ? `${ATTR}xmlns:${prefix}` : `${ATTR}xmlns`] = uri;
  };

  const prefixFor = (uri: string, allowDefault: boolean): string => {
    if (allowDefault && scope[""] === uri) return "";
    for (const [p, u] of Object.entries(scope)) {
      if (p !== "" && u === uri) return p;
    }
    let p = `ns${counter.next++}`;
    while (scope[p] !== undefined) p = `ns${counter.next++}`;
    declare(p, uri);
    return p;
  };

  for (const [p, u] of el.namespaces) {
    if (p !== "xml" && parentScope[p] !== u) declare(p, u);
  }

  const { uri, local } = splitClark(el.tag);
  let name = local;
  if (uri === undefined) {
    if (scope[""]) declare("", "");
  } else {
    const p = prefixFor(uri, true);
    if (p) name = `${p}:${local}`;
  }

  for (const [key, value] of el.attributes) {
    const a = splitClark(key);
    if (a.uri === undefined) attrs[`${ATTR}${a.local}`] = value;
    else attrs[`${ATTR}${prefixFor(a.uri, false)}:${a.local}`] = value;
  }

  const content: OrderedNode[] = [];
  if (el.text !== undefined && el.text !== "") content.push({ "#text": el.text });
  for (const child of el.children) content.push(toOrdered(child, scope, counter));

  const node: OrderedNode = { [name]: content };
  if (Object.keys(attrs).length > 0) node[":@"] = attrs;
  return node;
}
