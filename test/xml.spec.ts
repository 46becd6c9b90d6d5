import { describe, it, expect } from "vitest";
import {
  XML_NS,
  XmlElement,
  clark,
  encodeXml,
  parseXml,
  serializeXml,
  splitClark,
} from "../src/parsing/xml.js";
import { UnsupportedEncodingError, XmlParseError } from "../src/core/Errors.js";

describe("parseXml", () => {
  it("resolves prefixes and the default namespace to Clark names", () => {
    const root = parseXml(`<?xml version="1.0"?>
<feed xmlns="urn:test:feed" xmlns:x="urn:test:x">
  <x:entry x:id="e1" plain="p" xml:lang="en">text</x:entry>
</feed>`);

    expect(root.tag).toBe("{urn:test:feed}feed");
    expect(root.namespaces.get("")).toBe("urn:test:feed");

    const [entry] = root.children;
    expect(entry?.tag).toBe("{urn:test:x}entry");
    expect(entry?.parent).toBe(root);
    expect(entry?.text).toBe("text");
    expect(Object.fromEntries(entry?.attributes ?? [])).toEqual({
      "{urn:test:x}id": "e1",
      plain: "p",
      [`{${XML_NS}}lang`]: "en",
    });
  });

  it("keeps leading text and drops whitespace between elements", () => {
    const root = parseXml("<a>  lead <b/> tail </a>");
    expect(root.text).toBe("  lead ");
    expect(root.children).toHaveLength(1);

    expect(parseXml("<a>\n  <b/>\n</a>").text).toBeUndefined();
  });

  it("does not interpret values", () => {
    const root = parseXml(`<a n="007"><b>0012</b><c>true</c></a>`);
    expect(root.attributes.get("n")).toBe("007");
    expect(root.childrenNamed("b")[0]?.text).toBe("0012");
    expect(root.childrenNamed("c")[0]?.text).toBe("true");
  });

  it("decodes decimal and hexadecimal character references", () => {
    const root = parseXml(`<a code="&#x41;&#66;">caf&#233; &#x41; &amp;#233;</a>`);
    expect(root.text).toBe("café A &#233;");
    expect(root.attributes.get("code")).toBe("AB");
  });

  it("rejects malformed documents", () => {
    expect(() => parseXml("<a><b></a>")).toThrow(XmlParseError);
  });

  it("rejects undeclared prefixes", () => {
    expect(() => parseXml("<p:a/>")).toThrow("Undeclared namespace prefix 'p' in name 'p:a'");
  });
});

describe("serializeXml", () => {
  it("writes the declaration with the requested encoding", () => {
    const out = serializeXml(new XmlElement("a"), { encoding: "latin1" });
    expect(out.startsWith(`<?xml version="1.0" encoding="latin1"?>\n`)).toBe(true);
    expect(out.endsWith("\n")).toBe(true);
  });

  it("generates prefixes for undeclared namespaces", () => {
    const root = new XmlElement(clark("urn:test:x", "a"));
    root.append(new XmlElement(clark("urn:test:x", "b"))).text = "v";

    const out = serializeXml(root);
    expect(out).toContain(`xmlns:ns0="urn:test:x"`);
    expect(out).not.toContain("xmlns:ns1");

    const back = parseXml(out);
    expect(back.tag).toBe("{urn:test:x}a");
    expect(back.childrenNamed("{urn:test:x}b")[0]?.text).toBe("v");
  });

  it("round-trips namespaces, attributes and escaped text", () => {
    const source = `<d:doc xmlns:d="urn:test:d" xmlns="urn:test:default">
  <item d:kind="k &amp; v" xml:lang="fr">a &lt; b</item>
  <d:empty/>
</d:doc>`;
    const back = parseXml(serializeXml(parseXml(source)));

    expect(back.tag).toBe("{urn:test:d}doc");
    const [item, empty] = back.children;
    expect(item?.tag).toBe("{urn:test:default}item");
    expect(item?.text).toBe("a < b");
    expect(item?.attributes.get("{urn:test:d}kind")).toBe("k & v");
    expect(item?.attributes.get(`{${XML_NS}}lang`)).toBe("fr");
    expect(empty?.tag).toBe("{urn:test:d}empty");
  });

  it("resets the default namespace for unqualified children", () => {
    const root = new XmlElement(clark("urn:test:d", "a"), { "": "urn:test:d" });
    root.append(new XmlElement("plain"));

    const back = parseXml(serializeXml(root));
    expect(back.tag).toBe("{urn:test:d}a");
    expect(back.children[0]?.tag).toBe("plain");
  });
});

describe("encodeXml", () => {
  it("encodes with the output encoding", () => {
    const root = new XmlElement("a");
    root.text = "café";
    const buf = encodeXml(root, "latin1");
    expect(buf.includes(0xe9)).toBe(true);
    expect(buf.toString("latin1")).toContain("<a>café</a>");
  });

  it("writes characters outside latin1 as character references", () => {
    const root = new XmlElement("out");
    root.text = "price 5€ ok";
    root.attributes.set("unit", "€");

    const xml = encodeXml(root, "iso-8859-1").toString("latin1");
    expect(xml).toContain(`<out unit="&#8364;">price 5&#8364; ok</out>`);
    expect(parseXml(xml).text).toBe("price 5€ ok");
  });

  it("writes non-ASCII characters as character references under ascii", () => {
    const root = new XmlElement("out");
    root.text = "café";

    const buf = encodeXml(root, "ascii");
    expect(buf.every((byte) => byte < 0x80)).toBe(true);
    expect(buf.toString("ascii")).toContain("<out>caf&#233;</out>");
    expect(parseXml(buf.toString("ascii")).text).toBe("café");
  });

  it("rejects unknown encodings", () => {
    expect(() => encodeXml(new XmlElement("a"), "ebcdic")).toThrow(UnsupportedEncodingError);
  });
});

describe("clark names", () => {
  it("splits and joins", () => {
    expect(clark("urn:x", "a")).toBe("{urn:x}a");
    expect(clark(undefined, "a")).toBe("a");
    expect(splitClark("{urn:x}a")).toEqual({ uri: "urn:x", local: "a" });
    expect(splitClark("a")).toEqual({ local: "a" });
  });
});
