import { describe, it, expect } from "vitest";
import { fileURLToPath } from "url";
import { loadRules } from "../src/core/RuleLoader.js";
import { loadRuleModule } from "../src/core/RuleModule.js";
import { asFunctionRegistry, asRuleDocumentV1 } from "../src/core/validateDocument.js";
import { XmlMapper } from "../src/core/Mapper.js";
import { parseXml } from "../src/parsing/xml.js";
import {
  EmptyRulesError,
  InvalidRuleDocumentError,
  MissingRuleFunctionError,
} from "../src/core/Errors.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("loadRules", () => {
  it("fills defaults into the run metadata", () => {
    const { rules, meta } = loadRules({
      version: "1.0",
      rules: [{ name: "r", destination: "/out", apply: () => "x" }],
    });

    expect(rules.map((r) => r.name)).toEqual(["r"]);
    expect(Object.isFrozen(rules[0])).toBe(true);
    expect(meta.outputEncoding).toBe("utf-8");
    expect(meta.inputRequired).toEqual([]);
    expect(meta.outputNamespaces.map((b) => b.prefix)).toEqual(["xml"]);
  });

  it("requires at least one rule", () => {
    expect(() => loadRules({ version: "1.0", name: "empty.mjs", rules: [] })).toThrow(
      EmptyRulesError,
    );
    expect(() => loadRules({ version: "1.0", name: "empty.mjs", rules: [] })).toThrow(
      "Expected at least one rule definition, none given in empty.mjs",
    );
  });

  it("requires an implementation for every rule", () => {
    expect(() =>
      loadRules({ version: "1.0", rules: [{ name: "r", destination: "/out", function: "nope" }] }),
    ).toThrow("Rule r references unknown function: nope");
    expect(() => loadRules({ version: "1.0", rules: [{ name: "r", destination: "/out" }] })).toThrow(
      MissingRuleFunctionError,
    );
  });

  it("prefers an inline implementation over the registry", () => {
    const { rules } = loadRules(
      {
        version: "1.0",
        rules: [{ name: "r", destination: "/out", function: "shared", apply: () => "inline" }],
      },
      { shared: () => "registry" },
    );
    expect(rules[0]?.apply()).toBe("inline");
  });
});

describe("asRuleDocumentV1", () => {
  it("accepts parsed JSON", () => {
    const doc = asRuleDocumentV1(
      JSON.parse(`{
        "version": "1.0",
        "outputXmlNamespaces": [["/", null, "urn:test:out"]],
        "inputXmlNamespaces": { "in": "urn:test:in" },
        "rules": [{ "name": "r", "sources": ["/in:a"], "destination": "/b", "function": "f", "order": 3 }]
      }`),
    );
    expect(doc.rules).toEqual([
      {
        name: "r",
        sources: ["/in:a"],
        destination: "/b",
        foreach: undefined,
        order: 3,
        apply: undefined,
        function: "f",
      },
    ]);
    expect(doc.outputXmlNamespaces).toEqual([["/", null, "urn:test:out"]]);
    expect(doc.inputXmlNamespaces).toEqual({ in: "urn:test:in" });
  });

  it("rejects unsupported versions", () => {
    expect(() => asRuleDocumentV1({ version: "2.0", rules: [] })).toThrow(
      "Unsupported rule document version: 2.0",
    );
  });

  it("rejects unknown keys with a hint", () => {
    expect(() =>
      asRuleDocumentV1({ version: "1.0", rules: [{ name: "r", source: ["/a"], destination: "/b" }] }),
    ).toThrow(`Did you mean "sources"?`);
  });

  it("rejects malformed namespace tables", () => {
    expect(() =>
      asRuleDocumentV1({ version: "1.0", rules: [], inputXmlNamespaces: [["/", "p"]] }),
    ).toThrow("inputXmlNamespaces[0] must be a [scopePath, prefix, uri] triple");
  });

  it("rejects non-string sources", () => {
    expect(() =>
      asRuleDocumentV1({ version: "1.0", rules: [{ name: "r", sources: [1], destination: "/b" }] }),
    ).toThrow(InvalidRuleDocumentError);
  });
});

describe("asFunctionRegistry", () => {
  it("rejects non-function members", () => {
    expect(() => asFunctionRegistry({ f: "not a function" })).toThrow(
      "functions.f must be a function",
    );
  });

  it("checks what a loaded function returns", () => {
    const registry = asFunctionRegistry({ ok: (s: string) => s.length, bad: () => ({}) });
    expect(registry.ok?.("abc")).toBe(3);
    expect(() => registry.bad?.()).toThrow("rule returned object; expected a string or nothing");
  });
});

describe("loadRuleModule", () => {
  it("loads the rule document and its functions", async () => {
    const { rules, functions } = await loadRuleModule(fixture("rules.mjs"));
    expect(rules.name).toBe("fixture");
    expect(Object.keys(functions)).toEqual(["upper"]);

    const out = new XmlMapper({ rules, functions }).run(parseXml("<doc><title>Hello World</title></doc>"));
    expect(out.attributes.get("id")).toBe("hello-world");
    expect(out.childrenNamed("h1")[0]?.text).toBe("HELLO WORLD");
  });

  it("validates the default export", async () => {
    await expect(loadRuleModule(fixture("bad-rules.mjs"))).rejects.toThrow(InvalidRuleDocumentError);
  });
});
