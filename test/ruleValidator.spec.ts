import { describe, it, expect } from "vitest";
import { validateRule, validateRules } from "../src/core/RuleValidator.js";
import {
  DestinationCountError,
  DuplicateRuleError,
  ForeachArityError,
  ForeachNestingError,
  InvalidRuleDocumentError,
  MissingDestinationError,
} from "../src/core/Errors.js";

describe("validateRules", () => {
  it("accepts well-formed basic and foreach rules", () => {
    const shapes = validateRules([
      { name: "title", sources: ["/doc/title"], destination: "/out/title" },
      {
        name: "item",
        sources: ["/doc/list/item"],
        destination: ["/out/entries/entry/text"],
        foreach: [["/doc/list/item", "/out/entries/entry"]],
        order: 2,
      },
    ]);

    expect(shapes).toEqual([
      { name: "title", sources: ["/doc/title"], destination: "/out/title", foreach: [], order: undefined },
      {
        name: "item",
        sources: ["/doc/list/item"],
        destination: "/out/entries/entry/text",
        foreach: [["/doc/list/item", "/out/entries/entry"]],
        order: 2,
      },
    ]);
  });

  it("rejects duplicate names before looking at any rule", () => {
    const entries = [
      { name: "same", destination: "/a" },
      { name: "same" },
    ];
    expect(() => validateRules(entries)).toThrow(DuplicateRuleError);
    expect(() => validateRules(entries)).toThrow(
      "Rule name same is defined multiple times (entries 0 and 1)",
    );
  });

  it("stops at the first invalid rule", () => {
    expect(() =>
      validateRules([{ name: "ok", destination: "/a" }, { name: "broken" }]),
    ).toThrow("Rule broken requires at least a destination declaration");
  });
});

describe("validateRule", () => {
  it("requires a destination", () => {
    expect(() => validateRule({ name: "r" })).toThrow(MissingDestinationError);
  });

  it("requires exactly one destination", () => {
    expect(() => validateRule({ name: "r", destination: [] })).toThrow(DestinationCountError);
    expect(() => validateRule({ name: "r", destination: ["/a", "/b"] })).toThrow(
      "A rule must have exactly 1 destination. r has 2",
    );
  });

  it("requires at least one foreach pair", () => {
    expect(() => validateRule({ name: "r", destination: "/a", foreach: [] })).toThrow(
      "A foreach rule requires at least one [source, destination] pair. r has 0",
    );
  });

  it("requires two entries per foreach pair", () => {
    expect(() => validateRule({ name: "r", destination: "/a", foreach: [["/x"]] })).toThrow(
      ForeachArityError,
    );
    expect(() =>
      validateRule({ name: "r", destination: "/a", foreach: [["/x", "/y", "/z"]] }),
    ).toThrow("foreach pairs must have exactly two entries. r has 3");
  });

  it("requires outer source bases to prefix inner ones", () => {
    expect(() =>
      validateRule({
        name: "r",
        destination: "/o/p/v",
        foreach: [
          ["/x/a", "/o"],
          ["/y/b", "/o/p"],
        ],
      }),
    ).toThrow(ForeachNestingError);

    expect(() =>
      validateRule({
        name: "r",
        destination: "/o/p/v",
        foreach: [
          ["/x/a", "/o"],
          ["/y/b", "/o/p"],
        ],
      }),
    ).toThrow("Outer foreach source base '/x/a' must be prefix of inner foreach source base '/y/b' (rule r)");
  });

  it("accepts properly nested foreach pairs", () => {
    const shape = validateRule({
      name: "r",
      destination: "/o/p/v",
      foreach: [
        ["/a", "/o"],
        ["/a/b", "/o/p"],
      ],
    });
    expect(shape.foreach).toEqual([
      ["/a", "/o"],
      ["/a/b", "/o/p"],
    ]);
  });

  it("rejects a fractional order", () => {
    expect(() => validateRule({ name: "r", destination: "/a", order: 1.5 })).toThrow(
      InvalidRuleDocumentError,
    );
  });
});
