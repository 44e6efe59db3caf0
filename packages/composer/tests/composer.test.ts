import { afterEach, describe, expect, it } from "vitest";

import { flush, formatTraceEvent, resetTraceForTests, setTraceEnabled } from "@blisskit/core";

import { createReverseComposer } from "../src/index.js";
import { dictionary, tables } from "./fixtures.js";

const composer = createReverseComposer(dictionary, tables);

describe("reverse indices", () => {
  it("indexes English glosses and simple semantic effects", () => {
    expect(composer.indices.glossToId.get("building")).toBe("14905");
    expect(composer.indices.glossToId.get("shelter")).toBe("30000");
    expect(composer.indices.glossToId.has("medicin")).toBe(false);
    expect([...composer.indices.semanticPathToId]).toEqual([["ACTION:motion", "17700"]]);
    expect([...composer.indices.idToSemanticEffect.keys()]).toEqual(["17700", "17800", "26000"]);
  });

  it("prefers the character for a shared gloss whatever the insertion order", () => {
    const reversed = createReverseComposer(new Map([...dictionary].reverse()), tables);
    expect(reversed.indices.glossToId.get("building")).toBe("14905");
  });
});

describe("findByGloss", () => {
  it("falls back to a case-insensitive scan over every language", () => {
    expect(composer.findByGloss("Mystery Box")).toBe("25555");
    expect(composer.findByGloss("mystery box")).toBe("25555");
    expect(composer.findByGloss("MEDICIN")).toBe("24920");
  });

  it("takes the first symbol in dictionary order during the scan", () => {
    expect(composer.findByGloss("BUILDING")).toBe("12000");
  });

  it("returns null when nothing matches", () => {
    expect(composer.findByGloss("castle")).toBeNull();
  });
});

describe("findSemanticSymbol", () => {
  it("searches indicators before modifiers", () => {
    expect(composer.findSemanticSymbol("NUMBER", "plural")).toBe("9011");
    expect(composer.findSemanticSymbol("QUANTIFIER", "many")).toBe("14647");
  });

  it("matches values case-insensitively and types exactly", () => {
    expect(composer.findSemanticSymbol("NUMBER", "PLURAL")).toBe("9011");
    expect(composer.findSemanticSymbol("number", "plural")).toBeNull();
  });

  it("looks inside alternatives and combinations", () => {
    expect(composer.findSemanticSymbol("OPERATOR", "either")).toBe("24961");
    expect(composer.findSemanticSymbol("FORM", "descriptive")).toBe("8998");
  });

  it("ignores the symbols' own semantic effects", () => {
    expect(composer.indices.semanticPathToId.get("ACTION:motion")).toBe("17700");
    expect(composer.findSemanticSymbol("ACTION", "motion")).toBeNull();
  });
});

describe("composeFromSpec", () => {
  it("orders classifier, specifiers, then semantics as given", () => {
    expect(
      composer.composeFromSpec({
        classifier: "building",
        specifiers: ["medicine"],
        semantics: [{ NUMBER: "plural" }, { QUANTIFIER: "many" }],
      }),
    ).toEqual({ ok: true, value: { composition: ["14905", "24920", "9011", "14647"] }, warnings: [] });
  });

  it("skips unresolved parts with warnings", () => {
    expect(
      composer.composeFromSpec({
        classifier: "building",
        specifiers: ["castle", "medicine"],
        semantics: [{ COLOR: "red" }, { NUMBER: "plural", QUANTIFIER: "many" }, {}],
      }),
    ).toEqual({
      ok: true,
      value: { composition: ["14905", "24920"] },
      warnings: [
        "Specifier not found: castle",
        "No symbol found for semantic COLOR:red",
        'Complex semantic spec not fully supported: {"NUMBER":"plural","QUANTIFIER":"many"}',
        "Complex semantic spec not fully supported: {}",
      ],
    });
  });

  it("warns about semantics only a symbol's own effect carries", () => {
    expect(composer.composeFromSpec({ classifier: "medicine", semantics: [{ ACTION: "motion" }] })).toEqual({
      ok: true,
      value: { composition: ["24920"] },
      warnings: ["No symbol found for semantic ACTION:motion"],
    });
  });

  it("matches semantic values regardless of case", () => {
    const lower = composer.composeFromSpec({ classifier: "building", semantics: [{ NUMBER: "plural" }] });
    const mixed = composer.composeFromSpec({ classifier: "building", semantics: [{ NUMBER: "Plural" }] });
    expect(lower).toEqual({ ok: true, value: { composition: ["14905", "9011"] }, warnings: [] });
    expect(mixed).toEqual(lower);
  });

  it("requires a classifier", () => {
    expect(composer.composeFromSpec({ specifiers: ["medicine"] })).toEqual({
      ok: false,
      error: { code: "E_MISSING_FIELD", explain: "Missing required field: classifier" },
      warnings: [],
    });
  });

  it("fails when the classifier gloss is unknown", () => {
    expect(composer.composeFromSpec({ classifier: "castle" })).toEqual({
      ok: false,
      error: { code: "E_NOT_FOUND", explain: "Classifier not found: castle", details: { gloss: "castle" } },
      warnings: [],
    });
  });

  it("rejects malformed specs", () => {
    const wrongType = composer.composeFromSpec({ classifier: 7 });
    expect(wrongType.ok).toBe(false);
    if (wrongType.ok) return;
    expect(wrongType.error).toEqual({
      code: "E_INVALID_SPEC",
      explain: "Invalid compose spec: /classifier must be string",
    });

    const notAnObject = composer.composeFromSpec("building");
    expect(notAnObject.ok ? "ok" : notAnObject.error.code).toBe("E_INVALID_SPEC");
  });
});

describe("composeWithIds", () => {
  it("puts modifiers before the classifier and indicators last", () => {
    expect(composer.composeWithIds("14905", ["24920"], ["14647"], ["9011"])).toEqual({
      ok: true,
      value: { composition: ["14647", "14905", "24920", "9011"] },
      warnings: [],
    });
  });

  it("drops ids missing from the dictionary", () => {
    expect(composer.composeWithIds("14905", ["99999"], ["88888"], ["77777"])).toEqual({
      ok: true,
      value: { composition: ["14905"] },
      warnings: ["Modifier 88888 not found", "Specifier 99999 not found", "Indicator 77777 not found"],
    });
  });

  it("fails on a missing classifier and keeps earlier warnings", () => {
    expect(composer.composeWithIds("99999", [], ["88888"])).toEqual({
      ok: false,
      error: { code: "E_NOT_FOUND", explain: "Classifier 99999 not found", details: { id: "99999" } },
      warnings: ["Modifier 88888 not found"],
    });
  });
});

describe("resolution trace", () => {
  afterEach(() => {
    resetTraceForTests();
  });

  it("records how each part was resolved", () => {
    setTraceEnabled(true);
    composer.composeFromSpec({
      classifier: "building",
      specifiers: ["castle"],
      semantics: [{ ACTION: "motion" }, { NUMBER: "plural" }],
    });
    expect(flush().map(formatTraceEvent)).toEqual([
      'resolve via=gloss query="building" id=14905',
      'unresolved query="castle"',
      'unresolved query="ACTION:motion"',
      'resolve via=semantic-table query="NUMBER:plural" id=9011',
    ]);
  });
});
