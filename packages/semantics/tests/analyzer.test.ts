import { describe, expect, it } from "vitest";

import { createSymbolClassifier } from "@blisskit/classifier";

import { createSemanticAnalyzer, glossesIn, UNKNOWN_GLOSS } from "../src/index.js";
import { dictionary, tables } from "./fixtures.js";

const classifier = createSymbolClassifier(dictionary, tables);
const analyzer = createSemanticAnalyzer(dictionary, classifier, { tables });

describe("extractSemantics", () => {
  it("reads the table for the requested role only", () => {
    expect(analyzer.extractSemantics("9011", "indicator")).toEqual({
      symbolId: "9011",
      role: "indicator",
      semantics: { kind: "simple", type: "NUMBER", value: "plural" },
    });
    expect(analyzer.extractSemantics("9011", "modifier")).toBeNull();
    expect(analyzer.extractSemantics("14905", "indicator")).toBeNull();
  });
});

describe("analyzeComposition", () => {
  it("lists indicator facts before modifier facts", () => {
    const result = analyzer.analyzeComposition(["14647", "14905", "24920", "9011"]);
    expect(result).toEqual({
      ok: true,
      value: {
        originalComposition: ["14647", "14905", "24920", "9011"],
        classifier: "14905",
        classifierInfo: { id: "14905", gloss: ["building"], isCharacter: true },
        specifiers: ["24920"],
        specifierInfo: [{ id: "24920", gloss: ["medicine"], isCharacter: true }],
        indicators: ["9011"],
        modifiers: ["14647"],
        semantics: [
          { symbolId: "9011", role: "indicator", semantics: { kind: "simple", type: "NUMBER", value: "plural" } },
          { symbolId: "14647", role: "modifier", semantics: { kind: "simple", type: "QUANTIFIER", value: "many" } },
        ],
      },
      warnings: [],
    });
  });

  it("keeps alternatives and combinations as stored", () => {
    const result = analyzer.analyzeComposition(["24961", "14905", "8998"]);
    if (!result.ok) throw new Error("expected analysis to succeed");
    expect(result.value.classifier).toBe("14905");
    expect(result.value.semantics).toEqual([
      {
        symbolId: "8998",
        role: "indicator",
        semantics: {
          kind: "combination",
          parts: [
            { type: "POS", value: "adjective" },
            { type: "FORM", value: "descriptive" },
          ],
        },
      },
      {
        symbolId: "24961",
        role: "modifier",
        semantics: {
          kind: "alternatives",
          options: [
            { type: "OPERATOR", value: "or" },
            { type: "OPERATOR", value: "either" },
          ],
        },
      },
    ]);
  });

  it("falls back to English glosses when the language is missing", () => {
    const result = analyzer.analyzeComposition(["14905", "24920"], "sv");
    if (!result.ok) throw new Error("expected analysis to succeed");
    expect(result.value.classifierInfo?.gloss).toEqual(["byggnad"]);
    expect(result.value.specifierInfo).toEqual([{ id: "24920", gloss: ["medicine"], isCharacter: true }]);
  });

  it("shows unknown symbols as a placeholder with a warning", () => {
    const result = analyzer.analyzeComposition(["14905", "99999"]);
    if (!result.ok) throw new Error("expected analysis to succeed");
    expect(result.value.specifierInfo).toEqual([{ id: "99999", gloss: ["(unknown)"], isCharacter: false }]);
    expect(result.warnings).toEqual(["symbol 99999 not found; gloss shown as (unknown)"]);
  });

  it("uses the placeholder without a warning for a known symbol with no glosses", () => {
    const result = analyzer.analyzeComposition(["14905", "12600"]);
    if (!result.ok) throw new Error("expected analysis to succeed");
    expect(result.value.specifierInfo).toEqual([{ id: "12600", gloss: ["(unknown)"], isCharacter: false }]);
    expect(result.warnings).toEqual([]);
  });

  it("reports classification errors with the assignment attached", () => {
    expect(analyzer.analyzeComposition(["9011", "14905"])).toEqual({
      ok: false,
      error: {
        code: "E_CLASSIFICATION",
        explain: "first symbol is an indicator; no classifier found before it",
        details: {
          classifier: null,
          specifiers: [],
          indicators: [],
          modifiers: [],
          errors: ["first symbol is an indicator; no classifier found before it"],
        },
      },
      warnings: [],
    });
  });
});

describe("getCompositionStructure", () => {
  it("summarises roles and glosses", () => {
    const result = analyzer.getCompositionStructure(["14647", "14905", "24920", "9011"]);
    expect(result).toEqual({
      ok: true,
      value: {
        originalComposition: ["14647", "14905", "24920", "9011"],
        structure: {
          classifier: "14905",
          specifiers: ["24920"],
          indicators: ["9011"],
          modifiers: ["14647"],
        },
        interpretation: {
          classifierGlosses: { id: "14905", gloss: ["building"], isCharacter: true },
          specifierGlosses: [{ id: "24920", gloss: ["medicine"], isCharacter: true }],
          indicatorCount: 1,
          modifierCount: 1,
        },
        errors: [],
      },
      warnings: [],
    });
  });

  it("carries classification errors inside the structure", () => {
    const result = analyzer.getCompositionStructure(["9011"]);
    if (!result.ok) throw new Error("expected a structure");
    expect(result.value.errors).toEqual(["first symbol is an indicator; no classifier found before it"]);
    expect(result.value.interpretation).toEqual({
      classifierGlosses: null,
      specifierGlosses: [],
      indicatorCount: 0,
      modifierCount: 0,
    });
  });
});

describe("gloss lookups", () => {
  it("returns one symbol's glosses in the requested language", () => {
    expect(analyzer.getSymbolGlosses("14905", "sv")).toEqual({
      ok: true,
      value: { id: "14905", glosses: ["byggnad"], explanation: "roof over walls", isCharacter: true },
      warnings: [],
    });
  });

  it("fails for an unknown symbol", () => {
    expect(analyzer.getSymbolGlosses("99999")).toEqual({
      ok: false,
      error: { code: "E_NOT_FOUND", explain: "Symbol 99999 not found", details: { id: "99999" } },
      warnings: [],
    });
  });

  it("skips markers and warns about missing symbols in a composition", () => {
    expect(analyzer.getCompositionGlosses(["14905", "/", "24920", ";", "99999"])).toEqual({
      ok: true,
      value: {
        composition: ["14905", "/", "24920", ";", "99999"],
        components: [
          { id: "14905", glosses: ["building"], explanation: "roof over walls", isCharacter: true },
          { id: "24920", glosses: ["medicine"], explanation: "", isCharacter: true },
        ],
      },
      warnings: ["Symbol 99999 not found"],
    });
  });

  it("prefers the requested language, then English, then the placeholder", () => {
    expect(glossesIn({ en: ["or"], sv: ["eller"] }, "sv")).toEqual(["eller"]);
    expect(glossesIn({ en: ["or"] }, "de")).toEqual(["or"]);
    expect(glossesIn({ sv: ["eller"] }, "de")).toBe(UNKNOWN_GLOSS);
  });
});

describe("getSymbolInfo", () => {
  it("describes a modifier with its table semantics", () => {
    expect(analyzer.getSymbolInfo("14647")).toEqual({
      ok: true,
      value: {
        id: "14647",
        pos: "WHITE",
        glosses: { en: ["many", "much"] },
        isCharacter: false,
        explanation: "",
        kind: "modifier",
        semantics: { kind: "simple", type: "QUANTIFIER", value: "many" },
      },
      warnings: [],
    });
  });

  it("reports the symbol's own semantics for plain characters", () => {
    const result = analyzer.getSymbolInfo("17700");
    if (!result.ok) throw new Error("expected symbol info");
    expect(result.value.kind).toBe("character_or_word");
    expect(result.value.semantics).toBeNull();
    expect(result.value.symbolSemantics).toEqual({ kind: "simple", type: "POS", value: "verb" });
  });

  it("fails for an unknown symbol", () => {
    const result = analyzer.getSymbolInfo("99999");
    expect(result.ok).toBe(false);
  });
});

describe("analyzeSymbolWithContext", () => {
  it("adds the classification of the surrounding composition", () => {
    const result = analyzer.analyzeSymbolWithContext("24920", ["14905", "24920"]);
    if (!result.ok) throw new Error("expected symbol analysis");
    expect(result.value.kind).toBe("character_or_word");
    expect(result.value.context).toEqual({
      classifier: "14905",
      specifiers: ["24920"],
      indicators: [],
      modifiers: [],
      errors: [],
    });
  });

  it("omits the context when none is given", () => {
    const result = analyzer.analyzeSymbolWithContext("9011");
    if (!result.ok) throw new Error("expected symbol analysis");
    expect(result.value.kind).toBe("indicator");
    expect(result.value).not.toHaveProperty("context");
  });
});
