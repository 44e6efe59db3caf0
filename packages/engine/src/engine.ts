import { createSymbolClassifier } from "@blisskit/classifier";
import { createReverseComposer } from "@blisskit/composer";
import {
  assertDictionary,
  defaultSemanticTables,
  dictionaryStats,
  loadDictionary,
  type Dictionary,
} from "@blisskit/core";
import { DEFAULT_LANGUAGE, createSemanticAnalyzer } from "@blisskit/semantics";

import type { BlissEngine, EngineOptions } from "./types.js";

/**
 * One classifier, analyzer and composer over a shared read-only dictionary.
 * Throws `TypeError` when `dictionary` is not a loaded dictionary.
 */
export function createEngine(dictionary: Dictionary, options: EngineOptions = {}): BlissEngine {
  const checked = assertDictionary(dictionary);
  const tables = options.semantics ?? defaultSemanticTables();
  const language = options.language ?? DEFAULT_LANGUAGE;

  const classifier = createSymbolClassifier(checked, tables);
  const analyzer = createSemanticAnalyzer(checked, classifier, { tables, language });
  const composer = createReverseComposer(checked, tables);

  return {
    language,
    getSymbolGlosses: (id, lang) => analyzer.getSymbolGlosses(id, lang),
    getCompositionGlosses: (tokens, lang) => analyzer.getCompositionGlosses(tokens, lang),
    analyzeComposition: (tokens, lang) => analyzer.analyzeComposition(tokens, lang),
    getCompositionStructure: (tokens, lang) => analyzer.getCompositionStructure(tokens, lang),
    analyzeSymbolWithContext: (id, contextTokens, lang) => analyzer.analyzeSymbolWithContext(id, contextTokens, lang),
    getSymbolInfo: (id) => analyzer.getSymbolInfo(id),
    composeFromSpec: (spec) => composer.composeFromSpec(spec),
    composeWithIds: (classifierId, specifiers, modifiers, indicators) =>
      composer.composeWithIds(classifierId, specifiers, modifiers, indicators),
    classify: (tokens) => classifier.classify(tokens),
    explain: (tokens) => classifier.explain(tokens),
    isClassifier: (id) => classifier.isClassifier(id),
    isModifier: (id) => classifier.isModifier(id),
    isIndicator: (id) => classifier.isIndicator(id),
    stats: () => ({ ...dictionaryStats(checked), description: "Blissymbolics symbol dictionary" }),
  };
}

/** Builds the engine straight from the dictionary's JSON form. */
export function createEngineFromJson(raw: unknown, options: EngineOptions = {}): BlissEngine {
  return createEngine(loadDictionary(raw), options);
}
