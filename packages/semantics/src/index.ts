export { createSemanticAnalyzer } from "./analyzer.js";
export type { SemanticAnalyzerOptions } from "./analyzer.js";
export { extractSemantics } from "./extract.js";
export { DEFAULT_LANGUAGE, UNKNOWN_GLOSS, glossesIn, lookupGlosses } from "./glosses.js";
export type { GlossLookup } from "./glosses.js";
export type {
  CompositionAnalysis,
  CompositionGlosses,
  CompositionStructure,
  SemanticAnalyzer,
  SymbolGlossEntry,
  SymbolGlosses,
  SymbolInContext,
  SymbolInfo,
} from "./types.js";
