import type { Classification } from "@blisskit/classifier";
import type { Composition } from "@blisskit/composer";
import type {
  DictionaryStats,
  LanguageCode,
  Result,
  RoleAssignment,
  SemanticTables,
  SymbolId,
  Token,
} from "@blisskit/core";
import type {
  CompositionAnalysis,
  CompositionGlosses,
  CompositionStructure,
  SymbolGlossEntry,
  SymbolInContext,
  SymbolInfo,
} from "@blisskit/semantics";

export interface EngineOptions {
  /** Modifier and indicator tables; the bundled tables when omitted. */
  readonly semantics?: SemanticTables;
  /** Gloss language used when a call does not name one. */
  readonly language?: LanguageCode;
}

export interface EngineStats extends DictionaryStats {
  readonly description: string;
}

export interface BlissEngine {
  readonly language: LanguageCode;
  getSymbolGlosses(id: SymbolId, language?: LanguageCode): Result<SymbolGlossEntry>;
  getCompositionGlosses(tokens: readonly Token[], language?: LanguageCode): Result<CompositionGlosses>;
  analyzeComposition(tokens: readonly Token[], language?: LanguageCode): Result<CompositionAnalysis>;
  getCompositionStructure(tokens: readonly Token[], language?: LanguageCode): Result<CompositionStructure>;
  analyzeSymbolWithContext(
    id: SymbolId,
    contextTokens?: readonly Token[],
    language?: LanguageCode,
  ): Result<SymbolInContext>;
  getSymbolInfo(id: SymbolId): Result<SymbolInfo>;
  composeFromSpec(spec: unknown): Result<Composition>;
  composeWithIds(
    classifier: SymbolId,
    specifiers?: readonly SymbolId[],
    modifiers?: readonly SymbolId[],
    indicators?: readonly SymbolId[],
  ): Result<Composition>;
  classify(tokens: readonly Token[]): RoleAssignment;
  explain(tokens: readonly Token[]): Classification;
  isClassifier(id: SymbolId): boolean;
  isModifier(id: SymbolId): boolean;
  isIndicator(id: SymbolId): boolean;
  stats(): EngineStats;
}
