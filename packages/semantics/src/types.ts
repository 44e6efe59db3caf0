import type {
  LanguageCode,
  Result,
  RoleAssignment,
  SemanticDescriptor,
  SemanticFact,
  SymbolId,
  SymbolRole,
  Token,
} from "@blisskit/core";
import type { SymbolKind } from "@blisskit/classifier";

export interface SymbolGlosses {
  readonly id: SymbolId;
  readonly gloss: readonly string[];
  readonly isCharacter: boolean;
}

export interface SymbolGlossEntry {
  readonly id: SymbolId;
  readonly glosses: readonly string[];
  readonly explanation: string;
  readonly isCharacter: boolean;
}

export interface CompositionAnalysis {
  readonly originalComposition: readonly string[];
  readonly classifier: SymbolId | null;
  readonly classifierInfo: SymbolGlosses | null;
  readonly specifiers: readonly SymbolId[];
  readonly specifierInfo: readonly SymbolGlosses[];
  readonly indicators: readonly SymbolId[];
  readonly modifiers: readonly SymbolId[];
  readonly semantics: readonly SemanticFact[];
}

export interface CompositionStructure {
  readonly originalComposition: readonly string[];
  readonly structure: {
    readonly classifier: SymbolId | null;
    readonly specifiers: readonly SymbolId[];
    readonly indicators: readonly SymbolId[];
    readonly modifiers: readonly SymbolId[];
  };
  readonly interpretation: {
    readonly classifierGlosses: SymbolGlosses | null;
    readonly specifierGlosses: readonly SymbolGlosses[];
    readonly indicatorCount: number;
    readonly modifierCount: number;
  };
  readonly errors: readonly string[];
}

export interface CompositionGlosses {
  readonly composition: readonly string[];
  readonly components: readonly SymbolGlossEntry[];
}

export interface SymbolInfo {
  readonly id: SymbolId;
  readonly pos: string;
  readonly glosses: Readonly<Record<LanguageCode, readonly string[]>>;
  readonly isCharacter: boolean;
  readonly explanation: string;
  readonly kind: SymbolKind;
  readonly semantics: SemanticDescriptor | null;
  readonly symbolSemantics?: SemanticDescriptor;
}

export interface SymbolInContext extends SymbolGlossEntry {
  readonly kind: SymbolKind;
  readonly context?: RoleAssignment;
}

export interface SemanticAnalyzer {
  extractSemantics(id: SymbolId, role: SymbolRole): SemanticFact | null;
  collectSemantics(assignment: RoleAssignment): SemanticFact[];
  analyzeComposition(tokens: readonly Token[], language?: LanguageCode): Result<CompositionAnalysis>;
  getCompositionStructure(tokens: readonly Token[], language?: LanguageCode): Result<CompositionStructure>;
  getSymbolGlosses(id: SymbolId, language?: LanguageCode): Result<SymbolGlossEntry>;
  getCompositionGlosses(tokens: readonly Token[], language?: LanguageCode): Result<CompositionGlosses>;
  getSymbolInfo(id: SymbolId): Result<SymbolInfo>;
  analyzeSymbolWithContext(
    id: SymbolId,
    contextTokens?: readonly Token[],
    language?: LanguageCode,
  ): Result<SymbolInContext>;
}
