export type SymbolId = string;

/** A symbol id or a rendering marker such as "/" or ";". Numbers are accepted as ids. */
export type Token = string | number;

export type HeadPos = "YELLOW" | "RED" | "GREEN" | "BLUE";
export type SatellitePos = "GREY" | "WHITE";

export type LanguageCode = string;

export interface SemanticPair {
  readonly type: string;
  readonly value: string;
}

export interface SimpleSemantics {
  readonly kind: "simple";
  readonly type: string;
  readonly value: string;
}

/** Any one of the options may be intended. */
export interface AlternativeSemantics {
  readonly kind: "alternatives";
  readonly options: readonly SemanticPair[];
}

/** Every part applies at once. */
export interface CombinedSemantics {
  readonly kind: "combination";
  readonly parts: readonly SemanticPair[];
}

export type SemanticDescriptor = SimpleSemantics | AlternativeSemantics | CombinedSemantics;

export interface SymbolRecord {
  readonly posCategory: string;
  readonly isCharacter: boolean;
  readonly glosses: Readonly<Record<LanguageCode, readonly string[]>>;
  readonly explanation: string;
  readonly isOld: boolean;
  readonly semanticEffect?: SemanticDescriptor;
}

export type Dictionary = ReadonlyMap<SymbolId, SymbolRecord>;

export interface SemanticTables {
  readonly modifiers: ReadonlyMap<SymbolId, SemanticDescriptor>;
  readonly indicators: ReadonlyMap<SymbolId, SemanticDescriptor>;
}

export type SymbolRole = "indicator" | "modifier";

export interface RoleAssignment {
  readonly classifier: SymbolId | null;
  readonly specifiers: readonly SymbolId[];
  readonly indicators: readonly SymbolId[];
  readonly modifiers: readonly SymbolId[];
  readonly errors: readonly string[];
}

export interface SemanticFact {
  readonly symbolId: SymbolId;
  readonly role: SymbolRole;
  readonly semantics: SemanticDescriptor;
}

// On-disk shapes, before validation and conversion.

export interface RawSemanticPair {
  type: string;
  value: string;
}

export interface RawAlternatives {
  or: RawSemanticPair[];
}

export interface RawCombination {
  and: RawSemanticPair[];
}

export type RawSemantics = RawSemanticPair | RawAlternatives | RawCombination | Record<string, string>;

export interface RawSymbolRecord {
  pos?: string;
  isCharacter?: boolean;
  glosses?: Record<LanguageCode, string[]>;
  explanation?: string;
  semantics?: RawSemantics;
  is_old?: boolean;
}

export interface RawSemanticTables {
  modifiers: Record<SymbolId, RawSemantics>;
  indicators: Record<SymbolId, RawSemantics>;
}
