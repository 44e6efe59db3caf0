import type { RoleAssignment, SymbolId, Token } from "@blisskit/core";

export type RuleName = "indicator-anchored" | "part-of-speech" | "satellite-fallback";

export type SymbolKind = "modifier" | "indicator" | "character_or_word";

/** Read-only view over the dictionary and semantic tables that every rule sees. */
export interface RuleContext {
  readonly ids: readonly SymbolId[];
  isIndicator(id: SymbolId): boolean;
  isModifier(id: SymbolId): boolean;
  isClassifier(id: SymbolId): boolean;
  isSatellite(id: SymbolId): boolean;
  isKnown(id: SymbolId): boolean;
}

export interface RoleRule {
  readonly name: RuleName;
  matches(ctx: RuleContext): boolean;
  assign(ctx: RuleContext): RoleAssignment;
}

export interface Classification {
  readonly rule: RuleName | null;
  readonly assignment: RoleAssignment;
}

export interface SymbolClassifier {
  classify(tokens: readonly Token[]): RoleAssignment;
  explain(tokens: readonly Token[]): Classification;
  isClassifier(id: SymbolId): boolean;
  isModifier(id: SymbolId): boolean;
  isIndicator(id: SymbolId): boolean;
  isSpecifier(id: SymbolId): boolean;
  kindOf(id: SymbolId): SymbolKind;
}
