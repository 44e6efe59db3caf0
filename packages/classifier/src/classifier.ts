import {
  defaultSemanticTables,
  emit,
  isHeadPos,
  isSatellitePos,
  isSymbolId,
  type Dictionary,
  type RoleAssignment,
  type SemanticTables,
  type SymbolId,
  type Token,
} from "@blisskit/core";

import { CLASSIFY_ERRORS, ROLE_RULES, emptyAssignment } from "./rules.js";
import type { Classification, RoleRule, RuleContext, SymbolClassifier, SymbolKind } from "./types.js";

/** Keeps numeric ids in order; rendering markers such as "/" and ";" are dropped silently. */
export function filterSymbolIds(tokens: readonly Token[]): SymbolId[] {
  return tokens.map((token) => String(token)).filter(isSymbolId);
}

export function runRules(rules: readonly RoleRule[], ctx: RuleContext): Classification {
  if (ctx.ids.length === 0) {
    return { rule: null, assignment: emptyAssignment(CLASSIFY_ERRORS.noValidIds) };
  }
  for (const rule of rules) {
    if (rule.matches(ctx)) {
      return { rule: rule.name, assignment: rule.assign(ctx) };
    }
  }
  return { rule: null, assignment: emptyAssignment(CLASSIFY_ERRORS.noClassifier) };
}

export function createSymbolClassifier(
  dictionary: Dictionary,
  tables: SemanticTables = defaultSemanticTables(),
): SymbolClassifier {
  const modifiers: ReadonlySet<SymbolId> = new Set(tables.modifiers.keys());
  const indicators: ReadonlySet<SymbolId> = new Set(tables.indicators.keys());

  const posOf = (id: SymbolId): string => dictionary.get(id)?.posCategory ?? "";
  const isClassifier = (id: SymbolId): boolean => isHeadPos(posOf(id));
  const isModifier = (id: SymbolId): boolean => modifiers.has(id);
  const isIndicator = (id: SymbolId): boolean => indicators.has(id);

  const contextFor = (ids: readonly SymbolId[]): RuleContext => ({
    ids,
    isIndicator,
    isModifier,
    isClassifier,
    isSatellite: (id) => isSatellitePos(posOf(id)),
    isKnown: (id) => dictionary.has(id),
  });

  const explain = (tokens: readonly Token[]): Classification => {
    const ids = filterSymbolIds(tokens);
    const result = runRules(ROLE_RULES, contextFor(ids));
    emit({ kind: "classify", rule: result.rule ?? "none", ids });
    return result;
  };

  return {
    classify: (tokens) => explain(tokens).assignment,
    explain,
    isClassifier,
    isModifier,
    isIndicator,
    isSpecifier: (id) => dictionary.has(id),
    kindOf(id): SymbolKind {
      if (isModifier(id)) return "modifier";
      if (isIndicator(id)) return "indicator";
      return "character_or_word";
    },
  };
}
