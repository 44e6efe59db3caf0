import type { SemanticFact, SemanticTables, SymbolId, SymbolRole } from "@blisskit/core";

/**
 * Looks the id up in the table for its role. The stored descriptor is returned as is,
 * so alternatives stay alternatives and combinations stay combinations.
 */
export function extractSemantics(tables: SemanticTables, id: SymbolId, role: SymbolRole): SemanticFact | null {
  const table = role === "indicator" ? tables.indicators : tables.modifiers;
  const semantics = table.get(id);
  if (!semantics) {
    return null;
  }
  return { symbolId: id, role, semantics };
}
