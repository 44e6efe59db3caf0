import type { Result, SemanticDescriptor, SymbolId } from "@blisskit/core";

export interface Composition {
  readonly composition: readonly SymbolId[];
}

/** Lookup tables built once per composer from the dictionary it was given. */
export interface ReverseIndices {
  readonly glossToId: ReadonlyMap<string, SymbolId>;
  readonly idToSemanticEffect: ReadonlyMap<SymbolId, SemanticDescriptor>;
  readonly semanticPathToId: ReadonlyMap<string, SymbolId>;
}

export interface ReverseComposer {
  readonly indices: ReverseIndices;
  findByGloss(gloss: string): SymbolId | null;
  findSemanticSymbol(type: string, value: string): SymbolId | null;
  /** Accepts `{ classifier, specifiers?, semantics? }`; anything else fails with E_INVALID_SPEC. */
  composeFromSpec(spec: unknown): Result<Composition>;
  composeWithIds(
    classifier: SymbolId,
    specifiers?: readonly SymbolId[],
    modifiers?: readonly SymbolId[],
    indicators?: readonly SymbolId[],
  ): Result<Composition>;
}
