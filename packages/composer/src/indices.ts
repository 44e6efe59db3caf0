import { semanticPath, type Dictionary, type SemanticDescriptor, type SymbolId } from "@blisskit/core";

import type { ReverseIndices } from "./types.js";

/**
 * English glosses map to the first symbol that carries them, except that a character
 * takes a gloss over from a composed word. Semantic paths index simple effects only,
 * first writer wins.
 */
export function buildReverseIndices(dictionary: Dictionary): ReverseIndices {
  const glossToId = new Map<string, SymbolId>();
  const idToSemanticEffect = new Map<SymbolId, SemanticDescriptor>();
  const semanticPathToId = new Map<string, SymbolId>();

  for (const [id, record] of dictionary) {
    for (const gloss of record.glosses.en ?? []) {
      const existing = glossToId.get(gloss);
      if (existing === undefined) {
        glossToId.set(gloss, id);
      } else if (record.isCharacter && !dictionary.get(existing)?.isCharacter) {
        glossToId.set(gloss, id);
      }
    }

    const effect = record.semanticEffect;
    if (!effect) continue;
    idToSemanticEffect.set(id, effect);
    if (effect.kind === "simple") {
      const path = semanticPath(effect.type, effect.value);
      if (!semanticPathToId.has(path)) {
        semanticPathToId.set(path, id);
      }
    }
  }

  return { glossToId, idToSemanticEffect, semanticPathToId };
}
