import type { Dictionary, LanguageCode, SymbolId } from "@blisskit/core";

import type { SymbolGlosses } from "./types.js";

export const UNKNOWN_GLOSS: readonly string[] = Object.freeze(["(unknown)"]);
export const DEFAULT_LANGUAGE: LanguageCode = "en";

export interface GlossLookup {
  readonly info: SymbolGlosses;
  readonly warning?: string;
}

/** Requested language, then English, then the "(unknown)" placeholder. */
export function glossesIn(
  glosses: Readonly<Record<LanguageCode, readonly string[]>>,
  language: LanguageCode,
): readonly string[] {
  if (Object.hasOwn(glosses, language)) {
    return glosses[language];
  }
  if (Object.hasOwn(glosses, DEFAULT_LANGUAGE)) {
    return glosses[DEFAULT_LANGUAGE];
  }
  return UNKNOWN_GLOSS;
}

export function lookupGlosses(dictionary: Dictionary, id: SymbolId, language: LanguageCode): GlossLookup {
  const record = dictionary.get(id);
  if (!record) {
    return {
      info: { id, gloss: UNKNOWN_GLOSS, isCharacter: false },
      warning: `symbol ${id} not found; gloss shown as (unknown)`,
    };
  }
  return {
    info: { id, gloss: glossesIn(record.glosses, language), isCharacter: record.isCharacter },
  };
}
