import { deepFreeze } from "./freeze.js";
import type {
  Dictionary,
  HeadPos,
  RawSemantics,
  RawSymbolRecord,
  SatellitePos,
  SemanticDescriptor,
  SemanticPair,
  SymbolId,
  SymbolRecord,
} from "./types.js";
import { isPlainObject } from "@blisskit/utils";
import { validateSymbolRecord } from "./validate.js";

export const HEAD_POS: ReadonlySet<string> = new Set<HeadPos>(["YELLOW", "RED", "GREEN", "BLUE"]);
export const SATELLITE_POS: ReadonlySet<string> = new Set<SatellitePos>(["GREY", "WHITE"]);

const SYMBOL_ID_PATTERN = /^\d+$/;

export function isSymbolId(token: unknown): token is SymbolId {
  return typeof token === "string" && SYMBOL_ID_PATTERN.test(token);
}

export function isHeadPos(pos: string): boolean {
  return HEAD_POS.has(pos);
}

export function isSatellitePos(pos: string): boolean {
  return SATELLITE_POS.has(pos);
}

function toPair(raw: { type: string; value: string }): SemanticPair {
  return { type: raw.type, value: raw.value };
}

/**
 * Converts any accepted on-disk semantics shape into the closed descriptor.
 * A flat `{ TYPE: value }` map with one entry is simple; with more it is a combination.
 */
export function toDescriptor(raw: RawSemantics): SemanticDescriptor {
  if ("or" in raw && Array.isArray(raw.or)) {
    return { kind: "alternatives", options: raw.or.map(toPair) };
  }
  if ("and" in raw && Array.isArray(raw.and)) {
    return { kind: "combination", parts: raw.and.map(toPair) };
  }
  const entries: [string, unknown][] = Object.entries(raw);
  const keys = entries.map(([key]) => key).sort();
  if (keys.length === 2 && keys[0] === "type" && keys[1] === "value") {
    const type = entries.find(([key]) => key === "type")?.[1];
    const value = entries.find(([key]) => key === "value")?.[1];
    if (typeof type === "string" && typeof value === "string") {
      return { kind: "simple", type, value };
    }
  }
  const pairs: SemanticPair[] = [];
  for (const [type, value] of entries) {
    if (typeof value === "string") {
      pairs.push({ type, value });
    }
  }
  if (pairs.length === 1) {
    return { kind: "simple", type: pairs[0].type, value: pairs[0].value };
  }
  return { kind: "combination", parts: pairs };
}

export function toSymbolRecord(raw: RawSymbolRecord): SymbolRecord {
  const glosses: Record<string, readonly string[]> = {};
  for (const [language, list] of Object.entries(raw.glosses ?? {})) {
    glosses[language] = [...list];
  }
  const record: SymbolRecord = {
    posCategory: raw.pos ?? "",
    isCharacter: raw.isCharacter ?? false,
    glosses,
    explanation: raw.explanation ?? "",
    isOld: raw.is_old ?? false,
    ...(raw.semantics ? { semanticEffect: toDescriptor(raw.semantics) } : {}),
  };
  return record;
}

/**
 * Builds the read-only dictionary from its JSON form (`{ "<id>": { pos, glosses, ... } }`).
 * Throws `TypeError` when the payload is not a mapping and `Error` when a record is malformed.
 */
export function loadDictionary(raw: unknown): Dictionary {
  if (!isPlainObject(raw)) {
    throw new TypeError("dictionary must be a mapping of symbol ids to symbol records");
  }
  const dictionary = new Map<SymbolId, SymbolRecord>();
  for (const [id, value] of Object.entries(raw)) {
    dictionary.set(id, toSymbolRecord(validateSymbolRecord(value, id)));
  }
  return deepFreeze(dictionary);
}

/** Fails fast for anything that is not an already-built dictionary. */
export function assertDictionary(value: unknown): Dictionary {
  if (!(value instanceof Map)) {
    throw new TypeError("dictionary must be a mapping of symbol ids to symbol records");
  }
  const dictionary: Dictionary = value;
  return dictionary;
}

export interface DictionaryStats {
  readonly symbols: number;
  readonly characters: number;
  readonly composedWords: number;
}

export function dictionaryStats(dictionary: Dictionary): DictionaryStats {
  let characters = 0;
  for (const record of dictionary.values()) {
    if (record.isCharacter) characters += 1;
  }
  return {
    symbols: dictionary.size,
    characters,
    composedWords: dictionary.size - characters,
  };
}
