import specialGlossTable from "./data/special-glosses.json" with { type: "json" };

import { validateSourceDictionary, type SourceEntry } from "./schema.js";

export interface CleanedGlosses {
  readonly glosses: string[];
  readonly isOld: boolean;
}

export interface CleanedEntry {
  [field: string]: unknown;
  glosses: Record<string, string[]>;
  is_old?: true;
  semantics?: Record<string, string>;
}

// Punctuation, digits and Latin letters carry their literal form as the English gloss.
const SPECIAL_GLOSSES: ReadonlyMap<string, readonly string[]> = new Map(Object.entries(specialGlossTable));

const OLD_SUFFIX = "_(OLD)";
const INFINITIVE_SUFFIX = "-(to)";
const PLURAL_FORM = /^(.*)\(s\)$/;
const TRAILING_CONTEXT = /^(.*?)\s*(\([^()]*\))$/;
const CONCRETIZATION_ID = "9009";

function expandPlural(part: string): string[] {
  const match = PLURAL_FORM.exec(part);
  if (!match) return [part];
  return [match[1], `${match[1]}s`];
}

/**
 * Turns one raw description such as `"autumn,fall_(season)"` into gloss entries:
 * `["autumn (season)", "fall (season)"]`. A trailing parenthesised context applies
 * to every comma-separated part; `word(s)` yields both `word` and `words`.
 */
export function cleanGlossText(raw: string): CleanedGlosses {
  if (raw.length === 0) {
    return { glosses: [], isOld: false };
  }
  let text = raw;
  let isOld = false;
  if (text.endsWith(OLD_SUFFIX)) {
    text = text.slice(0, -OLD_SUFFIX.length);
    isOld = true;
  }
  if (text.endsWith(INFINITIVE_SUFFIX)) {
    text = text.slice(0, -INFINITIVE_SUFFIX.length);
  }
  text = text.replaceAll("_", " ");

  let context = "";
  const contextMatch = TRAILING_CONTEXT.exec(text);
  if (contextMatch && contextMatch[2] !== "(s)") {
    text = contextMatch[1];
    context = ` ${contextMatch[2].trim()}`;
  }

  const glosses: string[] = [];
  for (const part of text.split(",").map((piece) => piece.trim())) {
    if (part.length === 0) continue;
    for (const form of expandPlural(part)) {
      glosses.push(`${form}${context}`);
    }
  }
  return { glosses, isOld };
}

function derivedSemantics(entry: SourceEntry): Record<string, string> {
  const semantics: Record<string, string> = {};
  if (entry.pos === "RED") {
    semantics.POS = "verb";
  } else if (entry.pos === "YELLOW" || entry.pos === "BLUE") {
    semantics.POS = "noun";
  }
  if (entry.composition?.some((part) => String(part) === CONCRETIZATION_ID)) {
    semantics.TYPE_SHIFT = "concretization";
  }
  return semantics;
}

function cleanEntry(id: string, entry: SourceEntry): CleanedEntry {
  const glosses: Record<string, string[]> = {};
  let isOld = false;

  for (const [language, text] of Object.entries(entry.description ?? {})) {
    const special = language === "en" ? SPECIAL_GLOSSES.get(id) : undefined;
    if (special) {
      glosses[language] = [...special];
      continue;
    }
    const cleaned = cleanGlossText(text);
    if (cleaned.isOld) isOld = true;
    if (cleaned.glosses.length > 0) glosses[language] = cleaned.glosses;
  }

  const cleaned: CleanedEntry = { glosses: {} };
  for (const [field, value] of Object.entries(entry)) {
    if (field !== "description") cleaned[field] = value;
  }
  cleaned.glosses = glosses;
  if (isOld) cleaned.is_old = true;
  const semantics = derivedSemantics(entry);
  if (Object.keys(semantics).length > 0) cleaned.semantics = semantics;
  return cleaned;
}

/**
 * Converts the source explanation export (`description` per language) into the
 * dictionary shape `loadDictionary` reads.
 */
export function cleanDictionary(raw: unknown): Record<string, CleanedEntry> {
  const source = validateSourceDictionary(raw);
  const out: Record<string, CleanedEntry> = {};
  for (const [id, entry] of Object.entries(source)) {
    out[id] = cleanEntry(id, entry);
  }
  return out;
}
