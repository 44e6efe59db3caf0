import { pairsOf, type Dictionary, type LanguageCode, type SemanticDescriptor, type SymbolId } from "@blisskit/core";

export interface DuplicateReport {
  /** language → `"gloss (OLD, POS: noun)"` → ids sharing that gloss and metadata */
  readonly duplicates: Record<LanguageCode, Record<string, SymbolId[]>>;
  readonly groupsPerLanguage: Record<LanguageCode, number>;
  readonly totalGroups: number;
}

interface Group {
  readonly extras: readonly string[];
  readonly ids: SymbolId[];
}

function semanticExtras(effect: SemanticDescriptor | undefined): string[] {
  if (!effect) return [];
  const parts = pairsOf(effect).map((pair) => `${pair.type}: ${pair.value}`);
  if (effect.kind === "alternatives") {
    return [parts.join(" or ")];
  }
  return parts.sort();
}

const compareIds = (a: SymbolId, b: SymbolId): number => {
  const numeric = /^\d+$/;
  if (numeric.test(a) && numeric.test(b)) return Number(a) - Number(b);
  return a < b ? -1 : a > b ? 1 : 0;
};

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Groups, per language, the glosses that more than one symbol shares while also
 * sharing the same `is_old` flag and semantic effect.
 */
export function findDuplicateGlosses(dictionary: Dictionary): DuplicateReport {
  const byLanguage = new Map<LanguageCode, Map<string, Map<string, Group>>>();

  for (const [id, record] of dictionary) {
    const extras = [...(record.isOld ? ["OLD"] : []), ...semanticExtras(record.semanticEffect)];
    const signature = JSON.stringify(extras);
    for (const [language, glosses] of Object.entries(record.glosses)) {
      let byGloss = byLanguage.get(language);
      if (!byGloss) {
        byGloss = new Map();
        byLanguage.set(language, byGloss);
      }
      for (const gloss of glosses) {
        let bySignature = byGloss.get(gloss);
        if (!bySignature) {
          bySignature = new Map();
          byGloss.set(gloss, bySignature);
        }
        const group = bySignature.get(signature);
        if (group) {
          group.ids.push(id);
        } else {
          bySignature.set(signature, { extras, ids: [id] });
        }
      }
    }
  }

  const duplicates: Record<LanguageCode, Record<string, SymbolId[]>> = {};
  const groupsPerLanguage: Record<LanguageCode, number> = {};
  let totalGroups = 0;

  for (const [language, byGloss] of byLanguage) {
    const found: [string, SymbolId[]][] = [];
    for (const [gloss, bySignature] of byGloss) {
      for (const group of bySignature.values()) {
        if (group.ids.length < 2) continue;
        const key = group.extras.length > 0 ? `${gloss} (${group.extras.join(", ")})` : gloss;
        found.push([key, [...group.ids].sort(compareIds)]);
      }
    }
    if (found.length === 0) continue;
    found.sort(([a], [b]) => compareKeys(a, b));
    duplicates[language] = Object.fromEntries(found);
    groupsPerLanguage[language] = found.length;
    totalGroups += found.length;
  }

  return { duplicates, groupsPerLanguage, totalGroups };
}

export function formatDuplicateSummary(report: DuplicateReport): string[] {
  const languages = Object.keys(report.groupsPerLanguage).sort(compareKeys);
  return [
    `Total duplicate groups found: ${report.totalGroups}`,
    ...languages.map((language) => `${language.padEnd(10)} | ${report.groupsPerLanguage[language]}`),
  ];
}
