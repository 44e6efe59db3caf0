import type { RoleAssignment, SymbolId } from "@blisskit/core";

import type { RoleRule, RuleContext } from "./types.js";

export const CLASSIFY_ERRORS = {
  noValidIds: "no valid symbol ids found",
  firstIsIndicator: "first symbol is an indicator; no classifier found before it",
  noClassifier: "no classifier found in composition",
  unknownSymbol: (id: SymbolId) => `symbol ${id} not found in knowledge graph`,
} as const;

interface Buckets {
  classifier: SymbolId | null;
  specifiers: SymbolId[];
  indicators: SymbolId[];
  modifiers: SymbolId[];
  errors: string[];
}

const emptyBuckets = (): Buckets => ({
  classifier: null,
  specifiers: [],
  indicators: [],
  modifiers: [],
  errors: [],
});

export function emptyAssignment(error?: string): RoleAssignment {
  const buckets = emptyBuckets();
  if (error) buckets.errors.push(error);
  return buckets;
}

// Walks the ids by colour: modifiers first, then the first head-bearing symbol,
// every later head-bearing symbol drops to specifier.
function walkByPartOfSpeech(ctx: RuleContext): Buckets {
  const buckets = emptyBuckets();
  for (const id of ctx.ids) {
    if (ctx.isModifier(id)) {
      buckets.modifiers.push(id);
    } else if (ctx.isClassifier(id) && buckets.classifier === null) {
      buckets.classifier = id;
    } else {
      buckets.specifiers.push(id);
    }
  }
  return buckets;
}

const indicatorAnchored: RoleRule = {
  name: "indicator-anchored",
  matches: (ctx) => ctx.ids.some((id) => ctx.isIndicator(id)),
  assign(ctx) {
    const first = ctx.ids.findIndex((id) => ctx.isIndicator(id));
    if (first === 0) {
      return emptyAssignment(CLASSIFY_ERRORS.firstIsIndicator);
    }
    const buckets = emptyBuckets();
    buckets.classifier = ctx.ids[first - 1];
    buckets.modifiers.push(...ctx.ids.slice(0, first - 1));
    for (const id of ctx.ids.slice(first)) {
      if (ctx.isIndicator(id)) {
        buckets.indicators.push(id);
      } else if (ctx.isModifier(id)) {
        buckets.modifiers.push(id);
      } else {
        buckets.specifiers.push(id);
      }
    }
    return buckets;
  },
};

const partOfSpeech: RoleRule = {
  name: "part-of-speech",
  matches: (ctx) => ctx.ids.some((id) => !ctx.isModifier(id) && ctx.isClassifier(id)),
  assign: walkByPartOfSpeech,
};

const satelliteFallback: RoleRule = {
  name: "satellite-fallback",
  matches: () => true,
  assign(ctx) {
    const buckets = walkByPartOfSpeech(ctx);
    const first = ctx.ids[0];
    if (!ctx.isKnown(first)) {
      buckets.errors.push(CLASSIFY_ERRORS.unknownSymbol(first));
      return buckets;
    }
    if (!ctx.isSatellite(first)) {
      buckets.errors.push(CLASSIFY_ERRORS.noClassifier);
      return buckets;
    }
    return {
      ...buckets,
      classifier: first,
      specifiers: buckets.specifiers.filter((id) => id !== first),
      modifiers: buckets.modifiers.filter((id) => id !== first),
    };
  },
};

/** Evaluated top-down; the first rule whose guard holds decides the whole sequence. */
export const ROLE_RULES: readonly RoleRule[] = Object.freeze([indicatorAnchored, partOfSpeech, satelliteFallback]);
