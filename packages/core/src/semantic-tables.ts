import bundledTables from "./data/semantics.json" with { type: "json" };

import { toDescriptor } from "./dictionary.js";
import { deepFreeze } from "./freeze.js";
import type {
  RawSemantics,
  SemanticDescriptor,
  SemanticPair,
  SemanticTables,
  SymbolId,
} from "./types.js";
import { validateSemanticTables } from "./validate.js";

function convertTable(raw: Record<SymbolId, RawSemantics>): Map<SymbolId, SemanticDescriptor> {
  const table = new Map<SymbolId, SemanticDescriptor>();
  for (const [id, semantics] of Object.entries(raw)) {
    table.set(id, toDescriptor(semantics));
  }
  return table;
}

/** Validates and converts `{ modifiers, indicators }`; the two key sets must not overlap. */
export function loadSemanticTables(raw: unknown): SemanticTables {
  const validated = validateSemanticTables(raw);
  const modifiers = convertTable(validated.modifiers);
  const indicators = convertTable(validated.indicators);
  const shared = [...modifiers.keys()].filter((id) => indicators.has(id));
  if (shared.length > 0) {
    throw new Error(`symbols listed as both modifier and indicator: ${shared.join(", ")}`);
  }
  return deepFreeze({ modifiers, indicators });
}

let bundled: SemanticTables | undefined;

export function defaultSemanticTables(): SemanticTables {
  if (!bundled) {
    bundled = loadSemanticTables(bundledTables);
  }
  return bundled;
}

export function semanticPath(type: string, value: string): string {
  return `${type}:${value}`;
}

export function pairsOf(descriptor: SemanticDescriptor): readonly SemanticPair[] {
  switch (descriptor.kind) {
    case "simple":
      return [{ type: descriptor.type, value: descriptor.value }];
    case "alternatives":
      return descriptor.options;
    case "combination":
      return descriptor.parts;
  }
}

/** Type compares exactly, value case-insensitively. */
export function matchesPair(descriptor: SemanticDescriptor, type: string, value: string): boolean {
  const wanted = value.toLowerCase();
  return pairsOf(descriptor).some((pair) => pair.type === type && pair.value.toLowerCase() === wanted);
}
