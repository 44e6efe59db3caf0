import {
  ERROR_CODES,
  checkComposeSpec,
  defaultSemanticTables,
  emit,
  failure,
  matchesPair,
  ok,
  semanticPath,
  type Dictionary,
  type Result,
  type SemanticDescriptor,
  type SemanticTables,
  type SymbolId,
} from "@blisskit/core";
import { canonicalize } from "@blisskit/utils";

import { buildReverseIndices } from "./indices.js";
import type { Composition, ReverseComposer } from "./types.js";

function firstMatch(
  table: ReadonlyMap<SymbolId, SemanticDescriptor>,
  type: string,
  value: string,
): SymbolId | null {
  for (const [id, descriptor] of table) {
    if (matchesPair(descriptor, type, value)) return id;
  }
  return null;
}

export function createReverseComposer(
  dictionary: Dictionary,
  tables: SemanticTables = defaultSemanticTables(),
): ReverseComposer {
  const indices = buildReverseIndices(dictionary);

  const findByGloss = (gloss: string): SymbolId | null => {
    const exact = indices.glossToId.get(gloss);
    if (exact !== undefined) {
      emit({ kind: "resolve", via: "gloss", query: gloss, id: exact });
      return exact;
    }
    const wanted = gloss.toLowerCase();
    for (const [id, record] of dictionary) {
      const hit = Object.values(record.glosses).some((list) => list.some((g) => g.toLowerCase() === wanted));
      if (hit) {
        emit({ kind: "resolve", via: "gloss-scan", query: gloss, id });
        return id;
      }
    }
    emit({ kind: "unresolved", query: gloss });
    return null;
  };

  const findSemanticSymbol = (type: string, value: string): SymbolId | null => {
    const query = semanticPath(type, value);
    const fromTables = firstMatch(tables.indicators, type, value) ?? firstMatch(tables.modifiers, type, value);
    if (fromTables !== null) {
      emit({ kind: "resolve", via: "semantic-table", query, id: fromTables });
      return fromTables;
    }
    emit({ kind: "unresolved", query });
    return null;
  };

  const composeFromSpec = (spec: unknown): Result<Composition> => {
    const checked = checkComposeSpec(spec);
    if (!checked.ok) {
      return failure(ERROR_CODES.invalidSpec, `Invalid compose spec: ${checked.message}`);
    }
    const { classifier, specifiers = [], semantics = [] } = checked.spec;
    if (classifier === undefined) {
      return failure(ERROR_CODES.missingField, "Missing required field: classifier");
    }

    const classifierId = findByGloss(classifier);
    if (classifierId === null) {
      return failure(ERROR_CODES.notFound, `Classifier not found: ${classifier}`, { details: { gloss: classifier } });
    }

    const composition: SymbolId[] = [classifierId];
    const warnings: string[] = [];

    for (const gloss of specifiers) {
      const id = findByGloss(gloss);
      if (id === null) {
        warnings.push(`Specifier not found: ${gloss}`);
      } else {
        composition.push(id);
      }
    }

    for (const item of semantics) {
      const entries = Object.entries(item);
      if (entries.length !== 1) {
        warnings.push(`Complex semantic spec not fully supported: ${JSON.stringify(canonicalize(item))}`);
        continue;
      }
      const [type, value] = entries[0];
      const id = findSemanticSymbol(type, value);
      if (id === null) {
        warnings.push(`No symbol found for semantic ${semanticPath(type, value)}`);
      } else {
        composition.push(id);
      }
    }

    return ok({ composition }, warnings);
  };

  const composeWithIds = (
    classifier: SymbolId,
    specifiers: readonly SymbolId[] = [],
    modifiers: readonly SymbolId[] = [],
    indicators: readonly SymbolId[] = [],
  ): Result<Composition> => {
    const warnings: string[] = [];
    const present = (ids: readonly SymbolId[], label: string): SymbolId[] =>
      ids.filter((id) => {
        if (dictionary.has(id)) return true;
        warnings.push(`${label} ${id} not found`);
        return false;
      });

    const prefix = present(modifiers, "Modifier");
    if (!dictionary.has(classifier)) {
      return failure(ERROR_CODES.notFound, `Classifier ${classifier} not found`, {
        details: { id: classifier },
        warnings,
      });
    }
    const composition = [...prefix, classifier, ...present(specifiers, "Specifier"), ...present(indicators, "Indicator")];
    return ok({ composition }, warnings);
  };

  return {
    indices,
    findByGloss,
    findSemanticSymbol,
    composeFromSpec,
    composeWithIds,
  };
}
