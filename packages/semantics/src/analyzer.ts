import {
  ERROR_CODES,
  defaultSemanticTables,
  failure,
  isSymbolId,
  ok,
  type Dictionary,
  type LanguageCode,
  type Result,
  type RoleAssignment,
  type SemanticFact,
  type SemanticTables,
  type SymbolId,
  type Token,
} from "@blisskit/core";
import type { SymbolClassifier } from "@blisskit/classifier";

import { extractSemantics } from "./extract.js";
import { DEFAULT_LANGUAGE, glossesIn, lookupGlosses } from "./glosses.js";
import type {
  CompositionAnalysis,
  CompositionGlosses,
  CompositionStructure,
  SemanticAnalyzer,
  SymbolGlossEntry,
  SymbolGlosses,
  SymbolInContext,
  SymbolInfo,
} from "./types.js";

export interface SemanticAnalyzerOptions {
  readonly tables?: SemanticTables;
  readonly language?: LanguageCode;
}

const symbolNotFound = (id: SymbolId) => failure(ERROR_CODES.notFound, `Symbol ${id} not found`, { details: { id } });

export function createSemanticAnalyzer(
  dictionary: Dictionary,
  classifier: SymbolClassifier,
  options: SemanticAnalyzerOptions = {},
): SemanticAnalyzer {
  const tables = options.tables ?? defaultSemanticTables();
  const defaultLanguage = options.language ?? DEFAULT_LANGUAGE;

  const describeRoles = (assignment: RoleAssignment, language: LanguageCode) => {
    const warnings: string[] = [];
    const glossesOf = (id: SymbolId): SymbolGlosses => {
      const lookup = lookupGlosses(dictionary, id, language);
      if (lookup.warning) warnings.push(lookup.warning);
      return lookup.info;
    };
    const classifierInfo = assignment.classifier === null ? null : glossesOf(assignment.classifier);
    const specifierInfo = assignment.specifiers.map(glossesOf);
    return { classifierInfo, specifierInfo, warnings };
  };

  const collectSemantics = (assignment: RoleAssignment): SemanticFact[] => {
    const facts: SemanticFact[] = [];
    for (const id of assignment.indicators) {
      const fact = extractSemantics(tables, id, "indicator");
      if (fact) facts.push(fact);
    }
    for (const id of assignment.modifiers) {
      const fact = extractSemantics(tables, id, "modifier");
      if (fact) facts.push(fact);
    }
    return facts;
  };

  const symbolEntry = (id: SymbolId, language: LanguageCode): SymbolGlossEntry | null => {
    const record = dictionary.get(id);
    if (!record) return null;
    return {
      id,
      glosses: glossesIn(record.glosses, language),
      explanation: record.explanation,
      isCharacter: record.isCharacter,
    };
  };

  return {
    extractSemantics: (id, role) => extractSemantics(tables, id, role),
    collectSemantics,

    analyzeComposition(tokens, language = defaultLanguage): Result<CompositionAnalysis> {
      const originalComposition = tokens.map((token) => String(token));
      const assignment = classifier.classify(originalComposition);
      if (assignment.errors.length > 0) {
        return failure(ERROR_CODES.classification, assignment.errors[0], { details: assignment });
      }
      const { classifierInfo, specifierInfo, warnings } = describeRoles(assignment, language);
      return ok(
        {
          originalComposition,
          classifier: assignment.classifier,
          classifierInfo,
          specifiers: assignment.specifiers,
          specifierInfo,
          indicators: assignment.indicators,
          modifiers: assignment.modifiers,
          semantics: collectSemantics(assignment),
        },
        warnings,
      );
    },

    getCompositionStructure(tokens, language = defaultLanguage): Result<CompositionStructure> {
      const originalComposition = tokens.map((token) => String(token));
      const assignment = classifier.classify(originalComposition);
      const { classifierInfo, specifierInfo, warnings } = describeRoles(assignment, language);
      return ok(
        {
          originalComposition,
          structure: {
            classifier: assignment.classifier,
            specifiers: assignment.specifiers,
            indicators: assignment.indicators,
            modifiers: assignment.modifiers,
          },
          interpretation: {
            classifierGlosses: classifierInfo,
            specifierGlosses: specifierInfo,
            indicatorCount: assignment.indicators.length,
            modifierCount: assignment.modifiers.length,
          },
          errors: assignment.errors,
        },
        warnings,
      );
    },

    getSymbolGlosses(id, language = defaultLanguage): Result<SymbolGlossEntry> {
      const entry = symbolEntry(id, language);
      return entry ? ok(entry) : symbolNotFound(id);
    },

    getCompositionGlosses(tokens, language = defaultLanguage): Result<CompositionGlosses> {
      const composition = tokens.map((token) => String(token));
      const components: SymbolGlossEntry[] = [];
      const warnings: string[] = [];
      for (const id of composition.filter(isSymbolId)) {
        const entry = symbolEntry(id, language);
        if (entry) {
          components.push(entry);
        } else {
          warnings.push(`Symbol ${id} not found`);
        }
      }
      return ok({ composition, components }, warnings);
    },

    getSymbolInfo(id): Result<SymbolInfo> {
      const record = dictionary.get(id);
      if (!record) return symbolNotFound(id);
      const kind = classifier.kindOf(id);
      const table = kind === "modifier" ? tables.modifiers : kind === "indicator" ? tables.indicators : undefined;
      return ok({
        id,
        pos: record.posCategory,
        glosses: record.glosses,
        isCharacter: record.isCharacter,
        explanation: record.explanation,
        kind,
        semantics: table?.get(id) ?? null,
        ...(record.semanticEffect ? { symbolSemantics: record.semanticEffect } : {}),
      });
    },

    analyzeSymbolWithContext(id, contextTokens, language = defaultLanguage): Result<SymbolInContext> {
      const entry = symbolEntry(id, language);
      if (!entry) return symbolNotFound(id);
      const kind = classifier.kindOf(id);
      if (!contextTokens || contextTokens.length === 0) {
        return ok({ ...entry, kind });
      }
      return ok({ ...entry, kind, context: classifier.classify(contextTokens) });
    },
  };
}
