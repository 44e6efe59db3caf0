export { createSymbolClassifier, filterSymbolIds, runRules } from "./classifier.js";
export { CLASSIFY_ERRORS, ROLE_RULES, emptyAssignment } from "./rules.js";
export type {
  Classification,
  RoleRule,
  RuleContext,
  RuleName,
  SymbolClassifier,
  SymbolKind,
} from "./types.js";
