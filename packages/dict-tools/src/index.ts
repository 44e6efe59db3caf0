export { cleanDictionary, cleanGlossText } from "./clean.js";
export type { CleanedEntry, CleanedGlosses } from "./clean.js";
export { findDuplicateGlosses, formatDuplicateSummary } from "./duplicates.js";
export type { DuplicateReport } from "./duplicates.js";
export { validateSourceDictionary } from "./schema.js";
export type { SourceDictionary, SourceEntry } from "./schema.js";
