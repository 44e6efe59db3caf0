export * from "./types.js";
export {
  ERROR_CODES,
  error,
  failure,
  formatFailure,
  isOk,
  ok,
} from "./result.js";
export type { EngineError, ErrorCode, Failure, Ok, Result } from "./result.js";
export {
  HEAD_POS,
  SATELLITE_POS,
  assertDictionary,
  dictionaryStats,
  isHeadPos,
  isSatellitePos,
  isSymbolId,
  loadDictionary,
  toDescriptor,
  toSymbolRecord,
} from "./dictionary.js";
export type { DictionaryStats } from "./dictionary.js";
export {
  defaultSemanticTables,
  loadSemanticTables,
  matchesPair,
  pairsOf,
  semanticPath,
} from "./semantic-tables.js";
export { assertValid, checkComposeSpec, formatErrors } from "./validate.js";
export type { ComposeSpecInput } from "./validate.js";
export { deepFreeze } from "./freeze.js";
export { resetEnvCacheForTests, setTraceEnabled, traceEnabled } from "./env.js";
export { emit, flush, formatTraceEvent, resetTraceForTests } from "./trace.js";
export type { TraceEvent } from "./trace.js";
