export { createEngine, createEngineFromJson } from "./engine.js";
export { readDictionaryFile, readSemanticTablesFile } from "./files.js";
export { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from "./program.js";
export type { CliIO } from "./program.js";
export type { BlissEngine, EngineOptions, EngineStats } from "./types.js";
