export { createReverseComposer } from "./composer.js";
export { buildReverseIndices } from "./indices.js";
export type { Composition, ReverseComposer, ReverseIndices } from "./types.js";
