import { fileURLToPath } from "node:url";

export const dictionaryPath = fileURLToPath(new URL("./fixtures/dictionary.json", import.meta.url));
