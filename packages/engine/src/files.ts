import { loadDictionary, loadSemanticTables, type Dictionary, type SemanticTables } from "@blisskit/core";
import { readJsonFile } from "@blisskit/utils";

export async function readDictionaryFile(file: string): Promise<Dictionary> {
  return loadDictionary(await readJsonFile(file));
}

export async function readSemanticTablesFile(file: string): Promise<SemanticTables> {
  return loadSemanticTables(await readJsonFile(file));
}
