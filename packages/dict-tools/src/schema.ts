import Ajv, { type SchemaObject } from "ajv";

import { assertValid } from "@blisskit/core";

export interface SourceEntry {
  description?: Record<string, string>;
  pos?: string;
  composition?: (number | string)[];
  [field: string]: unknown;
}

export type SourceDictionary = Record<string, SourceEntry>;

const sourceDictionarySchema: SchemaObject = {
  $id: "https://blisskit.dev/schema/source-dictionary.json",
  type: "object",
  propertyNames: { pattern: "^[0-9]+$" },
  additionalProperties: {
    type: "object",
    properties: {
      description: { type: "object", additionalProperties: { type: "string" } },
      pos: { type: "string" },
      composition: { type: "array", items: { type: ["integer", "string"] } },
    },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSourceFn = ajv.compile<SourceDictionary>(sourceDictionarySchema);

export function validateSourceDictionary(value: unknown): SourceDictionary {
  return assertValid(value, validateSourceFn, "Source dictionary");
}
