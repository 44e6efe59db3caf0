import type { SchemaObject } from "ajv";

const semanticPairSchema: SchemaObject = {
  type: "object",
  additionalProperties: false,
  required: ["type", "value"],
  properties: {
    type: { type: "string", minLength: 1 },
    value: { type: "string" },
  },
};

export const semanticsSchema: SchemaObject = {
  $id: "https://blisskit.dev/schema/semantics.json",
  anyOf: [
    semanticPairSchema,
    {
      type: "object",
      additionalProperties: false,
      required: ["or"],
      properties: {
        or: { type: "array", items: semanticPairSchema, minItems: 1 },
      },
    },
    {
      type: "object",
      additionalProperties: false,
      required: ["and"],
      properties: {
        and: { type: "array", items: semanticPairSchema, minItems: 1 },
      },
    },
    {
      type: "object",
      minProperties: 1,
      additionalProperties: { type: "string" },
    },
  ],
};

export const symbolRecordSchema: SchemaObject = {
  $id: "https://blisskit.dev/schema/symbol-record.json",
  type: "object",
  required: [],
  properties: {
    pos: { type: "string" },
    isCharacter: { type: "boolean" },
    glosses: {
      type: "object",
      additionalProperties: {
        type: "array",
        items: { type: "string" },
      },
    },
    explanation: { type: "string" },
    is_old: { type: "boolean" },
    semantics: { $ref: "https://blisskit.dev/schema/semantics.json" },
  },
};

export const semanticTablesSchema: SchemaObject = {
  $id: "https://blisskit.dev/schema/semantic-tables.json",
  type: "object",
  required: ["modifiers", "indicators"],
  properties: {
    modifiers: {
      type: "object",
      propertyNames: { pattern: "^[0-9]+$" },
      additionalProperties: { $ref: "https://blisskit.dev/schema/semantics.json" },
    },
    indicators: {
      type: "object",
      propertyNames: { pattern: "^[0-9]+$" },
      additionalProperties: { $ref: "https://blisskit.dev/schema/semantics.json" },
    },
  },
};

export const composeSpecSchema: SchemaObject = {
  $id: "https://blisskit.dev/schema/compose-spec.json",
  type: "object",
  properties: {
    classifier: { type: "string" },
    specifiers: { type: "array", items: { type: "string" } },
    semantics: {
      type: "array",
      items: { type: "object", additionalProperties: { type: "string" } },
    },
  },
};
