import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";

import {
  composeSpecSchema,
  semanticTablesSchema,
  semanticsSchema,
  symbolRecordSchema,
} from "./schemas.js";
import type { RawSemanticTables, RawSymbolRecord } from "./types.js";

export interface ComposeSpecInput {
  classifier?: string;
  specifiers?: string[];
  semantics?: Record<string, string>[];
}

const ajv = new Ajv({ allErrors: true, strict: false });
ajv.addSchema(semanticsSchema);

const validateSymbolRecordFn = ajv.compile<RawSymbolRecord>(symbolRecordSchema);
const validateSemanticTablesFn = ajv.compile<RawSemanticTables>(semanticTablesSchema);
const validateComposeSpecFn = ajv.compile<ComposeSpecInput>(composeSpecSchema);

export function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown error";
  }
  return errors
    .map((error) => {
      const instance = error.instancePath || "/";
      const message = error.message ?? "validation error";
      return `${instance} ${message}`;
    })
    .join(", ");
}

export function assertValid<T>(value: unknown, validator: ValidateFunction<T>, label: string): T {
  if (validator(value)) {
    return value;
  }
  const details = formatErrors(validator.errors);
  throw new Error(`${label} failed validation: ${details}`);
}

export function validateSymbolRecord(value: unknown, id: string): RawSymbolRecord {
  return assertValid(value, validateSymbolRecordFn, `Symbol ${id}`);
}

export function validateSemanticTables(value: unknown): RawSemanticTables {
  return assertValid(value, validateSemanticTablesFn, "Semantic tables");
}

/** Non-throwing check used where a bad payload is reported as data. */
export function checkComposeSpec(value: unknown): { ok: true; spec: ComposeSpecInput } | { ok: false; message: string } {
  if (validateComposeSpecFn(value)) {
    return { ok: true, spec: value };
  }
  return { ok: false, message: formatErrors(validateComposeSpecFn.errors) };
}
