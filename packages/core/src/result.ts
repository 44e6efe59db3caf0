export const ERROR_CODES = {
  missingField: "E_MISSING_FIELD",
  notFound: "E_NOT_FOUND",
  classification: "E_CLASSIFICATION",
  invalidSpec: "E_INVALID_SPEC",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface EngineError {
  readonly code: ErrorCode;
  readonly explain: string;
  readonly details?: unknown;
}

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly warnings: readonly string[];
}

export interface Failure {
  readonly ok: false;
  readonly error: EngineError;
  readonly warnings: readonly string[];
}

export type Result<T> = Ok<T> | Failure;

// Warnings keep the order they were raised in; repeats collapse onto the first.
const uniqueInOrder = (items: Iterable<string>): string[] => {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const trimmed = item.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) continue;
    seen.add(trimmed);
    out.push(trimmed);
  }
  return out;
};

export const ok = <T>(value: T, warnings: Iterable<string> = []): Ok<T> => ({
  ok: true,
  value,
  warnings: uniqueInOrder(warnings),
});

export const error = (code: ErrorCode, explain: string, details?: unknown): EngineError => ({
  code,
  explain,
  ...(typeof details === "undefined" ? {} : { details }),
});

export const failure = (
  code: ErrorCode,
  explain: string,
  options: { details?: unknown; warnings?: Iterable<string> } = {},
): Failure => ({
  ok: false,
  error: error(code, explain, options.details),
  warnings: uniqueInOrder(options.warnings ?? []),
});

export const isOk = <T>(result: Result<T>): result is Ok<T> => result.ok;

export const formatFailure = (result: Result<unknown>): string => {
  if (result.ok) return "ok";
  return `${result.error.code}: ${result.error.explain}`;
};
