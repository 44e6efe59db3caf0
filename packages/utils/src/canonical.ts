type PointerSegment = string | number;

export function canonicalize(value: unknown): unknown {
  return canonicalizeInner(value, []);
}

export function canonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value))}\n`;
}

export function prettyCanonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value), null, 2)}\n`;
}

function pointerFromSegments(segments: readonly PointerSegment[]): string {
  if (segments.length === 0) {
    return "/";
  }
  return `/${segments.map((segment) => escapePointerSegment(String(segment))).join("/")}`;
}

function canonicalizeInner(value: unknown, path: PointerSegment[]): unknown {
  if (value === null) {
    return null;
  }

  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return value.toString();
    }
    return Object.is(value, -0) ? 0 : value;
  }

  if (Array.isArray(value)) {
    return value.map((entry, index) => canonicalizeInner(entry, [...path, index]));
  }

  if (value instanceof Map) {
    const record: Record<string, unknown> = {};
    for (const [key, entry] of value.entries()) {
      record[String(key)] = entry;
    }
    return canonicalizeInner(record, path);
  }

  if (value instanceof Set) {
    return canonicalizeInner(Array.from(value.values()), path);
  }

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    const keys = Object.keys(value).sort(compareLabels);
    for (const key of keys) {
      const entry = value[key];
      if (entry === undefined) {
        continue;
      }
      result[key] = canonicalizeInner(entry, [...path, key]);
    }
    return result;
  }

  throw new TypeError(`cannot canonicalize ${typeof value} at ${pointerFromSegments(path)}`);
}

function compareLabels(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}

function escapePointerSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
