import { resetEnvCacheForTests, traceEnabled } from "./env.js";

export type TraceEvent =
  | { readonly kind: "classify"; readonly rule: string; readonly ids: readonly string[] }
  | { readonly kind: "resolve"; readonly via: "gloss" | "gloss-scan" | "semantic-table"; readonly query: string; readonly id: string }
  | { readonly kind: "unresolved"; readonly query: string };

const log: TraceEvent[] = [];

export function emit(event: TraceEvent): void {
  if (!traceEnabled()) return;
  log.push(event);
}

export function flush(): TraceEvent[] {
  const out = log.slice();
  log.length = 0;
  return out;
}

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.kind) {
    case "classify":
      return `classify rule=${event.rule} ids=${event.ids.join(",")}`;
    case "resolve":
      return `resolve via=${event.via} query=${JSON.stringify(event.query)} id=${event.id}`;
    case "unresolved":
      return `unresolved query=${JSON.stringify(event.query)}`;
  }
}

export function resetTraceForTests(): void {
  resetEnvCacheForTests();
  log.length = 0;
}
