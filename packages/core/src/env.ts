// Cached environment feature flags.
let traceFlag: boolean | undefined;

export function traceEnabled(): boolean {
  if (traceFlag === undefined) {
    const v = (process.env.BLISS_TRACE || "").toLowerCase();
    traceFlag = v === "1" || v === "true";
  }
  return traceFlag;
}

export function setTraceEnabled(enabled: boolean): void {
  traceFlag = enabled;
}

// For tests only: re-read the flag from the environment on next use.
export function resetEnvCacheForTests(): void {
  traceFlag = undefined;
}
