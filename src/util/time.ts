import { performance } from "node:perf_hooks";

export function nowIso(): string {
  return new Date().toISOString();
}

export function monoNow(): number {
  return performance.now();
}

export function msSince(startMono: number): number {
  return performance.now() - startMono;
}

// Epoch milliseconds -> ISO-8601, or undefined when outside the Date range.
export function epochMsToIso(ms: number): string | undefined {
  if (!Number.isFinite(ms)) return undefined;
  const d = new Date(ms);
  if (Number.isNaN(d.getTime())) return undefined;
  return d.toISOString();
}
