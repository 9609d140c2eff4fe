import type { Entry } from "../entries/types.ts";
import type { Metrics } from "../metrics/metrics.ts";
import type { EntrySink, SinkResult } from "./types.ts";

// Never rejects: each sink's failure is logged, counted and returned.
export async function persistEntry(entry: Entry, sinks: readonly EntrySink[], metrics?: Metrics): Promise<SinkResult[]> {
  const settled = await Promise.allSettled(sinks.map(async (s) => s.write(entry)));
  return settled.map((r, i): SinkResult => {
    const sink = sinks[i].name;
    if (r.status === "fulfilled") return { sink, ok: true };
    const error = r.reason instanceof Error ? r.reason.message : String(r.reason);
    metrics?.sinkFailuresTotal.inc({ sink }, 1);
    // eslint-disable-next-line no-console
    console.error(`codetime-proxy: ${sink} sink failed for ${entry.method} ${entry.path} (${entry.row_hash.slice(0, 12)}): ${error}`);
    return { sink, ok: false, error };
  });
}
