import type { Config } from "./config.ts";
import type { Metrics } from "./metrics/metrics.ts";
import { createMetrics } from "./metrics/metrics.ts";
import type { UpstreamAgent } from "./proxy/forward.ts";
import { createUpstreamAgent } from "./proxy/forward.ts";
import type { TextSink } from "./render/console.ts";
import { JsonlFileSink } from "./sinks/fileSink.ts";
import { PgEntrySink } from "./sinks/pgSink.ts";
import type { EntrySink } from "./sinks/types.ts";

// Process-wide handles, built once at startup and passed to every request.
export type AppContext = {
  readonly cfg: Config;
  readonly metrics: Metrics;
  readonly agent: UpstreamAgent;
  readonly sinks: readonly EntrySink[];
  readonly console: TextSink;
  // Persistence still running after its reply was sent.
  readonly inflight: Set<Promise<unknown>>;
};

export const DRAIN_TIMEOUT_MS = 5000;

export function defaultSinks(cfg: Config): EntrySink[] {
  const sinks: EntrySink[] = [new JsonlFileSink(cfg.jsonLogPath)];
  if (cfg.databaseUrl) sinks.push(PgEntrySink.fromUrl(cfg.databaseUrl));
  return sinks;
}

export function createAppContext(
  cfg: Config,
  overrides?: Partial<Pick<AppContext, "metrics" | "sinks" | "console">>
): AppContext {
  return {
    cfg,
    metrics: overrides?.metrics ?? createMetrics(),
    agent: createUpstreamAgent(cfg.upstreamBase),
    sinks: overrides?.sinks ?? defaultSinks(cfg),
    console: overrides?.console ?? process.stdout,
    inflight: new Set(),
  };
}

// Resolves true once every in-flight write settled, false when timeoutMs passed first.
export async function drainPersistence(ctx: AppContext, timeoutMs = DRAIN_TIMEOUT_MS): Promise<boolean> {
  if (ctx.inflight.size === 0) return true;
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([Promise.allSettled([...ctx.inflight]).then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export async function closeAppContext(ctx: AppContext, opts?: { drainMs?: number }): Promise<void> {
  ctx.agent.destroy();
  if (!(await drainPersistence(ctx, opts?.drainMs))) {
    // eslint-disable-next-line no-console
    console.error(`codetime-proxy: closing with ${ctx.inflight.size} entries still being persisted`);
  }
  const results = await Promise.allSettled(ctx.sinks.map((s) => s.close()));
  results.forEach((r, i) => {
    if (r.status === "rejected") {
      // eslint-disable-next-line no-console
      console.error(`codetime-proxy: closing ${ctx.sinks[i].name} sink failed: ${String(r.reason)}`);
    }
  });
}
