import { describe, it, expect, beforeEach, afterEach } from "vitest";
import http from "node:http";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { newDb } from "pg-mem";
import type { Config } from "../src/config.ts";
import { loadConfig } from "../src/config.ts";
import type { AppContext } from "../src/context.ts";
import { closeAppContext, createAppContext, drainPersistence } from "../src/context.ts";
import type { Entry } from "../src/entries/types.ts";
import { createMetrics } from "../src/metrics/metrics.ts";
import { createProxyServer, parseRequestTarget } from "../src/proxy/httpProxy.ts";
import { JsonlFileSink } from "../src/sinks/fileSink.ts";
import { PgEntrySink } from "../src/sinks/pgSink.ts";
import type { EntrySink } from "../src/sinks/types.ts";
import { closeServer, listen, startUpstream } from "./support/servers.ts";
import type { Upstream } from "./support/servers.ts";

const UA = { "user-agent": "CodeTime Client" };

describe("parseRequestTarget", () => {
  it("splits origin-form targets", () => {
    expect(parseRequestTarget("/v3/x?a=1&a=2&b=3")).toEqual({ path: "/v3/x", query: { a: "2", b: "3" } });
    expect(parseRequestTarget("//double")).toEqual({ path: "//double", query: {} });
    expect(parseRequestTarget(undefined)).toEqual({ path: "/", query: {} });
  });

  it("keeps dot segments as sent", () => {
    expect(parseRequestTarget("/v3/a/../b?x=1")).toEqual({ path: "/v3/a/../b", query: { x: "1" } });
    expect(parseRequestTarget("/v3/./c")).toEqual({ path: "/v3/./c", query: {} });
  });

  it("accepts absolute-form targets", () => {
    expect(parseRequestTarget("http://localhost:9492/v3/y?q=1")).toEqual({ path: "/v3/y", query: { q: "1" } });
    expect(parseRequestTarget("http://localhost:9492")).toEqual({ path: "/", query: {} });
  });
});

describe("proxy server", () => {
  let dir: string;
  let upstream: Upstream;
  let pool: ReturnType<typeof memPool>;
  let rendered: string[];
  let ctx: AppContext;
  let proxy: http.Server;
  let base: string;

  function memPool() {
    const { Pool } = newDb().adapters.createPg();
    return new Pool();
  }

  async function start(respond: Parameters<typeof startUpstream>[0], opts?: { sinks?: EntrySink[]; cfg?: Partial<Config> }) {
    upstream = await startUpstream(respond);
    const cfg: Config = { ...loadConfig({ CODETIME_UPSTREAM: upstream.base, CODETIME_LOG_DIR: dir }), ...opts?.cfg };
    ctx = createAppContext(cfg, {
      metrics: createMetrics({ defaultMetrics: false }),
      sinks: opts?.sinks ?? [new JsonlFileSink(cfg.jsonLogPath), new PgEntrySink(pool)],
      console: { write: (s: string) => rendered.push(s) },
    });
    proxy = createProxyServer(ctx);
    base = `http://127.0.0.1:${await listen(proxy)}`;
  }

  async function fileEntries(): Promise<Entry[]> {
    const text = await readFile(path.join(dir, "traffic.jsonl"), "utf8");
    return text
      .split("\n")
      .filter(Boolean)
      .map((l) => JSON.parse(l));
  }

  async function rowCount(): Promise<number> {
    const res = await pool.query("SELECT row_hash FROM codetime_entries");
    return res.rows.length;
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "codetime-proxy-e2e-"));
    pool = memPool();
    rendered = [];
  });

  afterEach(async () => {
    await closeServer(proxy);
    await upstream.close();
    await closeAppContext(ctx);
    await rm(dir, { recursive: true, force: true });
  });

  it("forwards a client GET and records one entry in both sinks", async () => {
    await start((_req, res) => {
      res.writeHead(200, { "content-type": "application/json" });
      res.end("{}");
    });

    const res = await fetch(`${base}/v3/users/self/minutes`, { headers: UA });
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("{}");
    expect(await drainPersistence(ctx)).toBe(true);

    const entries = await fileEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0].path).toBe("/v3/users/self/minutes");
    expect(entries[0].response_status).toBe(200);
    expect(entries[0].method).toBe("GET");
    expect(entries[0].user_agent).toBe("CodeTime Client");
    expect(await rowCount()).toBe(1);
    expect(rendered).toHaveLength(1);
    expect(rendered[0]).toContain(">> GET /v3/users/self/minutes");
  });

  it("rejects other clients with 403 and records nothing", async () => {
    await start((_req, res) => res.end("{}"));

    const res = await fetch(`${base}/v3/users/self/minutes`, { headers: { "user-agent": "Other Client" } });
    expect(res.status).toBe(403);
    expect(await res.text()).toBe("Unsupported client");

    expect(upstream.seen).toHaveLength(0);
    expect(ctx.inflight.size).toBe(0);
    await expect(stat(path.join(dir, "traffic.jsonl"))).rejects.toMatchObject({ code: "ENOENT" });
    expect(rendered).toEqual([]);
  });

  it("answers 413 for bodies over 2 MiB without calling upstream", async () => {
    await start((_req, res) => res.end("{}"));

    const res = await fetch(`${base}/v3/users/event-log`, {
      method: "POST",
      headers: UA,
      body: "a".repeat(2 * 1024 * 1024 + 1),
    });
    expect(res.status).toBe(413);
    expect(upstream.seen).toHaveLength(0);
  });

  it("rewrites host, relays the body and extracts metadata", async () => {
    await start((_req, res) => {
      res.writeHead(201, { "content-type": "application/json", connection: "keep-alive", "x-upstream": "1" });
      res.end('{"data":"ok\u0000"}');
    });

    const body = JSON.stringify({ eventType: "fileSaved", absoluteFile: "C:\\Users\\alice\\proj\\file.rs", project: "proj", eventTime: 1700000000000 });
    const res = await fetch(`${base}/v3/users/event-log?source=vscode`, {
      method: "POST",
      headers: { ...UA, "content-type": "application/json", authorization: "Bearer test-token", "x-real-ip": "10.0.0.7" },
      body,
    });
    expect(res.status).toBe(201);
    expect(await res.text()).toBe('{"data":"ok"}');
    expect(res.headers.get("x-upstream")).toBe("1");

    const seen = upstream.seen[0];
    expect(seen.headers.host).toBe(`127.0.0.1:${upstream.port}`);
    expect(seen.url).toBe("/v3/users/event-log?source=vscode");
    expect(seen.body).toBe(body);
    expect(seen.headers.authorization).toBe("Bearer test-token");

    await drainPersistence(ctx);
    const [entry] = await fileEntries();
    expect(entry.query).toEqual({ source: "vscode" });
    expect(entry.request_body).toBe(body);
    expect(entry.response_body).toBe('{"data":"ok"}');
    expect(entry.auth_header).toBe("Bearer test-token");
    expect(entry.client_ip).toBe("10.0.0.7");
    expect(entry.windows_username).toBe("alice");
    expect(entry.file_extension).toBe(".rs");
    expect(entry.event_type).toBe("fileSaved");
    expect(entry.project).toBe("proj");
    expect(entry.event_time).toBe("2023-11-14T22:13:20.000Z");
  });

  it("deduplicates identical events in postgres only", async () => {
    await start((_req, res) => res.end("{}"));

    for (let i = 0; i < 2; i++) {
      const res = await fetch(`${base}/v3/users/event-log`, { method: "POST", headers: UA, body: '{"eventType":"fileEdited"}' });
      expect(res.status).toBe(200);
      await res.text();
      await drainPersistence(ctx);
    }

    const entries = await fileEntries();
    expect(entries).toHaveLength(2);
    expect(entries[0].row_hash).toBe(entries[1].row_hash);
    expect(await rowCount()).toBe(1);
  });

  it("maps an unreachable upstream to 502 and still records the exchange", async () => {
    await start((_req, res) => res.end("{}"));
    await upstream.close();

    const res = await fetch(`${base}/v3/users/self/minutes`, { headers: UA });
    expect(res.status).toBe(502);
    expect(await res.text()).toBe("Bad gateway");

    await drainPersistence(ctx);
    const [entry] = await fileEntries();
    expect(entry.response_status).toBe(502);
    expect(entry.response_body).toBe("Bad gateway");
    expect(entry.response_headers).toEqual({});
  });

  it("maps an upstream timeout to 504", async () => {
    await start(() => undefined, { cfg: { upstreamTimeoutMs: 100 } });

    const res = await fetch(`${base}/v3/users/self/minutes`, { headers: UA });
    expect(res.status).toBe(504);
    expect(await res.text()).toBe("Upstream timeout");
  });

  it("answers normally when every sink fails", async () => {
    const broken: EntrySink = {
      name: "file",
      write: async () => {
        throw new Error("disk full");
      },
      close: async () => undefined,
    };
    await start(
      (_req, res) => {
        res.writeHead(200, { "content-type": "application/json" });
        res.end('{"minutes":5}');
      },
      { sinks: [broken] }
    );

    const res = await fetch(`${base}/v3/users/self/minutes`, { headers: UA });
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('{"minutes":5}');
    await drainPersistence(ctx);
    const failures = await ctx.metrics.sinkFailuresTotal.get();
    expect(failures.values.map((v) => [v.labels.sink, v.value])).toEqual([["file", 1]]);
  });

  it("replies without waiting on a stalled sink", async () => {
    let release: () => void = () => undefined;
    const stalled: EntrySink = {
      name: "postgres",
      write: () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
      close: async () => undefined,
    };
    await start(
      (_req, res) => {
        res.writeHead(200, { "content-type": "application/json" });
        res.end('{"minutes":7}');
      },
      { sinks: [stalled] }
    );

    const res = await fetch(`${base}/v3/users/self/minutes`, { headers: UA, signal: AbortSignal.timeout(2000) });
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('{"minutes":7}');
    expect(ctx.inflight.size).toBe(1);
    expect(rendered).toHaveLength(1);

    expect(await drainPersistence(ctx, 20)).toBe(false);
    release();
    expect(await drainPersistence(ctx)).toBe(true);
  });
});
