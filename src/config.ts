import path from "node:path";
import { MAX_BODY_BYTES } from "./proxy/body.ts";
import { MAX_JSON_PARSE_BYTES } from "./proxy/metadata.ts";

export const DEFAULT_UPSTREAM = "https://api.codetime.dev";
export const CLIENT_MARKER = "CodeTime Client";

export type Config = Readonly<{
  upstreamBase: string;
  upstreamHost: string;
  logDir: string;
  jsonLogPath: string;
  databaseUrl?: string;
  proxyPort: number;
  mgmtPort: number;
  clientMarker: string;
  upstreamTimeoutMs: number;
  maxBodyBytes: number;
  maxJsonParseBytes: number;
}>;

type Env = Record<string, string | undefined>;

function envNum(env: Env, name: string, def: number): number {
  const v = env[name];
  if (v == null || v === "") return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}

function envStr(env: Env, name: string, def: string): string {
  const v = env[name];
  return v == null || v.trim() === "" ? def : v.trim();
}

function envOptStr(env: Env, name: string): string | undefined {
  const v = env[name];
  return v == null || v.trim() === "" ? undefined : v.trim();
}

export function normalizeUpstream(raw: string | undefined): { base: string; host: string } | undefined {
  const s = (raw ?? "").trim().replace(/\/+$/, "");
  if (!s) return undefined;
  let u: URL;
  try {
    u = new URL(s);
  } catch {
    return undefined;
  }
  if (u.protocol !== "http:" && u.protocol !== "https:") return undefined;
  if (!u.host) return undefined;
  return { base: s, host: u.host };
}

function port(env: Env, name: string, def: number): number {
  const n = Math.floor(envNum(env, name, def));
  return n > 0 && n < 65536 ? n : def;
}

export function loadConfig(env: Env = process.env): Config {
  const rawUpstream = envOptStr(env, "CODETIME_UPSTREAM");
  let upstream = normalizeUpstream(rawUpstream);
  if (!upstream) {
    if (rawUpstream) {
      // eslint-disable-next-line no-console
      console.error(`codetime-proxy: invalid CODETIME_UPSTREAM ${JSON.stringify(rawUpstream)}; using ${DEFAULT_UPSTREAM}`);
    }
    upstream = { base: DEFAULT_UPSTREAM, host: new URL(DEFAULT_UPSTREAM).host };
  }
  const logDir = envStr(env, "CODETIME_LOG_DIR", "logs");

  return Object.freeze({
    upstreamBase: upstream.base,
    upstreamHost: upstream.host,
    logDir,
    jsonLogPath: path.join(logDir, "traffic.jsonl"),
    databaseUrl: envOptStr(env, "PG_URL"),
    proxyPort: port(env, "PROXY_PORT", 9492),
    mgmtPort: port(env, "MGMT_PORT", 9090),
    clientMarker: CLIENT_MARKER,
    upstreamTimeoutMs: 30_000,
    maxBodyBytes: MAX_BODY_BYTES,
    maxJsonParseBytes: MAX_JSON_PARSE_BYTES,
  });
}
