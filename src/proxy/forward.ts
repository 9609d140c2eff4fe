import http from "node:http";
import https from "node:https";
import { promisify } from "node:util";
import zlib from "node:zlib";
import { monoNow, msSince } from "../util/time.ts";

export const ALLOWED_METHODS = new Set(["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS", "HEAD"]);

const CONNECT_FAILURES = new Set(["ECONNREFUSED", "ENOTFOUND", "EHOSTUNREACH", "ENETUNREACH", "EAI_AGAIN", "ETIMEDOUT"]);

export type UpstreamAgent = http.Agent | https.Agent;

export type ForwardSuccess = {
  ok: true;
  status: number;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
  durationMs: number;
};

export type ForwardFailureKind = "timeout" | "unreachable" | "protocol";

export type ForwardFailure = {
  ok: false;
  kind: ForwardFailureKind;
  status: 502 | 504;
  message: string;
  durationMs: number;
};

export type ForwardOutcome = ForwardSuccess | ForwardFailure;

export function buildTargetUrl(upstreamBase: string, path: string): string {
  const base = upstreamBase.replace(/\/+$/, "");
  const rel = path.startsWith("/") ? path.slice(1) : path;
  return `${base}/${rel}`;
}

// Scheme and authority removed from an absolute URL, leaving the raw path and query.
export function stripOrigin(url: string): string {
  return url.replace(/^https?:\/\/[^/?#]*/i, "");
}

export function withQuery(url: string, query: Record<string, string>): string {
  const qs = new URLSearchParams(query).toString();
  return qs ? `${url}?${qs}` : url;
}

export function createUpstreamAgent(upstreamBase: string): UpstreamAgent {
  const opts = { keepAlive: true, maxSockets: 64 };
  return upstreamBase.startsWith("https:") ? new https.Agent(opts) : new http.Agent(opts);
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function classifyTransportError(err: unknown): ForwardFailureKind {
  const code = errorCode(err);
  return code && CONNECT_FAILURES.has(code) ? "unreachable" : "protocol";
}

const gunzip = promisify(zlib.gunzip);
const inflate = promisify(zlib.inflate);
const brotli = promisify(zlib.brotliDecompress);

export async function decodeBody(body: Buffer, encoding: string | undefined): Promise<Buffer> {
  const enc = (encoding ?? "").trim().toLowerCase();
  if (!body.length || !enc || enc === "identity") return body;
  try {
    if (enc === "gzip" || enc === "x-gzip") return await gunzip(body);
    if (enc === "deflate") return await inflate(body);
    if (enc === "br") return await brotli(body);
  } catch {
    return body;
  }
  return body;
}

class UpstreamTimeoutError extends Error {
  constructor(ms: number) {
    super(`upstream did not answer within ${ms}ms`);
    this.name = "UpstreamTimeoutError";
  }
}

export function forwardRequest(input: {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: Buffer;
  timeoutMs: number;
  agent?: UpstreamAgent;
}): Promise<ForwardOutcome> {
  const started = monoNow();

  return new Promise<ForwardOutcome>((resolve) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    const fail = (err: unknown) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      const timedOut = err instanceof UpstreamTimeoutError;
      resolve({
        ok: false,
        kind: timedOut ? "timeout" : classifyTransportError(err),
        status: timedOut ? 504 : 502,
        message: errorMessage(err),
        durationMs: msSince(started),
      });
    };

    const onResponse = (res: http.IncomingMessage) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("error", fail);
      res.on("end", () => {
        if (settled) return;
        const durationMs = msSince(started);
        const enc = res.headers["content-encoding"];
        decodeBody(Buffer.concat(chunks), typeof enc === "string" ? enc : undefined).then((body) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          resolve({ ok: true, status: res.statusCode ?? 502, headers: res.headers, body, durationMs });
        }, fail);
      });
    };

    // An explicit path keeps dot segments that URL parsing would resolve.
    const opts: http.RequestOptions = { method: input.method, headers: input.headers, agent: input.agent, path: stripOrigin(input.url) || "/" };
    const req = input.url.startsWith("https:")
      ? https.request(input.url, opts, onResponse)
      : http.request(input.url, opts, onResponse);

    timer = setTimeout(() => req.destroy(new UpstreamTimeoutError(input.timeoutMs)), input.timeoutMs);
    req.on("error", fail);
    if (input.body.length) req.end(input.body);
    else req.end();
  });
}
