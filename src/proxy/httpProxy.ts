import http from "node:http";
import type { AppContext } from "../context.ts";
import type { Entry } from "../entries/types.ts";
import { statusClass } from "../metrics/metrics.ts";
import { renderExchange } from "../render/console.ts";
import { persistEntry } from "../sinks/fanout.ts";
import { declaredContentLength, PayloadTooLargeError, readBodyLimited } from "./body.ts";
import { buildEntry } from "./entrybuild.ts";
import type { ForwardOutcome } from "./forward.ts";
import { ALLOWED_METHODS, buildTargetUrl, forwardRequest, stripOrigin, withQuery } from "./forward.ts";
import { admit, REJECT_BODY, REJECT_STATUS } from "./gate.ts";
import { buildUpstreamHeaders, filterResponseHeaders, flattenHeaders, headerValue } from "./headers.ts";
import { collectMetadata } from "./metadata.ts";
import { sanitizeResponseText } from "./sanitize.ts";

const FAILURE_BODY: Record<502 | 504, string> = {
  502: "Bad gateway",
  504: "Upstream timeout",
};

function send(res: http.ServerResponse, status: number, body: string, headers?: Record<string, string>) {
  res.writeHead(status, { "content-type": "text/plain; charset=utf-8", ...headers });
  res.end(body);
}

// The path is kept as sent: no dot-segment or slash normalization.
export function parseRequestTarget(raw: string | undefined): { path: string; query: Record<string, string> } {
  const target = stripOrigin(raw ?? "/");
  const q = target.indexOf("?");
  const rawPath = q === -1 ? target : target.slice(0, q);
  const search = q === -1 ? "" : target.slice(q + 1);
  return { path: rawPath.startsWith("/") ? rawPath : `/${rawPath}`, query: Object.fromEntries(new URLSearchParams(search)) };
}

type Relay = { status: number; headers: Record<string, string>; body: string };

function relayOf(outcome: ForwardOutcome, sanitized: string): Relay {
  if (!outcome.ok) {
    return { status: outcome.status, headers: { "content-type": "text/plain; charset=utf-8" }, body: sanitized };
  }
  // An empty upstream body is stored as "{}" but relayed empty.
  return { status: outcome.status, headers: filterResponseHeaders(outcome.headers), body: outcome.body.length ? sanitized : "" };
}

export async function handleProxyRequest(ctx: AppContext, req: http.IncomingMessage, res: http.ServerResponse): Promise<Entry | undefined> {
  const { cfg, metrics } = ctx;
  const method = (req.method ?? "GET").toUpperCase();

  if (admit(req.headers, cfg.clientMarker) === "deny") {
    metrics.rejectedTotal.inc({ reason: "client" }, 1);
    req.resume();
    send(res, REJECT_STATUS, REJECT_BODY);
    return undefined;
  }

  if (!ALLOWED_METHODS.has(method)) {
    metrics.rejectedTotal.inc({ reason: "method" }, 1);
    req.resume();
    send(res, 405, "Method not allowed", { allow: [...ALLOWED_METHODS].join(", ") });
    return undefined;
  }

  const { path, query } = parseRequestTarget(req.url);

  let body: Buffer;
  try {
    body = await readBodyLimited(req, cfg.maxBodyBytes, declaredContentLength(headerValue(req.headers, "content-length")));
  } catch (e) {
    if (!(e instanceof PayloadTooLargeError)) throw e;
    metrics.rejectedTotal.inc({ reason: "payload_too_large" }, 1);
    send(res, e.status, "Payload too large");
    return undefined;
  }

  const outcome = await forwardRequest({
    url: withQuery(buildTargetUrl(cfg.upstreamBase, path), query),
    method,
    headers: buildUpstreamHeaders(req.headers, cfg.upstreamHost, body.length),
    body,
    timeoutMs: cfg.upstreamTimeoutMs,
    agent: ctx.agent,
  });

  const labels = { method, status_class: statusClass(outcome.status) };
  metrics.httpRequestsTotal.inc(labels, 1);
  metrics.httpRequestDurationSeconds.observe(labels, outcome.durationMs / 1000);
  if (!outcome.ok) {
    metrics.upstreamFailuresTotal.inc({ kind: outcome.kind }, 1);
    // eslint-disable-next-line no-console
    console.error(`codetime-proxy: upstream ${outcome.kind} on ${method} ${path}: ${outcome.message}`);
  }

  const requestBody = body.toString("utf8");
  const metadata = collectMetadata(requestBody, req.headers, cfg.maxJsonParseBytes);
  const sanitized = sanitizeResponseText(outcome.ok ? outcome.body.toString("utf8") : FAILURE_BODY[outcome.status]);
  const relay = relayOf(outcome, sanitized);

  const entry = buildEntry({
    method,
    path,
    query,
    requestHeaders: flattenHeaders(req.headers),
    requestBody,
    status: relay.status,
    responseHeaders: outcome.ok ? flattenHeaders(outcome.headers) : {},
    responseBody: sanitized,
    durationMs: outcome.durationMs,
    metadata,
  });

  // The reply does not wait on the sinks; close drains what is still in flight.
  const persisted = persistEntry(entry, ctx.sinks, metrics);
  ctx.inflight.add(persisted);
  try {
    renderExchange(entry, ctx.console);
    res.writeHead(relay.status, relay.headers);
    res.end(relay.body);
    await persisted;
  } finally {
    ctx.inflight.delete(persisted);
  }
  return entry;
}

export function createProxyServer(ctx: AppContext): http.Server {
  return http.createServer((req, res) => {
    handleProxyRequest(ctx, req, res).catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`codetime-proxy: unhandled error on ${req.method ?? "?"} ${req.url ?? "?"}: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
      if (res.headersSent) {
        res.destroy();
        return;
      }
      send(res, 500, "Internal error");
    });
  });
}
