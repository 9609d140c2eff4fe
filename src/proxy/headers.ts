import type http from "node:http";

// Never forwarded upstream; the Host header is rewritten separately.
const HOP_BY_HOP = new Set([
  "connection",
  "proxy-connection",
  "keep-alive",
  "transfer-encoding",
  "upgrade",
  "te",
  "trailer",
  "host",
  "content-length",
]);

// Stripped from upstream responses before relay.
const RELAY_STRIPPED = new Set([
  "content-encoding",
  "transfer-encoding",
  "connection",
  "keep-alive",
  "content-length",
]);

export type HeaderBag = http.IncomingHttpHeaders | Record<string, unknown>;

function normalizeHeaderValue(v: unknown): string | undefined {
  if (typeof v === "string") return v;
  if (Array.isArray(v) && v.every((x): x is string => typeof x === "string")) return v.join(", ");
  return undefined;
}

// Lower-cased keys, string values only; arrays are joined like on the wire.
export function flattenHeaders(headers: HeaderBag): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    const val = normalizeHeaderValue(v);
    if (val === undefined) continue;
    out[k.toLowerCase()] = val;
  }
  return out;
}

export function headerValue(headers: HeaderBag, name: string): string | undefined {
  const lk = name.toLowerCase();
  for (const [k, v] of Object.entries(headers)) {
    if (k.toLowerCase() !== lk) continue;
    return typeof v === "string" ? v : undefined;
  }
  return undefined;
}

export function buildUpstreamHeaders(inbound: HeaderBag, upstreamHost: string, bodyLength: number): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(flattenHeaders(inbound))) {
    if (HOP_BY_HOP.has(k)) continue;
    out[k] = v;
  }
  out.host = upstreamHost;
  if (bodyLength > 0) out["content-length"] = String(bodyLength);
  return out;
}

export function filterResponseHeaders(headers: HeaderBag): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(flattenHeaders(headers))) {
    if (RELAY_STRIPPED.has(k)) continue;
    out[k] = v;
  }
  return out;
}
