import { createHash } from "node:crypto";
import type { Entry, EntryMetadata, HashedFields } from "../entries/types.ts";
import { nowIso } from "../util/time.ts";

function sortKeys(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeys);
  if (typeof v === "object" && v !== null) {
    const entries: Array<[string, unknown]> = Object.entries(v);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([k, x]) => [k, sortKeys(x)]));
  }
  return v;
}

export function canonicalJson(v: unknown): string {
  return JSON.stringify(sortKeys(v));
}

export function computeRowHash(fields: HashedFields): string {
  const canonical = canonicalJson({
    method: fields.method,
    path: fields.path,
    query: fields.query,
    request_body: fields.request_body,
    response_status: fields.response_status,
  });
  return createHash("sha256").update(canonical, "utf8").digest("hex");
}

export function buildEntry(input: {
  method: string;
  path: string;
  query: Record<string, string>;
  requestHeaders: Record<string, string>;
  requestBody: string;
  status: number;
  responseHeaders: Record<string, string>;
  responseBody: string;
  durationMs: number;
  metadata: EntryMetadata;
}): Entry {
  const hashed: HashedFields = {
    method: input.method,
    path: input.path,
    query: input.query,
    request_body: input.requestBody,
    response_status: input.status,
  };
  return Object.freeze({
    timestamp: nowIso(),
    ...hashed,
    request_headers: input.requestHeaders,
    response_headers: input.responseHeaders,
    response_body: input.responseBody,
    duration_ms: input.durationMs,
    row_hash: computeRowHash(hashed),
    ...input.metadata,
  });
}
