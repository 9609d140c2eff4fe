import path from "node:path";
import type { EntryMetadata } from "../entries/types.ts";
import { epochMsToIso } from "../util/time.ts";
import type { HeaderBag } from "./headers.ts";
import { headerValue } from "./headers.ts";

export const MAX_JSON_PARSE_BYTES = 512 * 1024;

const SHORT = 64;
const LONG = 2048;

const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;
const WINDOWS_USER = /^[a-z]:\\Users\\([^\\]+)/i;
const NUMERIC = /^-?\d+(\.\d+)?$/;

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function parseBodyJson(text: string | null | undefined, maxBytes = MAX_JSON_PARSE_BYTES): JsonObject {
  if (!text) return {};
  if (Buffer.byteLength(text, "utf8") >= maxBytes) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  return isObject(parsed) ? parsed : {};
}

function ipv4(candidate: string | undefined): string | undefined {
  const v = candidate?.trim();
  return v && IPV4.test(v) ? v : undefined;
}

export function extractClientIp(headers: HeaderBag): string | undefined {
  const real = ipv4(headerValue(headers, "x-real-ip"));
  if (real) return real;
  const xff = headerValue(headers, "x-forwarded-for");
  if (xff) {
    for (const token of xff.split(",")) {
      const ip = ipv4(token);
      if (ip) return ip;
    }
  }
  return ipv4(headerValue(headers, "x-forwarded")) ?? ipv4(headerValue(headers, "host"));
}

export function extractUserAgent(headers: HeaderBag): string | undefined {
  return headerValue(headers, "user-agent");
}

export function extractWindowsUsername(filePath: unknown): string | undefined {
  if (typeof filePath !== "string" || !filePath) return undefined;
  return WINDOWS_USER.exec(filePath)?.[1];
}

export function extractFileExtension(filePath: unknown): string | undefined {
  if (typeof filePath !== "string" || !filePath) return undefined;
  // win32 accepts both separators
  const ext = path.win32.extname(filePath);
  return ext.length > 1 ? ext.toLowerCase() : undefined;
}

function scalarField(body: JsonObject, keys: readonly string[], cap: number): string | undefined {
  for (const key of keys) {
    const v = body[key];
    if (v == null) continue;
    if (typeof v === "string") return v ? v.slice(0, cap) : undefined;
    if (typeof v === "number") return Number.isFinite(v) ? String(v).slice(0, cap) : undefined;
    if (typeof v === "boolean") return String(v);
    return undefined;
  }
  return undefined;
}

export function parseEventTime(value: unknown): string | undefined {
  if (typeof value === "number") return epochMsToIso(value);
  if (typeof value === "string" && NUMERIC.test(value.trim())) return epochMsToIso(Number(value.trim()));
  return undefined;
}

export function collectMetadata(bodyText: string, headers: HeaderBag, maxJsonBytes = MAX_JSON_PARSE_BYTES): EntryMetadata {
  const body = parseBodyJson(bodyText, maxJsonBytes);
  const absolute = scalarField(body, ["absoluteFile", "absolute_file"], LONG);
  const eventTime = body.eventTime ?? body.event_time;

  return {
    auth_header: headerValue(headers, "authorization") ?? null,
    client_ip: extractClientIp(headers) ?? null,
    user_agent: extractUserAgent(headers) ?? null,
    windows_username: extractWindowsUsername(absolute) ?? null,
    file_extension: extractFileExtension(absolute) ?? null,
    operation_type: scalarField(body, ["operationType", "operation_type"], SHORT) ?? null,
    git_branch: scalarField(body, ["gitBranch", "git_branch"], LONG) ?? null,
    project: scalarField(body, ["project"], LONG) ?? null,
    editor: scalarField(body, ["editor"], SHORT) ?? null,
    platform: scalarField(body, ["platform"], SHORT) ?? null,
    event_time: parseEventTime(eventTime) ?? null,
    absolute_filepath: absolute ?? null,
    event_type: scalarField(body, ["eventType", "event_type"], SHORT) ?? null,
    language: scalarField(body, ["language"], SHORT) ?? null,
  };
}
