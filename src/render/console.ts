import type { Entry } from "../entries/types.ts";
import { isJsonText } from "../proxy/sanitize.ts";

export const PREVIEW_CHARS = 400;

const ANSI = {
  reset: "\x1b[0m",
  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
  blue: "\x1b[94m",
  green: "\x1b[32m",
  lightGreen: "\x1b[92m",
  red: "\x1b[31m",
} as const;

export type TextSink = { write(chunk: string): unknown };

export function truncatePreview(value: string, length = PREVIEW_CHARS): string {
  if (value.length <= length) return value;
  return `${value.slice(0, length)}...(truncated ${value.length - length} chars)`;
}

export function formatHeaders(headers: Record<string, string>): string {
  return Object.entries(headers)
    .map(([k, v]) => `${k}: ${v}`)
    .join(", ");
}

export function requestLine(entry: Entry): string {
  const qs = new URLSearchParams(entry.query).toString();
  return qs ? `${entry.method} ${entry.path}?${qs}` : `${entry.method} ${entry.path}`;
}

export function formatExchange(entry: Entry, opts?: { color?: boolean }): string[] {
  const color = opts?.color ?? true;
  const paint = (c: keyof typeof ANSI, s: string) => (color ? `${ANSI[c]}${s}${ANSI.reset}` : s);
  const lines = [
    paint("cyan", `>> ${requestLine(entry)}`),
    paint("magenta", `   Req headers: ${formatHeaders(entry.request_headers)}`),
  ];
  if (entry.request_body) lines.push(paint("blue", `   Req body: ${truncatePreview(entry.request_body)}`));
  lines.push(paint(entry.response_status >= 400 ? "red" : "green", `<< ${entry.response_status} (${entry.duration_ms.toFixed(2)}ms)`));
  if (entry.response_body) {
    const label = isJsonText(entry.response_body) ? "Resp body" : "Resp text";
    lines.push(paint("lightGreen", `   ${label}: ${truncatePreview(entry.response_body)}`));
  }
  return lines;
}

export function renderExchange(entry: Entry, out: TextSink = process.stdout, opts?: { color?: boolean }): void {
  try {
    out.write(`${formatExchange(entry, opts).join("\n")}\n`);
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error(`codetime-proxy: render failed: ${e instanceof Error ? e.message : String(e)}`);
  }
}
