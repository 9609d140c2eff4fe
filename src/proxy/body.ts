import type { Readable } from "node:stream";

export const MAX_BODY_BYTES = 2 * 1024 * 1024;

export class PayloadTooLargeError extends Error {
  readonly status = 413;

  constructor(readonly limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

// Buffers the whole body. Past the limit the rest is drained and discarded,
// so the connection stays usable for the 413.
export function readBodyLimited(src: Readable, limit: number, declaredLength?: number): Promise<Buffer> {
  if (declaredLength != null && declaredLength > limit) {
    src.resume();
    return Promise.reject(new PayloadTooLargeError(limit));
  }
  return new Promise((resolve, reject) => {
    const bufs: Buffer[] = [];
    let total = 0;
    let over = false;
    src.on("data", (chunk: Buffer | string) => {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      total += buf.length;
      if (total > limit) over = true;
      if (!over) bufs.push(buf);
    });
    src.on("end", () => {
      if (over) reject(new PayloadTooLargeError(limit));
      else resolve(Buffer.concat(bufs));
    });
    src.on("error", reject);
  });
}

export function declaredContentLength(v: string | undefined): number | undefined {
  if (v == null || !/^\d+$/.test(v.trim())) return undefined;
  return Number(v.trim());
}
