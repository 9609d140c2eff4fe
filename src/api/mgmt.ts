import http from "node:http";
import type { Metrics } from "../metrics/metrics.ts";

function send(res: http.ServerResponse, status: number, body: string, headers?: Record<string, string>) {
  res.writeHead(status, { "content-type": "text/plain; charset=utf-8", ...headers });
  res.end(body);
}

// Separate listener so every path on the proxy port goes upstream.
export function createMgmtServer(metrics: Metrics, ready: () => boolean): http.Server {
  return http.createServer((req, res) => {
    const path = new URL(req.url ?? "/", "http://mgmt.invalid").pathname;

    if (path === "/healthz") return send(res, 200, "ok\n");
    if (path === "/readyz") return send(res, ready() ? 200 : 503, ready() ? "ready\n" : "not ready\n");

    if (path === "/metrics") {
      metrics.registry.metrics().then(
        (body) => send(res, 200, body, { "content-type": metrics.registry.contentType }),
        (e: unknown) => send(res, 500, `metrics unavailable: ${e instanceof Error ? e.message : String(e)}\n`)
      );
      return;
    }

    send(res, 404, "not found\n");
  });
}
