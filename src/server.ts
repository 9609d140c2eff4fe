import http from "node:http";
import { loadConfig } from "./config.ts";
import { closeAppContext, createAppContext } from "./context.ts";
import { createMgmtServer } from "./api/mgmt.ts";
import { createProxyServer } from "./proxy/httpProxy.ts";

const cfg = loadConfig();
const ctx = createAppContext(cfg);

let proxyReady = false;
let mgmtReady = false;
const ready = () => proxyReady && mgmtReady;

const proxy = createProxyServer(ctx);
const mgmt = createMgmtServer(ctx.metrics, ready);

proxy.listen(cfg.proxyPort, "0.0.0.0", () => {
  proxyReady = true;
  // eslint-disable-next-line no-console
  console.error(`codetime-proxy: proxy listening on :${cfg.proxyPort} -> ${cfg.upstreamBase}`);
  // eslint-disable-next-line no-console
  console.error(`codetime-proxy: logging to ${cfg.jsonLogPath}${cfg.databaseUrl ? " and postgres" : ""}`);
});

mgmt.listen(cfg.mgmtPort, "0.0.0.0", () => {
  mgmtReady = true;
  // eslint-disable-next-line no-console
  console.error(`codetime-proxy: mgmt listening on :${cfg.mgmtPort}`);
});

function shutdown(server: http.Server, name: string): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve());
    setTimeout(() => {
      // eslint-disable-next-line no-console
      console.error(`codetime-proxy: force exit waiting for ${name} close`);
      resolve();
    }, 5000).unref();
  });
}

let stopping = false;

async function stop(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  proxyReady = false;
  // eslint-disable-next-line no-console
  console.error(`codetime-proxy: ${signal} received, shutting down`);
  await Promise.all([shutdown(proxy, "proxy"), shutdown(mgmt, "mgmt")]);
  await closeAppContext(ctx);
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    stop(signal).catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(`codetime-proxy: shutdown failed: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    });
  });
}
