import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export type Metrics = {
  registry: Registry;
  httpRequestsTotal: Counter;
  httpRequestDurationSeconds: Histogram;
  rejectedTotal: Counter;
  upstreamFailuresTotal: Counter;
  sinkFailuresTotal: Counter;
};

export function createMetrics(opts?: { defaultMetrics?: boolean }): Metrics {
  const registry = new Registry();
  if (opts?.defaultMetrics ?? true) collectDefaultMetrics({ register: registry });

  const httpRequestsTotal = new Counter({
    name: "codetime_proxy_http_requests_total",
    help: "Requests forwarded upstream, by upstream or translated status class.",
    labelNames: ["method", "status_class"],
    registers: [registry],
  });

  const httpRequestDurationSeconds = new Histogram({
    name: "codetime_proxy_http_request_duration_seconds",
    help: "Upstream call duration in seconds.",
    labelNames: ["method", "status_class"],
    registers: [registry],
  });

  const rejectedTotal = new Counter({
    name: "codetime_proxy_rejected_total",
    help: "Requests answered without contacting the upstream.",
    labelNames: ["reason"],
    registers: [registry],
  });

  const upstreamFailuresTotal = new Counter({
    name: "codetime_proxy_upstream_failures_total",
    help: "Upstream calls that ended in a transport failure.",
    labelNames: ["kind"],
    registers: [registry],
  });

  const sinkFailuresTotal = new Counter({
    name: "codetime_proxy_sink_failures_total",
    help: "Entry writes that failed, by sink.",
    labelNames: ["sink"],
    registers: [registry],
  });

  return {
    registry,
    httpRequestsTotal,
    httpRequestDurationSeconds,
    rejectedTotal,
    upstreamFailuresTotal,
    sinkFailuresTotal,
  };
}

export function statusClass(status: number | undefined): string {
  if (!status || !Number.isFinite(status)) return "0xx";
  const c = Math.floor(status / 100);
  return `${c}xx`;
}
