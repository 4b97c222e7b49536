import { Global, Module } from "@nestjs/common";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { makeCounterProvider, makeHistogramProvider, PrometheusModule } from "@willsoto/nestjs-prometheus";
import { MetricsPrometheusInterceptor } from "./metrics-prometheus.interceptor.js";

const metricProviders = [
  // HTTP metrics: API request volume and latency by method/path/status.
  makeCounterProvider({
    name: "http_requests_total",
    help: "Total number of HTTP requests",
    labelNames: ["method", "path", "status_code"] as const,
  }),
  makeHistogramProvider({
    name: "http_request_duration_seconds",
    help: "HTTP request duration in seconds",
    labelNames: ["method", "path", "status_code"] as const,
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  }),
  // Cluster RPC metrics
  /**
   * RPC calls per service/method.
   *
   * outcome values:
   *   "success":   reply received and decoded
   *   "not_found": remote reported the pin as not tracked
   *   "error":     transport failure, remote error or undecodable reply
   *   "aborted":   caller signal fired before the reply arrived
   */
  makeCounterProvider({
    name: "cluster_rpc_calls_total",
    help: "Total number of cluster RPC calls",
    labelNames: ["service", "method", "outcome"] as const,
  }),
  makeHistogramProvider({
    name: "cluster_rpc_duration_seconds",
    help: "Cluster RPC call duration in seconds",
    labelNames: ["service", "method"] as const,
    buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  }),
  // Pinning service metrics
  makeCounterProvider({
    name: "pin_status_lookup_failures_total",
    help: "Failed per-CID status lookups in explicit-CID list requests",
  }),
  makeHistogramProvider({
    name: "pin_list_results",
    help: "Number of results returned per list request",
    labelNames: ["source"] as const,
    buckets: [0, 1, 5, 10, 50, 100, 500, 1000],
  }),
];

@Global()
@Module({
  imports: [
    PrometheusModule.register({
      defaultMetrics: {
        enabled: true,
      },
      path: "/metrics",
      defaultLabels: {
        app: "cluster-pinsvc",
      },
    }),
  ],
  providers: [
    ...metricProviders,
    // HTTP metrics interceptor
    {
      provide: APP_INTERCEPTOR,
      useClass: MetricsPrometheusInterceptor,
    },
  ],
  exports: [PrometheusModule, ...metricProviders],
})
export class MetricsPrometheusModule {}
