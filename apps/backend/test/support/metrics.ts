import type { Provider } from "@nestjs/common";
import { getToken } from "@willsoto/nestjs-prometheus";
import { Counter, Histogram } from "prom-client";

/**
 * Metric providers backed by unregistered prom-client instances, so each test
 * module starts from zero and nothing lands in the global registry.
 */
export function createTestMetrics() {
  const rpcCalls = new Counter({
    name: "cluster_rpc_calls_total",
    help: "test",
    labelNames: ["service", "method", "outcome"],
    registers: [],
  });
  const rpcDuration = new Histogram({
    name: "cluster_rpc_duration_seconds",
    help: "test",
    labelNames: ["service", "method"],
    registers: [],
  });
  const lookupFailures = new Counter({
    name: "pin_status_lookup_failures_total",
    help: "test",
    registers: [],
  });
  const listResults = new Histogram({
    name: "pin_list_results",
    help: "test",
    labelNames: ["source"],
    registers: [],
  });

  const providers: Provider[] = [
    { provide: getToken("cluster_rpc_calls_total"), useValue: rpcCalls },
    { provide: getToken("cluster_rpc_duration_seconds"), useValue: rpcDuration },
    { provide: getToken("pin_status_lookup_failures_total"), useValue: lookupFailures },
    { provide: getToken("pin_list_results"), useValue: listResults },
  ];

  return { rpcCalls, rpcDuration, lookupFailures, listResults, providers };
}

/** Current value of a counter series whose labels include `labels`. */
export async function counterValue(counter: Counter, labels: Record<string, string> = {}): Promise<number> {
  const { values } = await counter.get();
  const match = values.find((entry) =>
    Object.entries(labels).every(([key, value]) => entry.labels[key] === value),
  );
  return match?.value ?? 0;
}
