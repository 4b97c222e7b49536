import { afterEach, describe, expect, it, vi } from "vitest";
import { configValidationSchema, loadConfig } from "./app.config.js";

describe("configValidationSchema", () => {
  it("applies defaults", () => {
    const { error, value } = configValidationSchema.validate({ CLUSTER_RPC_ENDPOINT: "http://127.0.0.1:9094/rpc" });

    expect(error).toBeUndefined();
    expect(value).toMatchObject({
      NODE_ENV: "development",
      PINSVC_PORT: 9097,
      PINSVC_HOST: "127.0.0.1",
      LOG_LEVEL: "log",
      CLUSTER_RPC_TIMEOUT_MS: 30000,
      PINSVC_STATUS_CONCURRENCY: 10,
      PINSVC_MAX_CIDS: 10,
    });
  });

  it("requires the cluster endpoint", () => {
    const { error } = configValidationSchema.validate({});

    expect(error?.message).toBe('"CLUSTER_RPC_ENDPOINT" is required');
  });

  it("rejects a non-http endpoint", () => {
    const { error } = configValidationSchema.validate({ CLUSTER_RPC_ENDPOINT: "ftp://cluster" });

    expect(error).toBeDefined();
  });
});

describe("loadConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads the environment", () => {
    vi.stubEnv("CLUSTER_RPC_ENDPOINT", "http://cluster.internal:9094/rpc//");
    vi.stubEnv("PINSVC_ALLOWED_ORIGINS", "https://a.example, https://b.example,");
    vi.stubEnv("PINSVC_STATUS_CONCURRENCY", "4");
    vi.stubEnv("PINSVC_MAX_CIDS", "25");

    const config = loadConfig();

    expect(config.cluster.rpcEndpoint).toBe("http://cluster.internal:9094/rpc");
    expect(config.app.allowedOrigins).toEqual(["https://a.example", "https://b.example"]);
    expect(config.pinsvc).toEqual({ statusConcurrency: 4, maxCids: 25 });
  });
});
