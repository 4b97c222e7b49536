import Joi from "joi";

export const configValidationSchema = Joi.object({
  // Application
  NODE_ENV: Joi.string().valid("development", "production", "test").default("development"),
  PINSVC_PORT: Joi.number().port().default(9097),
  PINSVC_HOST: Joi.string().default("127.0.0.1"),
  PINSVC_ALLOWED_ORIGINS: Joi.string().allow("").default(""),
  LOG_LEVEL: Joi.string()
    .lowercase()
    .valid("fatal", "error", "warn", "log", "info", "debug", "verbose")
    .default("log"),

  // Cluster RPC
  CLUSTER_RPC_ENDPOINT: Joi.string()
    .uri({ scheme: ["http", "https"] })
    .required(),
  CLUSTER_RPC_TIMEOUT_MS: Joi.number().integer().min(100).default(30000),

  // Pinning service
  PINSVC_STATUS_CONCURRENCY: Joi.number().integer().min(1).max(100).default(10),
  PINSVC_MAX_CIDS: Joi.number().integer().min(1).max(1000).default(10),
});

export interface IAppConfig {
  env: string;
  port: number;
  host: string;
  allowedOrigins: string[];
}

export interface IClusterConfig {
  /** Base URL of the JSON RPC gateway, without trailing slash. */
  rpcEndpoint: string;
  rpcTimeoutMs: number;
}

export interface IPinsvcConfig {
  /**
   * Number of concurrent `Cluster.Status` calls when a list request names
   * explicit CIDs.
   */
  statusConcurrency: number;
  /** Maximum number of CIDs accepted in a single list request. */
  maxCids: number;
}

export interface IConfig {
  app: IAppConfig;
  cluster: IClusterConfig;
  pinsvc: IPinsvcConfig;
}

const parseList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

export function loadConfig(): IConfig {
  return {
    app: {
      env: process.env.NODE_ENV || "development",
      port: Number.parseInt(process.env.PINSVC_PORT || "9097", 10),
      host: process.env.PINSVC_HOST || "127.0.0.1",
      allowedOrigins: parseList(process.env.PINSVC_ALLOWED_ORIGINS),
    },
    cluster: {
      rpcEndpoint: (process.env.CLUSTER_RPC_ENDPOINT || "").replace(/\/+$/, ""),
      rpcTimeoutMs: Number.parseInt(process.env.CLUSTER_RPC_TIMEOUT_MS || "30000", 10),
    },
    pinsvc: {
      statusConcurrency: Number.parseInt(process.env.PINSVC_STATUS_CONCURRENCY || "10", 10),
      maxCids: Number.parseInt(process.env.PINSVC_MAX_CIDS || "10", 10),
    },
  };
}
