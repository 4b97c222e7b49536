import { HttpService } from "@nestjs/axios";
import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { type AxiosRequestConfig, isAxiosError } from "axios";
import { firstValueFrom } from "rxjs";
import { createAbortError, withTimeoutSignal } from "../common/abort-utils.js";
import { ClusterRpcError } from "../common/errors.js";
import type { IClusterConfig, IConfig } from "../config/app.config.js";
import type { RpcCallOptions, RpcClient, RpcServiceName } from "./types.js";

function readRemoteError(data: unknown): string | undefined {
  if (typeof data === "object" && data !== null && "error" in data) {
    const message: unknown = data.error;
    if (typeof message === "string" && message.length > 0) {
      return message;
    }
  }
  if (typeof data === "string" && data.length > 0) {
    return data;
  }
  return undefined;
}

/**
 * JSON-over-HTTP transport for cluster RPC calls.
 *
 * `POST {endpoint}/{service}/{method}` with `{ dest, args }`; a 2xx body is the
 * reply, any other status carries `{ error }` whose text is surfaced unchanged.
 */
@Injectable()
export class HttpRpcClient implements RpcClient {
  private readonly logger = new Logger(HttpRpcClient.name);
  private readonly clusterConfig: IClusterConfig;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService<IConfig, true>,
  ) {
    this.clusterConfig = this.configService.get<IClusterConfig>("cluster");
  }

  async call(
    dest: string,
    service: RpcServiceName,
    method: string,
    args: unknown,
    options: RpcCallOptions = {},
  ): Promise<unknown> {
    const url = `${this.clusterConfig.rpcEndpoint}/${service}/${method}`;
    const { signal, timeoutSignal, clear } = withTimeoutSignal(this.clusterConfig.rpcTimeoutMs, options.signal);

    const config: AxiosRequestConfig = {
      method: "POST",
      url,
      data: { dest, args },
      headers: { "Content-Type": "application/json" },
      responseType: "json",
      signal,
      validateStatus: () => true,
    };

    try {
      this.logger.debug(`RPC ${service}.${method} -> ${dest || "local"}`);
      const response = await firstValueFrom(this.httpService.request<unknown>(config));

      if (response.status < 200 || response.status >= 300) {
        const message = readRemoteError(response.data) ?? `HTTP ${response.status}`;
        throw new ClusterRpcError(message, service, method, `HTTP_${response.status}`);
      }

      return response.data;
    } catch (error) {
      if (error instanceof ClusterRpcError) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw createAbortError(options.signal);
      }
      if (timeoutSignal.aborted) {
        throw new ClusterRpcError(
          `${service}.${method} timed out after ${this.clusterConfig.rpcTimeoutMs}ms`,
          service,
          method,
          "TIMEOUT",
        );
      }
      if (isAxiosError(error)) {
        throw new ClusterRpcError(error.message, service, method, error.code);
      }
      throw error;
    } finally {
      clear();
    }
  }
}
