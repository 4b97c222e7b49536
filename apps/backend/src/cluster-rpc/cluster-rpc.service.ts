import { Inject, Injectable, Logger } from "@nestjs/common";
import { InjectMetric } from "@willsoto/nestjs-prometheus";
import type { CID } from "multiformats/cid";
import type { Counter, Histogram } from "prom-client";
import { ClusterRpcError } from "../common/errors.js";
import { toStructuredError } from "../common/logging.js";
import {
  type ClusterMethod,
  type ClusterPin,
  type ConsensusMethod,
  type GlobalPinInfo,
  type IpfsId,
  LOCAL_PEER,
  RPC_CLIENT,
  type RpcClient,
  type RpcServiceName,
  type TrackerStatusSet,
} from "./types.js";
import {
  decodeGlobalPinInfo,
  decodeGlobalPinInfoList,
  decodeIpfsId,
  decodePeerList,
  decodePin,
  encodePinArgs,
  encodeStatusFilter,
  type PinRequestArgs,
} from "./wire.js";

type RpcOutcome = "success" | "not_found" | "error" | "aborted";

/**
 * Typed facade over the call-by-name RPC channel.
 * Every reply is validated before it reaches callers; failures pass through unchanged.
 */
@Injectable()
export class ClusterRpcService {
  private readonly logger = new Logger(ClusterRpcService.name);

  constructor(
    @Inject(RPC_CLIENT) private readonly rpcClient: RpcClient,
    @InjectMetric("cluster_rpc_calls_total") private readonly callsCounter: Counter,
    @InjectMetric("cluster_rpc_duration_seconds") private readonly callDuration: Histogram,
  ) {}

  /** Submits a pin, or updates one in place when `pin.pinUpdate` is set. */
  async pin(pin: PinRequestArgs, signal?: AbortSignal): Promise<ClusterPin> {
    return this.invoke("Cluster", "Pin", encodePinArgs(pin), (reply) => decodePin(reply, "Pin"), signal);
  }

  /** Fails with a `ClusterRpcError` whose `isNotFound()` is true when the CID is not pinned. */
  async unpin(cid: CID, signal?: AbortSignal): Promise<ClusterPin> {
    return this.invoke("Cluster", "Unpin", { cid: cid.toString() }, (reply) => decodePin(reply, "Unpin"), signal);
  }

  async status(cid: CID, signal?: AbortSignal): Promise<GlobalPinInfo> {
    return this.invoke("Cluster", "Status", cid.toString(), (reply) => decodeGlobalPinInfo(reply, "Status"), signal);
  }

  /** Every tracked pin with at least one peer reporting a flag in `filter`, in cluster order. */
  async statusAll(filter: TrackerStatusSet, signal?: AbortSignal): Promise<GlobalPinInfo[]> {
    return this.invoke(
      "Cluster",
      "StatusAll",
      encodeStatusFilter(filter),
      (reply) => decodeGlobalPinInfoList(reply, "StatusAll"),
      signal,
    );
  }

  async ipfsId(peer: string, signal?: AbortSignal): Promise<IpfsId> {
    return this.invoke("Cluster", "IPFSID", peer, decodeIpfsId, signal);
  }

  async peers(signal?: AbortSignal): Promise<string[]> {
    return this.invoke("Consensus", "Peers", {}, decodePeerList, signal);
  }

  private async invoke<T>(
    service: "Cluster",
    method: ClusterMethod,
    args: unknown,
    decode: (reply: unknown) => T,
    signal?: AbortSignal,
  ): Promise<T>;
  private async invoke<T>(
    service: "Consensus",
    method: ConsensusMethod,
    args: unknown,
    decode: (reply: unknown) => T,
    signal?: AbortSignal,
  ): Promise<T>;
  private async invoke<T>(
    service: RpcServiceName,
    method: string,
    args: unknown,
    decode: (reply: unknown) => T,
    signal?: AbortSignal,
  ): Promise<T> {
    const stopTimer = this.callDuration.startTimer({ service, method });
    let outcome: RpcOutcome = "success";

    try {
      const reply = await this.rpcClient.call(LOCAL_PEER, service, method, args, { signal });
      return decode(reply);
    } catch (error) {
      outcome = this.classify(error, signal);
      if (outcome === "error") {
        this.logger.warn({
          event: "cluster_rpc_failed",
          message: `${service}.${method} failed`,
          service,
          method,
          error: toStructuredError(error),
        });
      }
      throw error;
    } finally {
      stopTimer();
      this.callsCounter.inc({ service, method, outcome });
    }
  }

  private classify(error: unknown, signal?: AbortSignal): RpcOutcome {
    if (signal?.aborted) {
      return "aborted";
    }
    if (error instanceof ClusterRpcError && error.isNotFound()) {
      return "not_found";
    }
    return "error";
  }
}
