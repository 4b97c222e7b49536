import { Injectable, Logger } from "@nestjs/common";
import type { CID } from "multiformats/cid";
import { ClusterRpcService } from "../cluster-rpc/cluster-rpc.service.js";
import { type ClusterPin, isPinEverywhere } from "../cluster-rpc/types.js";
import { createAbortError } from "../common/abort-utils.js";
import { translateNotFound } from "../common/errors.js";
import { toStructuredError } from "../common/logging.js";
import { BatchStatusService } from "./batch-status.service.js";
import { parseCid } from "./list-options.js";
import { PIN_STATUS_INFO } from "./status-mapper.js";
import { type ExternalPinStatus, type ListOptions, type ListResult, type Pin, PinStatus } from "./types.js";

@Injectable()
export class PinsService {
  private readonly logger = new Logger(PinsService.name);

  constructor(
    private readonly clusterRpc: ClusterRpcService,
    private readonly batchStatus: BatchStatusService,
  ) {}

  /**
   * Submits `pin` to the cluster. With `replaces`, the new pin takes over the
   * allocations of that existing pin.
   */
  async addPin(pin: Pin, replaces?: CID, signal?: AbortSignal): Promise<ExternalPinStatus> {
    const cid = parseCid(pin.cid);
    this.logger.debug(`addPin: ${cid.toString()}${replaces ? ` (replaces ${replaces.toString()})` : ""}`);

    const clusterPin = await this.clusterRpc.pin(
      {
        cid,
        name: pin.name,
        mode: "recursive",
        origins: pin.origins,
        metadata: pin.meta,
        pinUpdate: replaces,
      },
      signal,
    );
    return this.fromNewPin(cid.toString(), clusterPin, signal);
  }

  async getPin(cid: CID, signal?: AbortSignal): Promise<ExternalPinStatus> {
    try {
      return await this.batchStatus.getStatus(cid, signal);
    } catch (error) {
      throw translateNotFound(error, cid.toString());
    }
  }

  async removePin(cid: CID, signal?: AbortSignal): Promise<void> {
    this.logger.debug(`removePin: ${cid.toString()}`);
    try {
      await this.clusterRpc.unpin(cid, signal);
    } catch (error) {
      throw translateNotFound(error, cid.toString());
    }
  }

  async listPins(options: ListOptions, signal?: AbortSignal): Promise<ListResult> {
    return this.batchStatus.list(options, signal);
  }

  /**
   * Status of a pin no peer has reported on yet: always queued, created at the
   * pin's timestamp. Delegates are looked up one peer at a time; a failed
   * lookup is logged and leaves that peer out.
   */
  async fromNewPin(requestId: string, pin: ClusterPin, signal?: AbortSignal): Promise<ExternalPinStatus> {
    const delegates = new Set<string>();

    for (const peer of await this.delegatePeers(pin, signal)) {
      try {
        const ipfsId = await this.clusterRpc.ipfsId(peer, signal);
        for (const address of ipfsId.addresses) {
          delegates.add(address);
        }
      } catch (error) {
        if (signal?.aborted) {
          throw createAbortError(signal);
        }
        this.logger.warn({
          event: "delegate_lookup_failed",
          message: `Could not resolve IPFS addresses of peer ${peer}`,
          peer,
          cid: pin.cid.toString(),
          error: toStructuredError(error),
        });
      }
    }

    return {
      requestId,
      status: PinStatus.QUEUED,
      created: pin.timestamp,
      pin: {
        cid: pin.cid.toString(),
        name: pin.name,
        origins: [...pin.origins],
        meta: { ...pin.metadata },
      },
      delegates: Array.from(delegates),
      info: { ...PIN_STATUS_INFO },
    };
  }

  private async delegatePeers(pin: ClusterPin, signal?: AbortSignal): Promise<string[]> {
    if (!isPinEverywhere(pin)) {
      return pin.allocations;
    }
    try {
      return await this.clusterRpc.peers(signal);
    } catch (error) {
      if (signal?.aborted) {
        throw createAbortError(signal);
      }
      this.logger.warn({
        event: "peer_listing_failed",
        message: "Could not list cluster peers for delegates",
        cid: pin.cid.toString(),
        error: toStructuredError(error),
      });
      return [];
    }
  }
}
