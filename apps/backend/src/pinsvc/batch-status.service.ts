import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InjectMetric } from "@willsoto/nestjs-prometheus";
import type { CID } from "multiformats/cid";
import type { Counter, Histogram } from "prom-client";
import { ClusterRpcService } from "../cluster-rpc/cluster-rpc.service.js";
import { BatchStatusError, type BatchStatusFailure } from "../common/errors.js";
import { toStructuredError } from "../common/logging.js";
import { type SettledTask, settleWithConcurrency } from "../common/task-pool.js";
import type { IConfig, IPinsvcConfig } from "../config/app.config.js";
import {
  aggregateGlobalPinInfo,
  matchesListFilters,
  matchesPinFilters,
  toTrackerStatusFilter,
} from "./status-mapper.js";
import type { ExternalPinStatus, ListOptions, ListResult } from "./types.js";

export interface BatchStatusResult {
  results: ExternalPinStatus[];
  error?: BatchStatusError;
}

function countKept<T, R>(outcomes: readonly SettledTask<T, R>[], keep: (value: R) => boolean): number {
  let count = 0;
  for (const outcome of outcomes) {
    if (outcome.status === "fulfilled" && keep(outcome.value)) {
      count += 1;
    }
  }
  return count;
}

/**
 * Answers status questions for one pin, an explicit list of pins, or every pin
 * matching a filter. Nothing is cached between calls.
 */
@Injectable()
export class BatchStatusService {
  private readonly logger = new Logger(BatchStatusService.name);
  private readonly pinsvcConfig: IPinsvcConfig;

  constructor(
    private readonly clusterRpc: ClusterRpcService,
    private readonly configService: ConfigService<IConfig, true>,
    @InjectMetric("pin_status_lookup_failures_total") private readonly lookupFailures: Counter,
    @InjectMetric("pin_list_results") private readonly listResults: Histogram,
  ) {
    this.pinsvcConfig = this.configService.get<IPinsvcConfig>("pinsvc");
  }

  /** RPC failures propagate untranslated. */
  async getStatus(cid: CID, signal?: AbortSignal): Promise<ExternalPinStatus> {
    const gpi = await this.clusterRpc.status(cid, signal);
    return aggregateGlobalPinInfo(cid.toString(), gpi);
  }

  /**
   * Looks up every CID on a bounded pool. Results are in completion order.
   *
   * Only successes accepted by `keep` are returned, at most `limit` of them;
   * failed or discarded lookups do not count toward it. Once the limit is
   * reached no further lookups start, but failures of lookups already running
   * are still collected into `error`.
   */
  async getStatuses(
    cids: readonly CID[],
    limit: number,
    signal?: AbortSignal,
    keep: (status: ExternalPinStatus) => boolean = () => true,
  ): Promise<BatchStatusResult> {
    const outcomes = await settleWithConcurrency(cids, (cid, taskSignal) => this.getStatus(cid, taskSignal), {
      concurrency: this.pinsvcConfig.statusConcurrency,
      signal,
      shouldStop: (settled) => countKept(settled, keep) >= limit,
    });

    const results: ExternalPinStatus[] = [];
    const failures: BatchStatusFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === "fulfilled") {
        if (results.length < limit && keep(outcome.value)) {
          results.push(outcome.value);
        }
      } else {
        failures.push({ cid: outcome.item.toString(), error: outcome.reason });
      }
    }

    if (failures.length === 0) {
      return { results };
    }

    this.lookupFailures.inc(failures.length);
    const error = new BatchStatusError(failures);
    this.logger.warn({
      event: "pin_status_batch_failed",
      message: error.message,
      requested: cids.length,
      succeeded: results.length,
      failed: failures.length,
      error: toStructuredError(error, false),
    });
    return { results, error };
  }

  /**
   * One `StatusAll` call filtered by tracker flags, then name, meta and
   * creation window. Keeps cluster order and stops after `limit` matches.
   */
  async listAll(options: ListOptions, signal?: AbortSignal): Promise<ExternalPinStatus[]> {
    const infos = await this.clusterRpc.statusAll(toTrackerStatusFilter(options.status), signal);

    const results: ExternalPinStatus[] = [];
    for (const gpi of infos) {
      if (results.length >= options.limit) {
        break;
      }
      const status = aggregateGlobalPinInfo(gpi.cid.toString(), gpi);
      if (matchesPinFilters(status, options)) {
        results.push(status);
      }
    }
    return results;
  }

  /**
   * Explicit CIDs are looked up one by one and checked against every filter,
   * including the status set; otherwise the cluster lists by tracker flags.
   */
  async list(options: ListOptions, signal?: AbortSignal): Promise<ListResult> {
    if (options.cids.length > 0) {
      const { results, error } = await this.getStatuses(options.cids, options.limit, signal, (status) =>
        matchesListFilters(status, options),
      );
      this.listResults.observe({ source: "cids" }, results.length);
      return { results, count: results.length, error };
    }

    const results = await this.listAll(options, signal);
    this.listResults.observe({ source: "status_all" }, results.length);
    return { results, count: results.length };
  }
}
