import type { RpcServiceName } from "../cluster-rpc/types.js";

/**
 * Message the cluster state returns when a CID is not tracked.
 * Remote errors cross the RPC boundary as plain strings, so this is matched verbatim.
 */
export const CLUSTER_NOT_FOUND_MESSAGE = "not found";

/**
 * Malformed client input: a CID that does not decode, an invalid body or query.
 * No RPC is attempted once this is raised.
 */
export class InvalidRequestError extends Error {
  readonly name = "InvalidRequestError";

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidRequestError);
    }
  }
}

/**
 * Failure reported by the RPC layer or the transport under it.
 * The message is the remote message, unchanged.
 */
export class ClusterRpcError extends Error {
  readonly name = "ClusterRpcError";

  constructor(
    message: string,
    public readonly service: RpcServiceName,
    public readonly method: string,
    public readonly code?: string,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ClusterRpcError);
    }
  }

  isNotFound(): boolean {
    return this.message === CLUSTER_NOT_FOUND_MESSAGE;
  }
}

export class PinNotFoundError extends Error {
  readonly name = "PinNotFoundError";

  constructor(
    public readonly cid: string,
    options?: { cause?: unknown },
  ) {
    super(`pin not found: ${cid}`, options);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PinNotFoundError);
    }
  }
}

export interface BatchStatusFailure {
  cid: string;
  error: unknown;
}

/**
 * Combined failures of an explicit-CID status batch.
 * Successful lookups of the same batch are returned next to it, never inside it.
 */
export class BatchStatusError extends AggregateError {
  readonly name = "BatchStatusError";

  constructor(public readonly failures: BatchStatusFailure[]) {
    super(
      failures.map((failure) => failure.error),
      `${failures.length} status lookup(s) failed: ` +
        failures.map((failure) => `${failure.cid}: ${errorMessage(failure.error)}`).join("; "),
    );
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BatchStatusError);
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Maps the cluster's "not found" RPC failure to {@link PinNotFoundError}; anything else is returned as is. */
export function translateNotFound(error: unknown, cid: string): unknown {
  if (error instanceof ClusterRpcError && error.isNotFound()) {
    return new PinNotFoundError(cid, { cause: error });
  }
  return error;
}
