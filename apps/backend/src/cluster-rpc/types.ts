import type { CID } from "multiformats/cid";

// -----------------------------------------
// RPC contract
// -----------------------------------------

export type RpcServiceName = "Cluster" | "Consensus";

export type ClusterMethod = "Pin" | "Unpin" | "Status" | "StatusAll" | "IPFSID";
export type ConsensusMethod = "Peers";

/** Peer-addressed destination. The empty string targets the local peer. */
export const LOCAL_PEER = "";

export interface RpcCallOptions {
  signal?: AbortSignal;
}

/**
 * Blocking call-by-name RPC channel to the cluster.
 * Arguments and replies are plain JSON values in the cluster's wire format.
 */
export interface RpcClient {
  call(
    dest: string,
    service: RpcServiceName,
    method: string,
    args: unknown,
    options?: RpcCallOptions,
  ): Promise<unknown>;
}

export const RPC_CLIENT = Symbol("RPC_CLIENT");

// -----------------------------------------
// Tracker status
// -----------------------------------------

/**
 * Per-peer pin lifecycle flags as reported by the cluster's pin tracker.
 * Values are the cluster's wire names.
 */
export enum TrackerStatus {
  CLUSTER_ERROR = "cluster_error",
  PIN_ERROR = "pin_error",
  UNPIN_ERROR = "unpin_error",
  PINNED = "pinned",
  PINNING = "pinning",
  UNPINNING = "unpinning",
  UNPINNED = "unpinned",
  REMOTE = "remote",
  PIN_QUEUED = "pin_queued",
  UNPIN_QUEUED = "unpin_queued",
  SHARDED = "sharded",
  UNEXPECTEDLY_UNPINNED = "unexpectedly_unpinned",
}

/** Wire name of the empty flag set. */
export const TRACKER_STATUS_UNDEFINED = "undefined";

/**
 * A set of tracker flags. A single peer reports one flag; sets with several
 * members come from combining reports across peers.
 */
export type TrackerStatusSet = ReadonlySet<TrackerStatus>;

// -----------------------------------------
// Cluster records
// -----------------------------------------

/** One peer's view of a pin. */
export interface PinInfo {
  peer: string;
  peerName: string;
  ipfsPeerId: string;
  status: TrackerStatusSet;
  ipfsAddresses: string[];
  /** Last status update. Epoch when the peer never reported. */
  timestamp: Date;
  error: string;
  attemptCount: number;
}

/** Cluster-wide status of one CID, keyed by peer id. */
export interface GlobalPinInfo {
  cid: CID;
  name: string;
  allocations: string[];
  origins: string[];
  created: Date;
  metadata: Record<string, string>;
  peerMap: Map<string, PinInfo>;
}

export type PinMode = "recursive" | "direct";

export interface ClusterPin {
  cid: CID;
  name: string;
  mode: PinMode;
  allocations: string[];
  origins: string[];
  metadata: Record<string, string>;
  /** -1 together with `replicationFactorMax` -1 means "every peer". 0 means the cluster default. */
  replicationFactorMin: number;
  replicationFactorMax: number;
  /** CID of an existing pin whose allocations this pin takes over. */
  pinUpdate?: CID;
  timestamp: Date;
}

export interface IpfsId {
  id: string;
  addresses: string[];
  error?: string;
}

export function isPinEverywhere(pin: Pick<ClusterPin, "replicationFactorMin" | "replicationFactorMax">): boolean {
  return pin.replicationFactorMin === -1 && pin.replicationFactorMax === -1;
}
