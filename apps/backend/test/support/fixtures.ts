import { CID } from "multiformats/cid";
import * as raw from "multiformats/codecs/raw";
import { identity } from "multiformats/hashes/identity";
import type { ClusterPin, GlobalPinInfo, PinInfo } from "../../src/cluster-rpc/types.js";
import { TrackerStatus } from "../../src/cluster-rpc/types.js";

const encoder = new TextEncoder();

/** Deterministic CIDv1 (raw codec, identity hash) for test content. */
export function testCid(label: string): CID {
  return CID.create(1, raw.code, identity.digest(encoder.encode(label)));
}

export function makePinInfo(overrides: Partial<PinInfo> = {}): PinInfo {
  return {
    peer: "peer-a",
    peerName: "node-a",
    ipfsPeerId: "ipfs-a",
    status: new Set([TrackerStatus.PINNED]),
    ipfsAddresses: [],
    timestamp: new Date(0),
    error: "",
    attemptCount: 0,
    ...overrides,
  };
}

export function makeGlobalPinInfo(cid: CID, peers: PinInfo[] = [], overrides: Partial<GlobalPinInfo> = {}): GlobalPinInfo {
  return {
    cid,
    name: "",
    allocations: [],
    origins: [],
    created: new Date(0),
    metadata: {},
    peerMap: new Map(peers.map((peer) => [peer.peer, peer])),
    ...overrides,
  };
}

export function makeClusterPin(cid: CID, overrides: Partial<ClusterPin> = {}): ClusterPin {
  return {
    cid,
    name: "",
    mode: "recursive",
    allocations: [],
    origins: [],
    metadata: {},
    replicationFactorMin: -1,
    replicationFactorMax: -1,
    timestamp: new Date("2024-05-01T10:00:00.000Z"),
    ...overrides,
  };
}
