import Joi from "joi";
import { CID } from "multiformats/cid";
import { ClusterRpcError } from "../common/errors.js";
import { isTrackerStatus, trackerStatusSet, trackerStatusToWire } from "./tracker-status.js";
import {
  type ClusterPin,
  type GlobalPinInfo,
  type IpfsId,
  type PinInfo,
  type PinMode,
  type RpcServiceName,
  TRACKER_STATUS_UNDEFINED,
  type TrackerStatusSet,
} from "./types.js";

// -----------------------------------------
// Wire types (after Joi conversion)
// -----------------------------------------

type WirePinInfo = {
  peername: string;
  ipfs_peer_id: string;
  ipfs_peer_addresses: string[];
  status: TrackerStatusSet;
  timestamp: Date;
  error: string;
  attempt_count: number;
};

type WireGlobalPinInfo = {
  cid: CID;
  name: string;
  allocations: string[];
  origins: string[];
  created: Date;
  metadata: Record<string, string>;
  peer_map: Record<string, WirePinInfo>;
};

type WirePin = {
  cid: CID;
  name: string;
  mode: PinMode;
  allocations: string[];
  origins: string[];
  metadata: Record<string, string>;
  replication_factor_min: number;
  replication_factor_max: number;
  pin_update?: CID;
  timestamp: Date;
};

type WireIpfsId = {
  id: string;
  addresses: string[];
  error?: string;
};

// -----------------------------------------
// Joi Custom Schema Converters
// -----------------------------------------

/** Accepts a CID string or the cluster's `{"/": "<cid>"}` link form. */
const toCid = (value: unknown, helpers: Joi.CustomHelpers) => {
  let encoded: unknown = value;
  if (typeof value === "object" && value !== null && "/" in value) {
    encoded = value["/"];
  }
  if (typeof encoded !== "string") {
    return helpers.error("any.invalid", { message: "Invalid CID" });
  }
  try {
    return CID.parse(encoded);
  } catch {
    return helpers.error("any.invalid", { message: "Invalid CID" });
  }
};

/** Turns one peer's status name into a flag set; "undefined" is the empty set. */
const toTrackerStatusSet = (value: string, helpers: Joi.CustomHelpers) => {
  if (value === TRACKER_STATUS_UNDEFINED) {
    return trackerStatusSet();
  }
  if (!isTrackerStatus(value)) {
    return helpers.error("any.invalid", { message: `Unknown tracker status: ${value}` });
  }
  return trackerStatusSet(value);
};

// -----------------------------------------
// Joi Schemas
// -----------------------------------------

const cidSchema = Joi.alternatives()
  .try(Joi.string(), Joi.object({ "/": Joi.string().required() }))
  .custom(toCid);

const stringList = Joi.array().items(Joi.string()).empty(null).default([]);
const stringMap = Joi.object().pattern(Joi.string(), Joi.string().allow("")).empty(null).default({});
const epoch = () => new Date(0);

const pinInfoSchema = Joi.object<WirePinInfo>({
  peername: Joi.string().allow("").default(""),
  ipfs_peer_id: Joi.string().allow("").default(""),
  ipfs_peer_addresses: stringList,
  status: Joi.string().required().custom(toTrackerStatusSet),
  timestamp: Joi.date().iso().default(epoch),
  error: Joi.string().allow("").default(""),
  attempt_count: Joi.number().integer().min(0).default(0),
}).unknown(true);

const globalPinInfoSchema = Joi.object<WireGlobalPinInfo>({
  cid: cidSchema.required(),
  name: Joi.string().allow("").default(""),
  allocations: stringList,
  origins: stringList,
  created: Joi.date().iso().default(epoch),
  metadata: stringMap,
  peer_map: Joi.object().pattern(Joi.string(), pinInfoSchema).empty(null).default({}),
})
  .unknown(true)
  .required();

const globalPinInfoListSchema = Joi.array<WireGlobalPinInfo[]>().items(globalPinInfoSchema).empty(null).default([]);

const pinSchema = Joi.object<WirePin>({
  cid: cidSchema.required(),
  name: Joi.string().allow("").default(""),
  mode: Joi.string().valid("recursive", "direct").default("recursive"),
  allocations: stringList,
  origins: stringList,
  metadata: stringMap,
  replication_factor_min: Joi.number().integer().min(-1).default(0),
  replication_factor_max: Joi.number().integer().min(-1).default(0),
  pin_update: cidSchema.empty(null).optional(),
  timestamp: Joi.date().iso().default(epoch),
})
  .unknown(true)
  .required();

const ipfsIdSchema = Joi.object<WireIpfsId>({
  id: Joi.string().allow("").default(""),
  addresses: stringList,
  error: Joi.string().allow("").optional(),
})
  .unknown(true)
  .required();

const peerListSchema = Joi.array<string[]>().items(Joi.string()).empty(null).default([]);

// -----------------------------------------
// Validator Functions
// -----------------------------------------

function validateReply<T>(
  schema: Joi.AnySchema<T>,
  value: unknown,
  service: RpcServiceName,
  method: string,
): T {
  const result = schema.validate(value, { abortEarly: false });
  if (result.error) {
    throw new ClusterRpcError(
      `invalid ${service}.${method} reply: ${result.error.message}`,
      service,
      method,
      "INVALID_REPLY",
    );
  }
  return result.value;
}

function toPinInfo(peer: string, wire: WirePinInfo): PinInfo {
  return {
    peer,
    peerName: wire.peername,
    ipfsPeerId: wire.ipfs_peer_id,
    status: wire.status,
    ipfsAddresses: wire.ipfs_peer_addresses,
    timestamp: wire.timestamp,
    error: wire.error,
    attemptCount: wire.attempt_count,
  };
}

function toGlobalPinInfo(wire: WireGlobalPinInfo): GlobalPinInfo {
  const peerMap = new Map<string, PinInfo>();
  for (const [peer, info] of Object.entries(wire.peer_map)) {
    peerMap.set(peer, toPinInfo(peer, info));
  }
  return {
    cid: wire.cid,
    name: wire.name,
    allocations: wire.allocations,
    origins: wire.origins,
    created: wire.created,
    metadata: wire.metadata,
    peerMap,
  };
}

export function decodeGlobalPinInfo(value: unknown, method: string): GlobalPinInfo {
  return toGlobalPinInfo(validateReply(globalPinInfoSchema, value, "Cluster", method));
}

export function decodeGlobalPinInfoList(value: unknown, method: string): GlobalPinInfo[] {
  return validateReply(globalPinInfoListSchema, value, "Cluster", method).map(toGlobalPinInfo);
}

export function decodePin(value: unknown, method: string): ClusterPin {
  const wire = validateReply(pinSchema, value, "Cluster", method);
  return {
    cid: wire.cid,
    name: wire.name,
    mode: wire.mode,
    allocations: wire.allocations,
    origins: wire.origins,
    metadata: wire.metadata,
    replicationFactorMin: wire.replication_factor_min,
    replicationFactorMax: wire.replication_factor_max,
    pinUpdate: wire.pin_update,
    timestamp: wire.timestamp,
  };
}

export function decodeIpfsId(value: unknown): IpfsId {
  const wire = validateReply(ipfsIdSchema, value, "Cluster", "IPFSID");
  return {
    id: wire.id,
    addresses: wire.addresses,
    error: wire.error || undefined,
  };
}

export function decodePeerList(value: unknown): string[] {
  return validateReply(peerListSchema, value, "Consensus", "Peers");
}

// -----------------------------------------
// Encoders
// -----------------------------------------

export type PinRequestArgs = Pick<ClusterPin, "cid" | "name" | "mode" | "origins" | "metadata"> &
  Partial<Pick<ClusterPin, "pinUpdate" | "replicationFactorMin" | "replicationFactorMax">>;

export function encodePinArgs(pin: PinRequestArgs): Record<string, unknown> {
  const args: Record<string, unknown> = {
    cid: pin.cid.toString(),
    name: pin.name,
    mode: pin.mode,
    origins: pin.origins,
    metadata: pin.metadata,
    replication_factor_min: pin.replicationFactorMin ?? 0,
    replication_factor_max: pin.replicationFactorMax ?? 0,
  };
  if (pin.pinUpdate) {
    args.pin_update = pin.pinUpdate.toString();
  }
  return args;
}

export function encodeStatusFilter(filter: TrackerStatusSet): string[] {
  return trackerStatusToWire(filter);
}
