import { matchesAny, TRACKER_ERROR_STATUSES, unionTrackerStatus } from "../cluster-rpc/tracker-status.js";
import { type GlobalPinInfo, TrackerStatus, type TrackerStatusSet } from "../cluster-rpc/types.js";
import { type ExternalPinStatus, type ListOptions, MatchingStrategy, type Pin, PinStatus } from "./types.js";

export const ZERO_TIMESTAMP_MS = 0;

/** Annotations attached to every pin status this service emits. */
export const PIN_STATUS_INFO: Readonly<Record<string, string>> = Object.freeze({
  source: "IPFS cluster API",
  warning1: "CID used for requestID. Conflicts possible",
  warning2: "experimental",
});

/**
 * Picks one representative status for a set of tracker flags.
 * Precedence: any error flag, then pin_queued, then pinning, then pinned.
 */
export function toPinStatus(status: TrackerStatusSet): PinStatus {
  if (matchesAny(status, TRACKER_ERROR_STATUSES)) {
    return PinStatus.FAILED;
  }
  if (status.has(TrackerStatus.PIN_QUEUED)) {
    return PinStatus.QUEUED;
  }
  if (status.has(TrackerStatus.PINNING)) {
    return PinStatus.PINNING;
  }
  if (status.has(TrackerStatus.PINNED)) {
    return PinStatus.PINNED;
  }
  return PinStatus.UNDEFINED;
}

/**
 * Tracker flags to request from the cluster for a status filter.
 *
 * A pin is listed when any peer reports any of these flags, so every flag an
 * external status can stand for is included. This is not the inverse of
 * {@link toPinStatus}: flags outside the four groups it reads map to nothing.
 */
export function toTrackerStatusFilter(statuses: Iterable<PinStatus>): TrackerStatusSet {
  const filter = new Set<TrackerStatus>();
  for (const status of statuses) {
    switch (status) {
      case PinStatus.FAILED:
        for (const flag of TRACKER_ERROR_STATUSES) {
          filter.add(flag);
        }
        break;
      case PinStatus.QUEUED:
        filter.add(TrackerStatus.PIN_QUEUED);
        break;
      case PinStatus.PINNING:
        filter.add(TrackerStatus.PINNING);
        break;
      case PinStatus.PINNED:
        filter.add(TrackerStatus.PINNED);
        break;
      case PinStatus.UNDEFINED:
        break;
    }
  }
  return filter;
}

/**
 * Combines every peer's report on a pin into one external status record.
 *
 * - status: union of the peers' flags, reduced by {@link toPinStatus}
 * - delegates: every peer's IPFS addresses, first occurrence kept
 * - created: earliest peer timestamp after epoch; epoch when there is none
 */
export function aggregateGlobalPinInfo(requestId: string, gpi: GlobalPinInfo): ExternalPinStatus {
  const peers = Array.from(gpi.peerMap.values());
  const delegates = new Set<string>();
  let createdMs = ZERO_TIMESTAMP_MS;

  for (const peer of peers) {
    for (const address of peer.ipfsAddresses) {
      delegates.add(address);
    }
    const ts = peer.timestamp.getTime();
    if (ts > ZERO_TIMESTAMP_MS && (createdMs === ZERO_TIMESTAMP_MS || ts < createdMs)) {
      createdMs = ts;
    }
  }

  return {
    requestId,
    status: toPinStatus(unionTrackerStatus(peers.map((peer) => peer.status))),
    created: new Date(createdMs),
    pin: {
      cid: gpi.cid.toString(),
      name: gpi.name,
      origins: [...gpi.origins],
      meta: { ...gpi.metadata },
    },
    delegates: Array.from(delegates),
    info: { ...PIN_STATUS_INFO },
  };
}

export function matchesName(pin: Pin, name: string, strategy: MatchingStrategy): boolean {
  if (name === "") {
    return true;
  }
  switch (strategy) {
    case MatchingStrategy.EXACT:
      return pin.name === name;
    case MatchingStrategy.IEXACT:
      return pin.name.toLowerCase() === name.toLowerCase();
    case MatchingStrategy.PARTIAL:
      return pin.name.includes(name);
    case MatchingStrategy.IPARTIAL:
      return pin.name.toLowerCase().includes(name.toLowerCase());
  }
}

/** Every filter entry must be present in the pin's metadata with an equal value. */
export function matchesMeta(pin: Pin, meta: Record<string, string>): boolean {
  return Object.entries(meta).every(
    ([key, value]) => Object.prototype.hasOwnProperty.call(pin.meta, key) && pin.meta[key] === value,
  );
}

/** `before` and `after` are exclusive bounds on the creation time. */
export function matchesCreated(status: ExternalPinStatus, before?: Date, after?: Date): boolean {
  const created = status.created.getTime();
  if (before && !(created < before.getTime())) {
    return false;
  }
  if (after && !(created > after.getTime())) {
    return false;
  }
  return true;
}

export type PinFilters = Pick<ListOptions, "name" | "matchingStrategy" | "meta" | "before" | "after">;

/** Name, metadata and creation-window filters of a list request. */
export function matchesPinFilters(status: ExternalPinStatus, filters: PinFilters): boolean {
  return (
    matchesName(status.pin, filters.name, filters.matchingStrategy) &&
    matchesMeta(status.pin, filters.meta) &&
    matchesCreated(status, filters.before, filters.after)
  );
}

/**
 * {@link matchesPinFilters} plus the requested status set, for statuses looked
 * up one CID at a time where the cluster has not filtered by tracker flags.
 */
export function matchesListFilters(
  status: ExternalPinStatus,
  filters: PinFilters & Pick<ListOptions, "status">,
): boolean {
  return filters.status.has(status.status) && matchesPinFilters(status, filters);
}
