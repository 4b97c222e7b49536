import { TrackerStatus, type TrackerStatusSet } from "./types.js";

const TRACKER_STATUS_VALUES: ReadonlySet<string> = new Set(Object.values(TrackerStatus));

/** Flags that make a peer report count as a failure. */
export const TRACKER_ERROR_STATUSES: TrackerStatusSet = new Set([
  TrackerStatus.CLUSTER_ERROR,
  TrackerStatus.PIN_ERROR,
  TrackerStatus.UNPIN_ERROR,
]);

export function isTrackerStatus(value: string): value is TrackerStatus {
  return TRACKER_STATUS_VALUES.has(value);
}

export function trackerStatusSet(...statuses: TrackerStatus[]): TrackerStatusSet {
  return new Set(statuses);
}

export function unionTrackerStatus(sets: Iterable<TrackerStatusSet>): TrackerStatusSet {
  const union = new Set<TrackerStatus>();
  for (const set of sets) {
    for (const status of set) {
      union.add(status);
    }
  }
  return union;
}

/** True when the two sets share at least one flag. */
export function matchesAny(status: TrackerStatusSet, filter: TrackerStatusSet): boolean {
  for (const flag of filter) {
    if (status.has(flag)) {
      return true;
    }
  }
  return false;
}

/** Wire form, sorted so the same set always serializes the same way. */
export function trackerStatusToWire(status: TrackerStatusSet): string[] {
  return Array.from(status).sort();
}
