import type { CID } from "multiformats/cid";
import type { BatchStatusError } from "../common/errors.js";

/** Status values of the Pinning Services API. */
export enum PinStatus {
  QUEUED = "queued",
  PINNING = "pinning",
  PINNED = "pinned",
  FAILED = "failed",
  UNDEFINED = "undefined",
}

/** How the `name` list filter is compared against pin names. */
export enum MatchingStrategy {
  EXACT = "exact",
  IEXACT = "iexact",
  PARTIAL = "partial",
  IPARTIAL = "ipartial",
}

/** Pin descriptor as sent and received by API clients. */
export interface Pin {
  cid: string;
  name: string;
  origins: string[];
  meta: Record<string, string>;
}

export interface ExternalPinStatus {
  /** The CID string; two requests for the same CID share it. */
  requestId: string;
  status: PinStatus;
  /** Earliest peer report, or epoch when no peer reported. */
  created: Date;
  pin: Pin;
  delegates: string[];
  info: Record<string, string>;
}

/** Validated list query; see `parseListOptions`. */
export interface ListOptions {
  cids: CID[];
  name: string;
  matchingStrategy: MatchingStrategy;
  status: ReadonlySet<PinStatus>;
  before?: Date;
  after?: Date;
  limit: number;
  meta: Record<string, string>;
}

export interface ListResult {
  results: ExternalPinStatus[];
  count: number;
  /** Set when lookups of an explicit CID list failed; `results` holds the successes. */
  error?: BatchStatusError;
}

export const DEFAULT_LIST_LIMIT = 10;
export const MAX_LIST_LIMIT = 1000;
export const MAX_PIN_NAME_LENGTH = 255;
