import Joi from "joi";
import { base16, base16upper } from "multiformats/bases/base16";
import { base32, base32hex, base32hexupper, base32upper } from "multiformats/bases/base32";
import { base36, base36upper } from "multiformats/bases/base36";
import { base58btc, base58flickr } from "multiformats/bases/base58";
import { base64, base64pad, base64url, base64urlpad } from "multiformats/bases/base64";
import { CID } from "multiformats/cid";
import { InvalidRequestError } from "../common/errors.js";
import {
  DEFAULT_LIST_LIMIT,
  type ListOptions,
  MatchingStrategy,
  MAX_LIST_LIMIT,
  MAX_PIN_NAME_LENGTH,
  PinStatus,
} from "./types.js";

type ListQuery = {
  cid: CID[];
  name: string;
  match: MatchingStrategy;
  status: Set<PinStatus>;
  before?: Date;
  after?: Date;
  limit: number;
  meta: Record<string, string>;
};

/** Statuses a client may filter on; `undefined` is never reported as a filter target. */
const FILTERABLE_STATUSES: ReadonlySet<string> = new Set([
  PinStatus.QUEUED,
  PinStatus.PINNING,
  PinStatus.PINNED,
  PinStatus.FAILED,
]);

function isFilterableStatus(value: string): value is PinStatus {
  return FILTERABLE_STATUSES.has(value);
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/** Accepts a CID string in any of these encodings, selected by its multibase prefix. */
const multibaseDecoder = base32.decoder
  .or(base32upper.decoder)
  .or(base32hex.decoder)
  .or(base32hexupper.decoder)
  .or(base36.decoder)
  .or(base36upper.decoder)
  .or(base58btc.decoder)
  .or(base58flickr.decoder)
  .or(base16.decoder)
  .or(base16upper.decoder)
  .or(base64.decoder)
  .or(base64pad.decoder)
  .or(base64url.decoder)
  .or(base64urlpad.decoder);

function decodeCid(value: string): CID {
  return CID.parse(value, multibaseDecoder);
}

export function parseCid(value: string, field = "cid"): CID {
  try {
    return decodeCid(value.trim());
  } catch {
    throw new InvalidRequestError(`invalid CID: ${value}`, field);
  }
}

// -----------------------------------------
// Joi Custom Schema Converters
// -----------------------------------------

const toCidList = (maxCids: number) => (value: string, helpers: Joi.CustomHelpers) => {
  const parts = splitList(value);
  if (parts.length === 0) {
    return helpers.message({ custom: "cid must list at least one CID" });
  }
  if (parts.length > maxCids) {
    return helpers.message({ custom: `cid accepts at most ${maxCids} CIDs` });
  }
  const cids: CID[] = [];
  for (const part of parts) {
    try {
      cids.push(decodeCid(part));
    } catch {
      return helpers.message({ custom: "cid contains an invalid CID" });
    }
  }
  return cids;
};

const toStatusSet = (value: string, helpers: Joi.CustomHelpers) => {
  const statuses = new Set<PinStatus>();
  for (const part of splitList(value)) {
    if (!isFilterableStatus(part)) {
      return helpers.message({ custom: "status must be a list of queued, pinning, pinned or failed" });
    }
    statuses.add(part);
  }
  if (statuses.size === 0) {
    return helpers.message({ custom: "status must list at least one status" });
  }
  return statuses;
};

const toStringRecord = (value: string, helpers: Joi.CustomHelpers) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return helpers.message({ custom: "meta must be a JSON object" });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return helpers.message({ custom: "meta must be a JSON object" });
  }
  const meta: Record<string, string> = {};
  for (const [key, entry] of Object.entries(parsed)) {
    if (typeof entry !== "string") {
      return helpers.message({ custom: "meta values must be strings" });
    }
    meta[key] = entry;
  }
  return meta;
};

// -----------------------------------------
// Joi Schema
// -----------------------------------------

function listQuerySchema(maxCids: number) {
  return Joi.object<ListQuery>({
    cid: Joi.string().custom(toCidList(maxCids)).default([]),
    name: Joi.string().allow("").max(MAX_PIN_NAME_LENGTH).default(""),
    match: Joi.string()
      .valid(...Object.values(MatchingStrategy))
      .default(MatchingStrategy.EXACT),
    status: Joi.string()
      .custom(toStatusSet)
      .default(() => new Set([PinStatus.PINNED])),
    before: Joi.date().iso(),
    after: Joi.date().iso(),
    limit: Joi.number().integer().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
    meta: Joi.string().custom(toStringRecord).default(() => ({})),
  });
}

/**
 * Validates the query string of a list request.
 * Unknown keys and malformed values are rejected with {@link InvalidRequestError}.
 */
export function parseListOptions(query: unknown, maxCids: number): ListOptions {
  const result = listQuerySchema(maxCids).validate(query ?? {}, { abortEarly: true, convert: true });
  if (result.error) {
    const field = result.error.details[0]?.path.join(".");
    throw new InvalidRequestError(result.error.message, field || undefined);
  }

  const parsed = result.value;
  return {
    cids: parsed.cid,
    name: parsed.name,
    matchingStrategy: parsed.match,
    status: parsed.status,
    before: parsed.before,
    after: parsed.after,
    limit: parsed.limit,
    meta: parsed.meta,
  };
}
