/**
 * UUID Types
 * 
 * @module types/uuid
 */

import type { UuidError } from "../errors/errorTypes";
import type { UUID_VARIANTS, UUID_VERSIONS } from "../utils/constants";

/**
 * Known version tags (1-5)
 */
export type UuidVersion = (typeof UUID_VERSIONS)[keyof typeof UUID_VERSIONS];

/**
 * Layout family read from byte 8
 */
export type UuidVariant = (typeof UUID_VARIANTS)[keyof typeof UUID_VARIANTS];

/**
 * The five RFC 4122 fields, each read big-endian
 */
export interface UuidFields {
  timeLow: number;
  timeMid: number;
  timeHiAndVersion: number;
  /** Bytes 8-9, variant bits included */
  clockSeq: number;
  /** 48-bit node */
  node: bigint;
}

/**
 * Outcome of a non-throwing codec call
 */
export type UuidResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: UuidError };

/**
 * Name input for version 3 and 5 generation. Strings are UTF-8 encoded.
 */
export type UuidName = string | Uint8Array;
