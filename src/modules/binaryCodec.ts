/**
 * BinaryCodec Module
 *
 * UUID value <-> 16-byte array. Bytes keep RFC 4122 field order (each
 * field big-endian), so no reordering happens in either direction.
 *
 * Ingestion does not check version or variant bits: foreign and legacy
 * layouts are accepted as-is.
 *
 * @module modules/binaryCodec
 */

import type { UuidResult } from "../types/uuid";
import { safeTry } from "../utils/safe";
import { Uuid } from "./uuidValue";

/**
 * Build a UUID value from exactly 16 bytes. The input is copied.
 *
 * @throws InvalidLengthError when the input is not 16 bytes long
 */
export function uuidFromBytes(bytes: Uint8Array): Uuid {
  return Uuid.copyOf(bytes);
}

/**
 * Fresh 16-byte copy of the value in stored order
 */
export function uuidToBytes(uuid: Uuid): Uint8Array {
  return uuid.toBytes();
}

/**
 * Non-throwing form of {@link uuidFromBytes}
 */
export function safeUuidFromBytes(bytes: Uint8Array): UuidResult<Uuid> {
  return safeTry(() => uuidFromBytes(bytes));
}
