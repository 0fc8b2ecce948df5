/**
 * Generators Module
 *
 * Random (v4) and name-based (v3 MD5, v5 SHA-1) generation. Version 3 and
 * 5 are separate operations so the declared version always matches the
 * hash that produced the payload.
 *
 * @module modules/generators
 */

import { InvalidLengthError } from "../errors/errorTypes";
import type { HashFunction, RandomSource } from "../types/collaborators";
import type { UuidName, UuidVersion } from "../types/uuid";
import { UUID_LAYOUT, UUID_VERSIONS } from "../utils/constants";
import { fillRandom, md5Hash, nodeRandomSource, sha1Hash } from "./collaborators";
import { Uuid } from "./uuidValue";

const textEncoder = new TextEncoder();

/**
 * Write the version nibble and the `10` variant bits into a filled
 * 16-byte payload, then copy it into a value. Must run after every
 * payload byte is in place.
 *
 * @throws InvalidLengthError when the payload is not 16 bytes long
 */
export function stampVersionAndVariant(payload: Uint8Array, version: UuidVersion): Uuid {
  payload[UUID_LAYOUT.VERSION_BYTE] = (payload[UUID_LAYOUT.VERSION_BYTE] & 0x0f) | (version << 4);
  payload[UUID_LAYOUT.VARIANT_BYTE] = (payload[UUID_LAYOUT.VARIANT_BYTE] & 0x3f) | 0x80;
  return Uuid.copyOf(payload);
}

/**
 * Version 4: 122 random bits.
 *
 * @throws EntropyUnavailableError when the random source fails
 */
export function generateV4(random: RandomSource = nodeRandomSource): Uuid {
  const payload = new Uint8Array(UUID_LAYOUT.BYTE_LENGTH);
  fillRandom(random, payload);
  return stampVersionAndVariant(payload, UUID_VERSIONS.RANDOM);
}

function generateNameBased(
  namespace: Uuid,
  name: UuidName,
  hash: HashFunction,
  version: UuidVersion
): Uuid {
  const nameBytes = typeof name === "string" ? textEncoder.encode(name) : name;
  const input = new Uint8Array(UUID_LAYOUT.BYTE_LENGTH + nameBytes.length);
  input.set(namespace.toBytes(), 0);
  input.set(nameBytes, UUID_LAYOUT.BYTE_LENGTH);

  const digest = hash.digest(input);
  if (digest.length < UUID_LAYOUT.BYTE_LENGTH) {
    throw new InvalidLengthError(
      `Hash digest must be at least ${UUID_LAYOUT.BYTE_LENGTH} bytes, got ${digest.length}`,
      digest.length
    );
  }
  return stampVersionAndVariant(digest.slice(0, UUID_LAYOUT.BYTE_LENGTH), version);
}

/**
 * Version 3: MD5 of namespace bytes followed by name bytes.
 * Identical inputs always give an identical value.
 */
export function generateV3(namespace: Uuid, name: UuidName, hash: HashFunction = md5Hash): Uuid {
  return generateNameBased(namespace, name, hash, UUID_VERSIONS.MD5);
}

/**
 * Version 5: SHA-1 of namespace bytes followed by name bytes, truncated
 * to 16 bytes.
 */
export function generateV5(namespace: Uuid, name: UuidName, hash: HashFunction = sha1Hash): Uuid {
  return generateNameBased(namespace, name, hash, UUID_VERSIONS.SHA1);
}
