/**
 * UuidValue Module
 *
 * The 16-byte UUID value. Instances are immutable: construction copies
 * its input and every accessor hands out a copy.
 *
 * Version is data (the top nibble of byte 6), not a subtype, so one class
 * covers every version including foreign or legacy layouts.
 *
 * @module modules/uuidValue
 */

import { InvalidLengthError } from "../errors/errorTypes";
import type { UuidFields, UuidVariant, UuidVersion } from "../types/uuid";
import { UUID_LAYOUT, UUID_VARIANTS, UUID_VERSIONS } from "../utils/constants";
import { formatCanonical } from "../utils/hex";

const KNOWN_VERSIONS: ReadonlySet<number> = new Set<number>(Object.values(UUID_VERSIONS));

function isUuidVersion(value: number): value is UuidVersion {
  return KNOWN_VERSIONS.has(value);
}

export class Uuid {
  /** The all-zero sentinel meaning "absent" */
  static readonly NIL: Uuid = new Uuid(new Uint8Array(UUID_LAYOUT.BYTE_LENGTH));

  private readonly octets: Uint8Array;

  private constructor(octets: Uint8Array) {
    this.octets = octets;
  }

  /**
   * Copy exactly 16 bytes into a new value
   *
   * @throws InvalidLengthError when the input is not 16 bytes long
   */
  static copyOf(octets: Uint8Array): Uuid {
    if (octets.length !== UUID_LAYOUT.BYTE_LENGTH) {
      throw new InvalidLengthError(
        `UUID requires ${UUID_LAYOUT.BYTE_LENGTH} bytes, got ${octets.length}`,
        octets.length
      );
    }
    return new Uuid(Uint8Array.from(octets));
  }

  /**
   * Copy of the 16 bytes in stored order
   */
  toBytes(): Uint8Array {
    return this.octets.slice();
  }

  /**
   * Raw top nibble of byte 6 (0-15)
   */
  get version(): number {
    return this.octets[UUID_LAYOUT.VERSION_BYTE] >>> 4;
  }

  /**
   * Version tag when it is one of the RFC 4122 versions
   */
  getVersion(): UuidVersion | undefined {
    const version = this.version;
    return isUuidVersion(version) ? version : undefined;
  }

  /**
   * Layout family from the top bits of byte 8 (RFC 4122 section 4.1.1)
   */
  getVariant(): UuidVariant {
    const byte = this.octets[UUID_LAYOUT.VARIANT_BYTE];
    if ((byte & 0x80) === 0x00) return UUID_VARIANTS.NCS;
    if ((byte & 0xc0) === 0x80) return UUID_VARIANTS.RFC4122;
    if ((byte & 0xe0) === 0xc0) return UUID_VARIANTS.MICROSOFT;
    return UUID_VARIANTS.FUTURE;
  }

  isNil(): boolean {
    return this.octets.every((byte) => byte === 0);
  }

  equals(other: Uuid): boolean {
    return this.compare(other) === 0;
  }

  /**
   * Byte-wise lexicographic comparison
   */
  compare(other: Uuid): -1 | 0 | 1 {
    for (let i = 0; i < UUID_LAYOUT.BYTE_LENGTH; i++) {
      const a = this.octets[i];
      const b = other.octets[i];
      if (a !== b) {
        return a < b ? -1 : 1;
      }
    }
    return 0;
  }

  asFields(): UuidFields {
    const view = new DataView(this.octets.buffer, this.octets.byteOffset, UUID_LAYOUT.BYTE_LENGTH);
    return {
      timeLow: view.getUint32(0),
      timeMid: view.getUint16(4),
      timeHiAndVersion: view.getUint16(6),
      clockSeq: view.getUint16(8),
      node: (BigInt(view.getUint16(10)) << 32n) | BigInt(view.getUint32(12)),
    };
  }

  /**
   * For version 1 values, the 60-bit count of 100 ns ticks since
   * 1582-10-15 the value was stamped with.
   */
  getTimestamp(): bigint | undefined {
    if (this.version !== UUID_VERSIONS.TIME) {
      return undefined;
    }
    const { timeLow, timeMid, timeHiAndVersion } = this.asFields();
    return (BigInt(timeHiAndVersion & 0x0fff) << 48n) | (BigInt(timeMid) << 32n) | BigInt(timeLow);
  }

  /**
   * For version 1 values, the 6-byte node identifier
   */
  getNode(): Uint8Array | undefined {
    if (this.version !== UUID_VERSIONS.TIME) {
      return undefined;
    }
    return this.octets.slice(UUID_LAYOUT.BYTE_LENGTH - UUID_LAYOUT.NODE_LENGTH);
  }

  toString(): string {
    return formatCanonical(this.octets);
  }

  toJSON(): string {
    return this.toString();
  }
}
