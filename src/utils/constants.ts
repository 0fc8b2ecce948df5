/**
 * Constants
 * 
 * Layout and clock constants shared across the library.
 * 
 * @module utils/constants
 */

/**
 * Fixed sizes of the RFC 4122 layout
 */
export const UUID_LAYOUT = {
  BYTE_LENGTH: 16,
  STRING_LENGTH: 36,
  NODE_LENGTH: 6,
  // Index of the hyphens in the canonical 8-4-4-4-12 form
  HYPHEN_POSITIONS: [8, 13, 18, 23],
  VERSION_BYTE: 6,
  VARIANT_BYTE: 8,
} as const;

/**
 * Version 1 timestamp constants (100 ns ticks)
 */
export const UUID_CLOCK = {
  // Ticks between 1582-10-15 and 1970-01-01
  GREGORIAN_OFFSET_TICKS: 0x01b21dd213814000n,
  TICKS_PER_MILLISECOND: 10_000n,
  TIMESTAMP_MASK: 0x0fffffffffffffffn,
  CLOCK_SEQ_MASK: 0x3fff,
} as const;

/**
 * Version tags carried in the top nibble of byte 6
 */
export const UUID_VERSIONS = {
  TIME: 1,
  DCE: 2,
  MD5: 3,
  RANDOM: 4,
  SHA1: 5,
} as const;

/**
 * Layout families encoded in the top bits of byte 8
 */
export const UUID_VARIANTS = {
  NCS: "ncs",
  RFC4122: "rfc4122",
  MICROSOFT: "microsoft",
  FUTURE: "future",
} as const;

export const URN_PREFIX = "urn:uuid:";
