/**
 * TextCodec Module
 *
 * Canonical text form: 32 lowercase hex digits in 8-4-4-4-12 groups,
 * 36 characters. Parsing accepts exactly that shape (hex digits in either
 * case) and never truncates or pads.
 *
 * @module modules/textCodec
 */

import { InvalidFormatError } from "../errors/errorTypes";
import type { UuidResult } from "../types/uuid";
import { URN_PREFIX, UUID_LAYOUT } from "../utils/constants";
import { formatCanonical, hexDigitValue } from "../utils/hex";
import { safeTry } from "../utils/safe";
import { Uuid } from "./uuidValue";

const HYPHEN_POSITIONS: ReadonlySet<number> = new Set<number>(UUID_LAYOUT.HYPHEN_POSITIONS);

/**
 * Canonical lowercase hyphenated form
 */
export function formatUuid(uuid: Uuid): string {
  return formatCanonical(uuid.toBytes());
}

/**
 * `urn:uuid:` followed by the canonical form
 */
export function toUrn(uuid: Uuid): string {
  return `${URN_PREFIX}${formatUuid(uuid)}`;
}

/**
 * Parse the canonical 36-character form.
 *
 * @throws InvalidFormatError on wrong length, a misplaced hyphen or a
 * non-hex character
 */
export function parseUuid(input: string): Uuid {
  if (typeof input !== "string") {
    throw new InvalidFormatError("UUID input must be a string", String(input));
  }
  if (input.length !== UUID_LAYOUT.STRING_LENGTH) {
    throw new InvalidFormatError(
      `UUID string must be ${UUID_LAYOUT.STRING_LENGTH} characters, got ${input.length}`,
      input
    );
  }

  const bytes = new Uint8Array(UUID_LAYOUT.BYTE_LENGTH);
  let byteIndex = 0;
  let i = 0;
  while (i < UUID_LAYOUT.STRING_LENGTH) {
    if (HYPHEN_POSITIONS.has(i)) {
      if (input[i] !== "-") {
        throw new InvalidFormatError(`Expected "-" at position ${i}`, input, i);
      }
      i += 1;
      continue;
    }

    // Groups have even length, so a digit pair never straddles a hyphen
    const high = hexDigitValue(input.charCodeAt(i));
    if (high < 0) {
      throw new InvalidFormatError(`Invalid hex character at position ${i}`, input, i);
    }
    const low = hexDigitValue(input.charCodeAt(i + 1));
    if (low < 0) {
      throw new InvalidFormatError(`Invalid hex character at position ${i + 1}`, input, i + 1);
    }
    bytes[byteIndex++] = (high << 4) | low;
    i += 2;
  }

  return Uuid.copyOf(bytes);
}

/**
 * Non-throwing form of {@link parseUuid}
 */
export function safeParseUuid(input: string): UuidResult<Uuid> {
  return safeTry(() => parseUuid(input));
}

/**
 * Type guard: true for strings {@link parseUuid} accepts
 */
export function isValidUuid(value: unknown): value is string {
  return typeof value === "string" && safeParseUuid(value).ok;
}
