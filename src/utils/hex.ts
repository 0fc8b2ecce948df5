/**
 * Hex Utility
 * 
 * Byte <-> hexadecimal helpers behind the textual codec.
 * 
 * @module utils/hex
 */

import { UUID_LAYOUT } from "./constants";

const BYTE_TO_HEX: readonly string[] = Array.from({ length: 256 }, (_, byte) =>
  byte.toString(16).padStart(2, "0")
);

/**
 * Lowercase hex of a single octet
 */
export function byteToHex(byte: number): string {
  return BYTE_TO_HEX[byte & 0xff];
}

/**
 * Value of one hex digit given its char code, or -1 when it is not one
 */
export function hexDigitValue(charCode: number): number {
  if (charCode >= 48 && charCode <= 57) return charCode - 48; // 0-9
  if (charCode >= 97 && charCode <= 102) return charCode - 87; // a-f
  if (charCode >= 65 && charCode <= 70) return charCode - 55; // A-F
  return -1;
}

/**
 * Render 16 bytes in the canonical 8-4-4-4-12 form
 */
export function formatCanonical(bytes: Uint8Array): string {
  let out = "";
  for (let i = 0; i < UUID_LAYOUT.BYTE_LENGTH; i++) {
    // Hyphens follow bytes 3, 5, 7 and 9
    if (i === 4 || i === 6 || i === 8 || i === 10) {
      out += "-";
    }
    out += byteToHex(bytes[i]);
  }
  return out;
}

/**
 * Render a node identifier as hyphen separated octets (00-2a-35-0d-13-80)
 */
export function formatNodeId(node: Uint8Array): string {
  return Array.from(node, byteToHex).join("-");
}
