/**
 * Collaborators Module
 *
 * Default random, hash, node-id and clock sources backed by Node.js.
 * Each one is a thin adapter; the generators only see the interfaces.
 *
 * @module modules/collaborators
 */

import { createHash, randomFillSync } from "node:crypto";
import { networkInterfaces, type NetworkInterfaceInfo } from "node:os";
import { EntropyUnavailableError } from "../errors/errorTypes";
import { callCollaborator } from "../errors/errorHandler";
import type { Clock, HashFunction, NodeIdSource, RandomSource } from "../types/collaborators";
import { UUID_CLOCK, UUID_LAYOUT } from "../utils/constants";

const ZERO_MAC = "00:00:00:00:00:00";

/**
 * CSPRNG from node:crypto
 */
export const nodeRandomSource: RandomSource = {
  fill(buffer: Uint8Array): void {
    randomFillSync(buffer);
  },
};

function nodeHash(algorithm: "md5" | "sha1"): HashFunction {
  return {
    digest(data: Uint8Array): Uint8Array {
      return new Uint8Array(createHash(algorithm).update(data).digest());
    },
  };
}

export const md5Hash: HashFunction = nodeHash("md5");

export const sha1Hash: HashFunction = nodeHash("sha1");

/**
 * Wall clock in 100 ns ticks since the Gregorian reform. Resolution is
 * one millisecond; the version 1 generator spreads calls within a tick.
 */
export const systemClock: Clock = {
  now(): bigint {
    return BigInt(Date.now()) * UUID_CLOCK.TICKS_PER_MILLISECOND + UUID_CLOCK.GREGORIAN_OFFSET_TICKS;
  },
};

/**
 * Parse "aa:bb:cc:dd:ee:ff" into 6 bytes
 */
function parseMac(mac: string): Uint8Array | undefined {
  const parts = mac.split(":");
  if (parts.length !== UUID_LAYOUT.NODE_LENGTH) {
    return undefined;
  }
  const bytes = new Uint8Array(UUID_LAYOUT.NODE_LENGTH);
  for (let i = 0; i < parts.length; i++) {
    if (!/^[0-9a-fA-F]{2}$/.test(parts[i])) {
      return undefined;
    }
    bytes[i] = parseInt(parts[i], 16);
  }
  return bytes;
}

/**
 * Node-id source reading the first non-internal hardware address.
 *
 * @param listInterfaces - Interface listing, `os.networkInterfaces` by default
 */
export function createSystemNodeIdSource(
  listInterfaces: () => NodeJS.Dict<NetworkInterfaceInfo[]> = networkInterfaces
): NodeIdSource {
  return {
    getNodeId(): Uint8Array | undefined {
      for (const addresses of Object.values(listInterfaces())) {
        for (const address of addresses ?? []) {
          if (address.internal || address.mac === ZERO_MAC) {
            continue;
          }
          const node = parseMac(address.mac);
          if (node) {
            return node;
          }
        }
      }
      return undefined;
    },
  };
}

export const systemNodeIdSource: NodeIdSource = createSystemNodeIdSource();

/**
 * Random 48-bit node with the multicast bit set, so it can never clash
 * with a real IEEE 802 address (RFC 4122 section 4.5). This is the
 * explicit fallback for hosts without a hardware address.
 *
 * @throws EntropyUnavailableError when the random source fails
 */
export function randomNodeId(random: RandomSource = nodeRandomSource): Uint8Array {
  const node = new Uint8Array(UUID_LAYOUT.NODE_LENGTH);
  fillRandom(random, node);
  node[0] |= 0x01;
  return node;
}

/**
 * Fill `buffer` from `random`, reporting any failure as EntropyUnavailableError
 */
export function fillRandom(random: RandomSource, buffer: Uint8Array): void {
  callCollaborator(
    () => random.fill(buffer),
    (detail, options) => new EntropyUnavailableError(`Random source failed: ${detail}`, options)
  );
}
