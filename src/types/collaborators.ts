/**
 * Collaborator Types
 * 
 * Narrow interfaces for the outside services the generators draw on.
 * 
 * @module types/collaborators
 */

/**
 * Cryptographically secure random bytes. Throws when no entropy is available.
 */
export interface RandomSource {
  fill(buffer: Uint8Array): void;
}

/**
 * Hash primitive. Only the first 16 bytes of the digest are used.
 */
export interface HashFunction {
  digest(data: Uint8Array): Uint8Array;
}

/**
 * Source of a stable 48-bit node identifier, usually a MAC address.
 * Returns undefined (or throws) when none can be found.
 */
export interface NodeIdSource {
  getNodeId(): Uint8Array | undefined;
}

/**
 * 100 ns ticks since 1582-10-15 00:00:00 UTC
 */
export interface Clock {
  now(): bigint;
}
