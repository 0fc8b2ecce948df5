/**
 * Configuration Types
 * 
 * @module types/config
 */

import type { Logger } from "../utils/logger";
import type { Clock, NodeIdSource, RandomSource } from "./collaborators";

/**
 * Options for a version 1 generator. Every collaborator falls back to the
 * Node.js backed default when omitted.
 */
export interface TimeUuidGeneratorOptions {
  clock?: Clock;
  random?: RandomSource;
  nodeIdSource?: NodeIdSource;
  /** Explicit 6-byte node; bypasses `nodeIdSource` */
  node?: Uint8Array;
  /** Initial clock sequence (low 14 bits used); drawn from `random` otherwise */
  clockSeq?: number;
  logger?: Logger;
}
