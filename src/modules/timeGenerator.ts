/**
 * TimeGenerator Module
 *
 * Version 1 (time + node) generation.
 *
 * Clock state (last reading, last timestamp, clock sequence) lives in a
 * sequencer. Each generator instance owns one, and `generateV1` shares a
 * single module-owned one across calls. Per sequencer, a
 * (timestamp, clock sequence) pair is never emitted twice:
 * - clock reading moved backwards: the clock sequence is incremented
 * - otherwise the timestamp is the reading, or one tick past the last
 *   timestamp when the reading has not passed it
 *
 * A missing node identifier is an error. Nothing is substituted; callers
 * that want a fallback pass `node: randomNodeId()` explicitly.
 *
 * @module modules/timeGenerator
 */

import { InvalidLengthError, NodeIdUnavailableError } from "../errors/errorTypes";
import { callCollaborator } from "../errors/errorHandler";
import type { NodeIdSource, RandomSource } from "../types/collaborators";
import type { TimeUuidGeneratorOptions } from "../types/config";
import { UUID_CLOCK, UUID_LAYOUT, UUID_VERSIONS } from "../utils/constants";
import type { Logger } from "../utils/logger";
import { formatNodeId } from "../utils/hex";
import { fillRandom, nodeRandomSource, systemClock, systemNodeIdSource } from "./collaborators";
import { stampVersionAndVariant } from "./generators";
import type { Uuid } from "./uuidValue";

/**
 * Stateful version 1 generator
 */
export interface TimeUuidGenerator {
  /**
   * @throws NodeIdUnavailableError when no node identifier can be obtained
   * @throws EntropyUnavailableError when the clock sequence cannot be seeded
   */
  generate(): Uuid;
  /** Current 14-bit clock sequence, undefined until first use */
  getClockSequence(): number | undefined;
}

interface ClockTick {
  timestamp: bigint;
  clockSeq: number;
}

interface ClockSequencer {
  next(reading: bigint, random: RandomSource, logger?: Logger): ClockTick;
  current(): number | undefined;
}

function createClockSequencer(initialClockSeq?: number): ClockSequencer {
  let clockSeq: number | undefined =
    initialClockSeq === undefined ? undefined : initialClockSeq & UUID_CLOCK.CLOCK_SEQ_MASK;
  let lastReading = -1n;
  let lastTimestamp = -1n;

  function seed(random: RandomSource, logger?: Logger): number {
    const bytes = new Uint8Array(2);
    fillRandom(random, bytes);
    const seq = ((bytes[0] << 8) | bytes[1]) & UUID_CLOCK.CLOCK_SEQ_MASK;
    logger?.logDebug("TimeGenerator: clock sequence seeded", { clockSeq: seq });
    return seq;
  }

  return {
    next(rawReading, random, logger) {
      // Seed first so a failure leaves the state unchanged
      let seq = clockSeq ?? seed(random, logger);
      const reading = rawReading & UUID_CLOCK.TIMESTAMP_MASK;
      let timestamp: bigint;
      if (reading < lastReading) {
        seq = (seq + 1) & UUID_CLOCK.CLOCK_SEQ_MASK;
        timestamp = reading;
        logger?.logDebug("TimeGenerator: clock moved backwards, clock sequence incremented", {
          lastReading: lastReading.toString(),
          reading: reading.toString(),
          clockSeq: seq,
        });
      } else {
        timestamp = reading > lastTimestamp ? reading : lastTimestamp + 1n;
      }
      lastReading = reading;
      lastTimestamp = timestamp;
      clockSeq = seq;
      return { timestamp, clockSeq: seq };
    },
    current: () => clockSeq,
  };
}

function checkExplicitNode(node: Uint8Array | undefined): Uint8Array | undefined {
  if (node && node.length !== UUID_LAYOUT.NODE_LENGTH) {
    throw new InvalidLengthError(
      `Node identifier must be ${UUID_LAYOUT.NODE_LENGTH} bytes, got ${node.length}`,
      node.length
    );
  }
  return node?.slice();
}

function lookUpNode(source: NodeIdSource): Uint8Array {
  const found = callCollaborator(
    () => source.getNodeId(),
    (detail, errorOptions) =>
      new NodeIdUnavailableError(`Node identifier source failed: ${detail}`, errorOptions)
  );
  if (!found) {
    throw new NodeIdUnavailableError("No node identifier available");
  }
  if (found.length !== UUID_LAYOUT.NODE_LENGTH) {
    throw new NodeIdUnavailableError(
      `Node identifier must be ${UUID_LAYOUT.NODE_LENGTH} bytes, got ${found.length}`
    );
  }
  return found.slice();
}

function composeTimeUuid({ timestamp, clockSeq }: ClockTick, node: Uint8Array): Uuid {
  const payload = new Uint8Array(UUID_LAYOUT.BYTE_LENGTH);
  const view = new DataView(payload.buffer);
  view.setUint32(0, Number(timestamp & 0xffffffffn));
  view.setUint16(4, Number((timestamp >> 32n) & 0xffffn));
  view.setUint16(6, Number((timestamp >> 48n) & 0x0fffn));
  view.setUint16(8, clockSeq);
  payload.set(node, UUID_LAYOUT.BYTE_LENGTH - UUID_LAYOUT.NODE_LENGTH);

  return stampVersionAndVariant(payload, UUID_VERSIONS.TIME);
}

/**
 * Create a version 1 generator with its own clock state
 *
 * @throws InvalidLengthError when `options.node` is not 6 bytes
 */
export function createTimeUuidGenerator(
  options: TimeUuidGeneratorOptions = {}
): TimeUuidGenerator {
  const {
    clock = systemClock,
    random = nodeRandomSource,
    nodeIdSource = systemNodeIdSource,
    logger,
  } = options;

  let node = checkExplicitNode(options.node);
  const sequencer = createClockSequencer(options.clockSeq);

  function resolveNode(): Uint8Array {
    if (!node) {
      node = lookUpNode(nodeIdSource);
      logger?.logDebug("TimeGenerator: node identifier resolved", { node: formatNodeId(node) });
    }
    return node;
  }

  return {
    generate: () => {
      // Resolve the node before touching clock state
      const nodeId = resolveNode();
      return composeTimeUuid(sequencer.next(clock.now(), random, logger), nodeId);
    },
    getClockSequence: () => sequencer.current(),
  };
}

let sharedSequencer: ClockSequencer | undefined;

/**
 * Version 1 UUID from the system clock.
 *
 * Calls share one module-owned clock sequencer, so repeated calls never
 * repeat a (timestamp, clock sequence) pair; `node`, `nodeIdSource`,
 * `random` and `logger` apply per call. Passing `clock` or `clockSeq`
 * makes the call use a fresh generator instead, since a caller's clock is
 * not comparable with the system clock the shared state follows.
 *
 * @throws NodeIdUnavailableError when no node identifier can be obtained
 * @throws EntropyUnavailableError when the clock sequence cannot be seeded
 * @throws InvalidLengthError when `options.node` is not 6 bytes
 */
export function generateV1(options: TimeUuidGeneratorOptions = {}): Uuid {
  if (options.clock !== undefined || options.clockSeq !== undefined) {
    return createTimeUuidGenerator(options).generate();
  }

  const { random = nodeRandomSource, nodeIdSource = systemNodeIdSource, logger } = options;
  const node = checkExplicitNode(options.node) ?? lookUpNode(nodeIdSource);
  if (!sharedSequencer) {
    sharedSequencer = createClockSequencer();
  }
  return composeTimeUuid(sharedSequencer.next(systemClock.now(), random, logger), node);
}
