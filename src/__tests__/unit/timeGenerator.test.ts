/**
 * Unit Tests - TimeGenerator Module
 * 
 * Tests for version 1 layout, clock-sequence handling and node failures.
 */

import { describe, it, expect, vi } from 'vitest';
import { createTimeUuidGenerator, generateV1 } from '../../modules/timeGenerator';
import { randomNodeId } from '../../modules/collaborators';
import {
  EntropyUnavailableError,
  InvalidLengthError,
  NodeIdUnavailableError,
} from '../../errors/errorTypes';
import type { Clock, NodeIdSource, RandomSource } from '../../types/collaborators';
import type { Logger } from '../../utils/logger';
import { formatNodeId } from '../../utils/hex';

const NODE = Uint8Array.from([0x00, 0x2a, 0x35, 0x0d, 0x13, 0x80]);
const TICKS = 0x0123456789abcdefn;

const fixedRandom = (byte: number): RandomSource => ({
  fill: (buffer) => {
    buffer.fill(byte);
  },
});

const sequenceClock = (...ticks: bigint[]): Clock => {
  let calls = 0;
  return {
    now: () => ticks[Math.min(calls++, ticks.length - 1)],
  };
};

const fixedNodeSource = (node: Uint8Array | undefined): NodeIdSource => ({
  getNodeId: () => node,
});

describe('TimeGenerator', () => {
  describe('layout', () => {
    it('should split the timestamp and place the node verbatim', () => {
      const uuid = generateV1({
        clock: sequenceClock(TICKS),
        random: fixedRandom(0xff),
        nodeIdSource: fixedNodeSource(NODE),
      });

      expect(uuid.toString()).toBe('89abcdef-4567-1123-bfff-002a350d1380');
      expect(uuid.version).toBe(1);
      expect(uuid.getVariant()).toBe('rfc4122');
      expect(uuid.getTimestamp()).toBe(TICKS);
      expect(uuid.getNode()).toEqual(NODE);
      expect(formatNodeId(NODE)).toBe('00-2a-35-0d-13-80');
    });

    it('should use an explicit clock sequence and node', () => {
      const uuid = generateV1({
        clock: sequenceClock(TICKS),
        clockSeq: 0x1234,
        node: NODE,
      });

      expect(uuid.toString()).toBe('89abcdef-4567-1123-9234-002a350d1380');
    });

    it('should keep only 60 bits of the clock reading', () => {
      const uuid = generateV1({
        clock: sequenceClock(0xf000000000000001n),
        clockSeq: 0,
        node: NODE,
      });

      expect(uuid.getTimestamp()).toBe(1n);
      expect(uuid.toString()).toBe('00000001-0000-1000-8000-002a350d1380');
    });

    it('should work with the default clock and an explicit random node', () => {
      const uuid = generateV1({ node: randomNodeId() });

      expect(uuid.version).toBe(1);
      expect(uuid.getVariant()).toBe('rfc4122');
      expect((uuid.getNode() ?? new Uint8Array(6))[0] & 0x01).toBe(1);
    });
  });

  describe('clock sequence', () => {
    it('should seed the sequence from the random source on first use', () => {
      const generator = createTimeUuidGenerator({
        clock: sequenceClock(1000n),
        random: fixedRandom(0xab),
        node: NODE,
      });

      expect(generator.getClockSequence()).toBeUndefined();
      generator.generate();
      expect(generator.getClockSequence()).toBe(0x2bab);
    });

    it('should advance the timestamp when the clock has not moved', () => {
      const generator = createTimeUuidGenerator({
        clock: sequenceClock(1000n),
        clockSeq: 7,
        node: NODE,
      });

      const stamps = [generator.generate(), generator.generate(), generator.generate()].map(
        (uuid) => uuid.getTimestamp()
      );

      expect(stamps).toEqual([1000n, 1001n, 1002n]);
      expect(generator.getClockSequence()).toBe(7);
    });

    it('should increment the sequence when the clock moves backwards', () => {
      const generator = createTimeUuidGenerator({
        clock: sequenceClock(1000n, 500n),
        clockSeq: 5,
        node: NODE,
      });

      const first = generator.generate();
      const second = generator.generate();

      expect(first.asFields().clockSeq & 0x3fff).toBe(5);
      expect(second.asFields().clockSeq & 0x3fff).toBe(6);
      expect(second.getTimestamp()).toBe(500n);
      expect(generator.getClockSequence()).toBe(6);
    });

    it('should wrap the sequence at 14 bits', () => {
      const generator = createTimeUuidGenerator({
        clock: sequenceClock(1000n, 500n),
        clockSeq: 0x3fff,
        node: NODE,
      });

      generator.generate();
      generator.generate();

      expect(generator.getClockSequence()).toBe(0);
    });

    it('should keep state per generator instance', () => {
      const options = { clock: { now: () => 1000n }, clockSeq: 1, node: NODE };
      const a = createTimeUuidGenerator(options);
      const b = createTimeUuidGenerator(options);

      a.generate();
      a.generate();

      expect(b.generate().getTimestamp()).toBe(1000n);
    });

    it('should log clock regressions through the supplied logger', () => {
      const logger: Logger = {
        logDebug: vi.fn(),
        logInfo: vi.fn(),
        logWarn: vi.fn(),
        logError: vi.fn(),
      };
      const generator = createTimeUuidGenerator({
        clock: sequenceClock(1000n, 500n),
        clockSeq: 5,
        node: NODE,
        logger,
      });

      generator.generate();
      generator.generate();

      expect(logger.logDebug).toHaveBeenCalledWith(
        'TimeGenerator: clock moved backwards, clock sequence incremented',
        { lastReading: '1000', reading: '500', clockSeq: 6 }
      );
      expect(logger.logError).not.toHaveBeenCalled();
    });

    it('should fail and keep no sequence when entropy is unavailable', () => {
      const generator = createTimeUuidGenerator({
        clock: sequenceClock(1000n),
        random: {
          fill: () => {
            throw new Error('closed');
          },
        },
        node: NODE,
      });

      expect(() => generator.generate()).toThrow(EntropyUnavailableError);
      expect(generator.getClockSequence()).toBeUndefined();
    });
  });

  describe('node identifier', () => {
    it('should fail when the source has no node', () => {
      expect(() =>
        generateV1({ clockSeq: 0, nodeIdSource: fixedNodeSource(undefined) })
      ).toThrow(NodeIdUnavailableError);
    });

    it('should wrap a failing source and keep the cause', () => {
      const cause = new Error('permission denied');
      const generator = createTimeUuidGenerator({
        clockSeq: 0,
        nodeIdSource: {
          getNodeId: () => {
            throw cause;
          },
        },
      });

      expect(() => generator.generate()).toThrow('Node identifier source failed: permission denied');
      try {
        generator.generate();
      } catch (error) {
        expect(error).toBeInstanceOf(NodeIdUnavailableError);
        if (error instanceof NodeIdUnavailableError) {
          expect(error.code).toBe('NODE_ID_UNAVAILABLE');
          expect(error.cause).toBe(cause);
        }
      }
    });

    it('should reject a source node of the wrong size', () => {
      expect(() =>
        generateV1({ clockSeq: 0, nodeIdSource: fixedNodeSource(new Uint8Array(8)) })
      ).toThrow('Node identifier must be 6 bytes, got 8');
    });

    it('should reject an explicit node of the wrong size at creation', () => {
      expect(() => createTimeUuidGenerator({ node: new Uint8Array(4) })).toThrow(InvalidLengthError);
    });

    it('should look the node up once per generator', () => {
      const getNodeId = vi.fn(() => NODE);
      const generator = createTimeUuidGenerator({
        clock: sequenceClock(1000n),
        clockSeq: 0,
        nodeIdSource: { getNodeId },
      });

      generator.generate();
      generator.generate();

      expect(getNodeId).toHaveBeenCalledTimes(1);
    });
  });

  describe('generateV1', () => {
    it('should never repeat a value across calls on the system clock', () => {
      const node = randomNodeId();
      const seen = new Set<string>();

      for (let i = 0; i < 5000; i++) {
        seen.add(generateV1({ node }).toString());
      }

      expect(seen.size).toBe(5000);
    });

    it('should carry the last timestamp from one call to the next', () => {
      const node = randomNodeId();
      const stamps = Array.from({ length: 200 }, () => generateV1({ node }).getTimestamp() ?? 0n);

      for (let i = 1; i < stamps.length; i++) {
        expect(stamps[i] > stamps[i - 1]).toBe(true);
      }
    });

    it('should give calls with their own clock a fresh generator', () => {
      const first = generateV1({ clock: sequenceClock(1000n), clockSeq: 3, node: NODE });
      const second = generateV1({ clock: sequenceClock(1000n), clockSeq: 3, node: NODE });

      expect(first.equals(second)).toBe(true);
      expect(first.getTimestamp()).toBe(1000n);
    });

    it('should reject an explicit node of the wrong size', () => {
      expect(() => generateV1({ node: new Uint8Array(5) })).toThrow(InvalidLengthError);
    });
  });
});
