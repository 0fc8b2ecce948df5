/**
 * Unit Tests - Errors Module
 * 
 * Tests for error classes, the type guard and the safe wrapper.
 */

import { describe, it, expect } from 'vitest';
import {
  UuidError,
  InvalidLengthError,
  InvalidFormatError,
  EntropyUnavailableError,
  NodeIdUnavailableError,
} from '../../errors/errorTypes';
import { UUID_ERROR_CODES } from '../../errors/errorCodes';
import { callCollaborator, isUuidError } from '../../errors/errorHandler';
import { safeTry } from '../../utils/safe';

describe('Errors', () => {
  it('should give every error class its name and code', () => {
    const errors = [
      [new InvalidLengthError('a', 3), 'InvalidLengthError', UUID_ERROR_CODES.INVALID_LENGTH],
      [new InvalidFormatError('b', 'xyz', 1), 'InvalidFormatError', UUID_ERROR_CODES.INVALID_FORMAT],
      [new EntropyUnavailableError('c'), 'EntropyUnavailableError', UUID_ERROR_CODES.ENTROPY_UNAVAILABLE],
      [new NodeIdUnavailableError('d'), 'NodeIdUnavailableError', UUID_ERROR_CODES.NODE_ID_UNAVAILABLE],
    ] as const;

    for (const [error, name, code] of errors) {
      expect(error).toBeInstanceOf(UuidError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
    }
  });

  it('should narrow library errors only', () => {
    expect(isUuidError(new InvalidLengthError('a', 3))).toBe(true);
    expect(isUuidError(new Error('plain'))).toBe(false);
    expect(isUuidError('INVALID_LENGTH')).toBe(false);
  });

  describe('callCollaborator', () => {
    it('should wrap foreign errors and keep the cause', () => {
      const cause = new TypeError('boom');

      expect(() =>
        callCollaborator(
          () => {
            throw cause;
          },
          (detail, options) => new EntropyUnavailableError(`wrapped: ${detail}`, options)
        )
      ).toThrow('wrapped: boom');
    });

    it('should pass library errors through unchanged', () => {
      const original = new NodeIdUnavailableError('none');

      expect(() =>
        callCollaborator(
          () => {
            throw original;
          },
          (detail, options) => new EntropyUnavailableError(detail, options)
        )
      ).toThrow(original);
    });

    it('should describe non-Error throws', () => {
      expect(() =>
        callCollaborator(
          () => {
            throw 'offline';
          },
          (detail) => new EntropyUnavailableError(detail)
        )
      ).toThrow('offline');
    });
  });

  describe('safeTry', () => {
    it('should return library errors as results', () => {
      const result = safeTry(() => {
        throw new InvalidLengthError('short', 2);
      });

      expect(result).toEqual({ ok: false, error: expect.any(InvalidLengthError) });
    });

    it('should rethrow anything else', () => {
      expect(() =>
        safeTry(() => {
          throw new RangeError('unrelated');
        })
      ).toThrow(RangeError);
    });

    it('should return the value on success', () => {
      expect(safeTry(() => 42)).toEqual({ ok: true, value: 42 });
    });
  });
});
