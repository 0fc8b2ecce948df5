/**
 * Error Types
 * 
 * Structured error classes, one per failure kind.
 * 
 * @module errors/errorTypes
 */

import { UUID_ERROR_CODES, type UuidErrorCode } from "./errorCodes";

/**
 * Base class of every error the library throws
 */
export class UuidError extends Error {
  code: UuidErrorCode;

  constructor(message: string, code: UuidErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "UuidError";
    this.code = code;
  }
}

/**
 * Byte input (or a hash digest, or a node id override) has the wrong size
 */
export class InvalidLengthError extends UuidError {
  actualLength: number;

  constructor(message: string, actualLength: number) {
    super(message, UUID_ERROR_CODES.INVALID_LENGTH);
    this.name = "InvalidLengthError";
    this.actualLength = actualLength;
  }
}

/**
 * Text input is not in canonical 8-4-4-4-12 form
 */
export class InvalidFormatError extends UuidError {
  input: string;
  position?: number;

  constructor(message: string, input: string, position?: number) {
    super(message, UUID_ERROR_CODES.INVALID_FORMAT);
    this.name = "InvalidFormatError";
    this.input = input;
    this.position = position;
  }
}

/**
 * The random source could not supply bytes
 */
export class EntropyUnavailableError extends UuidError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, UUID_ERROR_CODES.ENTROPY_UNAVAILABLE, options);
    this.name = "EntropyUnavailableError";
  }
}

/**
 * No node identifier could be obtained for a version 1 UUID
 */
export class NodeIdUnavailableError extends UuidError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, UUID_ERROR_CODES.NODE_ID_UNAVAILABLE, options);
    this.name = "NodeIdUnavailableError";
  }
}
