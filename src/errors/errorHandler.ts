/**
 * Error Handler
 * 
 * Helpers for recognising library errors and wrapping collaborator
 * failures. Nothing here logs: errors go back to the caller.
 * 
 * @module errors/errorHandler
 */

import { UuidError } from "./errorTypes";

/**
 * Type guard for errors raised by this library
 */
export function isUuidError(error: unknown): error is UuidError {
  return error instanceof UuidError;
}

/**
 * Message text of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Call a collaborator, converting anything it throws into a library error
 * that keeps the original as `cause`.
 * 
 * @param fn - Collaborator call
 * @param wrap - Builds the library error from the failure text and options
 */
export function callCollaborator<T>(
  fn: () => T,
  wrap: (detail: string, options: ErrorOptions) => UuidError
): T {
  try {
    return fn();
  } catch (error) {
    if (isUuidError(error)) {
      throw error;
    }
    throw wrap(describeError(error), { cause: error });
  }
}
