/**
 * Safe Wrappers
 * 
 * Turn a throwing codec call into an explicit result value.
 * 
 * @module utils/safe
 */

import type { UuidResult } from "../types/uuid";
import { isUuidError } from "../errors/errorHandler";

/**
 * Run `fn`, returning library errors as a failed result.
 * Anything that is not a UuidError is rethrown unchanged.
 */
export function safeTry<T>(fn: () => T): UuidResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (isUuidError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
