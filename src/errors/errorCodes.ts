/**
 * Error Codes
 * 
 * Error code constants shared by every UUID error.
 * 
 * @module errors/errorCodes
 */

export const UUID_ERROR_CODES = {
  INVALID_LENGTH: "INVALID_LENGTH",
  INVALID_FORMAT: "INVALID_FORMAT",
  ENTROPY_UNAVAILABLE: "ENTROPY_UNAVAILABLE",
  NODE_ID_UNAVAILABLE: "NODE_ID_UNAVAILABLE",
} as const;

export type UuidErrorCode = (typeof UUID_ERROR_CODES)[keyof typeof UUID_ERROR_CODES];
