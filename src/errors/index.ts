/**
 * Errors Module
 * 
 * @module errors
 */

export * from "./errorCodes";
export * from "./errorTypes";
export { isUuidError } from "./errorHandler";
