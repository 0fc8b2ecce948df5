/**
 * Types Module
 * 
 * @module types
 */

export type * from "./uuid";
export type * from "./collaborators";
export type * from "./config";
