/**
 * Namespaces Module
 *
 * Well-known namespace IDs for name-based UUIDs (RFC 4122 appendix C).
 *
 * @module modules/namespaces
 */

import { parseUuid } from "./textCodec";

export const NAMESPACE_DNS = parseUuid("6ba7b810-9dad-11d1-80b4-00c04fd430c8");
export const NAMESPACE_URL = parseUuid("6ba7b811-9dad-11d1-80b4-00c04fd430c8");
export const NAMESPACE_OID = parseUuid("6ba7b812-9dad-11d1-80b4-00c04fd430c8");
export const NAMESPACE_X500 = parseUuid("6ba7b814-9dad-11d1-80b4-00c04fd430c8");
