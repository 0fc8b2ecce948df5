/**
 * rfc-uuid
 * 
 * Main entry point. RFC 4122 UUID value type, generators and codecs.
 * 
 * @module index
 */

import { generateV3, generateV4, generateV5 } from './modules/generators';
import { generateV1 } from './modules/timeGenerator';
import { formatUuid, parseUuid } from './modules/textCodec';
import { uuidFromBytes, uuidToBytes } from './modules/binaryCodec';

// Re-export types
export type * from './types';

export { Uuid } from './modules/uuidValue';
export { generateV3, generateV4, generateV5 } from './modules/generators';
export { createTimeUuidGenerator, generateV1 } from './modules/timeGenerator';
export type { TimeUuidGenerator } from './modules/timeGenerator';
export { formatUuid, parseUuid, safeParseUuid, isValidUuid, toUrn } from './modules/textCodec';
export { uuidFromBytes, uuidToBytes, safeUuidFromBytes } from './modules/binaryCodec';
export { NAMESPACE_DNS, NAMESPACE_URL, NAMESPACE_OID, NAMESPACE_X500 } from './modules/namespaces';
export {
  nodeRandomSource,
  md5Hash,
  sha1Hash,
  systemClock,
  systemNodeIdSource,
  createSystemNodeIdSource,
  randomNodeId,
} from './modules/collaborators';

export * from './errors';
export { createLogger } from './utils/logger';
export type { Logger, LoggerOptions } from './utils/logger';
export { formatNodeId } from './utils/hex';
export { UUID_VERSIONS, UUID_VARIANTS } from './utils/constants';

// Public API
export const UUID = {
  v1: generateV1,
  v3: generateV3,
  v4: generateV4,
  v5: generateV5,
  parse: parseUuid,
  format: formatUuid,
  fromBytes: uuidFromBytes,
  toBytes: uuidToBytes,
};
