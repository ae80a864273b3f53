export { CidrBlacklistIndex, BlacklistIndexDocumentSchema } from './cidr-index.js';
export type { BlacklistIndexDocument, BlacklistIndexStatus, UploadResult } from './cidr-index.js';
export { ManualBlacklist, createBlacklistEntry } from './entries.js';
export * from './types.js';
