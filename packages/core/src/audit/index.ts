/**
 * Permission change audit trail.
 */

export { AuditReader, AuditRecorder, AUDIT_DEFAULTS, type AuditOptions } from './audit-recorder.js';
export { computeEntryHash, isValidLink, type UnhashedEntry } from './hash-chain.js';
