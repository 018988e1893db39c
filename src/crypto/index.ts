export { sha256, hashObject, GENESIS_HASH } from './hasher.js';
export {
  generateKeyPair,
  saveKeyPair,
  loadKeyPair,
  signData,
  verifySignature,
  auditSigningPayload,
  type KeyPair
} from './signer.js';
export { AuditLog } from './audit-log.js';
