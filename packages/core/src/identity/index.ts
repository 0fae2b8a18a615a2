export {
  generateIdentity,
  identityFromSeed,
  identityFromSecretKeys,
  identityPublicKey,
  splitPublicKey,
  signData,
  verifySignature,
  publicKeyToNodeId,
  publicKeyToNodeIdBytes,
  PUBLIC_KEY_LENGTH,
  NODE_ID_LENGTH,
  SIGNATURE_LENGTH,
} from './keypair.js';
export type { NodeIdentity, NodeId, KeyPair } from './keypair.js';
export type { IdentityStorage } from './storage.js';
export { MemoryStorage, FileStorageAdapter } from './storage.js';
export { IdentityManager } from './identity-manager.js';
