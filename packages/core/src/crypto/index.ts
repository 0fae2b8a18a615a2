export { deriveSharedSecret, encryptBody, decryptBody, NONCE_LENGTH, SHARED_SECRET_LENGTH } from './encryption.js';
export { naclCrypto } from './crypto-provider.js';
export type { DhtCrypto } from './crypto-provider.js';
export { envelopeDigest } from './digest.js';
