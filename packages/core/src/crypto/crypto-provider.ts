import type { NodeIdentity } from '../identity/keypair.js';
import { signData, splitPublicKey, verifySignature } from '../identity/keypair.js';
import { deriveSharedSecret } from './encryption.js';

/**
 * Signature and key-agreement capability consumed by the origin authenticator.
 * Public keys are wire public keys (signing key || exchange key).
 */
export interface DhtCrypto {
  sign(identity: NodeIdentity, data: Uint8Array): Uint8Array;
  verify(publicKey: Uint8Array, data: Uint8Array, signature: Uint8Array): boolean;
  /** null when the remote key cannot be used for key agreement */
  deriveSharedSecret(identity: NodeIdentity, remotePublicKey: Uint8Array): Uint8Array | null;
}

export const naclCrypto: DhtCrypto = {
  sign(identity, data) {
    return signData(identity.signingKey.secretKey, data);
  },

  verify(publicKey, data, signature) {
    const parts = splitPublicKey(publicKey);
    if (!parts) return false;
    return verifySignature(parts.signingKey, data, signature);
  },

  deriveSharedSecret(identity, remotePublicKey) {
    return deriveSharedSecret(identity, remotePublicKey);
  },
};
