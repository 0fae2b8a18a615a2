/**
 * Body confidentiality.
 *
 * Uses TweetNaCl.js:
 * - nacl.box.before (X25519 + HSalsa20) to derive a static shared key between two nodes
 * - nacl.secretbox (XSalsa20-Poly1305) to seal the body with a random nonce
 *
 * Sealed body layout: nonce (24 bytes) || ciphertext.
 */

import nacl from 'tweetnacl';
import { splitPublicKey } from '../identity/keypair.js';
import type { NodeIdentity } from '../identity/keypair.js';
import { concatBytes } from '../utils/bytes.js';

export const NONCE_LENGTH = nacl.secretbox.nonceLength;
export const SHARED_SECRET_LENGTH = nacl.box.sharedKeyLength;

/**
 * Shared secret between the local identity and a remote wire public key.
 * Returns null if the remote key is not a valid wire public key.
 */
export function deriveSharedSecret(identity: NodeIdentity, remotePublicKey: Uint8Array): Uint8Array | null {
  const remote = splitPublicKey(remotePublicKey);
  if (!remote) return null;
  return nacl.box.before(remote.exchangeKey, identity.exchangeKey.secretKey);
}

export function encryptBody(plaintext: Uint8Array, sharedSecret: Uint8Array): Uint8Array {
  const nonce = nacl.randomBytes(NONCE_LENGTH);
  const ciphertext = nacl.secretbox(plaintext, nonce, sharedSecret);
  return concatBytes(nonce, ciphertext);
}

/**
 * Open a sealed body.
 * @returns plaintext, or null if the body is truncated, tampered or sealed under another key
 */
export function decryptBody(sealed: Uint8Array, sharedSecret: Uint8Array): Uint8Array | null {
  if (sealed.length < NONCE_LENGTH + nacl.secretbox.overheadLength) return null;
  if (sharedSecret.length !== SHARED_SECRET_LENGTH) return null;
  const nonce = sealed.subarray(0, NONCE_LENGTH);
  const ciphertext = sealed.subarray(NONCE_LENGTH);
  return nacl.secretbox.open(ciphertext, nonce, sharedSecret);
}
