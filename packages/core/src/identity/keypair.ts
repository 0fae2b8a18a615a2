import nacl from 'tweetnacl';
import { bytesToHex, concatBytes } from '../utils/bytes.js';

export interface KeyPair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

/**
 * A node's static identity: an Ed25519 keypair for origin signatures and an
 * X25519 keypair for body key agreement.
 */
export interface NodeIdentity {
  signingKey: KeyPair;
  exchangeKey: KeyPair;
}

/** Hex-encoded node id (first NODE_ID_LENGTH bytes of SHA-512 over the public key) */
export type NodeId = string;

export const SIGNING_PUBLIC_KEY_LENGTH = nacl.sign.publicKeyLength;
export const EXCHANGE_PUBLIC_KEY_LENGTH = nacl.box.publicKeyLength;
/** Wire public key = signing public key || exchange public key */
export const PUBLIC_KEY_LENGTH = SIGNING_PUBLIC_KEY_LENGTH + EXCHANGE_PUBLIC_KEY_LENGTH;
export const NODE_ID_LENGTH = 13;
export const SIGNATURE_LENGTH = nacl.sign.signatureLength;

export function generateIdentity(): NodeIdentity {
  const signing = nacl.sign.keyPair();
  const exchange = nacl.box.keyPair();
  return {
    signingKey: { publicKey: signing.publicKey, secretKey: signing.secretKey },
    exchangeKey: { publicKey: exchange.publicKey, secretKey: exchange.secretKey },
  };
}

/**
 * Derive a deterministic identity from a 32-byte seed. Both keypairs come from
 * the same seed, the exchange key through a SHA-512 of it.
 */
export function identityFromSeed(seed: Uint8Array): NodeIdentity {
  if (seed.length !== nacl.sign.seedLength) {
    throw new Error(`Identity seed must be ${nacl.sign.seedLength} bytes, got ${seed.length}`);
  }
  const signing = nacl.sign.keyPair.fromSeed(seed);
  const exchange = nacl.box.keyPair.fromSecretKey(nacl.hash(seed).slice(0, nacl.box.secretKeyLength));
  return {
    signingKey: { publicKey: signing.publicKey, secretKey: signing.secretKey },
    exchangeKey: { publicKey: exchange.publicKey, secretKey: exchange.secretKey },
  };
}

/** Rebuild an identity from its two secret keys (public halves are recomputed) */
export function identityFromSecretKeys(signingSecretKey: Uint8Array, exchangeSecretKey: Uint8Array): NodeIdentity {
  const signing = nacl.sign.keyPair.fromSecretKey(signingSecretKey);
  const exchange = nacl.box.keyPair.fromSecretKey(exchangeSecretKey);
  return {
    signingKey: { publicKey: signing.publicKey, secretKey: signing.secretKey },
    exchangeKey: { publicKey: exchange.publicKey, secretKey: exchange.secretKey },
  };
}

export function identityPublicKey(identity: NodeIdentity): Uint8Array {
  return concatBytes(identity.signingKey.publicKey, identity.exchangeKey.publicKey);
}

/** Split a wire public key into its halves, or null if it has the wrong length */
export function splitPublicKey(publicKey: Uint8Array): { signingKey: Uint8Array; exchangeKey: Uint8Array } | null {
  if (publicKey.length !== PUBLIC_KEY_LENGTH) return null;
  return {
    signingKey: publicKey.slice(0, SIGNING_PUBLIC_KEY_LENGTH),
    exchangeKey: publicKey.slice(SIGNING_PUBLIC_KEY_LENGTH),
  };
}

export function signData(secretKey: Uint8Array, data: Uint8Array): Uint8Array {
  return nacl.sign.detached(data, secretKey);
}

export function verifySignature(publicKey: Uint8Array, data: Uint8Array, signature: Uint8Array): boolean {
  // nacl throws on wrong sizes; remote input must never make it throw
  if (publicKey.length !== SIGNING_PUBLIC_KEY_LENGTH || signature.length !== SIGNATURE_LENGTH) {
    return false;
  }
  return nacl.sign.detached.verify(data, signature, publicKey);
}

export function publicKeyToNodeIdBytes(publicKey: Uint8Array): Uint8Array {
  return nacl.hash(publicKey).slice(0, NODE_ID_LENGTH);
}

export function publicKeyToNodeId(publicKey: Uint8Array): NodeId {
  return bytesToHex(publicKeyToNodeIdBytes(publicKey));
}
