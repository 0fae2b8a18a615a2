import { signingBytes } from '../codec/envelope-codec.js';
import type { DhtCrypto } from '../crypto/crypto-provider.js';
import { naclCrypto } from '../crypto/crypto-provider.js';
import { decryptBody, encryptBody } from '../crypto/encryption.js';
import { DhtError } from '../errors/dht-error.js';
import type { NodeIdentity } from '../identity/keypair.js';
import { identityPublicKey } from '../identity/keypair.js';
import type { DhtDestination, DhtEnvelope, DhtHeader, DhtMessageType, DhtOrigin, Network } from '../types/envelope.js';
import { AUTHENTICATED_MESSAGE_TYPES, DHT_PROTOCOL_VERSION, DhtMessageFlags, isEncrypted } from '../types/envelope.js';

export type AuthFailureReason = 'MISSING_ORIGIN' | 'ENCRYPTED_WITHOUT_ORIGIN' | 'AUTHENTICATION_FAILED';

export type AuthFailed = { status: 'failed'; reason: AuthFailureReason; detail: string };

export type VerifyResult =
  | {
      status: 'authenticated';
      /** Verified origin, or null for an unsigned message type that allows it */
      originPublicKey: Uint8Array | null;
    }
  | AuthFailed;

export type OpenResult =
  | {
      status: 'authenticated';
      originPublicKey: Uint8Array | null;
      /** Body after decryption (the wire body itself when not encrypted) */
      plaintext: Uint8Array;
    }
  | AuthFailed;

export interface SealParams {
  destination: DhtDestination;
  messageType: DhtMessageType;
  network: Network;
  payload: Uint8Array;
  /** Encrypt the payload for the destination public key */
  encrypt?: boolean;
  /** Attach a signed origin. Default: true */
  signed?: boolean;
}

export interface OriginAuthenticatorOptions {
  identity?: NodeIdentity | null;
  crypto?: DhtCrypto;
}

const EMPTY = new Uint8Array(0);

function failed(reason: AuthFailureReason, detail: string): AuthFailed {
  return { status: 'failed', reason, detail };
}

/**
 * Binds messages to their origin public key and drives body confidentiality.
 *
 * Inbound rule: the signature is checked over the wire body before anything is
 * decrypted. Network-originated failures are returned, never thrown.
 */
export class OriginAuthenticator {
  private identity: NodeIdentity | null;
  private crypto: DhtCrypto;

  constructor(options: OriginAuthenticatorOptions = {}) {
    this.identity = options.identity ?? null;
    this.crypto = options.crypto ?? naclCrypto;
  }

  get localPublicKey(): Uint8Array | null {
    return this.identity ? identityPublicKey(this.identity) : null;
  }

  /**
   * Produce the origin for a header/body pair. The header's own origin (if any)
   * is replaced by the signer's public key before signing.
   * @throws DhtError IDENTITY_MISSING when no identity is given or configured
   */
  sign(header: DhtHeader, body: Uint8Array, identity: NodeIdentity | null = this.identity): DhtOrigin {
    if (!identity) {
      throw new DhtError('IDENTITY_MISSING', 'Cannot sign without a local identity');
    }
    const publicKey = identityPublicKey(identity);
    const unsigned: DhtHeader = { ...header, origin: { publicKey, signature: EMPTY } };
    const signature = this.crypto.sign(identity, signingBytes(unsigned, body));
    return { publicKey, signature };
  }

  verify(envelope: DhtEnvelope): VerifyResult {
    const { header, body } = envelope;
    const origin = header.origin;

    if (!origin) {
      if (isEncrypted(header)) {
        return failed('ENCRYPTED_WITHOUT_ORIGIN', 'encrypted body has no attributable origin');
      }
      if (AUTHENTICATED_MESSAGE_TYPES.has(header.messageType)) {
        return failed('MISSING_ORIGIN', `${header.messageType} requires an origin`);
      }
      return { status: 'authenticated', originPublicKey: null };
    }

    if (!this.crypto.verify(origin.publicKey, signingBytes(header, body), origin.signature)) {
      return failed('AUTHENTICATION_FAILED', 'signature does not match origin');
    }
    return { status: 'authenticated', originPublicKey: origin.publicKey };
  }

  /** Decrypt an envelope whose origin has already been verified */
  decrypt(envelope: DhtEnvelope): OpenResult {
    const origin = envelope.header.origin;
    if (!isEncrypted(envelope.header)) {
      return { status: 'authenticated', originPublicKey: origin?.publicKey ?? null, plaintext: envelope.body };
    }
    if (!origin) {
      return failed('ENCRYPTED_WITHOUT_ORIGIN', 'encrypted body has no attributable origin');
    }
    if (!this.identity) {
      return failed('AUTHENTICATION_FAILED', 'no local identity to decrypt with');
    }
    const secret = this.crypto.deriveSharedSecret(this.identity, origin.publicKey);
    if (!secret) {
      return failed('AUTHENTICATION_FAILED', 'origin public key cannot be used for key agreement');
    }
    const plaintext = decryptBody(envelope.body, secret);
    if (!plaintext) {
      return failed('AUTHENTICATION_FAILED', 'body decryption failed');
    }
    return { status: 'authenticated', originPublicKey: origin.publicKey, plaintext };
  }

  /** Verify, then decrypt. Plaintext never exists for an unverified envelope. */
  open(envelope: DhtEnvelope): OpenResult {
    const verified = this.verify(envelope);
    if (verified.status === 'failed') return verified;
    return this.decrypt(envelope);
  }

  /**
   * Build an outbound envelope: encrypt for the destination when asked, then sign.
   * @throws DhtError for local misuse (no identity, encryption without a public-key destination)
   */
  seal(params: SealParams): DhtEnvelope {
    const { destination, messageType, network, payload, encrypt = false, signed = true } = params;

    if (encrypt && !signed) {
      throw new DhtError('ENCRYPTED_WITHOUT_ORIGIN', 'Encrypted messages must carry a signed origin');
    }

    const header: DhtHeader = {
      version: DHT_PROTOCOL_VERSION,
      destination,
      messageType,
      network,
      flags: encrypt ? DhtMessageFlags.ENCRYPTED : DhtMessageFlags.NONE,
    };

    let body = payload;
    if (encrypt) {
      if (!this.identity) {
        throw new DhtError('IDENTITY_MISSING', 'Cannot encrypt without a local identity');
      }
      if (destination.kind !== 'public-key') {
        throw new DhtError('MALFORMED_ENVELOPE', 'Encrypted messages need a public-key destination', {
          destination: destination.kind,
        });
      }
      const secret = this.crypto.deriveSharedSecret(this.identity, destination.publicKey);
      if (!secret) {
        throw new DhtError('MALFORMED_ENVELOPE', 'Destination public key cannot be used for key agreement');
      }
      body = encryptBody(payload, secret);
    }

    if (signed) {
      header.origin = this.sign(header, body);
    }
    return { header, body };
  }
}
