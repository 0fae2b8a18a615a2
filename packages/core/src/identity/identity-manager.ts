import { DhtError } from '../errors/dht-error.js';
import {
  type NodeId,
  type NodeIdentity,
  generateIdentity,
  identityPublicKey,
  publicKeyToNodeId,
  signData,
  verifySignature,
} from './keypair.js';
import type { IdentityStorage } from './storage.js';

export class IdentityManager {
  private storage: IdentityStorage;
  private identity: NodeIdentity | null = null;

  constructor(storage: IdentityStorage) {
    this.storage = storage;
  }

  async init(): Promise<NodeIdentity> {
    const existing = await this.storage.load();
    if (existing) {
      this.identity = existing;
      return existing;
    }

    const created = generateIdentity();
    await this.storage.save(created);
    this.identity = created;
    return created;
  }

  getIdentity(): NodeIdentity {
    if (!this.identity) {
      throw new DhtError('IDENTITY_MISSING', 'IdentityManager not initialized. Call init() first.');
    }
    return this.identity;
  }

  getPublicKey(): Uint8Array {
    return identityPublicKey(this.getIdentity());
  }

  getNodeId(): NodeId {
    return publicKeyToNodeId(this.getPublicKey());
  }

  sign(data: Uint8Array): Uint8Array {
    return signData(this.getIdentity().signingKey.secretKey, data);
  }

  verify(publicKey: Uint8Array, data: Uint8Array, signature: Uint8Array): boolean {
    return verifySignature(publicKey, data, signature);
  }
}
