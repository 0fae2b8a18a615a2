import { bytesToHex, hexToBytes } from '../utils/bytes.js';
import { type NodeIdentity, identityFromSecretKeys } from './keypair.js';

export interface IdentityStorage {
  save(identity: NodeIdentity): Promise<void>;
  load(): Promise<NodeIdentity | null>;
}

interface StoredIdentity {
  signingSecretKey: string;
  exchangeSecretKey: string;
}

function toStored(identity: NodeIdentity): StoredIdentity {
  return {
    signingSecretKey: bytesToHex(identity.signingKey.secretKey),
    exchangeSecretKey: bytesToHex(identity.exchangeKey.secretKey),
  };
}

function fromStored(data: unknown): NodeIdentity {
  if (typeof data !== 'object' || data === null) {
    throw new Error('Stored identity is not an object');
  }
  if (
    !('signingSecretKey' in data) ||
    !('exchangeSecretKey' in data) ||
    typeof data.signingSecretKey !== 'string' ||
    typeof data.exchangeSecretKey !== 'string'
  ) {
    throw new Error('Stored identity is missing its secret keys');
  }
  return identityFromSecretKeys(hexToBytes(data.signingSecretKey), hexToBytes(data.exchangeSecretKey));
}

export class MemoryStorage implements IdentityStorage {
  private stored: StoredIdentity | null = null;

  async save(identity: NodeIdentity): Promise<void> {
    this.stored = toStored(identity);
  }

  async load(): Promise<NodeIdentity | null> {
    if (!this.stored) return null;
    return fromStored(this.stored);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class FileStorageAdapter implements IdentityStorage {
  private filePath: string;

  constructor(filePath?: string) {
    this.filePath = filePath ?? this.defaultPath();
  }

  private defaultPath(): string {
    const home = process.env.HOME || process.env.USERPROFILE || '.';
    return `${home}/.dhtwire/identity.json`;
  }

  async save(identity: NodeIdentity): Promise<void> {
    const { mkdir, writeFile } = await import('node:fs/promises');
    const { dirname } = await import('node:path');
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(toStored(identity), null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  /** Returns null when the file does not exist; a corrupt file is an error */
  async load(): Promise<NodeIdentity | null> {
    const { readFile } = await import('node:fs/promises');
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return fromStored(JSON.parse(raw));
  }
}
