import { DEFAULT_SAF_CAPACITY, DEFAULT_SAF_RETENTION_MS, DEFAULT_SAF_SWEEP_INTERVAL_MS } from '../config/dht-config.js';
import { envelopeDigest } from '../crypto/digest.js';
import type { DhtEnvelope, Network, StoredMessage } from '../types/envelope.js';
import { cloneHeader } from '../types/envelope.js';

export type EvictionReason = 'expired' | 'capacity';

export interface SafStoreEvents {
  onMessageStored?: (digest: string, message: StoredMessage) => void;
  onMessageEvicted?: (digest: string, reason: EvictionReason) => void;
}

export interface SafStoreOptions {
  retentionMs?: number;
  capacity?: number;
  sweepIntervalMs?: number;
  /** If true, starts the sweep timer immediately. Default: false */
  autoStart?: boolean;
  now?: () => number;
  events?: SafStoreEvents;
}

function copyStored(message: StoredMessage): StoredMessage {
  return {
    storedAt: message.storedAt,
    version: message.version,
    dhtHeader: cloneHeader(message.dhtHeader),
    encryptedBody: message.encryptedBody.slice(),
  };
}

/**
 * SafStore - messages held on behalf of peers that were not reachable.
 *
 * - Memory-only, keyed by the digest of (header, wire body)
 * - Map insertion order is storage order, oldest first
 * - Eviction (retention, then capacity) only ever runs in sweep()
 *
 * Every operation is synchronous, so store, retrieve and a sweep never observe
 * each other half-done. Call stop() when done to release the sweep timer.
 */
export class SafStore {
  private messages = new Map<string, StoredMessage>();
  private events: SafStoreEvents;
  private retentionMs: number;
  private capacity: number;
  private sweepIntervalMs: number;
  private now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private pendingSweep: ReturnType<typeof setTimeout> | null = null;

  constructor(options: SafStoreOptions = {}) {
    this.retentionMs = options.retentionMs ?? DEFAULT_SAF_RETENTION_MS;
    this.capacity = options.capacity ?? DEFAULT_SAF_CAPACITY;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SAF_SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.events = options.events ?? {};
    if (options.autoStart) {
      this.start();
    }
  }

  get running(): boolean {
    return this.sweepTimer !== null;
  }

  /** Start the periodic sweep */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);
  }

  /** Stop scheduling sweeps. A sweep already running completes. */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    if (this.pendingSweep) {
      clearTimeout(this.pendingSweep);
      this.pendingSweep = null;
    }
  }

  /**
   * Hold an envelope exactly as it arrived.
   * @returns false if an identical (header, body) pair is already held
   */
  store(envelope: DhtEnvelope): boolean {
    const digest = envelopeDigest(envelope.header, envelope.body);
    if (this.messages.has(digest)) {
      return false;
    }

    const message: StoredMessage = {
      storedAt: this.now(),
      version: envelope.header.version,
      dhtHeader: cloneHeader(envelope.header),
      encryptedBody: envelope.body.slice(),
    };
    this.messages.set(digest, message);

    console.log(`[SafStore] Stored message ${digest.slice(0, 8)} (${this.messages.size}/${this.capacity})`);
    this.events.onMessageStored?.(digest, copyStored(message));

    // Over capacity: trim on the next tick instead of refusing the message
    if (this.messages.size > this.capacity && this.running && !this.pendingSweep) {
      this.pendingSweep = setTimeout(() => {
        this.pendingSweep = null;
        this.sweep();
      }, 0);
    }
    return true;
  }

  /**
   * Unexpired messages stored at or after `since`, oldest first, optionally limited to one network.
   * The result is a restartable view over a snapshot taken now; later stores and
   * sweeps do not affect it, and every iteration yields fresh copies.
   */
  retrieve(since?: number, network?: Network): Iterable<StoredMessage> {
    const now = this.now();
    // Expired entries stay until the next sweep but are never served
    const snapshot = Array.from(this.messages.values()).filter(
      (message) =>
        now - message.storedAt < this.retentionMs &&
        (since === undefined || message.storedAt >= since) &&
        (network === undefined || message.dhtHeader.network === network),
    );
    return {
      *[Symbol.iterator]() {
        for (const message of snapshot) {
          yield copyStored(message);
        }
      },
    };
  }

  /**
   * Remove expired messages, then the oldest until within capacity.
   * @returns number of messages removed
   */
  sweep(): number {
    const now = this.now();
    const expired: string[] = [];

    for (const [digest, message] of this.messages) {
      if (now - message.storedAt >= this.retentionMs) {
        expired.push(digest);
      }
    }
    for (const digest of expired) {
      this.messages.delete(digest);
      this.events.onMessageEvicted?.(digest, 'expired');
    }

    let trimmed = 0;
    while (this.messages.size > this.capacity) {
      const oldest = this.messages.keys().next().value;
      if (oldest === undefined) break;
      this.messages.delete(oldest);
      this.events.onMessageEvicted?.(oldest, 'capacity');
      trimmed++;
    }

    if (expired.length > 0 || trimmed > 0) {
      // Log without message content
      console.log(`[SafStore] Swept ${expired.length} expired, ${trimmed} over capacity`);
    }
    return expired.length + trimmed;
  }

  get size(): number {
    return this.messages.size;
  }
}
