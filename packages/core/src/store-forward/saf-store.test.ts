import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { DhtEnvelope, Network } from '../types/envelope.js';
import { DHT_PROTOCOL_VERSION, DhtMessageFlags } from '../types/envelope.js';
import { SafStore } from './saf-store.js';

function makeEnvelope(fill: number, network: Network = 'local-test'): DhtEnvelope {
  return {
    header: {
      version: DHT_PROTOCOL_VERSION,
      destination: { kind: 'public-key', publicKey: new Uint8Array(64).fill(fill) },
      origin: { publicKey: new Uint8Array(64).fill(1), signature: new Uint8Array(64).fill(2) },
      messageType: 'none',
      network,
      flags: DhtMessageFlags.ENCRYPTED,
    },
    body: new Uint8Array([fill, fill + 1, fill + 2]),
  };
}

function bodies(messages: Iterable<{ encryptedBody: Uint8Array }>): number[] {
  return Array.from(messages, (m) => m.encryptedBody[0]);
}

describe('SafStore', () => {
  let clock: number;
  let store: SafStore;
  let onMessageStored: ReturnType<typeof vi.fn>;
  let onMessageEvicted: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    clock = 0;
    onMessageStored = vi.fn();
    onMessageEvicted = vi.fn();
    store = new SafStore({
      retentionMs: 1000,
      capacity: 100,
      now: () => clock,
      events: { onMessageStored, onMessageEvicted },
    });
  });

  afterEach(() => {
    store.stop();
    vi.restoreAllMocks();
  });

  function storeAt(time: number, fill: number, network?: Network): void {
    clock = time;
    store.store(makeEnvelope(fill, network));
  }

  describe('storing messages', () => {
    it('should record the arrival time and keep the wire body', () => {
      storeAt(42, 7);
      const [message] = store.retrieve();

      expect(message.storedAt).toBe(42);
      expect(message.version).toBe(DHT_PROTOCOL_VERSION);
      expect(message.dhtHeader).toEqual(makeEnvelope(7).header);
      expect(message.encryptedBody).toEqual(new Uint8Array([7, 8, 9]));
      expect(onMessageStored).toHaveBeenCalledTimes(1);
    });

    it('should ignore an exact duplicate', () => {
      expect(store.store(makeEnvelope(7))).toBe(true);
      expect(store.store(makeEnvelope(7))).toBe(false);

      expect(store.size).toBe(1);
      expect(onMessageStored).toHaveBeenCalledTimes(1);
    });

    it('should keep envelopes that differ only in body', () => {
      const a = makeEnvelope(7);
      const b = makeEnvelope(7);
      b.body = new Uint8Array([0]);
      store.store(a);
      store.store(b);
      expect(store.size).toBe(2);
    });

    it('should not alias the caller envelope', () => {
      const envelope = makeEnvelope(7);
      store.store(envelope);
      envelope.body.fill(0);
      if (envelope.header.destination.kind === 'public-key') envelope.header.destination.publicKey.fill(0);

      const [message] = store.retrieve();
      expect(message.encryptedBody).toEqual(new Uint8Array([7, 8, 9]));
      expect(message.dhtHeader.destination).toEqual({ kind: 'public-key', publicKey: new Uint8Array(64).fill(7) });
    });
  });

  describe('retrieve', () => {
    it('returns messages at or after since, oldest first', () => {
      storeAt(10, 10);
      storeAt(20, 20);
      storeAt(30, 30);

      expect(bodies(store.retrieve(15))).toEqual([20, 30]);
      expect(bodies(store.retrieve(20))).toEqual([20, 30]);
      expect(bodies(store.retrieve())).toEqual([10, 20, 30]);
    });

    it('returns a superset for an earlier since', () => {
      storeAt(10, 10);
      storeAt(20, 20);
      storeAt(30, 30);

      const early = bodies(store.retrieve(12));
      const late = bodies(store.retrieve(25));
      expect(early).toEqual(expect.arrayContaining(late));
      expect(early.length).toBeGreaterThan(late.length);
    });

    it('never returns messages for another network', () => {
      storeAt(10, 10, 'local-test');
      storeAt(20, 20, 'main');

      expect(bodies(store.retrieve(undefined, 'main'))).toEqual([20]);
      expect(bodies(store.retrieve(undefined, 'test'))).toEqual([]);
    });

    it('can be iterated more than once and does not consume the cache', () => {
      storeAt(10, 10);
      const result = store.retrieve();

      expect(bodies(result)).toEqual([10]);
      expect(bodies(result)).toEqual([10]);
      expect(store.size).toBe(1);
    });

    it('iterates over the snapshot taken at call time', () => {
      storeAt(10, 10);
      const result = store.retrieve();
      storeAt(20, 20);

      expect(bodies(result)).toEqual([10]);
    });

    it('does not serve messages past the retention window before a sweep', () => {
      storeAt(0, 1);
      storeAt(600, 2);

      clock = 1000;
      expect(bodies(store.retrieve())).toEqual([2]);
      clock = 50_000;
      expect(bodies(store.retrieve())).toEqual([]);
      // Eviction itself still only happens in sweep()
      expect(store.size).toBe(2);
      expect(onMessageEvicted).not.toHaveBeenCalled();
    });

    it('serves copies', () => {
      storeAt(10, 10);
      const [first] = store.retrieve();
      first.encryptedBody.fill(0);

      expect(bodies(store.retrieve())).toEqual([10]);
    });
  });

  describe('sweep', () => {
    it('removes messages once the retention window elapses', () => {
      storeAt(0, 1);
      storeAt(500, 2);

      clock = 1000;
      expect(store.sweep()).toBe(1);
      expect(bodies(store.retrieve())).toEqual([2]);
      expect(bodies(store.retrieve(0))).toEqual([2]);
      expect(onMessageEvicted).toHaveBeenCalledWith(expect.any(String), 'expired');
    });

    it('trims the oldest messages down to capacity', () => {
      const small = new SafStore({ capacity: 2, now: () => clock, events: { onMessageEvicted } });
      small.store(makeEnvelope(1));
      small.store(makeEnvelope(2));
      small.store(makeEnvelope(3));

      expect(small.size).toBe(3);
      expect(small.sweep()).toBe(1);
      expect(bodies(small.retrieve())).toEqual([2, 3]);
      expect(onMessageEvicted).toHaveBeenCalledWith(expect.any(String), 'capacity');
    });

    it('is a no-op on an empty store', () => {
      expect(store.sweep()).toBe(0);
    });
  });

  describe('sweep timer', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('sweeps periodically once started', () => {
      const timed = new SafStore({ retentionMs: 1000, sweepIntervalMs: 100, now: () => Date.now() });
      timed.store(makeEnvelope(1));
      timed.start();

      vi.advanceTimersByTime(900);
      expect(timed.size).toBe(1);
      vi.advanceTimersByTime(100);
      expect(timed.size).toBe(0);
      timed.stop();
    });

    it('stops sweeping after stop()', () => {
      const timed = new SafStore({ retentionMs: 1000, sweepIntervalMs: 100, autoStart: true, now: () => Date.now() });
      timed.store(makeEnvelope(1));
      expect(timed.running).toBe(true);

      timed.stop();
      vi.advanceTimersByTime(5000);
      expect(timed.size).toBe(1);
      expect(timed.running).toBe(false);
    });

    it('schedules a sweep when a store exceeds capacity', () => {
      const timed = new SafStore({ capacity: 1, sweepIntervalMs: 60_000, autoStart: true, now: () => Date.now() });
      timed.store(makeEnvelope(1));
      timed.store(makeEnvelope(2));
      expect(timed.size).toBe(2);

      vi.advanceTimersByTime(1);
      expect(bodies(timed.retrieve())).toEqual([2]);
      timed.stop();
    });
  });
});
