import { DEFAULT_MAX_ENVELOPE_SIZE } from '../codec/envelope-codec.js';
import { DhtError } from '../errors/dht-error.js';
import type { Network } from '../types/envelope.js';

/** Peers a broadcast or forwarded message goes to */
export const DEFAULT_FAN_OUT = 3;

/** Stored messages older than this are swept (3 hours) */
export const DEFAULT_SAF_RETENTION_MS = 3 * 60 * 60 * 1000;

export const DEFAULT_SAF_CAPACITY = 10_000;

/** Eviction sweep cadence (1 minute) */
export const DEFAULT_SAF_SWEEP_INTERVAL_MS = 60 * 1000;

/** Upper bound on messages in one store-forward response */
export const DEFAULT_SAF_MAX_RETURNED_MESSAGES = 500;

/** Max age for envelope deduplication entries (10 minutes) */
export const DEFAULT_DEDUP_TTL_MS = 10 * 60 * 1000;

export const DEFAULT_DEDUP_MAX_SIZE = 10_000;

export interface DhtConfig {
  network: Network;
  fanOut: number;
  maxEnvelopeSize: number;
  safRetentionMs: number;
  safCapacity: number;
  safSweepIntervalMs: number;
  safMaxReturnedMessages: number;
  dedupTtlMs: number;
  dedupMaxSize: number;
}

export const DEFAULT_DHT_CONFIG: Readonly<DhtConfig> = {
  network: 'main',
  fanOut: DEFAULT_FAN_OUT,
  maxEnvelopeSize: DEFAULT_MAX_ENVELOPE_SIZE,
  safRetentionMs: DEFAULT_SAF_RETENTION_MS,
  safCapacity: DEFAULT_SAF_CAPACITY,
  safSweepIntervalMs: DEFAULT_SAF_SWEEP_INTERVAL_MS,
  safMaxReturnedMessages: DEFAULT_SAF_MAX_RETURNED_MESSAGES,
  dedupTtlMs: DEFAULT_DEDUP_TTL_MS,
  dedupMaxSize: DEFAULT_DEDUP_MAX_SIZE,
};

const NUMERIC_KEYS = [
  'fanOut',
  'maxEnvelopeSize',
  'safRetentionMs',
  'safCapacity',
  'safSweepIntervalMs',
  'safMaxReturnedMessages',
  'dedupTtlMs',
  'dedupMaxSize',
] as const satisfies readonly (keyof DhtConfig)[];

const NETWORKS: readonly Network[] = ['main', 'test', 'local-test'];

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws DhtError INVALID_CONFIG on a non-positive or non-integer numeric value, or an unknown network
 */
export function resolveDhtConfig(overrides: Partial<DhtConfig> = {}): DhtConfig {
  const config: DhtConfig = { ...DEFAULT_DHT_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    Object.assign(config, { [key]: value });
  }

  if (!NETWORKS.includes(config.network)) {
    throw new DhtError('INVALID_CONFIG', `Unknown network "${String(config.network)}"`, { key: 'network' });
  }
  for (const key of NUMERIC_KEYS) {
    const value = config[key];
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new DhtError('INVALID_CONFIG', `${key} must be a positive integer, got ${value}`, { key, value });
    }
  }
  return config;
}
