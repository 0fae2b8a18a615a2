import { type DhtConfig, DhtError, type Network, resolveDhtConfig } from 'dhtwire';

type NumericKey = Exclude<keyof DhtConfig, 'network'>;

/** Environment variable for each numeric config key */
export const DHT_ENV_KEYS: Record<NumericKey, string> = {
  fanOut: 'DHT_FAN_OUT',
  maxEnvelopeSize: 'DHT_MAX_ENVELOPE_SIZE',
  safRetentionMs: 'DHT_SAF_RETENTION_MS',
  safCapacity: 'DHT_SAF_CAPACITY',
  safSweepIntervalMs: 'DHT_SAF_SWEEP_INTERVAL_MS',
  safMaxReturnedMessages: 'DHT_SAF_MAX_RETURNED_MESSAGES',
  dedupTtlMs: 'DHT_DEDUP_TTL_MS',
  dedupMaxSize: 'DHT_DEDUP_MAX_SIZE',
};

export const DHT_NETWORK_ENV = 'DHT_NETWORK';

function parseNetwork(value: string): Network {
  switch (value) {
    case 'main':
    case 'test':
    case 'local-test':
      return value;
    default:
      throw new DhtError('INVALID_CONFIG', `Unknown network "${value}"`, { key: DHT_NETWORK_ENV });
  }
}

/**
 * Build a DhtConfig from DHT_* variables. Unset or empty variables keep their
 * default; anything else goes through resolveDhtConfig validation.
 * @throws DhtError INVALID_CONFIG
 */
export function loadDhtConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DhtConfig {
  const overrides: Partial<DhtConfig> = {};

  const network = env[DHT_NETWORK_ENV];
  if (network) {
    overrides.network = parseNetwork(network);
  }

  for (const [key, name] of Object.entries(DHT_ENV_KEYS)) {
    const raw = env[name];
    if (!raw) continue;
    // NaN and fractions are rejected by resolveDhtConfig
    Object.assign(overrides, { [key]: Number(raw.trim()) });
  }

  return resolveDhtConfig(overrides);
}
