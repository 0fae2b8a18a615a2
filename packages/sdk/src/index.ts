export { DHTWIRE_VERSION } from 'dhtwire';
export { DhtNode } from './dht-node.js';
export type { DhtNodeOptions, StatusHandler, DropHandler } from './dht-node.js';
export { WebSocketTransport } from './ws-transport.js';
export type { WebSocketTransportOptions } from './ws-transport.js';
export { loadDhtConfigFromEnv, DHT_ENV_KEYS, DHT_NETWORK_ENV } from './config-env.js';
