export { DhtError } from './dht-error.js';
export type { DhtErrorCode, DropReason } from './dht-error.js';
