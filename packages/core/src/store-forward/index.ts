export { SafStore } from './saf-store.js';
export type { SafStoreEvents, SafStoreOptions, EvictionReason } from './saf-store.js';
