export { PeerTable, xorDistance, peerTargetFor } from './peer-table.js';
export type { PeerTarget, RoutingTable, DistanceMetric, PeerTableOptions } from './peer-table.js';
export { DestinationRouter } from './destination-router.js';
export type { DestinationRouterOptions } from './destination-router.js';
export { DuplicateFilter, DUPLICATE_FILTER_TTL_MS, DUPLICATE_FILTER_MAX_SIZE } from './duplicate-filter.js';
export type { DuplicateFilterOptions } from './duplicate-filter.js';
