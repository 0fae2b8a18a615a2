export { DhtDispatcher } from './dht-dispatcher.js';
export type { DhtDispatcherOptions, DhtMessage, DhtMessageHandler, DispatcherEvents } from './dht-dispatcher.js';
export { InboundQueue, inlineExecutor } from './inbound-queue.js';
export type { FrameHandler, FrameSource, TaskExecutor } from './inbound-queue.js';
