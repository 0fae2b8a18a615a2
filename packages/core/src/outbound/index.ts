export { OutboundMessenger } from './outbound-messenger.js';
export type { SendParams, SendResult, OutboundMessengerOptions } from './outbound-messenger.js';
