import type { OriginAuthenticator } from '../auth/origin-authenticator.js';
import type { EnvelopeCodec } from '../codec/envelope-codec.js';
import { encodeEnvelope } from '../codec/envelope-codec.js';
import {
  decodeStoredMessagesRequest,
  decodeStoredMessagesResponse,
  encodeStoredMessagesResponse,
  storedMessageEncodedLength,
  storedMessagesResponseLength,
} from '../codec/store-forward-codec.js';
import { DEFAULT_SAF_MAX_RETURNED_MESSAGES } from '../config/dht-config.js';
import { envelopeDigest } from '../crypto/digest.js';
import type { DropReason } from '../errors/dht-error.js';
import { publicKeyToNodeIdBytes } from '../identity/keypair.js';
import type { OutboundMessenger } from '../outbound/outbound-messenger.js';
import { DuplicateFilter } from '../routing/duplicate-filter.js';
import type { PeerTarget, RoutingTable } from '../routing/peer-table.js';
import type { SafStore } from '../store-forward/saf-store.js';
import type { DhtDestination, DhtEnvelope, DhtHeader, DhtMessageType, StoredMessage } from '../types/envelope.js';
import { bytesEqual, hexToBytes } from '../utils/bytes.js';
import type { FrameSource, TaskExecutor } from './inbound-queue.js';
import { InboundQueue, inlineExecutor } from './inbound-queue.js';

/** Room left in a store-forward response frame for the header, origin and encryption */
const RESPONSE_ENVELOPE_OVERHEAD = 512;

/** An authenticated message handed to the application or a protocol handler */
export interface DhtMessage {
  header: DhtHeader;
  /** Body after decryption */
  payload: Uint8Array;
  originPublicKey: Uint8Array | null;
  /** Neighbour that delivered the frame */
  peer: PeerTarget;
  source: FrameSource;
}

export type DhtMessageHandler = (message: DhtMessage) => void;

export interface DispatcherEvents {
  onMessage?: DhtMessageHandler;
  onJoin?: DhtMessageHandler;
  onDiscovery?: DhtMessageHandler;
  onDiscoveryResponse?: DhtMessageHandler;
  onReject?: DhtMessageHandler;
  onMessageForwarded?: (header: DhtHeader, targets: PeerTarget[]) => void;
  onMessageStored?: (header: DhtHeader) => void;
  onStoredMessagesServed?: (requesterPublicKey: Uint8Array, count: number) => void;
  onStoredMessagesReceived?: (peer: PeerTarget, count: number) => void;
  onMessageDropped?: (reason: DropReason, peer: PeerTarget, detail: string) => void;
}

export interface DhtDispatcherOptions {
  localPublicKey: Uint8Array;
  codec: EnvelopeCodec;
  authenticator: OriginAuthenticator;
  messenger: OutboundMessenger;
  routingTable: RoutingTable;
  safStore: SafStore;
  duplicateFilter?: DuplicateFilter;
  executor?: TaskExecutor;
  safMaxReturnedMessages?: number;
  events?: DispatcherEvents;
}

type HandlerKey = 'onMessage' | 'onJoin' | 'onDiscovery' | 'onDiscoveryResponse' | 'onReject';

const HANDLERS: Record<Exclude<DhtMessageType, 'store-forward-request' | 'store-forward-response'>, HandlerKey> = {
  none: 'onMessage',
  join: 'onJoin',
  discovery: 'onDiscovery',
  'discovery-response': 'onDiscoveryResponse',
  reject: 'onReject',
};

function isStoreForwardControl(messageType: DhtMessageType): boolean {
  return messageType === 'store-forward-request' || messageType === 'store-forward-response';
}

/** A stored message belongs to the requester if it names the requester's key or node id */
function isApplicable(message: StoredMessage, requesterKey: Uint8Array, requesterNodeId: Uint8Array): boolean {
  const { destination } = message.dhtHeader;
  switch (destination.kind) {
    case 'public-key':
      return bytesEqual(destination.publicKey, requesterKey);
    case 'node-id':
      return bytesEqual(destination.nodeId, requesterNodeId);
    case 'unknown':
      return false;
  }
}

/**
 * Inbound pipeline: decode -> dedup -> authenticate -> branch on message type.
 *
 * Remote input never throws out of here; every failure ends as a drop with an
 * onMessageDropped diagnostic (network mismatches and duplicates are silent).
 */
export class DhtDispatcher {
  private localPublicKey: Uint8Array;
  private localNodeId: Uint8Array;
  private codec: EnvelopeCodec;
  private authenticator: OriginAuthenticator;
  private messenger: OutboundMessenger;
  private routingTable: RoutingTable;
  private safStore: SafStore;
  private duplicates: DuplicateFilter;
  private executor: TaskExecutor;
  private safMaxReturnedMessages: number;
  private events: DispatcherEvents;
  private queue: InboundQueue;

  constructor(options: DhtDispatcherOptions) {
    this.localPublicKey = options.localPublicKey;
    this.localNodeId = publicKeyToNodeIdBytes(options.localPublicKey);
    this.codec = options.codec;
    this.authenticator = options.authenticator;
    this.messenger = options.messenger;
    this.routingTable = options.routingTable;
    this.safStore = options.safStore;
    this.duplicates = options.duplicateFilter ?? new DuplicateFilter();
    this.executor = options.executor ?? inlineExecutor;
    this.safMaxReturnedMessages = options.safMaxReturnedMessages ?? DEFAULT_SAF_MAX_RETURNED_MESSAGES;
    this.events = options.events ?? {};
    this.queue = new InboundQueue((peer, bytes, source) => this.handleFrame(peer, bytes, source));
  }

  /** Entry point for frames from the transport */
  receive(peer: PeerTarget, bytes: Uint8Array): void {
    this.queue.push(peer, bytes, 'transport');
  }

  /** Resolves when no frame is queued or being handled */
  whenIdle(): Promise<void> {
    return this.queue.drain();
  }

  private async handleFrame(peer: PeerTarget, bytes: Uint8Array, source: FrameSource): Promise<void> {
    const decoded = this.codec.decode(bytes);
    if (!decoded.ok) {
      if (decoded.reason !== 'NETWORK_MISMATCH') {
        this.drop(decoded.reason, peer, decoded.detail);
      }
      return;
    }
    const { envelope } = decoded;
    const { header } = envelope;

    // Requests carry no nonce, so a repeated request is a legitimate new one
    if (
      header.messageType !== 'store-forward-request' &&
      this.duplicates.checkAndRecord(envelopeDigest(header, envelope.body))
    ) {
      return;
    }

    if (source === 'store' && isStoreForwardControl(header.messageType)) {
      this.drop('UNSUPPORTED_MESSAGE_TYPE', peer, `${header.messageType} inside a store-forward response`);
      return;
    }

    if (!this.isForLocalNode(header.destination)) {
      const verified = await this.executor(() => this.authenticator.verify(envelope));
      if (verified.status === 'failed') {
        this.drop(verified.reason, peer, verified.detail);
        return;
      }
      this.relay(peer, envelope, bytes);
      return;
    }

    const opened = await this.executor(() => this.authenticator.open(envelope));
    if (opened.status === 'failed') {
      this.drop(opened.reason, peer, opened.detail);
      return;
    }

    const message: DhtMessage = {
      header,
      payload: opened.plaintext,
      originPublicKey: opened.originPublicKey,
      peer,
      source,
    };

    switch (header.messageType) {
      case 'store-forward-request':
        this.serveStoredMessages(message);
        return;
      case 'store-forward-response':
        this.unpackStoredMessages(message);
        return;
      default: {
        const handler = this.events[HANDLERS[header.messageType]];
        if (!handler) {
          this.drop('UNSUPPORTED_MESSAGE_TYPE', peer, `no handler for ${header.messageType}`);
          return;
        }
        handler(message);
      }
    }
  }

  private isForLocalNode(destination: DhtDestination): boolean {
    switch (destination.kind) {
      case 'unknown':
        return true;
      case 'public-key':
        return bytesEqual(destination.publicKey, this.localPublicKey);
      case 'node-id':
        return bytesEqual(destination.nodeId, this.localNodeId);
    }
  }

  /** Hold application messages for unreachable recipients, then pass the frame on unchanged */
  private relay(peer: PeerTarget, envelope: DhtEnvelope, bytes: Uint8Array): void {
    const { header } = envelope;
    if (header.messageType === 'none' && this.shouldStore(header.destination)) {
      if (!this.fitsStoredMessagesResponse(envelope)) {
        console.warn(`[DhtDispatcher] Not storing a ${envelope.body.length}-byte body: it could never be served`);
      } else if (this.safStore.store(envelope)) {
        this.events.onMessageStored?.(header);
      }
    }

    const targets = this.messenger.forward(bytes, header.destination, [peer.nodeId]);
    if (targets.length > 0) {
      this.events.onMessageForwarded?.(header, targets);
    }
  }

  private shouldStore(destination: DhtDestination): boolean {
    switch (destination.kind) {
      case 'public-key':
        return !this.routingTable.isDirectlyReachable(destination.publicKey);
      case 'node-id':
        return true;
      case 'unknown':
        return false;
    }
  }

  /** Whether the envelope, once stored, fits on its own in a response frame */
  private fitsStoredMessagesResponse(envelope: DhtEnvelope): boolean {
    const entryBytes = storedMessageEncodedLength({
      // Widest timestamp encoding
      storedAt: Number.MAX_SAFE_INTEGER,
      version: envelope.header.version,
      dhtHeader: envelope.header,
      encryptedBody: envelope.body,
    });
    return storedMessagesResponseLength(1, entryBytes) <= this.responseBudget();
  }

  private responseBudget(): number {
    return this.codec.maxEnvelopeSize - RESPONSE_ENVELOPE_OVERHEAD;
  }

  private serveStoredMessages(message: DhtMessage): void {
    const request = decodeStoredMessagesRequest(message.payload);
    if (!request.ok) {
      this.drop('MALFORMED_ENVELOPE', message.peer, request.detail);
      return;
    }

    const requesterKey = message.originPublicKey ?? hexToBytes(message.peer.publicKey);
    const requesterNodeId = publicKeyToNodeIdBytes(requesterKey);

    // Oldest first until either the count cap or the frame budget is reached
    const budget = this.responseBudget();
    const messages: StoredMessage[] = [];
    let entryBytes = 0;
    for (const stored of this.safStore.retrieve(request.value.since, message.header.network)) {
      if (messages.length >= this.safMaxReturnedMessages) break;
      if (!isApplicable(stored, requesterKey, requesterNodeId)) continue;
      const length = storedMessageEncodedLength(stored);
      if (storedMessagesResponseLength(messages.length + 1, entryBytes + length) > budget) break;
      messages.push(stored);
      entryBytes += length;
    }

    const payload = encodeStoredMessagesResponse({ messages });

    this.messenger.send({
      destination: { kind: 'public-key', publicKey: requesterKey },
      messageType: 'store-forward-response',
      payload,
      encrypt: true,
    });

    console.log(`[DhtDispatcher] Served ${messages.length} stored message(s) to ${message.peer.nodeId.slice(0, 8)}`);
    this.events.onStoredMessagesServed?.(requesterKey, messages.length);
  }

  /** Feed every contained message back through the queue as a fresh arrival from the same peer */
  private unpackStoredMessages(message: DhtMessage): void {
    const response = decodeStoredMessagesResponse(message.payload);
    if (!response.ok) {
      this.drop('MALFORMED_ENVELOPE', message.peer, response.detail);
      return;
    }

    const { messages, skipped } = response.value;
    if (skipped > 0) {
      this.drop('MALFORMED_ENVELOPE', message.peer, `${skipped} unreadable stored message(s)`);
    }

    for (const stored of messages) {
      this.queue.push(message.peer, encodeEnvelope(stored.dhtHeader, stored.encryptedBody), 'store');
    }
    this.events.onStoredMessagesReceived?.(message.peer, messages.length);
  }

  private drop(reason: DropReason, peer: PeerTarget, detail: string): void {
    console.warn(`[DhtDispatcher] Dropped frame from ${peer.nodeId.slice(0, 8)}: ${reason} (${detail})`);
    this.events.onMessageDropped?.(reason, peer, detail);
  }
}
