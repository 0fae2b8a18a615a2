import type { OriginAuthenticator } from '../auth/origin-authenticator.js';
import type { EnvelopeCodec } from '../codec/envelope-codec.js';
import type { NodeId } from '../identity/index.js';
import type { DestinationRouter } from '../routing/destination-router.js';
import type { PeerTarget } from '../routing/peer-table.js';
import type { DhtTransport } from '../transport/transport-layer.js';
import type { DhtDestination, DhtEnvelope, DhtMessageType } from '../types/envelope.js';

export interface SendParams {
  destination: DhtDestination;
  payload: Uint8Array;
  /** Default: 'none' (application payload) */
  messageType?: DhtMessageType;
  encrypt?: boolean;
  /** Default: true */
  signed?: boolean;
  /** Neighbours that must not receive the message */
  exclude?: Iterable<NodeId>;
}

export interface SendResult {
  envelope: DhtEnvelope;
  bytes: Uint8Array;
  targets: PeerTarget[];
}

export interface OutboundMessengerOptions {
  authenticator: OriginAuthenticator;
  codec: EnvelopeCodec;
  router: DestinationRouter;
  transport: DhtTransport;
}

/**
 * Outbound path: header -> encrypt/sign -> encode -> resolve targets -> transport.
 */
export class OutboundMessenger {
  private authenticator: OriginAuthenticator;
  private codec: EnvelopeCodec;
  private router: DestinationRouter;
  private transport: DhtTransport;

  constructor(options: OutboundMessengerOptions) {
    this.authenticator = options.authenticator;
    this.codec = options.codec;
    this.router = options.router;
    this.transport = options.transport;
  }

  /**
   * Build a fresh envelope and hand it to the resolved neighbours.
   * @throws DhtError on local misuse (see OriginAuthenticator.seal, EnvelopeCodec.encode)
   */
  send(params: SendParams): SendResult {
    const { envelope, bytes } = this.build(params);
    const targets = this.router.resolve(params.destination, params.exclude);
    this.dispatch(targets, bytes);

    console.log(`[OutboundMessenger] Sent ${envelope.header.messageType} to ${targets.length} peer(s)`);
    return { envelope, bytes, targets };
  }

  /** Send to one specific neighbour, bypassing destination resolution */
  sendTo(peer: PeerTarget, params: Omit<SendParams, 'exclude'>): SendResult {
    const { envelope, bytes } = this.build(params);
    this.transport.send(peer, bytes);
    return { envelope, bytes, targets: [peer] };
  }

  /**
   * Re-send a received frame as-is. The bytes are the ones that arrived, so the
   * origin signature stays valid and nothing is re-signed or re-encrypted.
   */
  forward(bytes: Uint8Array, destination: DhtDestination, exclude: Iterable<NodeId> = []): PeerTarget[] {
    const targets = this.router.resolve(destination, exclude);
    this.dispatch(targets, bytes);
    return targets;
  }

  private build(params: Omit<SendParams, 'exclude'>): { envelope: DhtEnvelope; bytes: Uint8Array } {
    const envelope = this.authenticator.seal({
      destination: params.destination,
      messageType: params.messageType ?? 'none',
      network: this.codec.network,
      payload: params.payload,
      encrypt: params.encrypt,
      signed: params.signed,
    });
    return { envelope, bytes: this.codec.encode(envelope.header, envelope.body) };
  }

  private dispatch(targets: PeerTarget[], bytes: Uint8Array): void {
    for (const target of targets) {
      this.transport.send(target, bytes);
    }
  }
}
