import {
  DEFAULT_MAX_ENVELOPE_SIZE,
  DhtError,
  type DhtTransport,
  PUBLIC_KEY_LENGTH,
  type PeerConnection,
  type PeerTarget,
  TransportLayer,
  type TransportEvents,
  bytesEqual,
  peerTargetFor,
} from 'dhtwire';
import WebSocket, { WebSocketServer } from 'ws';

export interface WebSocketTransportOptions {
  /** Largest frame accepted from a peer. Default: the envelope size limit */
  maxFrameSize?: number;
  /** Time a new link gets to send its hello before it is dropped. Default: 10s */
  helloTimeoutMs?: number;
}

const DEFAULT_HELLO_TIMEOUT_MS = 10_000;

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return new Uint8Array(Buffer.concat(data));
  if (data instanceof ArrayBuffer) return new Uint8Array(data.slice(0));
  return new Uint8Array(data);
}

/** One binary frame per envelope; text frames are not part of the protocol */
class WsPeerConnection implements PeerConnection {
  onFrame: ((bytes: Uint8Array) => void) | null = null;
  onClose: (() => void) | null = null;

  constructor(
    readonly peer: PeerTarget,
    private socket: WebSocket,
  ) {
    socket.on('message', (data, isBinary) => {
      if (!isBinary) {
        console.warn(`[WebSocketTransport] Ignoring text frame from ${peer.nodeId.slice(0, 8)}`);
        return;
      }
      this.onFrame?.(toBytes(data));
    });
    socket.on('close', () => this.onClose?.());
  }

  send(bytes: Uint8Array): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error(`Socket to ${this.peer.nodeId.slice(0, 8)} is not open`);
    }
    this.socket.send(bytes);
  }

  close(): void {
    this.socket.close();
  }
}

/**
 * DhtTransport over WebSocket links. Both ends open with a hello frame that
 * carries their 64-byte public key; every later binary frame is one envelope.
 */
export class WebSocketTransport implements DhtTransport {
  private layer = new TransportLayer();
  private server: WebSocketServer | null = null;
  private maxFrameSize: number;
  private helloTimeoutMs: number;

  constructor(
    private publicKey: Uint8Array,
    options: WebSocketTransportOptions = {},
  ) {
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_ENVELOPE_SIZE;
    this.helloTimeoutMs = options.helloTimeoutMs ?? DEFAULT_HELLO_TIMEOUT_MS;
  }

  listen(events: TransportEvents): void {
    this.layer.listen(events);
  }

  send(peer: PeerTarget, bytes: Uint8Array): void {
    this.layer.send(peer, bytes);
  }

  getConnectedPeers(): PeerTarget[] {
    return this.layer.getConnectedPeers();
  }

  /**
   * Accept inbound links.
   * @returns the bound port (useful with port 0)
   */
  serve(port: number, host = '127.0.0.1'): Promise<number> {
    if (this.server) {
      return Promise.reject(new DhtError('TRANSPORT_FAILED', 'Already serving'));
    }
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ port, host, maxPayload: this.maxFrameSize });
      this.server = server;
      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        const address = server.address();
        resolve(typeof address === 'string' ? port : address.port);
      });
      server.on('connection', (socket: WebSocket) => {
        socket.on('error', (err) => console.warn(`[WebSocketTransport] Inbound link error: ${err.message}`));
        this.handshake(socket).catch((err: unknown) => {
          console.warn(`[WebSocketTransport] Rejected inbound link: ${err instanceof Error ? err.message : String(err)}`);
        });
      });
    });
  }

  /** Open a link to a listening peer; resolves once hellos are exchanged */
  connect(url: string): Promise<PeerTarget> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, { maxPayload: this.maxFrameSize });
      socket.on('error', (err) => console.warn(`[WebSocketTransport] Link error to ${url}: ${err.message}`));
      socket.once('error', (err) => reject(new DhtError('TRANSPORT_FAILED', err.message, { url })));
      socket.once('open', () => {
        this.handshake(socket).then(resolve, reject);
      });
    });
  }

  close(): void {
    this.layer.close();
    const server = this.server;
    if (!server) return;
    this.server = null;
    // Links still waiting for a hello are not in the layer
    for (const socket of server.clients) socket.terminate();
    server.close((err) => {
      if (err) console.warn(`[WebSocketTransport] Server close failed: ${err.message}`);
    });
  }

  private handshake(socket: WebSocket): Promise<PeerTarget> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        socket.off('close', onClose);
        socket.off('message', onHello);
        socket.terminate();
        reject(new DhtError('TRANSPORT_FAILED', 'No hello received', { timeoutMs: this.helloTimeoutMs }));
      }, this.helloTimeoutMs);

      const onClose = () => {
        clearTimeout(timer);
        reject(new DhtError('TRANSPORT_FAILED', 'Link closed before hello'));
      };

      const onHello = (data: WebSocket.RawData, isBinary: boolean) => {
        clearTimeout(timer);
        socket.off('close', onClose);
        const remoteKey = toBytes(data);
        if (!isBinary || remoteKey.length !== PUBLIC_KEY_LENGTH) {
          socket.close();
          reject(new DhtError('TRANSPORT_FAILED', 'Invalid hello frame', { length: remoteKey.length }));
          return;
        }
        if (bytesEqual(remoteKey, this.publicKey)) {
          socket.close();
          reject(new DhtError('TRANSPORT_FAILED', 'Refusing a link to ourselves'));
          return;
        }
        const conn = new WsPeerConnection(peerTargetFor(remoteKey), socket);
        this.layer.registerPeer(conn);
        resolve(conn.peer);
      };

      socket.once('close', onClose);
      socket.once('message', onHello);

      socket.send(this.publicKey);
    });
  }
}
