import {
  type DhtConfig,
  DhtDispatcher,
  type DhtMessageHandler,
  type DhtTransport,
  DestinationRouter,
  type DispatcherEvents,
  type DropReason,
  DuplicateFilter,
  EnvelopeCodec,
  IdentityManager,
  type IdentityStorage,
  MemoryStorage,
  type NodeId,
  OriginAuthenticator,
  OutboundMessenger,
  PeerTable,
  type PeerTarget,
  SafStore,
  type SendParams,
  type SendResult,
  type TaskExecutor,
  encodeStoredMessagesRequest,
  hexToBytes,
  identityPublicKey,
  publicKeyToNodeId,
  resolveDhtConfig,
} from 'dhtwire';

export interface DhtNodeOptions<T extends DhtTransport = DhtTransport> {
  /** Builds the transport once the local public key is known */
  createTransport: (publicKey: Uint8Array) => T;
  storage?: IdentityStorage;
  config?: Partial<DhtConfig>;
  /** Runs origin verification and decryption; defaults to inline */
  executor?: TaskExecutor;
}

export type StatusHandler = (status: string, detail?: string) => void;
export type DropHandler = (reason: DropReason, peer: PeerTarget, detail: string) => void;

type ApplicationEvent = 'onMessage' | 'onJoin' | 'onDiscovery' | 'onDiscoveryResponse' | 'onReject';

interface NodeRuntime<T extends DhtTransport> {
  transport: T;
  peers: PeerTable;
  messenger: OutboundMessenger;
  safStore: SafStore;
  dispatcher: DhtDispatcher;
}

/**
 * One DHT participant: identity, peer table, codec, authenticator, router,
 * store-and-forward cache and dispatcher wired onto a transport.
 */
export class DhtNode<T extends DhtTransport = DhtTransport> {
  private identity: IdentityManager;
  private config: DhtConfig;
  private createTransport: (publicKey: Uint8Array) => T;
  private executor: TaskExecutor | undefined;
  private runtime: NodeRuntime<T> | null = null;

  private handlers: Record<ApplicationEvent, DhtMessageHandler[]> = {
    onMessage: [],
    onJoin: [],
    onDiscovery: [],
    onDiscoveryResponse: [],
    onReject: [],
  };
  private statusHandlers: StatusHandler[] = [];
  private dropHandlers: DropHandler[] = [];

  // Handlers are added lazily so an unsubscribed type stays an unsupported drop
  private dispatcherEvents: DispatcherEvents = {
    onMessageForwarded: (header, targets) => this.emitStatus('message:forwarded', `${header.messageType} -> ${targets.length}`),
    onMessageStored: (header) => this.emitStatus('message:stored', header.destination.kind),
    onStoredMessagesServed: (requester, count) =>
      this.emitStatus('saf:served', `${count} to ${publicKeyToNodeId(requester).slice(0, 8)}`),
    onStoredMessagesReceived: (peer, count) => this.emitStatus('saf:received', `${count} from ${peer.nodeId.slice(0, 8)}`),
    onMessageDropped: (reason, peer, detail) => {
      for (const handler of this.dropHandlers) handler(reason, peer, detail);
    },
  };

  /** @throws DhtError INVALID_CONFIG */
  constructor(options: DhtNodeOptions<T>) {
    this.identity = new IdentityManager(options.storage ?? new MemoryStorage());
    this.config = resolveDhtConfig(options.config);
    this.createTransport = options.createTransport;
    this.executor = options.executor;
  }

  get running(): boolean {
    return this.runtime !== null;
  }

  async start(): Promise<void> {
    if (this.runtime) return;
    const identity = await this.identity.init();
    const publicKey = identityPublicKey(identity);
    const { config } = this;

    const transport = this.createTransport(publicKey);
    const peers = new PeerTable({ localPublicKey: publicKey });
    const codec = new EnvelopeCodec({ network: config.network, maxEnvelopeSize: config.maxEnvelopeSize });
    const authenticator = new OriginAuthenticator({ identity });
    const router = new DestinationRouter({ routingTable: peers, localPublicKey: publicKey, fanOut: config.fanOut });
    const messenger = new OutboundMessenger({ authenticator, codec, router, transport });
    const safStore = new SafStore({
      retentionMs: config.safRetentionMs,
      capacity: config.safCapacity,
      sweepIntervalMs: config.safSweepIntervalMs,
    });
    const dispatcher = new DhtDispatcher({
      localPublicKey: publicKey,
      codec,
      authenticator,
      messenger,
      routingTable: peers,
      safStore,
      duplicateFilter: new DuplicateFilter({ ttlMs: config.dedupTtlMs, maxSize: config.dedupMaxSize }),
      executor: this.executor,
      safMaxReturnedMessages: config.safMaxReturnedMessages,
      events: this.dispatcherEvents,
    });

    transport.listen({
      onReceive: (peer, bytes) => {
        peers.touch(peer.nodeId);
        dispatcher.receive(peer, bytes);
      },
      onPeerConnected: (peer) => {
        peers.addPeer(hexToBytes(peer.publicKey));
        this.emitStatus('peer:connected', peer.nodeId);
      },
      onPeerDisconnected: (peer) => {
        peers.removePeer(peer.nodeId);
        this.emitStatus('peer:disconnected', peer.nodeId);
      },
      onError: (peer, error) => this.emitStatus('error', `${peer.nodeId.slice(0, 8)}: ${error.message}`),
    });
    safStore.start();

    this.runtime = { transport, peers, messenger, safStore, dispatcher };
    console.log(`[DhtNode] Started ${publicKeyToNodeId(publicKey).slice(0, 8)} on ${config.network}`);
    this.emitStatus('started', publicKeyToNodeId(publicKey));
  }

  /** Cancel the sweep timer and close every link. Safe to call twice. */
  stop(): void {
    const runtime = this.runtime;
    if (!runtime) return;
    this.runtime = null;
    runtime.safStore.stop();
    runtime.transport.close();
    this.emitStatus('stopped');
  }

  /**
   * Seal and send an application payload (message type none by default).
   * @returns null when the node is not started
   * @throws DhtError on local misuse (see OriginAuthenticator.seal)
   */
  send(params: SendParams): SendResult | null {
    if (!this.runtime) return null;
    return this.runtime.messenger.send(params);
  }

  /**
   * Ask neighbours for messages they hold for this node. Replies come back as
   * store-forward responses and are delivered through the usual handlers.
   */
  requestStoredMessages(since?: number): SendResult | null {
    if (!this.runtime) return null;
    return this.runtime.messenger.send({
      destination: { kind: 'unknown' },
      messageType: 'store-forward-request',
      payload: encodeStoredMessagesRequest({ since }),
    });
  }

  onMessage(handler: DhtMessageHandler): void {
    this.subscribe('onMessage', handler);
  }

  onJoin(handler: DhtMessageHandler): void {
    this.subscribe('onJoin', handler);
  }

  onDiscovery(handler: DhtMessageHandler): void {
    this.subscribe('onDiscovery', handler);
  }

  onDiscoveryResponse(handler: DhtMessageHandler): void {
    this.subscribe('onDiscoveryResponse', handler);
  }

  onReject(handler: DhtMessageHandler): void {
    this.subscribe('onReject', handler);
  }

  onStatus(handler: StatusHandler): void {
    this.statusHandlers.push(handler);
  }

  onMessageDropped(handler: DropHandler): void {
    this.dropHandlers.push(handler);
  }

  /** @throws DhtError IDENTITY_MISSING before start() */
  getPublicKey(): Uint8Array {
    return this.identity.getPublicKey();
  }

  /** @throws DhtError IDENTITY_MISSING before start() */
  getNodeId(): NodeId {
    return this.identity.getNodeId();
  }

  getConfig(): Readonly<DhtConfig> {
    return this.config;
  }

  /** The transport built by start(), or null while stopped */
  getTransport(): T | null {
    return this.runtime?.transport ?? null;
  }

  getPeers(): PeerTarget[] {
    return this.runtime?.peers.getPeers() ?? [];
  }

  /** Number of messages held for other nodes */
  storedMessageCount(): number {
    return this.runtime?.safStore.size ?? 0;
  }

  /** Resolves once every queued inbound frame has been handled */
  async whenIdle(): Promise<void> {
    await this.runtime?.dispatcher.whenIdle();
  }

  private subscribe(event: ApplicationEvent, handler: DhtMessageHandler): void {
    const list = this.handlers[event];
    list.push(handler);
    this.dispatcherEvents[event] ??= (message) => {
      for (const h of list) h(message);
    };
  }

  private emitStatus(status: string, detail?: string): void {
    for (const handler of this.statusHandlers) handler(status, detail);
  }
}
