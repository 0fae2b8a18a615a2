import type { NodeId } from '../identity/index.js';
import type { PeerTarget } from '../routing/peer-table.js';

/** Where a frame came from: the wire, or unpacked from a store-forward response */
export type FrameSource = 'transport' | 'store';

export type FrameHandler = (peer: PeerTarget, bytes: Uint8Array, source: FrameSource) => Promise<void>;

/**
 * Runs CPU-heavy work (signature checks, decryption) somewhere else, e.g. a worker pool.
 * The default runs the task inline.
 */
export type TaskExecutor = <T>(task: () => T) => Promise<T>;

export const inlineExecutor: TaskExecutor = async (task) => task();

/**
 * Per-peer ordered processing. Frames from one peer are handled one after the
 * other in arrival order; different peers proceed concurrently.
 */
export class InboundQueue {
  private chains = new Map<NodeId, Promise<void>>();
  private handler: FrameHandler;

  constructor(handler: FrameHandler) {
    this.handler = handler;
  }

  push(peer: PeerTarget, bytes: Uint8Array, source: FrameSource = 'transport'): void {
    const previous = this.chains.get(peer.nodeId) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(() => this.handler(peer, bytes, source))
      .catch((err: unknown) => {
        // A failing frame must not stall the frames queued behind it
        console.error(`[InboundQueue] Handler failed for peer ${peer.nodeId.slice(0, 8)}:`, err);
      })
      .finally(() => {
        if (this.chains.get(peer.nodeId) === next) {
          this.chains.delete(peer.nodeId);
        }
      });
    this.chains.set(peer.nodeId, next);
  }

  /** Number of peers with frames in flight */
  get activePeers(): number {
    return this.chains.size;
  }

  /** Resolves once every queued frame, including ones queued meanwhile, is handled */
  async drain(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all(this.chains.values());
    }
  }
}
