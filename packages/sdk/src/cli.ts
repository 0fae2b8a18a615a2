// DHT node CLI: listens on PORT and links to every URL in DHT_PEERS (comma-separated)
import { FileStorageAdapter } from 'dhtwire';
import { loadDhtConfigFromEnv } from './config-env.js';
import { DhtNode } from './dht-node.js';
import { WebSocketTransport } from './ws-transport.js';

const PORT = Number(process.env.PORT) || 7100;
const HOST = process.env.HOST || '127.0.0.1';
const PEERS = (process.env.DHT_PEERS ?? '')
  .split(',')
  .map((url) => url.trim())
  .filter((url) => url.length > 0);

async function main(): Promise<DhtNode<WebSocketTransport>> {
  const config = loadDhtConfigFromEnv();
  const node = new DhtNode({
    createTransport: (publicKey) => new WebSocketTransport(publicKey, { maxFrameSize: config.maxEnvelopeSize }),
    storage: new FileStorageAdapter(process.env.DHT_IDENTITY_FILE),
    config,
  });
  node.onStatus((status, detail) => console.log(`[dhtwire] ${status}${detail ? ` ${detail}` : ''}`));
  node.onMessage((message) =>
    console.log(`[dhtwire] Message of ${message.payload.length} bytes from ${message.peer.nodeId.slice(0, 8)}`),
  );

  await node.start();
  const transport = node.getTransport();
  if (!transport) throw new Error('Transport missing after start');

  const port = await transport.serve(PORT, HOST);
  console.log(`dhtwire node ${node.getNodeId()} listening on ws://${HOST}:${port}`);

  for (const url of PEERS) {
    try {
      const peer = await transport.connect(url);
      console.log(`Linked to ${peer.nodeId} at ${url}`);
    } catch (err) {
      console.warn(`Could not link to ${url}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  node.requestStoredMessages();
  return node;
}

main()
  .then((node) => {
    process.on('SIGINT', () => {
      node.stop();
      process.exit(0);
    });
  })
  .catch((err: unknown) => {
    console.error('Failed to start dhtwire node:', err);
    process.exit(1);
  });
