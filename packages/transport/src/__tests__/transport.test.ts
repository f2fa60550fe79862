import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import net from 'node:net';
import { FrameCodec, HEADER_SIZE } from '@convoy/protocol';
import { MessageRelay } from '@convoy/relay';
import {
  ConnectionError,
  DisconnectedError,
  joinMessage,
  stateMessage,
  type PlatoonMessage,
  type RelayAddress,
  type VehicleState,
} from '@convoy/types';
import { InboundStream, PeerClient, reconnectDelay, type PeerClientOptions } from '../index.js';

// Quiet logger for tests
const quietLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

const fastRetry = { baseDelayMs: 5, maxDelayMs: 10, maxRetries: 2 };

function stateAt(sequence: number): PlatoonMessage {
  const state: VehicleState = {
    peerId: 'car-a',
    position: { x: sequence, y: 0, z: 0 },
    velocity: { x: 8, y: 0, z: 0 },
    heading: 0,
    sequence,
    timestamp: 1000 + sequence * 50,
  };
  return stateMessage(state);
}

async function unusedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const bound = server.address();
  const port = bound !== null && typeof bound === 'object' ? bound.port : 0;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

describe('@convoy/transport', () => {
  // ─────────────────────────────────────────────────────────────────────
  // Backoff
  // ─────────────────────────────────────────────────────────────────────

  describe('reconnectDelay', () => {
    it('doubles from the base up to the cap', () => {
      const policy = { baseDelayMs: 500, maxDelayMs: 8000 };
      const delays = [1, 2, 3, 4, 5, 6, 7].map((attempt) => reconnectDelay(attempt, policy));
      expect(delays).toEqual([500, 1000, 2000, 4000, 8000, 8000, 8000]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // InboundStream
  // ─────────────────────────────────────────────────────────────────────

  describe('InboundStream', () => {
    it('buffers items pushed before they are read', async () => {
      const stream = new InboundStream<number>();
      stream.push(1);
      stream.push(2);
      expect(stream.size).toBe(2);
      expect(await stream.next()).toEqual({ value: 1, done: false });
      expect(await stream.next()).toEqual({ value: 2, done: false });
    });

    it('resolves a pending read on push', async () => {
      const stream = new InboundStream<string>();
      const pending = stream.next();
      stream.push('join');
      expect(await pending).toEqual({ value: 'join', done: false });
    });

    it('ends pending reads and stays ended', async () => {
      const stream = new InboundStream<number>();
      const pending = stream.next();
      stream.end();
      stream.push(5);
      expect(await pending).toEqual({ value: undefined, done: true });
      expect(await stream.next()).toEqual({ value: undefined, done: true });
      expect(stream.isEnded).toBe(true);
    });

    it('drains buffered items before reporting the end', async () => {
      const stream = new InboundStream<number>();
      stream.push(1);
      stream.push(2);
      stream.end();
      const seen: number[] = [];
      for await (const item of stream) {
        seen.push(item);
      }
      expect(seen).toEqual([1, 2]);
    });

    it('drops the oldest item past its bound', async () => {
      const onOverflow = vi.fn();
      const stream = new InboundStream<number>(2, onOverflow);
      stream.push(1);
      stream.push(2);
      stream.push(3);
      expect(onOverflow).toHaveBeenCalledWith(1);
      expect(await stream.next()).toEqual({ value: 2, done: false });
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // PeerClient against a loopback relay
  // ─────────────────────────────────────────────────────────────────────

  describe('PeerClient', () => {
    let relay: MessageRelay;
    let address: RelayAddress;
    const clients: PeerClient[] = [];

    function createClient(options?: PeerClientOptions): PeerClient {
      const client = new PeerClient(options, quietLogger);
      clients.push(client);
      return client;
    }

    async function connectedPair(): Promise<[PeerClient, PeerClient]> {
      const a = createClient();
      const b = createClient();
      await a.connect(address);
      await b.connect(address);
      await vi.waitFor(() => expect(relay.getPeers()).toHaveLength(2));
      return [a, b];
    }

    beforeEach(async () => {
      relay = new MessageRelay({ host: '127.0.0.1', port: 0 }, quietLogger);
      address = await relay.start();
    });

    afterEach(async () => {
      for (const client of clients.splice(0)) {
        await client.disconnect();
      }
      await relay.stop();
    });

    it('connects and reports status', async () => {
      const client = createClient();
      const connected = vi.fn();
      client.on('connected', connected);
      expect(client.getStatus()).toBe('idle');

      await client.connect(address);

      expect(client.getStatus()).toBe('connected');
      expect(connected).toHaveBeenCalledWith(address);
      await expect(client.connect(address)).rejects.toThrow('PeerClient already connected');
    });

    it('delivers messages unmodified and in order', async () => {
      const [a, b] = await connectedPair();
      const sent = Array.from({ length: 10 }, (_, i) => stateAt(i));
      const inbound = b.receive();
      const onMessage = vi.fn();
      const echoed = vi.fn();
      b.on('message', onMessage);
      a.on('message', echoed);

      for (const message of sent) {
        expect(a.send(message)).toBe(true);
      }

      const received: PlatoonMessage[] = [];
      for (let i = 0; i < sent.length; i++) {
        const result = await inbound.next();
        if (!result.done) received.push(result.value);
      }
      expect(received).toEqual(sent);
      expect(onMessage).toHaveBeenCalledTimes(10);
      expect(echoed).not.toHaveBeenCalled();
    });

    it('skips invalid frames and foreign namespaces', async () => {
      const client = createClient();
      await client.connect(address);
      const onMessage = vi.fn();
      client.on('message', onMessage);

      const raw = net.connect({ host: address.host, port: address.port });
      raw.on('error', () => {});
      await new Promise<void>((resolve) => raw.once('connect', () => resolve()));
      await vi.waitFor(() => expect(relay.getPeers()).toHaveLength(2));

      const codec = new FrameCodec({ defaultFormat: 'json' });
      const unknownFormat = Buffer.alloc(HEADER_SIZE + 2);
      unknownFormat.writeUInt32BE(2, 0);
      unknownFormat.writeUInt8(0x04, 4);
      raw.write(codec.encode({ namespace: 'platoon', type: 'STATE', payload: {} }));
      raw.write(codec.encode({ namespace: 'chat', type: 'hello', payload: 'hi' }));
      raw.write(unknownFormat);
      raw.write(codec.encode({ namespace: 'platoon', type: 'JOIN', payload: { requestingPeerId: 'car-x', timestamp: 9 } }));

      await vi.waitFor(() => expect(onMessage).toHaveBeenCalledTimes(1));
      expect(onMessage).toHaveBeenCalledWith(joinMessage('car-x', 9));
      expect(client.getStatus()).toBe('connected');
      raw.destroy();
    });

    it('flushes queued messages on disconnect', async () => {
      const [a, b] = await connectedPair();
      const onMessage = vi.fn();
      const disconnected = vi.fn();
      b.on('message', onMessage);
      a.on('disconnected', disconnected);

      a.send(joinMessage('car-1', 1));
      a.send(joinMessage('car-2', 2));
      a.send(joinMessage('car-3', 3));
      await a.disconnect();

      await vi.waitFor(() => expect(onMessage).toHaveBeenCalledTimes(3));
      expect(a.getStatus()).toBe('disconnected');
      expect(disconnected).toHaveBeenCalledWith();
      expect(a.send(joinMessage('car-4', 4))).toBe(false);
      await vi.waitFor(() => expect(relay.getPeers()).toHaveLength(1));
      expect(await a.receive().next()).toEqual({ value: undefined, done: true });
    });

    // ─── Connection failures ───

    it('rejects with ConnectionError on a refused port', async () => {
      const port = await unusedPort();
      const client = createClient();

      const error = await client.connect({ host: '127.0.0.1', port }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.attempts).toBe(1);
        expect(error.address).toEqual({ host: '127.0.0.1', port });
      }
      expect(client.getStatus()).toBe('disconnected');
    });

    it('retries the initial connect when asked to', async () => {
      const port = await unusedPort();
      const client = createClient({ reconnect: fastRetry, retryInitialConnect: true });
      const reconnecting = vi.fn();
      client.on('reconnecting', reconnecting);

      const error = await client.connect({ host: '127.0.0.1', port }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.attempts).toBe(3);
      }
      expect(reconnecting.mock.calls).toEqual([
        [1, 5],
        [2, 10],
      ]);
    });

    it('stops retrying the initial connect on disconnect', async () => {
      const port = await unusedPort();
      const client = createClient({
        reconnect: { baseDelayMs: 60_000, maxDelayMs: 60_000, maxRetries: 5 },
        retryInitialConnect: true,
      });
      const reconnecting = vi.fn();
      client.on('reconnecting', reconnecting);

      const pending = client.connect({ host: '127.0.0.1', port }).catch((err: unknown) => err);
      await vi.waitFor(() => expect(reconnecting).toHaveBeenCalledWith(1, 60_000));
      await client.disconnect();
      const error = await pending;

      expect(error).toBeInstanceOf(ConnectionError);
      if (error instanceof ConnectionError) {
        expect(error.attempts).toBe(1);
      }
      expect(reconnecting).toHaveBeenCalledTimes(1);
      expect(client.getStatus()).toBe('disconnected');
    });

    it('gives up after the retry budget and ends the stream', async () => {
      const client = createClient({ reconnect: fastRetry });
      await client.connect(address);
      const inbound = client.receive();
      const lost = vi.fn();
      const reconnecting = vi.fn();
      client.on('connectionLost', lost);
      client.on('reconnecting', reconnecting);
      const disconnected = new Promise<DisconnectedError | undefined>((resolve) => {
        client.once('disconnected', (error) => resolve(error));
      });

      await relay.stop();
      const error = await disconnected;

      expect(lost).toHaveBeenCalledTimes(1);
      expect(reconnecting.mock.calls).toEqual([
        [1, 5],
        [2, 10],
      ]);
      expect(error).toBeInstanceOf(DisconnectedError);
      expect(error?.attempts).toBe(2);
      expect(client.getStatus()).toBe('disconnected');
      expect(await inbound.next()).toEqual({ value: undefined, done: true });
    });

    it('reconnects and keeps the same inbound stream', async () => {
      const a = createClient({ reconnect: { baseDelayMs: 20, maxDelayMs: 50, maxRetries: 20 } });
      await a.connect(address);
      const inbound = a.receive();
      const reconnected = new Promise<void>((resolve) => a.once('reconnected', () => resolve()));

      await relay.stop();
      relay = new MessageRelay({ host: '127.0.0.1', port: address.port }, quietLogger);
      await relay.start();
      await reconnected;
      expect(a.getStatus()).toBe('connected');

      const b = createClient();
      await b.connect(address);
      await vi.waitFor(() => expect(relay.getPeers()).toHaveLength(2));
      b.send(joinMessage('car-b', 11));

      expect(await inbound.next()).toEqual({ value: joinMessage('car-b', 11), done: false });
    });

    it('bounds the queue while the link is down', async () => {
      const client = createClient({
        reconnect: { baseDelayMs: 10_000, maxDelayMs: 10_000, maxRetries: 1 },
        maxPendingMessages: 2,
      });
      await client.connect(address);
      const lost = new Promise<void>((resolve) => client.once('connectionLost', () => resolve()));

      await relay.stop();
      await lost;

      expect(client.getStatus()).toBe('reconnecting');
      expect(client.send(joinMessage('car-1', 1))).toBe(true);
      expect(client.send(joinMessage('car-2', 2))).toBe(true);
      expect(client.send(joinMessage('car-3', 3))).toBe(true);
      expect(client.getPendingCount()).toBe(2);

      await client.disconnect();
      expect(client.getStatus()).toBe('disconnected');
      expect(client.getPendingCount()).toBe(0);
    });
  });
});
