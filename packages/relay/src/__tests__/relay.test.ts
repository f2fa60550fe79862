import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import net from 'node:net';
import { once } from 'node:events';
import { FrameCodec, HEADER_SIZE, MAX_MESSAGE_SIZE } from '@convoy/protocol';
import { MessageRelay } from '../index.js';

const quietLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

const codec = new FrameCodec();

interface RawPeer {
  socket: net.Socket;
  frames: Buffer[];
}

async function connectRaw(relay: MessageRelay, expectedPeers: number): Promise<RawPeer> {
  const address = relay.getAddress();
  if (!address) throw new Error('relay not started');

  const socket = net.connect({ host: address.host, port: address.port });
  const frames: Buffer[] = [];
  let pending = Buffer.alloc(0);
  socket.on('data', (chunk: Buffer) => {
    const split = codec.splitFrames(Buffer.concat([pending, chunk]));
    frames.push(...split.frames.map((frame) => Buffer.from(frame)));
    pending = Buffer.from(split.remaining);
  });
  socket.on('error', () => {});
  await once(socket, 'connect');
  await vi.waitFor(() => expect(relay.getPeers()).toHaveLength(expectedPeers));
  return { socket, frames };
}

function frameFor(sequence: number): Buffer {
  return codec.encode({ namespace: 'platoon', type: 'STATE', payload: { sequence } });
}

function sequenceOf(frame: Buffer): unknown {
  const message = codec.decodeFrame(frame);
  const payload = message.payload;
  return typeof payload === 'object' && payload !== null && 'sequence' in payload
    ? payload.sequence
    : undefined;
}

describe('@convoy/relay', () => {
  let relay: MessageRelay;
  const sockets: net.Socket[] = [];

  beforeEach(async () => {
    relay = new MessageRelay({ host: '127.0.0.1', port: 0 }, quietLogger);
    await relay.start();
  });

  afterEach(async () => {
    for (const socket of sockets.splice(0)) socket.destroy();
    await relay.stop();
  });

  async function join(): Promise<RawPeer> {
    const peer = await connectRaw(relay, relay.getPeers().length + 1);
    sockets.push(peer.socket);
    return peer;
  }

  // ─────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────

  describe('lifecycle', () => {
    it('binds an ephemeral port', () => {
      const address = relay.getAddress();
      expect(address?.host).toBe('127.0.0.1');
      expect(address?.port).toBeGreaterThan(0);
      expect(relay.isRunning()).toBe(true);
    });

    it('refuses to start twice', async () => {
      await expect(relay.start()).rejects.toThrow('Relay already running');
    });

    it('rejects when the port is taken', async () => {
      const address = relay.getAddress();
      const other = new MessageRelay({ host: '127.0.0.1', port: address?.port ?? 0 }, quietLogger);
      await expect(other.start()).rejects.toThrow();
      expect(other.isRunning()).toBe(false);
    });

    it('closes peer connections on stop', async () => {
      const a = await join();
      const closed = once(a.socket, 'close');
      const stopped = vi.fn();
      relay.on('stopped', stopped);

      await relay.stop();
      await closed;

      expect(stopped).toHaveBeenCalledTimes(1);
      expect(relay.isRunning()).toBe(false);
      expect(relay.getAddress()).toBeNull();
      expect(relay.getPeers()).toEqual([]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // Fan-out
  // ─────────────────────────────────────────────────────────────────────

  describe('fan-out', () => {
    it('forwards byte-identical copies to everyone but the sender', async () => {
      const a = await join();
      const b = await join();
      const c = await join();
      const frame = frameFor(1);

      a.socket.write(frame);

      await vi.waitFor(() => {
        expect(b.frames).toHaveLength(1);
        expect(c.frames).toHaveLength(1);
      });
      expect(b.frames[0].equals(frame)).toBe(true);
      expect(c.frames[0].equals(frame)).toBe(true);
      expect(a.frames).toHaveLength(0);
    });

    it('preserves per-sender order across split writes', async () => {
      const a = await join();
      const b = await join();
      const stream = Buffer.concat(Array.from({ length: 20 }, (_, i) => frameFor(i)));

      a.socket.write(stream.subarray(0, 13));
      a.socket.write(stream.subarray(13, 200));
      a.socket.write(stream.subarray(200));

      await vi.waitFor(() => expect(b.frames).toHaveLength(20));
      expect(b.frames.map(sequenceOf)).toEqual(Array.from({ length: 20 }, (_, i) => i));
    });

    it('reports each forwarded frame', async () => {
      const a = await join();
      await join();
      await join();
      const forwarded = vi.fn();
      relay.on('forwarded', forwarded);
      const frame = frameFor(7);

      a.socket.write(frame);

      await vi.waitFor(() => expect(forwarded).toHaveBeenCalledTimes(1));
      const [peerA] = relay.getPeers();
      expect(forwarded).toHaveBeenCalledWith(peerA.id, 2, frame.length);
      expect(peerA.framesReceived).toBe(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // Failures
  // ─────────────────────────────────────────────────────────────────────

  describe('failures', () => {
    it('keeps delivering when one peer goes away abruptly', async () => {
      const a = await join();
      const b = await join();
      const c = await join();
      const [, , peerC] = relay.getPeers();
      const dropped = vi.fn();
      relay.on('peerDisconnected', dropped);

      c.socket.destroy();
      a.socket.write(frameFor(1));
      a.socket.write(frameFor(2));

      await vi.waitFor(() => expect(b.frames).toHaveLength(2));
      await vi.waitFor(() => expect(relay.getPeers()).toHaveLength(2));
      expect(dropped).toHaveBeenCalledWith(peerC.id, expect.any(String));
    });

    it('drops a peer whose backlog exceeds the limit', async () => {
      await relay.stop();
      relay = new MessageRelay({ host: '127.0.0.1', port: 0, maxBufferedBytesPerPeer: 8 }, quietLogger);
      await relay.start();

      const a = await join();
      await join();
      const [, peerB] = relay.getPeers();
      const dropped = vi.fn();
      relay.on('peerDisconnected', dropped);

      a.socket.write(frameFor(1));

      await vi.waitFor(() => expect(dropped).toHaveBeenCalledWith(peerB.id, 'backpressure'));
      expect(relay.getPeers()).toHaveLength(1);
    });

    it('disconnects a sender that announces an oversized frame', async () => {
      const a = await join();
      const b = await join();
      const [peerA] = relay.getPeers();
      const errors = vi.fn();
      const dropped = vi.fn();
      relay.on('error', errors);
      relay.on('peerDisconnected', dropped);

      const header = Buffer.alloc(HEADER_SIZE);
      header.writeUInt32BE(MAX_MESSAGE_SIZE + 1, 0);
      a.socket.write(header);

      await vi.waitFor(() => expect(dropped).toHaveBeenCalledWith(peerA.id, 'protocol_error'));
      expect(errors).toHaveBeenCalledWith(expect.objectContaining({ peerId: peerA.id }));
      expect(b.frames).toHaveLength(0);
      expect(relay.getPeers()).toHaveLength(1);
    });

    it('synthesizes nothing when a peer leaves', async () => {
      const a = await join();
      const b = await join();

      b.socket.end();

      await vi.waitFor(() => expect(relay.getPeers()).toHaveLength(1));
      expect(a.frames).toHaveLength(0);
    });
  });
});
