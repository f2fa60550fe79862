/**
 * MessageRelay - broadcast hub every vehicle connects to.
 *
 * Accepts TCP connections and forwards each complete frame it reads from
 * one connection to every other connection, byte for byte. Frames are
 * never decoded: only the length prefix is read to find boundaries.
 *
 *   Vehicle A ──┐               ┌──▶ Vehicle B
 *               ├─▶ Relay ──────┤
 *   Vehicle C ──┘               └──▶ ...
 */

import net from 'node:net';
import { FrameCodec } from '@convoy/protocol';
import {
  DEFAULT_RELAY_HOST,
  DEFAULT_RELAY_PORT,
  TypedEventEmitter,
  createLogger,
  type Logger,
  type RelayAddress,
} from '@convoy/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_MAX_BUFFERED_BYTES_PER_PEER = 1024 * 1024;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface RelayOptions {
  host?: string;
  /** 0 picks an ephemeral port */
  port?: number;
  /** Unsent backlog after which a slow peer is disconnected */
  maxBufferedBytesPerPeer?: number;
}

export interface RelayPeer {
  id: string;
  remoteAddr: string;
  connectedAt: Date;
  framesReceived: number;
}

export type PeerDropReason =
  | 'closed'
  | 'protocol_error'
  | 'backpressure'
  | 'write_failed'
  | 'relay_stopped'
  | 'socket_error';

export interface RelayEvents {
  started: (address: RelayAddress) => void;
  stopped: () => void;
  peerConnected: (peer: RelayPeer) => void;
  peerDisconnected: (peerId: string, reason: PeerDropReason) => void;
  forwarded: (fromPeerId: string, recipients: number, bytes: number) => void;
  error: (payload: { peerId?: string; error: unknown }) => void;
}

interface InternalPeer extends RelayPeer {
  socket: net.Socket;
  pending: Buffer;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class MessageRelay extends TypedEventEmitter<RelayEvents> {
  private readonly log: Logger;
  private readonly host: string;
  private readonly port: number;
  private readonly maxBufferedBytesPerPeer: number;
  private readonly codec = new FrameCodec();

  private server: net.Server | null = null;
  private address: RelayAddress | null = null;
  private peers = new Map<string, InternalPeer>();
  private nextPeerNumber = 0;

  constructor(options?: RelayOptions, logger?: Logger) {
    super();
    this.log = logger ?? createLogger('Relay');
    this.host = options?.host ?? DEFAULT_RELAY_HOST;
    this.port = options?.port ?? DEFAULT_RELAY_PORT;
    this.maxBufferedBytesPerPeer =
      options?.maxBufferedBytesPerPeer ?? DEFAULT_MAX_BUFFERED_BYTES_PER_PEER;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  async start(): Promise<RelayAddress> {
    if (this.server) {
      throw new Error('Relay already running');
    }

    const server = net.createServer((socket) => this.handleConnection(socket));
    this.server = server;

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error) => {
          server.off('listening', onListening);
          reject(error);
        };
        const onListening = () => {
          server.off('error', onError);
          resolve();
        };
        server.once('error', onError);
        server.once('listening', onListening);
        server.listen(this.port, this.host);
      });
    } catch (error) {
      this.server = null;
      throw error;
    }

    server.on('error', (error) => this.emitError({ error }));

    const bound = server.address();
    const port = bound !== null && typeof bound === 'object' ? bound.port : this.port;
    this.address = { host: this.host, port };

    this.log.info(`Listening on ${this.host}:${port}`);
    this.emit('started', { ...this.address });
    return { ...this.address };
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const peer of Array.from(this.peers.values())) {
      this.dropPeer(peer, 'relay_stopped');
    }

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          this.log.warn(`Listener close: ${error.message}`);
        }
        resolve();
      });
    });

    this.address = null;
    this.log.info('Stopped');
    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getAddress(): RelayAddress | null {
    return this.address ? { ...this.address } : null;
  }

  getPeers(): RelayPeer[] {
    return Array.from(this.peers.values()).map(toPublicPeer);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - CONNECTIONS
  // ─────────────────────────────────────────────────────────────────────────

  private handleConnection(socket: net.Socket): void {
    this.nextPeerNumber++;
    const peer: InternalPeer = {
      id: `peer:${this.nextPeerNumber}`,
      remoteAddr: `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`,
      connectedAt: new Date(),
      framesReceived: 0,
      socket,
      pending: Buffer.alloc(0),
    };

    socket.setNoDelay(true);
    this.peers.set(peer.id, peer);

    socket.on('data', (chunk: Buffer) => this.handleData(peer, chunk));
    socket.on('error', (error) => {
      this.log.debug(`Socket error on ${peer.id}: ${error.message}`);
      this.dropPeer(peer, 'socket_error');
    });
    socket.on('close', () => this.dropPeer(peer, 'closed'));

    this.log.info(`Peer ${peer.id} connected from ${peer.remoteAddr}`);
    this.emit('peerConnected', toPublicPeer(peer));
  }

  private dropPeer(peer: InternalPeer, reason: PeerDropReason): void {
    if (!this.peers.delete(peer.id)) return;

    peer.socket.destroy();
    peer.pending = Buffer.alloc(0);
    this.log.info(`Peer ${peer.id} disconnected (${reason})`);
    this.emit('peerDisconnected', peer.id, reason);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - FAN-OUT
  // ─────────────────────────────────────────────────────────────────────────

  private handleData(peer: InternalPeer, chunk: Buffer): void {
    if (!this.peers.has(peer.id)) return;

    const stream = peer.pending.length === 0 ? chunk : Buffer.concat([peer.pending, chunk]);
    let frames: Buffer[];
    try {
      const split = this.codec.splitFrames(stream);
      frames = split.frames;
      peer.pending = Buffer.from(split.remaining);
    } catch (error) {
      this.emitError({ peerId: peer.id, error });
      this.dropPeer(peer, 'protocol_error');
      return;
    }

    for (const frame of frames) {
      peer.framesReceived++;
      this.fanOut(peer, frame);
    }
  }

  private fanOut(from: InternalPeer, frame: Buffer): void {
    const copy = Buffer.from(frame);
    let recipients = 0;

    for (const target of Array.from(this.peers.values())) {
      if (target.id === from.id || !target.socket.writable) continue;

      if (target.socket.writableLength + copy.length > this.maxBufferedBytesPerPeer) {
        this.log.warn(
          `Peer ${target.id} backlog exceeds ${this.maxBufferedBytesPerPeer} bytes, disconnecting`
        );
        this.dropPeer(target, 'backpressure');
        continue;
      }

      try {
        target.socket.write(copy);
        recipients++;
      } catch (error) {
        this.emitError({ peerId: target.id, error });
        this.dropPeer(target, 'write_failed');
      }
    }

    this.emit('forwarded', from.id, recipients, copy.length);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - ERROR HANDLING
  // ─────────────────────────────────────────────────────────────────────────

  private emitError(payload: { peerId?: string; error: unknown }): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', payload);
      return;
    }

    const errorMessage = payload.error instanceof Error ? payload.error.message : String(payload.error);
    const peerInfo = payload.peerId ? ` peer=${payload.peerId}` : '';
    this.log.error(`error:${peerInfo} ${errorMessage}`);
  }
}

function toPublicPeer(peer: InternalPeer): RelayPeer {
  return {
    id: peer.id,
    remoteAddr: peer.remoteAddr,
    connectedAt: peer.connectedAt,
    framesReceived: peer.framesReceived,
  };
}
