/**
 * PeerClient - one vehicle's connection to the message relay.
 *
 * Owns a TCP socket to the relay, a FIFO send queue and the inbound
 * message stream. Reconnects on its own after a transport failure and
 * keeps queueing outbound messages while the link is down.
 *
 * Architecture:
 *   VehicleSession (tick loop)
 *       |
 *   PlatoonProtocolEngine
 *       |
 *   PeerClient  <- This layer
 *       |
 *   MessageRelay (TCP)
 */

import net from 'node:net';
import { FrameCodec, encodePlatoonMessage, parsePlatoonMessage } from '@convoy/protocol';
import {
  ConnectionError,
  DisconnectedError,
  TypedEventEmitter,
  createLogger,
  formatRelayAddress,
  toError,
  type Logger,
  type PlatoonMessage,
  type RelayAddress,
} from '@convoy/types';
import { InboundStream } from './inbound-stream.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_CONNECT_TIMEOUT_MS = 3000;
const DEFAULT_CLOSE_TIMEOUT_MS = 1000;
const DEFAULT_MAX_PENDING_MESSAGES = 256;
const DEFAULT_MAX_BUFFERED_INBOUND = 4096;

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  baseDelayMs: 500,
  maxDelayMs: 8000,
  maxRetries: 6,
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type PeerClientStatus = 'idle' | 'connecting' | 'connected' | 'reconnecting' | 'disconnected';

export interface ReconnectPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  maxRetries: number;
}

export interface PeerClientOptions {
  codec?: FrameCodec;
  connectTimeoutMs?: number;
  closeTimeoutMs?: number;
  reconnect?: Partial<ReconnectPolicy>;
  /** Apply the reconnect policy to the first connect() as well */
  retryInitialConnect?: boolean;
  maxPendingMessages?: number;
  maxBufferedInbound?: number;
}

export interface PeerClientEvents {
  connected: (address: RelayAddress) => void;
  connectionLost: (reason: string) => void;
  reconnecting: (attempt: number, delayMs: number) => void;
  reconnected: () => void;
  /** `error` is set when retries ran out, absent after disconnect() */
  disconnected: (error?: DisconnectedError) => void;
  message: (message: PlatoonMessage) => void;
  error: (error: Error) => void;
}

/**
 * What the session needs from a relay connection. Implemented by
 * PeerClient; tests substitute an in-process fake.
 */
export interface IPeerClient extends TypedEventEmitter<PeerClientEvents> {
  connect(address: RelayAddress): Promise<void>;
  send(message: PlatoonMessage): boolean;
  receive(): AsyncIterableIterator<PlatoonMessage>;
  flush(): Promise<void>;
  disconnect(): Promise<void>;
  getStatus(): PeerClientStatus;
}

/**
 * Backoff before reconnect attempt `attempt` (1-based).
 */
export function reconnectDelay(attempt: number, policy: Pick<ReconnectPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class PeerClient extends TypedEventEmitter<PeerClientEvents> implements IPeerClient {
  private readonly log: Logger;
  private readonly codec: FrameCodec;
  private readonly connectTimeoutMs: number;
  private readonly closeTimeoutMs: number;
  private readonly policy: ReconnectPolicy;
  private readonly retryInitialConnect: boolean;
  private readonly maxPendingMessages: number;
  private readonly maxBufferedInbound: number;

  private status: PeerClientStatus = 'idle';
  private address: RelayAddress | null = null;
  private socket: net.Socket | null = null;
  private inboundBytes = Buffer.alloc(0);
  private stream: InboundStream<PlatoonMessage> | null = null;
  private closing = false;

  private queue: Buffer[] = [];
  private writeBlocked = false;
  private flushWaiters: Array<() => void> = [];

  private reconnectAttempt = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private wakeRetry: (() => void) | null = null;

  constructor(options?: PeerClientOptions, logger?: Logger) {
    super();
    this.log = logger ?? createLogger('PeerClient');
    this.codec = options?.codec ?? new FrameCodec();
    this.connectTimeoutMs = options?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.closeTimeoutMs = options?.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options?.reconnect };
    this.retryInitialConnect = options?.retryInitialConnect ?? false;
    this.maxPendingMessages = options?.maxPendingMessages ?? DEFAULT_MAX_PENDING_MESSAGES;
    this.maxBufferedInbound = options?.maxBufferedInbound ?? DEFAULT_MAX_BUFFERED_INBOUND;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  async connect(address: RelayAddress): Promise<void> {
    if (this.status === 'connecting' || this.status === 'connected' || this.status === 'reconnecting') {
      throw new Error(`PeerClient already ${this.status}`);
    }

    this.address = { ...address };
    this.closing = false;
    this.reconnectAttempt = 0;
    this.queue = [];
    if (!this.stream || this.stream.isEnded) {
      this.stream = this.createStream();
    }
    this.setStatus('connecting');

    const target = formatRelayAddress(address);
    for (let attempt = 1; ; attempt++) {
      try {
        const socket = await this.openSocket(address);
        if (this.closing) {
          socket.destroy();
          throw new Error('disconnect() called while connecting');
        }
        this.attach(socket);
        this.setStatus('connected');
        this.log.info(`Connected to relay at ${target}`);
        this.emit('connected', { ...address });
        this.pumpQueue();
        return;
      } catch (cause) {
        const retry = this.retryInitialConnect && attempt <= this.policy.maxRetries && !this.closing;
        if (!retry) {
          this.setStatus('disconnected');
          this.stream?.end();
          throw new ConnectionError(`Cannot reach relay at ${target}: ${toError(cause).message}`, address, attempt, {
            cause,
          });
        }
        const delayMs = reconnectDelay(attempt, this.policy);
        this.log.warn(`Relay at ${target} unreachable, retrying in ${delayMs}ms (attempt ${attempt})`);
        this.emit('reconnecting', attempt, delayMs);
        await this.waitBeforeRetry(delayMs);
        if (this.closing) {
          this.stream?.end();
          throw new ConnectionError(`Cannot reach relay at ${target}: disconnect() called while retrying`, address, attempt);
        }
      }
    }
  }

  async disconnect(): Promise<void> {
    if (this.status === 'idle' || this.status === 'disconnected') {
      this.stream?.end();
      return;
    }

    this.closing = true;
    this.cancelReconnect();

    const socket = this.socket;
    if (socket && this.status === 'connected') {
      await this.flush();
      await this.closeSocket(socket);
    } else if (socket) {
      socket.destroy();
    }

    this.socket = null;
    this.queue = [];
    this.resolveFlushWaiters();
    this.setStatus('disconnected');
    this.stream?.end();
    this.log.info('Disconnected from relay');
    this.emit('disconnected');
  }

  getStatus(): PeerClientStatus {
    return this.status;
  }

  getPendingCount(): number {
    return this.queue.length;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // MESSAGING
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Queue a message for the relay. Returns false if the client is not
   * connected and will not reconnect.
   */
  send(message: PlatoonMessage): boolean {
    if (this.status === 'idle' || this.status === 'disconnected') {
      this.log.debug(`Dropping ${message.type}: client ${this.status}`);
      return false;
    }

    this.queue.push(encodePlatoonMessage(this.codec, message));
    if (this.queue.length > this.maxPendingMessages) {
      this.queue.shift();
      this.log.warn(`Send queue over ${this.maxPendingMessages} messages, dropped the oldest`);
    }

    this.pumpQueue();
    return true;
  }

  /**
   * Resolves once every queued message has been handed to the socket.
   */
  flush(): Promise<void> {
    if (this.queue.length === 0 || this.status === 'idle' || this.status === 'disconnected') {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.flushWaiters.push(resolve));
  }

  /**
   * Inbound messages in relay order. Survives reconnects; ends on
   * disconnect() or when retries run out.
   */
  receive(): AsyncIterableIterator<PlatoonMessage> {
    if (!this.stream) {
      this.stream = this.createStream();
    }
    return this.stream;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - SOCKET
  // ─────────────────────────────────────────────────────────────────────────

  private openSocket(address: RelayAddress): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host: address.host, port: address.port });

      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new Error(`Connect timeout after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      const onConnect = () => {
        cleanup();
        resolve(socket);
      };

      const onError = (error: Error) => {
        cleanup();
        socket.destroy();
        reject(error);
      };

      const cleanup = () => {
        clearTimeout(timer);
        socket.off('connect', onConnect);
        socket.off('error', onError);
      };

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;
    this.inboundBytes = Buffer.alloc(0);
    this.writeBlocked = false;
    socket.setNoDelay(true);

    socket.on('data', (chunk: Buffer) => this.handleData(socket, chunk));
    socket.on('drain', () => {
      this.writeBlocked = false;
      this.pumpQueue();
    });
    socket.on('error', (error) => {
      this.log.debug(`Socket error: ${error.message}`);
    });
    socket.on('close', () => this.handleClose(socket));
  }

  private closeSocket(socket: net.Socket): Promise<void> {
    if (socket.destroyed) return Promise.resolve();

    return new Promise((resolve) => {
      const timer = setTimeout(() => socket.destroy(), this.closeTimeoutMs);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.end();
    });
  }

  private handleClose(socket: net.Socket): void {
    if (this.socket !== socket) return;
    this.socket = null;
    this.writeBlocked = false;

    if (this.closing) return;

    this.log.warn('Connection to relay lost');
    this.emit('connectionLost', 'socket_closed');
    this.scheduleReconnect();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - QUEUES
  // ─────────────────────────────────────────────────────────────────────────

  private pumpQueue(): void {
    const socket = this.socket;
    if (!socket || this.writeBlocked || this.status !== 'connected') return;

    while (this.queue.length > 0) {
      const [frame] = this.queue.splice(0, 1);
      if (!socket.write(frame)) {
        this.writeBlocked = true;
        break;
      }
    }

    if (this.queue.length === 0) {
      this.resolveFlushWaiters();
    }
  }

  private resolveFlushWaiters(): void {
    for (const resolve of this.flushWaiters.splice(0)) {
      resolve();
    }
  }

  private handleData(socket: net.Socket, chunk: Buffer): void {
    const bytes = this.inboundBytes.length === 0 ? chunk : Buffer.concat([this.inboundBytes, chunk]);
    let frames: Buffer[];
    try {
      const split = this.codec.splitFrames(bytes);
      frames = split.frames;
      this.inboundBytes = Buffer.from(split.remaining);
    } catch (error) {
      this.emitError(toError(error));
      this.inboundBytes = Buffer.alloc(0);
      socket.destroy();
      return;
    }

    for (const frame of frames) {
      let message: PlatoonMessage | null;
      try {
        message = parsePlatoonMessage(this.codec.decodeFrame(frame));
      } catch (error) {
        this.log.warn(`Skipping invalid frame: ${toError(error).message}`);
        continue;
      }
      if (message === null) continue;

      this.emit('message', message);
      this.stream?.push(message);
    }
  }

  private createStream(): InboundStream<PlatoonMessage> {
    return new InboundStream<PlatoonMessage>(this.maxBufferedInbound, (dropped) => {
      this.log.warn(`Inbound stream over ${this.maxBufferedInbound} messages, ${dropped} dropped so far`);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - RECONNECTION
  // ─────────────────────────────────────────────────────────────────────────

  private scheduleReconnect(): void {
    const address = this.address;
    if (!address || this.closing) return;

    this.reconnectAttempt++;
    if (this.reconnectAttempt > this.policy.maxRetries) {
      this.giveUp(address);
      return;
    }

    const attempt = this.reconnectAttempt;
    const delayMs = reconnectDelay(attempt, this.policy);
    this.setStatus('reconnecting');
    this.log.info(`Reconnecting in ${delayMs}ms (attempt ${attempt})`);
    this.emit('reconnecting', attempt, delayMs);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.openSocket(address)
        .then((socket) => {
          if (this.closing) {
            socket.destroy();
            return;
          }
          this.attach(socket);
          this.reconnectAttempt = 0;
          this.setStatus('connected');
          this.log.info(`Reconnected to relay at ${formatRelayAddress(address)}`);
          this.emit('reconnected');
          this.pumpQueue();
        })
        .catch((err: unknown) => {
          this.log.warn(`Reconnect attempt ${attempt} failed: ${toError(err).message}`);
          this.scheduleReconnect();
        });
    }, delayMs);
  }

  /**
   * Pause between initial connect attempts. cancelReconnect() ends it early.
   */
  private waitBeforeRetry(delayMs: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeRetry = resolve;
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        this.wakeRetry = null;
        resolve();
      }, delayMs);
    });
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.wakeRetry?.();
    this.wakeRetry = null;
  }

  private giveUp(address: RelayAddress): void {
    const attempts = this.policy.maxRetries;
    const error = new DisconnectedError(
      `Lost relay at ${formatRelayAddress(address)}; ${attempts} reconnect attempts failed`,
      attempts
    );

    this.queue = [];
    this.resolveFlushWaiters();
    this.setStatus('disconnected');
    this.stream?.end();
    this.log.error(error.message);
    this.emit('disconnected', error);
  }

  private setStatus(status: PeerClientStatus): void {
    if (this.status !== status) {
      this.log.debug(`Status ${this.status} -> ${status}`);
      this.status = status;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - ERROR HANDLING
  // ─────────────────────────────────────────────────────────────────────────

  private emitError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
      return;
    }
    this.log.error(`error: ${error.message}`);
  }
}
