import { describe, it, expect, vi } from 'vitest';
import {
  VehicleStateSchema,
  JoinRequestSchema,
  LeaveNoticeSchema,
  MembershipSnapshotSchema,
  PlatoonMessageSchema,
  ConvoyConfigSchema,
  ControllerParamsSchema,
  ConnectionError,
  DisconnectedError,
  StaleDataError,
  VehicleHandleError,
  TypedEventEmitter,
  createLogger,
  describeRole,
  formatRelayAddress,
  joinMessage,
  leaveMessage,
  membersMessage,
  parseRelayAddress,
  stateMessage,
  toError,
  type VehicleState,
} from '../index.js';

const sampleState: VehicleState = {
  peerId: 'car-a',
  position: { x: 10, y: -15, z: 0.1 },
  velocity: { x: 5, y: 0, z: 0 },
  heading: 0,
  sequence: 3,
  timestamp: 1_700_000_000_000,
};

describe('@convoy/types', () => {
  // ─────────────────────────────────────────────────────────────────────
  // SCHEMAS
  // ─────────────────────────────────────────────────────────────────────

  describe('VehicleStateSchema', () => {
    it('validates a vehicle state', () => {
      expect(VehicleStateSchema.safeParse(sampleState).success).toBe(true);
    });

    it('accepts an optional control sample', () => {
      const result = VehicleStateSchema.safeParse({
        ...sampleState,
        control: { throttle: 0.4, brake: 0 },
      });
      expect(result.success).toBe(true);
    });

    it('rejects a negative sequence', () => {
      expect(VehicleStateSchema.safeParse({ ...sampleState, sequence: -1 }).success).toBe(false);
    });

    it('rejects a fractional sequence', () => {
      expect(VehicleStateSchema.safeParse({ ...sampleState, sequence: 1.5 }).success).toBe(false);
    });

    it('rejects out-of-range control values', () => {
      const result = VehicleStateSchema.safeParse({
        ...sampleState,
        control: { throttle: 1.2, brake: 0 },
      });
      expect(result.success).toBe(false);
    });

    it('rejects an empty peer id', () => {
      expect(VehicleStateSchema.safeParse({ ...sampleState, peerId: '' }).success).toBe(false);
    });
  });

  describe('Message payload schemas', () => {
    it('validates JoinRequest', () => {
      expect(JoinRequestSchema.safeParse({ requestingPeerId: 'car-b', timestamp: 1 }).success).toBe(true);
    });

    it('validates LeaveNotice with and without reason', () => {
      expect(LeaveNoticeSchema.safeParse({ peerId: 'car-b' }).success).toBe(true);
      expect(LeaveNoticeSchema.safeParse({ peerId: 'car-b', reason: 'peer-lost' }).success).toBe(true);
      expect(LeaveNoticeSchema.safeParse({ peerId: 'car-b', reason: 'crashed' }).success).toBe(false);
    });

    it('validates MembershipSnapshot', () => {
      const result = MembershipSnapshotSchema.safeParse({
        fromPeerId: 'car-a',
        members: ['car-a', 'car-b'],
        timestamp: 2,
      });
      expect(result.success).toBe(true);
    });
  });

  describe('PlatoonMessageSchema', () => {
    it('discriminates on type', () => {
      const result = PlatoonMessageSchema.safeParse({
        type: 'JOIN',
        payload: { requestingPeerId: 'car-c', timestamp: 5 },
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.type).toBe('JOIN');
      }
    });

    it('rejects a payload that does not match its type', () => {
      const result = PlatoonMessageSchema.safeParse({
        type: 'STATE',
        payload: { requestingPeerId: 'car-c', timestamp: 5 },
      });
      expect(result.success).toBe(false);
    });

    it('rejects unknown types', () => {
      expect(PlatoonMessageSchema.safeParse({ type: 'PING', payload: {} }).success).toBe(false);
    });
  });

  describe('message helpers', () => {
    it('builds each message kind', () => {
      expect(stateMessage(sampleState)).toEqual({ type: 'STATE', payload: sampleState });
      expect(joinMessage('car-b', 42)).toEqual({
        type: 'JOIN',
        payload: { requestingPeerId: 'car-b', timestamp: 42 },
      });
      expect(leaveMessage('car-b')).toEqual({
        type: 'LEAVE',
        payload: { peerId: 'car-b', reason: 'leave' },
      });
      expect(leaveMessage('car-b', 'peer-lost').payload).toEqual({ peerId: 'car-b', reason: 'peer-lost' });
    });

    it('copies the member list into snapshots', () => {
      const members = ['car-a', 'car-b'];
      const message = membersMessage('car-a', members, 7);
      members.push('car-c');
      expect(message).toEqual({
        type: 'MEMBERS',
        payload: { fromPeerId: 'car-a', members: ['car-a', 'car-b'], timestamp: 7 },
      });
    });

    it('produces messages that pass schema validation', () => {
      for (const message of [
        stateMessage(sampleState),
        joinMessage('car-b', 1),
        leaveMessage('car-b'),
        membersMessage('car-a', ['car-a'], 1),
      ]) {
        expect(PlatoonMessageSchema.safeParse(message).success).toBe(true);
      }
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // ROLES & ADDRESSES
  // ─────────────────────────────────────────────────────────────────────

  describe('describeRole', () => {
    it('describes each role', () => {
      expect(describeRole({ kind: 'detached' })).toBe('detached');
      expect(describeRole({ kind: 'leader' })).toBe('leader');
      expect(describeRole({ kind: 'follower', predecessorId: 'car-a', position: 1 })).toBe(
        'follower #1 behind car-a'
      );
    });
  });

  describe('parseRelayAddress', () => {
    it('parses host and port', () => {
      expect(parseRelayAddress('10.0.0.5:6000')).toEqual({ host: '10.0.0.5', port: 6000 });
    });

    it('defaults the host', () => {
      expect(parseRelayAddress(':6000')).toEqual({ host: '127.0.0.1', port: 6000 });
      expect(parseRelayAddress('6000')).toEqual({ host: '127.0.0.1', port: 6000 });
    });

    it('rejects bad ports', () => {
      expect(() => parseRelayAddress('relay:abc')).toThrow('Invalid relay address: relay:abc');
      expect(() => parseRelayAddress('relay:70000')).toThrow('Invalid relay address');
      expect(() => parseRelayAddress('relay:')).toThrow('Invalid relay address');
    });

    it('formats an address', () => {
      expect(formatRelayAddress({ host: 'relay', port: 52384 })).toBe('relay:52384');
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // CONFIG
  // ─────────────────────────────────────────────────────────────────────

  describe('ConvoyConfigSchema', () => {
    it('fills defaults from an empty object', () => {
      const config = ConvoyConfigSchema.parse({});
      expect(config.relay).toEqual({ host: '127.0.0.1', port: 52384 });
      expect(config.tickMs).toBe(50);
      expect(config.stalenessTimeoutMs).toBeUndefined();
      expect(config.peerLossTimeoutMs).toBe(2000);
      expect(config.reconnect).toEqual({ baseDelayMs: 500, maxDelayMs: 8000, maxRetries: 6 });
      expect(config.controller).toEqual({});
      expect(config.blueprint).toBe('sedan');
    });

    it('keeps partial controller overrides', () => {
      const config = ConvoyConfigSchema.parse({ controller: { targetGap: 12 } });
      expect(config.controller).toEqual({ targetGap: 12 });
    });

    it('rejects invalid controller values', () => {
      expect(ConvoyConfigSchema.safeParse({ controller: { failSafeBrake: 0 } }).success).toBe(false);
      expect(ControllerParamsSchema.partial().safeParse({ targetGap: -1 }).success).toBe(false);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // ERRORS
  // ─────────────────────────────────────────────────────────────────────

  describe('errors', () => {
    it('carries structured fields', () => {
      const cause = new Error('ECONNREFUSED');
      const conn = new ConnectionError('unreachable', { host: 'relay', port: 1 }, 3, { cause });
      expect(conn).toBeInstanceOf(Error);
      expect(conn.name).toBe('ConnectionError');
      expect(conn.attempts).toBe(3);
      expect(conn.cause).toBe(cause);

      expect(new DisconnectedError('gone', 6).attempts).toBe(6);

      const stale = new StaleDataError('car-a', 180);
      expect(stale.message).toBe('No state from predecessor car-a for 180ms');
      expect(stale.predecessorId).toBe('car-a');

      expect(new VehicleHandleError('actor destroyed').name).toBe('VehicleHandleError');
    });

    it('normalizes thrown values', () => {
      const err = new Error('x');
      expect(toError(err)).toBe(err);
      expect(toError('boom').message).toBe('boom');
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // LOGGER & EVENTS
  // ─────────────────────────────────────────────────────────────────────

  describe('createLogger', () => {
    it('prefixes messages', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      createLogger('Relay').warn('peer dropped', 'peer:1');
      expect(spy).toHaveBeenCalledWith('[Relay] peer dropped', 'peer:1');
      spy.mockRestore();
    });
  });

  describe('TypedEventEmitter', () => {
    it('delivers typed events', () => {
      const emitter = new TypedEventEmitter<{ gap: (meters: number) => void }>();
      const handler = vi.fn();
      emitter.on('gap', handler);
      emitter.emit('gap', 10);
      emitter.off('gap', handler);
      emitter.emit('gap', 11);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(10);
    });

    it('supports once', () => {
      const emitter = new TypedEventEmitter<{ tick: () => void }>();
      const handler = vi.fn();
      emitter.once('tick', handler);
      emitter.emit('tick');
      emitter.emit('tick');
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });
});
