import { z } from 'zod';
import { EventEmitter } from 'events';

// ═══════════════════════════════════════════════════════════════════════════
// VEHICLE MODEL
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Platoon member identifier. Unique per vehicle process, assigned on first join.
 */
export type PeerId = string;

export const Vec3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});
export type Vec3 = z.infer<typeof Vec3Schema>;

/**
 * Throttle/brake pair a vehicle applied on its previous tick.
 */
export const ControlSampleSchema = z.object({
  throttle: z.number().min(0).max(1),
  brake: z.number().min(0).max(1),
});
export type ControlSample = z.infer<typeof ControlSampleSchema>;

/**
 * State a vehicle broadcasts about itself once per tick.
 */
export const VehicleStateSchema = z.object({
  peerId: z.string().min(1),
  /** World position in metres */
  position: Vec3Schema,
  /** Velocity vector in m/s */
  velocity: Vec3Schema,
  /** Yaw in radians, counter-clockwise from +x */
  heading: z.number(),
  /** Strictly increasing per sender */
  sequence: z.number().int().nonnegative(),
  /** Sender wall clock (ms since epoch) */
  timestamp: z.number(),
  control: ControlSampleSchema.optional(),
});
export type VehicleState = z.infer<typeof VehicleStateSchema>;

/**
 * Output of the gap-keeping controller. Throttle and brake are never both > 0.
 */
export interface ControlCommand {
  throttle: number;
  brake: number;
  steer: number;
}

/**
 * What a vehicle handle reports about itself.
 */
export interface VehicleKinematics {
  position: Vec3;
  velocity: Vec3;
  heading: number;
  timestamp: number;
}

/**
 * Abstract vehicle provided by the simulation collaborator.
 */
export interface VehicleHandle {
  readonly id: string;
  /** Bumper to bumper, metres. Followers subtract it from centre distances. */
  readonly length?: number;
  getState(): VehicleKinematics;
  applyControl(throttle: number, brake: number, steer: number): void;
}

export interface VehicleSpawner<B extends string = string> {
  spawn(blueprint: B, location: Vec3, heading?: number): VehicleHandle;
}

// ═══════════════════════════════════════════════════════════════════════════
// PLATOON MESSAGE PROTOCOL
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Namespace carried by every platoon frame on the wire.
 */
export const PLATOON_NAMESPACE = 'platoon';

export const PLATOON_MESSAGE_TYPES = {
  STATE: 'STATE',
  JOIN: 'JOIN',
  LEAVE: 'LEAVE',
  MEMBERS: 'MEMBERS',
} as const;

export type PlatoonMessageType = (typeof PLATOON_MESSAGE_TYPES)[keyof typeof PLATOON_MESSAGE_TYPES];

export const JoinRequestSchema = z.object({
  requestingPeerId: z.string().min(1),
  timestamp: z.number(),
});
export type JoinRequest = z.infer<typeof JoinRequestSchema>;

export const LeaveReasonSchema = z.enum(['leave', 'peer-lost']);
export type LeaveReason = z.infer<typeof LeaveReasonSchema>;

export const LeaveNoticeSchema = z.object({
  peerId: z.string().min(1),
  reason: LeaveReasonSchema.optional(),
});
export type LeaveNotice = z.infer<typeof LeaveNoticeSchema>;

/**
 * Membership view sent by the leader when a peer joins, so late
 * joiners can pick up the chain they never saw form.
 */
export const MembershipSnapshotSchema = z.object({
  fromPeerId: z.string().min(1),
  members: z.array(z.string().min(1)),
  timestamp: z.number(),
});
export type MembershipSnapshot = z.infer<typeof MembershipSnapshotSchema>;

export const PlatoonMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal(PLATOON_MESSAGE_TYPES.STATE), payload: VehicleStateSchema }),
  z.object({ type: z.literal(PLATOON_MESSAGE_TYPES.JOIN), payload: JoinRequestSchema }),
  z.object({ type: z.literal(PLATOON_MESSAGE_TYPES.LEAVE), payload: LeaveNoticeSchema }),
  z.object({ type: z.literal(PLATOON_MESSAGE_TYPES.MEMBERS), payload: MembershipSnapshotSchema }),
]);
export type PlatoonMessage = z.infer<typeof PlatoonMessageSchema>;

export function stateMessage(state: VehicleState): PlatoonMessage {
  return { type: 'STATE', payload: state };
}

export function joinMessage(requestingPeerId: PeerId, timestamp: number = Date.now()): PlatoonMessage {
  return { type: 'JOIN', payload: { requestingPeerId, timestamp } };
}

export function leaveMessage(peerId: PeerId, reason: LeaveReason = 'leave'): PlatoonMessage {
  return { type: 'LEAVE', payload: { peerId, reason } };
}

export function membersMessage(
  fromPeerId: PeerId,
  members: readonly PeerId[],
  timestamp: number = Date.now()
): PlatoonMessage {
  return { type: 'MEMBERS', payload: { fromPeerId, members: [...members], timestamp } };
}

// ═══════════════════════════════════════════════════════════════════════════
// ROLES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Role derived from the local position in the membership.
 * - detached: not a member
 * - leader: index 0, regulates to target speed only
 * - follower: tracks the member immediately ahead
 */
export type PlatoonRole =
  | { kind: 'detached' }
  | { kind: 'leader' }
  | { kind: 'follower'; predecessorId: PeerId; position: number };

/**
 * Latest state received from the current predecessor.
 * `receivedAt` is the local receipt time, or the re-link time while `state` is null.
 */
export interface PredecessorTrack {
  predecessorId: PeerId;
  state: VehicleState | null;
  receivedAt: number;
}

export function describeRole(role: PlatoonRole): string {
  switch (role.kind) {
    case 'detached':
      return 'detached';
    case 'leader':
      return 'leader';
    case 'follower':
      return `follower #${role.position} behind ${role.predecessorId}`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// RELAY ADDRESS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_RELAY_HOST = '127.0.0.1';
export const DEFAULT_RELAY_PORT = 52384;

export interface RelayAddress {
  host: string;
  port: number;
}

/**
 * Parse `host:port`, `:port` or `port` into a relay address.
 */
export function parseRelayAddress(value: string): RelayAddress {
  const trimmed = value.trim();
  const separator = trimmed.lastIndexOf(':');
  const host = separator > 0 ? trimmed.slice(0, separator) : DEFAULT_RELAY_HOST;
  const portText = separator >= 0 ? trimmed.slice(separator + 1) : trimmed;
  const port = Number(portText);

  if (portText === '' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid relay address: ${value}`);
  }
  return { host, port };
}

export function formatRelayAddress(address: RelayAddress): string {
  return `${address.host}:${address.port}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════════════════

export const ControllerParamsSchema = z.object({
  targetGap: z.number().positive(),
  targetSpeed: z.number().nonnegative(),
  kp: z.number().nonnegative(),
  kd: z.number().nonnegative(),
  maxAcceleration: z.number().positive(),
  maxDeceleration: z.number().positive(),
  headingGain: z.number().nonnegative(),
  lateralGain: z.number().nonnegative(),
  failSafeBrake: z.number().gt(0).max(1),
  minSafeGap: z.number().nonnegative(),
  fullStopHysteresis: z.number().nonnegative(),
  maxGapError: z.number().positive(),
  relativeSpeedSmoothing: z.number().gt(0).max(1),
  brakeMirrorGain: z.number().min(0).max(1),
  vehicleLength: z.number().nonnegative(),
});
export type ControllerParams = z.infer<typeof ControllerParamsSchema>;

/**
 * Shape of convoy.config.json. Everything is optional; omitted
 * values fall back to library defaults.
 */
export const ConvoyConfigSchema = z.object({
  relay: z
    .object({
      host: z.string().default(DEFAULT_RELAY_HOST),
      port: z.number().int().min(0).max(65535).default(DEFAULT_RELAY_PORT),
    })
    .default({}),
  /** Control loop period */
  tickMs: z.number().int().positive().default(50),
  /** Predecessor silence before fail-safe (defaults to 3 ticks) */
  stalenessTimeoutMs: z.number().int().positive().optional(),
  /** Predecessor silence before it is evicted from the platoon (0 disables) */
  peerLossTimeoutMs: z.number().int().nonnegative().default(2000),
  reconnect: z
    .object({
      baseDelayMs: z.number().int().positive().default(500),
      maxDelayMs: z.number().int().positive().default(8000),
      maxRetries: z.number().int().nonnegative().default(6),
    })
    .default({}),
  controller: ControllerParamsSchema.partial().default({}),
  blueprint: z.string().default('sedan'),
});
export type ConvoyConfig = z.infer<typeof ConvoyConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Relay unreachable, or the handshake did not complete in time.
 */
export class ConnectionError extends Error {
  override readonly name = 'ConnectionError';

  constructor(
    message: string,
    readonly address: RelayAddress,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Connection lost mid-session and reconnect attempts ran out.
 */
export class DisconnectedError extends Error {
  override readonly name = 'DisconnectedError';

  constructor(message: string, readonly attempts: number) {
    super(message);
  }
}

/**
 * Predecessor silent for longer than the staleness window. Never fatal.
 */
export class StaleDataError extends Error {
  override readonly name = 'StaleDataError';

  constructor(readonly predecessorId: PeerId, readonly silentForMs: number) {
    super(`No state from predecessor ${predecessorId} for ${silentForMs}ms`);
  }
}

/**
 * The simulation no longer accepts calls on a vehicle (e.g. actor destroyed).
 */
export class VehicleHandleError extends Error {
  override readonly name = 'VehicleHandleError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Malformed frame or payload on the wire.
 */
export class ProtocolError extends Error {
  override readonly name = 'ProtocolError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Simple logger interface. Consumers can provide their own logger.
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger with a prefix tag.
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[${prefix}] ${msg}`, ...args),
    debug: (msg, ...args) => console.log(`[${prefix}] ${msg}`, ...args),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPED EVENT EMITTER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Type-safe EventEmitter. Extend with an event map to get typed on/off/once/emit.
 *
 * Usage: `class Foo extends TypedEventEmitter<{ myEvent: (x: number) => void }>`
 */
export class TypedEventEmitter<
  Events extends {} = {},
> extends EventEmitter {
  override on<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.on(event, listener);
  }

  override once<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.once(event, listener);
  }

  override off<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends string & keyof Events>(
    event: K,
    ...args: Events[K] extends (...args: infer A) => any ? A : never
  ): boolean {
    return super.emit(event, ...args);
  }
}
