/**
 * GapController - turns role, own state and predecessor track into
 * throttle/brake/steer.
 *
 * Follower: PD law on gap error and relative speed, plus heading and
 * cross-track steering toward the predecessor's line.
 * Leader: speed regulation to the target speed, no steering.
 *
 * Overrides, highest priority first:
 * 1. Link down                         -> fail-safe
 * 2. Predecessor stale or not heard    -> fail-safe
 * 3. Gap below minSafeGap (latched)    -> full stop
 * 4. Predecessor braking               -> brake mirroring
 */

import type {
  ControlCommand,
  ControllerParams,
  PlatoonRole,
  PredecessorTrack,
  Vec3,
  VehicleKinematics,
  VehicleState,
} from '@convoy/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_CONTROLLER_PARAMS: ControllerParams = {
  targetGap: 10,
  targetSpeed: 8,
  kp: 0.5,
  kd: 0.6,
  maxAcceleration: 3,
  maxDeceleration: 6,
  headingGain: 1.0,
  lateralGain: 0.1,
  failSafeBrake: 0.6,
  minSafeGap: 1.5,
  fullStopHysteresis: 0.2,
  maxGapError: 20,
  relativeSpeedSmoothing: 0.5,
  brakeMirrorGain: 0.5,
  vehicleLength: 0,
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type ControlMode = 'cruise' | 'follow' | 'fail-safe' | 'full-stop' | 'idle';

export interface ControlInput {
  role: PlatoonRole;
  own: VehicleKinematics;
  /** Null unless the role is follower */
  track: PredecessorTrack | null;
  stale: boolean;
  linkUp: boolean;
}

export interface ControlOutput {
  command: ControlCommand;
  mode: ControlMode;
  /** Bumper gap to the predecessor, when one was measured */
  distance: number | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class GapController {
  private params: ControllerParams;
  private smoothedRelativeSpeed: number | null = null;
  private fullStopLatched = false;
  private lastRoleKey: string | null = null;

  constructor(params?: Partial<ControllerParams>) {
    this.params = { ...DEFAULT_CONTROLLER_PARAMS, ...params };
  }

  getParams(): ControllerParams {
    return { ...this.params };
  }

  setTargetGap(meters: number): void {
    if (!Number.isFinite(meters) || meters <= 0) {
      throw new RangeError(`Target gap must be a positive number of meters, got ${meters}`);
    }
    this.params.targetGap = meters;
  }

  setTargetSpeed(metersPerSecond: number): void {
    if (!Number.isFinite(metersPerSecond) || metersPerSecond < 0) {
      throw new RangeError(`Target speed must be zero or more m/s, got ${metersPerSecond}`);
    }
    this.params.targetSpeed = metersPerSecond;
  }

  /**
   * Forget the relative-speed filter and the full-stop latch.
   */
  reset(): void {
    this.smoothedRelativeSpeed = null;
    this.fullStopLatched = false;
  }

  compute(input: ControlInput): ControlOutput {
    const key = roleKey(input.role);
    if (key !== this.lastRoleKey) {
      this.reset();
      this.lastRoleKey = key;
    }

    const { role } = input;
    if (role.kind === 'detached') {
      return { command: { throttle: 0, brake: 0, steer: 0 }, mode: 'idle', distance: null };
    }
    if (!input.linkUp) {
      return this.failSafe();
    }
    if (role.kind === 'leader') {
      const acceleration = this.params.kd * (this.params.targetSpeed - longitudinalSpeed(input.own));
      return { command: { ...this.toPedals(acceleration), steer: 0 }, mode: 'cruise', distance: null };
    }

    const predecessor = input.track?.state ?? null;
    if (input.stale || predecessor === null) {
      return this.failSafe();
    }

    return this.follow(input.own, predecessor);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - FOLLOWER LAW
  // ─────────────────────────────────────────────────────────────────────────

  private follow(own: VehicleKinematics, predecessor: VehicleState): ControlOutput {
    const p = this.params;
    const distance = planarDistance(predecessor.position, own.position) - p.vehicleLength;
    const steer = this.steering(own, predecessor);

    if (distance < p.minSafeGap || (this.fullStopLatched && distance < p.minSafeGap + p.fullStopHysteresis)) {
      this.fullStopLatched = true;
      return { command: { throttle: 0, brake: 1, steer }, mode: 'full-stop', distance };
    }
    this.fullStopLatched = false;

    const gapError = clamp(Math.max(distance, 0) - p.targetGap, -p.targetGap, p.maxGapError);
    const rawRelativeSpeed = longitudinalSpeed(predecessor) - longitudinalSpeed(own);
    const relativeSpeed =
      this.smoothedRelativeSpeed === null
        ? rawRelativeSpeed
        : p.relativeSpeedSmoothing * rawRelativeSpeed +
          (1 - p.relativeSpeedSmoothing) * this.smoothedRelativeSpeed;
    this.smoothedRelativeSpeed = relativeSpeed;

    let { throttle, brake } = this.toPedals(p.kp * gapError + p.kd * relativeSpeed);

    const predecessorBrake = predecessor.control?.brake ?? 0;
    if (predecessorBrake > 0 && p.brakeMirrorGain > 0) {
      const mirrored = Math.min(1, predecessorBrake * p.brakeMirrorGain);
      if (throttle > 0) {
        throttle = 0;
        brake = mirrored;
      } else {
        brake = Math.max(brake, mirrored);
      }
    }

    return { command: { throttle, brake, steer }, mode: 'follow', distance };
  }

  /**
   * Heading alignment plus a pull toward the predecessor's heading line.
   * Cross-track error is positive when we sit left of that line.
   */
  private steering(own: VehicleKinematics, predecessor: VehicleKinematics): number {
    const headingError = wrapAngle(predecessor.heading - own.heading);
    const crossTrack =
      (own.position.x - predecessor.position.x) * -Math.sin(predecessor.heading) +
      (own.position.y - predecessor.position.y) * Math.cos(predecessor.heading);
    return clamp(this.params.headingGain * headingError - this.params.lateralGain * crossTrack, -1, 1);
  }

  private toPedals(acceleration: number): { throttle: number; brake: number } {
    const a = clamp(acceleration, -this.params.maxDeceleration, this.params.maxAcceleration);
    if (a > 0) return { throttle: Math.min(1, a / this.params.maxAcceleration), brake: 0 };
    if (a < 0) return { throttle: 0, brake: Math.min(1, -a / this.params.maxDeceleration) };
    return { throttle: 0, brake: 0 };
  }

  private failSafe(): ControlOutput {
    return {
      command: { throttle: 0, brake: this.params.failSafeBrake, steer: 0 },
      mode: 'fail-safe',
      distance: null,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

function roleKey(role: PlatoonRole): string {
  return role.kind === 'follower' ? `follower:${role.predecessorId}` : role.kind;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Wrap an angle into (-pi, pi] */
export function wrapAngle(radians: number): number {
  return Math.atan2(Math.sin(radians), Math.cos(radians));
}

export function longitudinalSpeed(state: Pick<VehicleKinematics, 'velocity' | 'heading'>): number {
  return state.velocity.x * Math.cos(state.heading) + state.velocity.y * Math.sin(state.heading);
}

export function planarDistance(a: Vec3, b: Vec3): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}
