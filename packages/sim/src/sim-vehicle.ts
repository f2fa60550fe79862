import { VehicleHandleError } from '@convoy/types';
import type { Vec3, VehicleHandle, VehicleKinematics } from '@convoy/types';

// ═══════════════════════════════════════════════════════════════════════════
// BLUEPRINTS
// ═══════════════════════════════════════════════════════════════════════════

export interface VehicleBlueprint {
  /** Bumper to bumper, metres */
  length: number;
  wheelbase: number;
  /** At full throttle, m/s² */
  maxAcceleration: number;
  /** At full brake, m/s² */
  maxBrakeDeceleration: number;
  /** Linear drag coefficient, 1/s */
  drag: number;
  /** Road-wheel angle at full steer, radians */
  maxSteerAngle: number;
}

export const BLUEPRINTS = {
  sedan: {
    length: 4.6,
    wheelbase: 2.7,
    maxAcceleration: 3,
    maxBrakeDeceleration: 8,
    drag: 0.05,
    maxSteerAngle: 0.6,
  },
  truck: {
    length: 9.5,
    wheelbase: 5.5,
    maxAcceleration: 1.5,
    maxBrakeDeceleration: 6,
    drag: 0.08,
    maxSteerAngle: 0.5,
  },
} satisfies Record<string, VehicleBlueprint>;

export type BlueprintName = keyof typeof BLUEPRINTS;

export const BLUEPRINT_NAMES = Object.keys(BLUEPRINTS).filter(isBlueprintName);

export function isBlueprintName(name: string): name is BlueprintName {
  return Object.prototype.hasOwnProperty.call(BLUEPRINTS, name);
}

// ═══════════════════════════════════════════════════════════════════════════
// VEHICLE
// ═══════════════════════════════════════════════════════════════════════════

export interface SimVehicleOptions {
  heading?: number;
  /** Initial forward speed, m/s */
  speed?: number;
  now?: () => number;
}

/**
 * Point-mass longitudinal model with kinematic bicycle yaw.
 */
export class SimVehicle implements VehicleHandle {
  private position: Vec3;
  private heading: number;
  private speed: number;
  private throttle = 0;
  private brake = 0;
  private steer = 0;
  private destroyed = false;
  private readonly now: () => number;

  constructor(
    readonly id: string,
    readonly blueprintName: BlueprintName,
    location: Vec3,
    options?: SimVehicleOptions
  ) {
    this.position = { ...location };
    this.heading = options?.heading ?? 0;
    this.speed = options?.speed ?? 0;
    this.now = options?.now ?? Date.now;
  }

  get blueprint(): VehicleBlueprint {
    return BLUEPRINTS[this.blueprintName];
  }

  get length(): number {
    return this.blueprint.length;
  }

  getState(): VehicleKinematics {
    this.assertAlive('getState');
    return {
      position: { ...this.position },
      velocity: {
        x: this.speed * Math.cos(this.heading),
        y: this.speed * Math.sin(this.heading),
        z: 0,
      },
      heading: this.heading,
      timestamp: this.now(),
    };
  }

  applyControl(throttle: number, brake: number, steer: number): void {
    this.assertAlive('applyControl');
    this.throttle = clampFinite(throttle, 0, 1);
    this.brake = clampFinite(brake, 0, 1);
    this.steer = clampFinite(steer, -1, 1);
  }

  getControl(): { throttle: number; brake: number; steer: number } {
    return { throttle: this.throttle, brake: this.brake, steer: this.steer };
  }

  getSpeed(): number {
    return this.speed;
  }

  /**
   * Advance by `dt` seconds with the last applied control.
   */
  step(dt: number): void {
    if (this.destroyed || dt <= 0) return;

    const bp = this.blueprint;
    const acceleration = this.throttle * bp.maxAcceleration - this.brake * bp.maxBrakeDeceleration - bp.drag * this.speed;
    this.speed = Math.max(0, this.speed + acceleration * dt);

    const yawRate = (this.speed / bp.wheelbase) * Math.tan(this.steer * bp.maxSteerAngle);
    this.heading = Math.atan2(Math.sin(this.heading + yawRate * dt), Math.cos(this.heading + yawRate * dt));

    this.position = {
      x: this.position.x + this.speed * Math.cos(this.heading) * dt,
      y: this.position.y + this.speed * Math.sin(this.heading) * dt,
      z: this.position.z,
    };
  }

  destroy(): void {
    this.destroyed = true;
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  private assertAlive(operation: string): void {
    if (this.destroyed) {
      throw new VehicleHandleError(`${operation} on destroyed vehicle ${this.id}`);
    }
  }
}

function clampFinite(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(max, Math.max(min, value));
}
