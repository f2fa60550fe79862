/**
 * SimWorld - in-process stand-in for the driving simulator.
 *
 * Spawns SimVehicles, refuses overlapping spawns and steps every live
 * vehicle, either on demand or on a real-time interval.
 */

import { createLogger } from '@convoy/types';
import type { Logger, Vec3, VehicleSpawner } from '@convoy/types';
import { BLUEPRINTS, SimVehicle, isBlueprintName, type BlueprintName } from './sim-vehicle.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** First formation slot; later slots line up behind it along -x */
export const FORMATION_ORIGIN: Vec3 = { x: -20, y: -15, z: 0.1 };
export const FORMATION_SPACING = 7;
const MAX_FORMATION_SLOTS = 32;
const DEFAULT_STEP_MS = 50;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export class SpawnError extends Error {
  override readonly name = 'SpawnError';

  constructor(message: string, readonly location: Vec3) {
    super(message);
  }
}

export interface SimWorldOptions {
  logger?: Logger;
  now?: () => number;
}

export interface FormationSpawn {
  vehicle: SimVehicle;
  slot: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class SimWorld implements VehicleSpawner<BlueprintName> {
  private readonly log: Logger;
  private readonly now: () => number;
  private vehicles = new Map<string, SimVehicle>();
  private nextId = 1;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options?: SimWorldOptions) {
    this.log = options?.logger ?? createLogger('SimWorld');
    this.now = options?.now ?? Date.now;
  }

  /**
   * Spawn a vehicle. Throws SpawnError when the spot is taken by another
   * actor or the blueprint is unknown.
   */
  spawn(blueprint: BlueprintName, location: Vec3, heading = 0): SimVehicle {
    if (!isBlueprintName(blueprint)) {
      throw new SpawnError(`Unknown blueprint: ${String(blueprint)}`, location);
    }

    const clearance = BLUEPRINTS[blueprint].length;
    for (const other of this.vehicles.values()) {
      const { position } = other.getState();
      if (Math.hypot(position.x - location.x, position.y - location.y) < clearance) {
        throw new SpawnError(
          `Spawn at (${location.x}, ${location.y}) collides with ${other.id}`,
          location
        );
      }
    }

    const id = `vehicle-${this.nextId++}`;
    const vehicle = new SimVehicle(id, blueprint, location, { heading, now: this.now });
    this.vehicles.set(id, vehicle);
    this.log.info(`Spawned ${blueprint} ${id} at (${location.x}, ${location.y})`);
    return vehicle;
  }

  /**
   * Location of a formation slot: slot 0 is the origin, slot k sits
   * k * spacing behind it.
   */
  slotLocation(slot: number, origin: Vec3 = FORMATION_ORIGIN, spacing = FORMATION_SPACING): Vec3 {
    return { x: origin.x - slot * spacing, y: origin.y, z: origin.z };
  }

  /**
   * Try successive slots behind the origin until a spawn succeeds.
   */
  spawnInFormation(
    blueprint: BlueprintName,
    origin: Vec3 = FORMATION_ORIGIN,
    spacing = FORMATION_SPACING
  ): FormationSpawn {
    for (let slot = 0; slot < MAX_FORMATION_SLOTS; slot++) {
      const location = this.slotLocation(slot, origin, spacing);
      try {
        return { vehicle: this.spawn(blueprint, location), slot };
      } catch (error) {
        if (!(error instanceof SpawnError)) throw error;
        this.log.debug(`Slot ${slot} taken: ${error.message}`);
      }
    }
    throw new SpawnError(`No free formation slot within ${MAX_FORMATION_SLOTS} slots`, origin);
  }

  getVehicles(): SimVehicle[] {
    return Array.from(this.vehicles.values());
  }

  /**
   * Remove the actor. Its handle throws on every later call.
   */
  destroy(id: string): boolean {
    const vehicle = this.vehicles.get(id);
    if (!vehicle) return false;
    vehicle.destroy();
    this.vehicles.delete(id);
    this.log.info(`Destroyed ${id}`);
    return true;
  }

  /** Advance every vehicle by `dt` seconds */
  step(dt: number): void {
    for (const vehicle of this.vehicles.values()) {
      vehicle.step(dt);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // REAL-TIME STEPPING
  // ─────────────────────────────────────────────────────────────────────────

  start(stepMs = DEFAULT_STEP_MS): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.step(stepMs / 1000), stepMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
