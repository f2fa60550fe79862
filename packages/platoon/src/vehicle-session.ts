/**
 * VehicleSession - one vehicle taking part in a platoon.
 *
 * Owns the vehicle handle and composes the relay client, the protocol
 * engine and the gap controller behind a fixed-period tick. Inbound
 * messages and operator commands are queued and only applied inside
 * the tick, so membership and the predecessor track have one writer.
 *
 * Tick order:
 * 1. Operator commands, due profile steps, pending re-join
 * 2. Read the vehicle state
 * 3. Publish STATE (member, link up, not muted)
 * 4. Apply queued inbound messages
 * 5. Peer-loss eviction and staleness
 * 6. Controller
 * 7. Apply control (skipped while detached)
 * 8. Emit `tick`
 */

import { randomUUID } from 'node:crypto';
import {
  TypedEventEmitter,
  VehicleHandleError,
  createLogger,
  describeRole,
  stateMessage,
  toError,
} from '@convoy/types';
import type {
  ControlCommand,
  ControlSample,
  ControllerParams,
  DisconnectedError,
  Logger,
  PeerId,
  PlatoonMessage,
  PlatoonRole,
  RelayAddress,
  StaleDataError,
  VehicleHandle,
  VehicleKinematics,
} from '@convoy/types';
import type { IPeerClient } from '@convoy/transport';
import { GapController, type ControlMode } from './gap-controller.js';
import { PlatoonProtocolEngine } from './protocol-engine.js';
import { getDriveProfile, type DriveProfileName, type ProfileStep } from './drive-profiles.js';
import type { OperatorCommand } from './operator-commands.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_TICK_MS = 50;
const DEFAULT_PEER_LOSS_TIMEOUT_MS = 2000;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface VehicleSessionOptions {
  vehicle: VehicleHandle;
  client: IPeerClient;
  relay: RelayAddress;
  /** Generated on the first join when omitted */
  peerId?: PeerId;
  tickMs?: number;
  /** Defaults to three ticks */
  stalenessTimeoutMs?: number;
  /** 0 disables eviction of a silent predecessor */
  peerLossTimeoutMs?: number;
  controller?: Partial<ControllerParams>;
  logger?: Logger;
  now?: () => number;
}

/** Commands the session applies; `status` and `help` stay with the console */
export type SessionCommand = Exclude<OperatorCommand, { kind: 'status' } | { kind: 'help' }>;

export interface TickReport {
  tick: number;
  at: number;
  role: PlatoonRole;
  members: PeerId[];
  mode: ControlMode;
  command: ControlCommand;
  distance: number | null;
  stale: boolean;
  linkUp: boolean;
  muted: boolean;
  published: boolean;
}

export interface SessionStatus {
  peerId: PeerId | null;
  running: boolean;
  role: PlatoonRole;
  members: PeerId[];
  linkUp: boolean;
  muted: boolean;
  mode: ControlMode;
  profile: DriveProfileName | null;
  targetGap: number;
  targetSpeed: number;
  sequence: number;
}

export interface VehicleSessionEvents {
  tick: (report: TickReport) => void;
  roleChanged: (role: PlatoonRole, previous: PlatoonRole) => void;
  membershipChanged: (members: PeerId[]) => void;
  predecessorStale: (error: StaleDataError) => void;
  linkDown: (reason: string) => void;
  linkUp: () => void;
  /** The client gave up reconnecting; the session keeps braking in fail-safe */
  disconnected: (error: DisconnectedError) => void;
  terminated: (error: VehicleHandleError) => void;
  left: () => void;
  error: (error: Error) => void;
}

type QueuedCommand =
  | { kind: 'join' }
  | { kind: 'leave'; resolve: () => void; reject: (error: Error) => void }
  | { kind: 'set-gap'; meters: number }
  | { kind: 'set-speed'; metersPerSecond: number }
  | { kind: 'profile'; name: DriveProfileName }
  | { kind: 'mute'; ms: number };

interface InboundEntry {
  message: PlatoonMessage;
  receivedAt: number;
}

interface RunningProfile {
  name: DriveProfileName;
  steps: readonly ProfileStep[];
  startedAt: number;
  nextStep: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class VehicleSession extends TypedEventEmitter<VehicleSessionEvents> {
  private readonly log: Logger;
  private readonly vehicle: VehicleHandle;
  private readonly client: IPeerClient;
  private readonly relay: RelayAddress;
  private readonly tickMs: number;
  private readonly peerLossTimeoutMs: number;
  private readonly now: () => number;
  private readonly engine: PlatoonProtocolEngine;
  private readonly controller: GapController;

  private peerId: PeerId | null;
  private running = false;
  private started = false;
  private finished = false;
  private leaving: Promise<void> | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pumpDone: Promise<void> = Promise.resolve();

  private commands: QueuedCommand[] = [];
  private inbound: InboundEntry[] = [];

  private linkUp = false;
  private linkUpSince = 0;
  private wantsMembership = false;
  private rejoinPending = false;
  private mutedUntil = 0;
  private profile: RunningProfile | null = null;

  private tickCount = 0;
  private sequence = 0;
  private lastApplied: ControlSample | null = null;
  private lastMode: ControlMode = 'idle';

  constructor(options: VehicleSessionOptions) {
    super();
    this.log = options.logger ?? createLogger('VehicleSession');
    this.vehicle = options.vehicle;
    this.client = options.client;
    this.relay = { ...options.relay };
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.peerLossTimeoutMs = options.peerLossTimeoutMs ?? DEFAULT_PEER_LOSS_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.peerId = options.peerId ?? null;

    this.engine = new PlatoonProtocolEngine({
      localPeerId: options.peerId,
      stalenessTimeoutMs: options.stalenessTimeoutMs ?? 3 * this.tickMs,
      logger: this.log,
      now: this.now,
    });
    this.controller = new GapController({ vehicleLength: options.vehicle.length ?? 0, ...options.controller });

    this.wireEngine();
    this.wireClient();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Connect to the relay and start ticking. Rejects with the client's
   * ConnectionError when the relay cannot be reached.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error('VehicleSession already started');
    }
    this.started = true;

    try {
      await this.client.connect(this.relay);
    } catch (error) {
      this.started = false;
      throw error;
    }
    this.linkUp = true;
    this.linkUpSince = this.now();
    this.running = true;
    this.pumpDone = this.pumpInbound();
    this.log.info(`Vehicle ${this.vehicle.id} ticking every ${this.tickMs}ms`);
    this.scheduleTick(0);
  }

  /**
   * Leave if still a member, otherwise just halt and close the connection.
   */
  async stop(): Promise<void> {
    if (this.finished) return;
    if (this.engine.isMember()) {
      await this.leave();
      return;
    }
    this.finished = true;
    this.halt();
    await this.client.disconnect();
    await this.pumpDone;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): SessionStatus {
    const params = this.controller.getParams();
    return {
      peerId: this.peerId,
      running: this.running,
      role: this.engine.currentRole(),
      members: this.engine.getMembers(),
      linkUp: this.linkUp,
      muted: this.now() < this.mutedUntil,
      mode: this.lastMode,
      profile: this.profile?.name ?? null,
      targetGap: params.targetGap,
      targetSpeed: params.targetSpeed,
      sequence: this.sequence,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // OPERATOR COMMANDS (applied on the next tick)
  // ─────────────────────────────────────────────────────────────────────────

  join(): void {
    this.commands.push({ kind: 'join' });
  }

  /**
   * Announce the departure, drain pending sends and close the
   * connection. Resolves once the relay holds nothing of ours.
   */
  leave(): Promise<void> {
    if (!this.running) {
      return this.performLeave();
    }
    return new Promise((resolve, reject) => {
      this.commands.push({ kind: 'leave', resolve, reject });
    });
  }

  setTargetGap(meters: number): void {
    this.commands.push({ kind: 'set-gap', meters });
  }

  setTargetSpeed(metersPerSecond: number): void {
    this.commands.push({ kind: 'set-speed', metersPerSecond });
  }

  runProfile(name: DriveProfileName): void {
    this.commands.push({ kind: 'profile', name });
  }

  mute(ms: number): void {
    this.commands.push({ kind: 'mute', ms });
  }

  submit(command: SessionCommand): Promise<void> {
    switch (command.kind) {
      case 'join':
        this.join();
        break;
      case 'leave':
        return this.leave();
      case 'set-gap':
        this.setTargetGap(command.meters);
        break;
      case 'set-speed':
        this.setTargetSpeed(command.metersPerSecond);
        break;
      case 'profile':
        this.runProfile(command.name);
        break;
      case 'mute':
        this.mute(command.ms);
        break;
    }
    return Promise.resolve();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - TICK LOOP
  // ─────────────────────────────────────────────────────────────────────────

  private scheduleTick(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runTick().catch((error) => this.emitError(toError(error)));
    }, delayMs);
  }

  private async runTick(): Promise<void> {
    const startedAt = this.now();
    try {
      await this.tick(startedAt);
    } catch (error) {
      this.emitError(toError(error));
    }
    if (this.running) {
      this.scheduleTick(Math.max(0, this.tickMs - (this.now() - startedAt)));
    }
  }

  private async tick(now: number): Promise<void> {
    this.tickCount++;

    // 1. Commands
    const leaveRequest = this.drainCommands(now);
    if (leaveRequest) {
      await this.performLeave().then(leaveRequest.resolve, leaveRequest.reject);
      return;
    }
    this.applyProfileSteps(now);
    if (this.rejoinPending) {
      this.rejoinPending = false;
      if (this.wantsMembership && !this.engine.isMember()) {
        this.engine.join(this.ensurePeerId());
      }
    }

    // 2. Vehicle state
    let own: VehicleKinematics;
    try {
      own = this.vehicle.getState();
    } catch (error) {
      await this.terminate(error);
      return;
    }

    // 3. Publish
    const muted = now < this.mutedUntil;
    const published = this.linkUp && !muted && this.publishState(own, now);

    // 4. Inbound
    for (const entry of this.inbound.splice(0)) {
      this.engine.handleInbound(entry.message, entry.receivedAt);
    }

    // 5. Peer loss, then staleness against whoever is ahead now
    this.checkPeerLoss(now);
    const stale = this.engine.checkStaleness(now) !== null;

    // 6. Control
    const role = this.engine.currentRole();
    const output = this.controller.compute({
      role,
      own,
      track: this.engine.getTrack(),
      stale,
      linkUp: this.linkUp,
    });
    this.lastMode = output.mode;

    // 7. Apply
    if (output.mode !== 'idle') {
      const { throttle, brake, steer } = output.command;
      try {
        this.vehicle.applyControl(throttle, brake, steer);
      } catch (error) {
        await this.terminate(error);
        return;
      }
      this.lastApplied = { throttle, brake };
    }

    // 8. Report
    this.emit('tick', {
      tick: this.tickCount,
      at: now,
      role,
      members: this.engine.getMembers(),
      mode: output.mode,
      command: { ...output.command },
      distance: output.distance,
      stale,
      linkUp: this.linkUp,
      muted,
      published,
    });
  }

  /**
   * Applies queued commands in order and stops at a leave, which the
   * caller performs once the rest of the tick is abandoned.
   */
  private drainCommands(now: number): Extract<QueuedCommand, { kind: 'leave' }> | null {
    while (this.commands.length > 0) {
      const [command] = this.commands.splice(0, 1);
      switch (command.kind) {
        case 'leave':
          this.dropQueuedAfterLeave();
          return command;
        case 'join':
          this.wantsMembership = true;
          this.engine.join(this.ensurePeerId());
          break;
        case 'set-gap':
          this.updateParam(() => this.controller.setTargetGap(command.meters));
          break;
        case 'set-speed':
          this.profile = null;
          this.updateParam(() => this.controller.setTargetSpeed(command.metersPerSecond));
          break;
        case 'profile':
          this.profile = { name: command.name, steps: getDriveProfile(command.name), startedAt: now, nextStep: 0 };
          this.log.info(`Running drive profile ${command.name}`);
          break;
        case 'mute':
          this.muteFor(now, command.ms);
          break;
      }
    }
    return null;
  }

  private dropQueuedAfterLeave(): void {
    for (const command of this.commands.splice(0)) {
      if (command.kind === 'leave') {
        this.performLeave().then(command.resolve, command.reject);
      } else {
        this.log.debug(`Dropping ${command.kind}: session is leaving`);
      }
    }
  }

  private applyProfileSteps(now: number): void {
    const profile = this.profile;
    if (!profile) return;

    const elapsed = now - profile.startedAt;
    while (profile.nextStep < profile.steps.length && profile.steps[profile.nextStep].afterMs <= elapsed) {
      const step = profile.steps[profile.nextStep];
      profile.nextStep++;
      this.updateParam(() => this.controller.setTargetSpeed(step.targetSpeed));
      if (step.muteMs !== undefined) {
        this.muteFor(now, step.muteMs);
      }
      this.log.debug(`Profile ${profile.name}: target speed ${step.targetSpeed} m/s`);
    }

    if (profile.nextStep >= profile.steps.length) {
      this.log.info(`Drive profile ${profile.name} finished`);
      this.profile = null;
    }
  }

  /**
   * Followers evict a predecessor that stays silent past their peer-loss
   * window, so a mute is held to half of ours.
   */
  private muteFor(now: number, ms: number): void {
    const limit = this.peerLossTimeoutMs > 0 ? this.peerLossTimeoutMs / 2 : ms;
    const duration = Math.min(ms, limit);
    if (duration < ms) {
      this.log.warn(`Mute capped at ${duration}ms to stay inside the peer-loss window`);
    }
    this.mutedUntil = now + duration;
    this.log.info(`State broadcasts muted for ${duration}ms`);
  }

  private updateParam(apply: () => void): void {
    try {
      apply();
    } catch (error) {
      this.log.warn(toError(error).message);
    }
  }

  private publishState(own: VehicleKinematics, now: number): boolean {
    const peerId = this.engine.getLocalPeerId();
    if (peerId === null || !this.engine.isMember()) return false;

    const message = stateMessage({
      peerId,
      position: { ...own.position },
      velocity: { ...own.velocity },
      heading: own.heading,
      sequence: this.sequence,
      timestamp: now,
      ...(this.lastApplied ? { control: { ...this.lastApplied } } : {}),
    });
    this.sequence++;
    return this.client.send(message);
  }

  private checkPeerLoss(now: number): void {
    if (!this.linkUp || this.peerLossTimeoutMs <= 0) return;

    const track = this.engine.getTrack();
    if (!track) return;

    const silentForMs = now - Math.max(track.receivedAt, this.linkUpSince);
    if (silentForMs > this.peerLossTimeoutMs) {
      this.engine.reportPeerLost(track.predecessorId);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - MEMBERSHIP
  // ─────────────────────────────────────────────────────────────────────────

  private ensurePeerId(): PeerId {
    if (this.peerId === null) {
      this.peerId = randomUUID().slice(0, 8);
    }
    return this.peerId;
  }

  private performLeave(): Promise<void> {
    if (this.leaving) return this.leaving;
    if (this.finished) return Promise.resolve();
    this.leaving = this.announceAndClose();
    return this.leaving;
  }

  private async announceAndClose(): Promise<void> {
    this.finished = true;
    this.wantsMembership = false;
    this.halt();

    this.engine.leave();
    await this.client.flush();
    await this.client.disconnect();
    await this.pumpDone;

    this.log.info(`Vehicle ${this.vehicle.id} left`);
    this.emit('left');
  }

  private async terminate(cause: unknown): Promise<void> {
    const error =
      cause instanceof VehicleHandleError
        ? cause
        : new VehicleHandleError(`Vehicle ${this.vehicle.id} failed: ${toError(cause).message}`, { cause });

    this.finished = true;
    this.wantsMembership = false;
    this.halt();
    this.log.error(`Session terminated: ${error.message}`);

    this.engine.leave();
    await this.client.flush();
    await this.client.disconnect();
    await this.pumpDone;
    this.emit('terminated', error);
  }

  private halt(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - WIRING
  // ─────────────────────────────────────────────────────────────────────────

  private async pumpInbound(): Promise<void> {
    try {
      for await (const message of this.client.receive()) {
        this.inbound.push({ message, receivedAt: this.now() });
      }
    } catch (error) {
      this.emitError(toError(error));
    }
  }

  private wireEngine(): void {
    this.engine.on('broadcast', (message) => {
      if (!this.client.send(message)) {
        this.log.debug(`${message.type} not sent: relay connection closed`);
      }
    });
    this.engine.on('membershipChanged', (members) => this.emit('membershipChanged', members));
    this.engine.on('roleChanged', (role, previous) => {
      this.log.info(`${this.vehicle.id} is now ${describeRole(role)}`);
      this.emit('roleChanged', role, previous);
    });
    this.engine.on('predecessorStale', (error) => this.emit('predecessorStale', error));
    this.engine.on('evicted', () => {
      if (this.wantsMembership) {
        this.rejoinPending = true;
      }
    });
  }

  private wireClient(): void {
    this.client.on('connectionLost', (reason) => {
      this.linkUp = false;
      this.emit('linkDown', reason);
    });
    this.client.on('reconnected', () => {
      this.linkUp = true;
      this.linkUpSince = this.now();
      this.engine.reannounce();
      this.emit('linkUp');
    });
    this.client.on('disconnected', (error) => {
      this.linkUp = false;
      if (error) {
        this.log.error(`Relay connection gone for good: ${error.message}`);
        this.emit('disconnected', error);
      }
    });
  }

  private emitError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    } else {
      this.log.error(error.message);
    }
  }
}
