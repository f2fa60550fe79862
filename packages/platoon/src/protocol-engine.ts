/**
 * PlatoonProtocolEngine - local membership state machine.
 *
 * Applies JOIN/LEAVE/MEMBERS events in the order this instance observes
 * them and keeps the track of the predecessor's latest STATE. There is
 * no arbiter: every engine on the relay converges by applying the same
 * events.
 *
 * Role derivation:
 * 1. Not in the membership: detached
 * 2. Index 0: leader
 * 3. Index k > 0: follower of the member at index k - 1
 */

import {
  StaleDataError,
  TypedEventEmitter,
  createLogger,
  describeRole,
  joinMessage,
  leaveMessage,
  membersMessage,
} from '@convoy/types';
import type {
  LeaveNotice,
  Logger,
  MembershipSnapshot,
  PeerId,
  PlatoonMessage,
  PlatoonRole,
  PredecessorTrack,
  VehicleState,
} from '@convoy/types';
import { PlatoonMembership } from './membership.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** Three broadcast periods at the default 50ms tick */
const DEFAULT_STALENESS_TIMEOUT_MS = 150;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ProtocolEngineOptions {
  /** Known up front when the operator picked one; otherwise set by join() */
  localPeerId?: PeerId;
  stalenessTimeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface ProtocolEngineEvents {
  membershipChanged: (members: PeerId[]) => void;
  roleChanged: (role: PlatoonRole, previous: PlatoonRole) => void;
  predecessorChanged: (predecessorId: PeerId | null) => void;
  predecessorStale: (error: StaleDataError) => void;
  predecessorFresh: (predecessorId: PeerId) => void;
  broadcast: (message: PlatoonMessage) => void;
  evicted: () => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class PlatoonProtocolEngine extends TypedEventEmitter<ProtocolEngineEvents> {
  private readonly log: Logger;
  private readonly stalenessTimeoutMs: number;
  private readonly now: () => number;

  private localPeerId: PeerId | null;
  private membership = new PlatoonMembership();
  private role: PlatoonRole = { kind: 'detached' };
  private track: PredecessorTrack | null = null;
  private lastSequence = -1;
  private staleEpisode = false;
  private awaitingSnapshot = false;

  constructor(options?: ProtocolEngineOptions) {
    super();
    this.log = options?.logger ?? createLogger('PlatoonEngine');
    this.stalenessTimeoutMs = options?.stalenessTimeoutMs ?? DEFAULT_STALENESS_TIMEOUT_MS;
    this.now = options?.now ?? Date.now;
    this.localPeerId = options?.localPeerId ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATE
  // ─────────────────────────────────────────────────────────────────────────

  getLocalPeerId(): PeerId | null {
    return this.localPeerId;
  }

  getMembers(): PeerId[] {
    return this.membership.toArray();
  }

  currentRole(): PlatoonRole {
    return { ...this.role };
  }

  isMember(): boolean {
    return this.localPeerId !== null && this.membership.has(this.localPeerId);
  }

  isAwaitingSnapshot(): boolean {
    return this.awaitingSnapshot;
  }

  getTrack(): PredecessorTrack | null {
    return this.track ? { ...this.track } : null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LOCAL EVENTS
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Join at the tail. Applied locally and broadcast, since the relay
   * never echoes a sender's own frames.
   */
  join(peerId: PeerId): void {
    if (this.localPeerId !== null && this.localPeerId !== peerId) {
      throw new Error(`Engine already bound to peer ${this.localPeerId}, cannot join as ${peerId}`);
    }
    this.localPeerId = peerId;

    if (this.membership.has(peerId)) {
      this.log.debug(`Join ignored: ${peerId} is already a member`);
      return;
    }

    const now = this.now();
    this.awaitingSnapshot = this.membership.size === 0;
    this.membership.add(peerId);
    this.log.info(`Joined platoon as ${peerId} (position ${this.membership.indexOf(peerId)})`);
    this.emit('broadcast', joinMessage(peerId, now));
    this.afterMembershipChange(now);
  }

  leave(): void {
    const self = this.localPeerId;
    if (self === null || !this.membership.has(self)) {
      this.log.debug('Leave ignored: not a member');
      return;
    }

    const now = this.now();
    this.membership.remove(self);
    this.awaitingSnapshot = false;
    this.log.info(`Left platoon as ${self}`);
    this.emit('broadcast', leaveMessage(self, 'leave'));
    this.afterMembershipChange(now);
  }

  /**
   * Announce ourselves again after a reconnect. Members that evicted us
   * re-add us at the tail; the leader answers with a snapshot that
   * replaces our possibly outdated view.
   */
  reannounce(): void {
    const self = this.localPeerId;
    if (self === null || !this.membership.has(self)) return;

    this.awaitingSnapshot = true;
    this.log.info(`Re-announcing ${self} after reconnect`);
    this.emit('broadcast', joinMessage(self, this.now()));
  }

  /**
   * Remove a peer that went silent, on behalf of everyone.
   */
  reportPeerLost(peerId: PeerId): void {
    if (peerId === this.localPeerId) return;
    if (!this.membership.has(peerId)) {
      this.log.debug(`Peer-lost ignored: ${peerId} is not a member`);
      return;
    }

    const now = this.now();
    this.membership.remove(peerId);
    this.log.warn(`Evicting silent peer ${peerId}`);
    this.emit('broadcast', leaveMessage(peerId, 'peer-lost'));
    this.afterMembershipChange(now);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // INBOUND
  // ─────────────────────────────────────────────────────────────────────────

  handleInbound(message: PlatoonMessage, receivedAt: number = this.now()): void {
    switch (message.type) {
      case 'STATE':
        this.handleState(message.payload, receivedAt);
        break;
      case 'JOIN':
        this.handleJoin(message.payload.requestingPeerId, receivedAt);
        break;
      case 'LEAVE':
        this.handleLeave(message.payload, receivedAt);
        break;
      case 'MEMBERS':
        this.handleSnapshot(message.payload, receivedAt);
        break;
    }
  }

  private handleState(state: VehicleState, receivedAt: number): void {
    const track = this.track;
    if (!track || state.peerId !== track.predecessorId || state.sequence <= this.lastSequence) {
      return;
    }

    this.track = { predecessorId: track.predecessorId, state, receivedAt };
    this.lastSequence = state.sequence;

    if (this.staleEpisode) {
      this.staleEpisode = false;
      this.log.info(`Predecessor ${track.predecessorId} is fresh again`);
      this.emit('predecessorFresh', track.predecessorId);
    }
  }

  private handleJoin(peerId: PeerId, receivedAt: number): void {
    if (peerId === this.localPeerId) {
      this.log.debug('Ignoring JOIN for the local peer');
      return;
    }

    if (this.membership.add(peerId)) {
      this.awaitingSnapshot = false;
      this.log.info(`${peerId} joined at position ${this.membership.indexOf(peerId)}`);
      this.afterMembershipChange(receivedAt);
    } else {
      this.log.debug(`Join conflict: ${peerId} is already a member`);
    }

    if (this.role.kind === 'leader' && this.localPeerId !== null) {
      this.emit('broadcast', membersMessage(this.localPeerId, this.membership.toArray(), receivedAt));
    }
  }

  private handleLeave(notice: LeaveNotice, receivedAt: number): void {
    if (!this.membership.remove(notice.peerId)) {
      this.log.debug(`Leave conflict: ${notice.peerId} is not a member`);
      return;
    }

    const isSelf = notice.peerId === this.localPeerId;
    if (!isSelf) {
      this.awaitingSnapshot = false;
    }
    this.log.info(`${notice.peerId} left (${notice.reason ?? 'leave'})`);
    this.afterMembershipChange(receivedAt);

    if (isSelf && notice.reason === 'peer-lost') {
      this.log.warn('Evicted from the platoon by a follower that lost our state');
      this.emit('evicted');
    }
  }

  /**
   * Adopted when we joined blind, when we have no view at all, or when
   * it only reorders our view and comes from our leader. The last case
   * settles concurrent joins that reached peers in different orders.
   */
  private handleSnapshot(snapshot: MembershipSnapshot, receivedAt: number): void {
    const self = this.localPeerId;
    const containsSelf = self !== null && snapshot.members.includes(self);
    const emptyObserver = !this.isMember() && this.membership.size === 0;
    const leaderReorder =
      snapshot.fromPeerId === this.membership.leader() &&
      this.membership.hasSameMembers(snapshot.members) &&
      !this.membership.equals(snapshot.members);

    if (!(this.awaitingSnapshot && containsSelf) && !emptyObserver && !leaderReorder) {
      this.log.debug(`Ignoring membership snapshot from ${snapshot.fromPeerId}`);
      return;
    }

    this.membership.replace(snapshot.members);
    this.awaitingSnapshot = false;
    this.log.info(`Adopted membership from ${snapshot.fromPeerId}: [${this.membership.toArray().join(', ')}]`);
    this.afterMembershipChange(receivedAt);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STALENESS
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Returns a StaleDataError while the predecessor has been silent for
   * longer than the staleness window. Emits `predecessorStale` once per
   * silent episode.
   */
  checkStaleness(now: number = this.now()): StaleDataError | null {
    const track = this.track;
    if (!track || this.role.kind !== 'follower') return null;

    const silentForMs = now - track.receivedAt;
    if (silentForMs <= this.stalenessTimeoutMs) return null;

    const error = new StaleDataError(track.predecessorId, silentForMs);
    if (!this.staleEpisode) {
      this.staleEpisode = true;
      this.log.warn(error.message);
      this.emit('predecessorStale', error);
    }
    return error;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - ROLE DERIVATION
  // ─────────────────────────────────────────────────────────────────────────

  private afterMembershipChange(now: number): void {
    this.emit('membershipChanged', this.membership.toArray());

    const previous = this.role;
    const role = this.deriveRole();
    const predecessorId = role.kind === 'follower' ? role.predecessorId : null;

    if (predecessorId !== (this.track?.predecessorId ?? null)) {
      this.track = predecessorId === null ? null : { predecessorId, state: null, receivedAt: now };
      this.lastSequence = -1;
      this.staleEpisode = false;
      this.emit('predecessorChanged', predecessorId);
    }

    if (!sameRole(previous, role)) {
      this.role = role;
      this.log.info(`Role: ${describeRole(previous)} -> ${describeRole(role)}`);
      this.emit('roleChanged', { ...role }, previous);
    }
  }

  private deriveRole(): PlatoonRole {
    const self = this.localPeerId;
    if (self === null) return { kind: 'detached' };

    const index = this.membership.indexOf(self);
    if (index === -1) return { kind: 'detached' };
    if (index === 0) return { kind: 'leader' };

    const predecessorId = this.membership.predecessorOf(self);
    return predecessorId === null
      ? { kind: 'detached' }
      : { kind: 'follower', predecessorId, position: index };
  }
}

function sameRole(a: PlatoonRole, b: PlatoonRole): boolean {
  if (a.kind === 'follower' && b.kind === 'follower') {
    return a.predecessorId === b.predecessorId && a.position === b.position;
  }
  return a.kind === b.kind;
}
