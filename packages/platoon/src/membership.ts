import type { PeerId } from '@convoy/types';

/**
 * Ordered platoon membership. Index 0 is the leader; every other member
 * follows the entry right before it. No peer appears twice.
 */
export class PlatoonMembership {
  private members: PeerId[] = [];

  constructor(initial?: readonly PeerId[]) {
    if (initial) {
      this.replace(initial);
    }
  }

  get size(): number {
    return this.members.length;
  }

  has(peerId: PeerId): boolean {
    return this.members.includes(peerId);
  }

  indexOf(peerId: PeerId): number {
    return this.members.indexOf(peerId);
  }

  leader(): PeerId | null {
    return this.members.length > 0 ? this.members[0] : null;
  }

  /**
   * Append at the tail. Returns false if already a member.
   */
  add(peerId: PeerId): boolean {
    if (this.has(peerId)) return false;
    this.members.push(peerId);
    return true;
  }

  /**
   * Remove and close the gap, so the removed peer's follower now follows
   * the removed peer's predecessor. Returns false if not a member.
   */
  remove(peerId: PeerId): boolean {
    const index = this.members.indexOf(peerId);
    if (index === -1) return false;
    this.members.splice(index, 1);
    return true;
  }

  predecessorOf(peerId: PeerId): PeerId | null {
    const index = this.members.indexOf(peerId);
    return index > 0 ? this.members[index - 1] : null;
  }

  /** Replace the whole view, keeping the first occurrence of duplicates */
  replace(peerIds: readonly PeerId[]): void {
    this.members = Array.from(new Set(peerIds));
  }

  /** Same peers, in any order */
  hasSameMembers(peerIds: readonly PeerId[]): boolean {
    const other = new Set(peerIds);
    return other.size === this.members.length && this.members.every((peerId) => other.has(peerId));
  }

  equals(peerIds: readonly PeerId[]): boolean {
    return peerIds.length === this.members.length && peerIds.every((peerId, i) => peerId === this.members[i]);
  }

  toArray(): PeerId[] {
    return [...this.members];
  }
}
