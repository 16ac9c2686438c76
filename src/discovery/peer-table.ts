import type { PeerRecord } from './peer.js';

/**
 * In-memory table of peers currently visible on the network.
 * Owned by the discovery engine; other components only see copies.
 */
export class PeerTable {
  private peers: Map<string, PeerRecord> = new Map();

  /**
   * Record a sighting.
   * An existing entry keeps its `firstSeen`; everything else is replaced by the new sighting.
   *
   * @returns 'appeared' for a new peer, 'updated' for a known one
   */
  upsert(peer: PeerRecord): 'appeared' | 'updated' {
    const existing = this.peers.get(peer.peerId);
    if (existing) {
      this.peers.set(peer.peerId, { ...peer, firstSeen: existing.firstSeen });
      return 'updated';
    }
    this.peers.set(peer.peerId, { ...peer });
    return 'appeared';
  }

  /**
   * @returns true if the peer was removed, false if it didn't exist
   */
  remove(peerId: string): boolean {
    return this.peers.delete(peerId);
  }

  get(peerId: string): PeerRecord | undefined {
    const peer = this.peers.get(peerId);
    return peer ? { ...peer, capabilities: [...peer.capabilities] } : undefined;
  }

  /**
   * Find all peers that advertise a capability tag.
   */
  findByCapability(capability: string): PeerRecord[] {
    return this.all().filter(peer => peer.capabilities.includes(capability));
  }

  all(): PeerRecord[] {
    return Array.from(this.peers.values(), peer => ({ ...peer, capabilities: [...peer.capabilities] }));
  }

  size(): number {
    return this.peers.size;
  }

  clear(): void {
    this.peers.clear();
  }

  /**
   * Remove peers that haven't been seen within the specified time window.
   *
   * @param maxAgeMs - Peers last seen longer ago than this are removed
   * @param now - Current time in ms
   * @returns Ids of the removed peers
   */
  prune(maxAgeMs: number, now: number = Date.now()): string[] {
    const cutoff = now - maxAgeMs;
    const removed: string[] = [];

    for (const [peerId, peer] of this.peers.entries()) {
      if (peer.lastSeen < cutoff) {
        this.peers.delete(peerId);
        removed.push(peerId);
      }
    }

    return removed;
  }
}
