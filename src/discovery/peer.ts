import type { DeviceKind } from '../identity/device.js';

/**
 * A peer currently visible on the local network
 */
export interface PeerRecord {
  /** Stable identifier, unique per device installation */
  peerId: string;
  /** Human-readable name; may change between sightings */
  displayName: string;
  kind: DeviceKind;
  /** Reachable endpoint from the most recent advertisement */
  address: string;
  port: number;
  /** Message kinds the peer claims to support */
  capabilities: string[];
  /** Unix timestamp (ms) of the first sighting */
  firstSeen: number;
  /** Unix timestamp (ms) of the latest sighting */
  lastSeen: number;
}

/**
 * Events produced while browsing
 */
export type DiscoveryEvent =
  | { type: 'peer-appeared'; peer: PeerRecord }
  | { type: 'peer-updated'; peer: PeerRecord }
  | { type: 'peer-disappeared'; peerId: string };

/**
 * Read access to the latest discovery state, used for reconnection.
 */
export interface PeerLookup {
  getPeer(peerId: string): PeerRecord | undefined;
}
