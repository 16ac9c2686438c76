import { EventEmitter } from 'node:events';
import { createLogger, type Logger } from '../logger.js';
import { AsyncQueue } from '../utils/async-queue.js';
import {
  encodeAnnouncement,
  parseAnnouncement,
  type AdvertisedDevice,
  type Announcement,
} from './announcement.js';
import type { AnnouncementChannel, DatagramSource } from './channel.js';
import { PeerTable } from './peer-table.js';
import type { DiscoveryEvent, PeerLookup, PeerRecord } from './peer.js';

export const DEFAULT_ANNOUNCE_INTERVAL_MS = 5000;

export interface DiscoveryEngineOptions {
  channel: AnnouncementChannel;
  /** Our own device id; announcements carrying it are ignored */
  localId: string;
  /** Re-announce period (default: 5000) */
  announceIntervalMs?: number;
  /** Peers silent for longer than this are dropped (default: 3 × announceIntervalMs) */
  peerTimeoutMs?: number;
  /** How often stale peers are checked (default: peerTimeoutMs / 3) */
  pruneIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Events emitted by DiscoveryEngine
 */
export interface DiscoveryEngineEvents {
  /** Every browse event, for in-process consumers */
  'discovery': (event: DiscoveryEvent) => void;
}

/**
 * Stream of browse events. Ends when browsing stops or the consumer breaks out.
 */
export type DiscoveryStream = AsyncIterableIterator<DiscoveryEvent>;

/**
 * Advertises this device and keeps a table of peers seen on the local network.
 *
 * Advertising and browsing share one announcement channel; it is opened by
 * whichever starts first and closed when both have stopped.
 */
export class DiscoveryEngine extends EventEmitter implements PeerLookup {
  private channel: AnnouncementChannel;
  private localId: string;
  private announceIntervalMs: number;
  private peerTimeoutMs: number;
  private pruneIntervalMs: number;
  private logger: Logger;
  private now: () => number;

  private table = new PeerTable();
  private streams = new Set<AsyncQueue<DiscoveryEvent>>();
  private advertised: AdvertisedDevice | null = null;
  private advertiseStart: Promise<void> | null = null;
  private browsing = false;
  private announceTimer: NodeJS.Timeout | null = null;
  private pruneTimer: NodeJS.Timeout | null = null;
  private channelUsers = 0;
  private channelOpen: Promise<void> | null = null;

  constructor(options: DiscoveryEngineOptions) {
    super();
    this.channel = options.channel;
    this.localId = options.localId;
    this.announceIntervalMs = options.announceIntervalMs ?? DEFAULT_ANNOUNCE_INTERVAL_MS;
    this.peerTimeoutMs = options.peerTimeoutMs ?? this.announceIntervalMs * 3;
    this.pruneIntervalMs = options.pruneIntervalMs ?? Math.max(1, Math.floor(this.peerTimeoutMs / 3));
    this.logger = options.logger ?? createLogger('discovery');
    this.now = options.now ?? Date.now;

    this.channel.onMessage((data, from) => this.handleDatagram(data, from));
  }

  /**
   * Announce `self` now and periodically until stopAdvertising().
   * Calling again replaces the advertised record and re-announces.
   *
   * @throws NetworkUnavailableError
   */
  async startAdvertising(self: AdvertisedDevice): Promise<void> {
    // Overlapping calls share one start, so one timer and one channel use.
    if (!this.advertiseStart) {
      this.advertiseStart = this.beginAdvertising();
    }
    const start = this.advertiseStart;
    try {
      await start;
    } catch (err) {
      if (this.advertiseStart === start) {
        this.advertiseStart = null;
      }
      throw err;
    }
    if (this.advertiseStart !== start) {
      // stopAdvertising() ran while the channel was opening
      return;
    }
    this.advertised = { ...self, capabilities: [...self.capabilities] };
    this.announce();
  }

  /**
   * Stop announcing. A withdrawal is sent so browsers drop us immediately.
   */
  async stopAdvertising(): Promise<void> {
    const start = this.advertiseStart;
    if (!start) {
      return;
    }
    this.advertiseStart = null;
    try {
      await start;
    } catch (err) {
      this.logger.debug(`advertising never started: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    const device = this.advertised;
    this.advertised = null;
    if (this.announceTimer) {
      clearInterval(this.announceTimer);
      this.announceTimer = null;
    }
    if (device) {
      try {
        await this.channel.send(encodeAnnouncement({ type: 'withdraw', id: device.id }));
      } catch (err) {
        this.logger.debug(`withdraw not sent: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    await this.releaseChannel();
  }

  isAdvertising(): boolean {
    return this.advertised !== null;
  }

  /**
   * Start browsing and open a new event stream.
   * Peers already in the table are replayed to the new stream as `peer-appeared`.
   *
   * @throws NetworkUnavailableError
   */
  async startBrowsing(): Promise<DiscoveryStream> {
    await this.browse();

    const stream: AsyncQueue<DiscoveryEvent> = new AsyncQueue(() => this.streams.delete(stream));
    for (const peer of this.table.all()) {
      stream.push({ type: 'peer-appeared', peer });
    }
    this.streams.add(stream);
    return stream;
  }

  /**
   * Start browsing without opening a stream; events arrive as `discovery` events only.
   *
   * @throws NetworkUnavailableError
   */
  async browse(): Promise<void> {
    if (this.browsing) {
      return;
    }
    this.browsing = true;
    try {
      await this.acquireChannel();
    } catch (err) {
      this.browsing = false;
      throw err;
    }
    this.pruneTimer = setInterval(() => this.prune(), this.pruneIntervalMs);
    this.query();
  }

  /**
   * End every open stream, stop pruning and forget all peers.
   */
  async stopBrowsing(): Promise<void> {
    if (!this.browsing) {
      return;
    }
    this.browsing = false;
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = null;
    }
    for (const stream of [...this.streams]) {
      stream.end();
    }
    this.table.clear();
    await this.releaseChannel();
  }

  isBrowsing(): boolean {
    return this.browsing;
  }

  getPeer(peerId: string): PeerRecord | undefined {
    return this.table.get(peerId);
  }

  listPeers(): PeerRecord[] {
    return this.table.all();
  }

  findByCapability(capability: string): PeerRecord[] {
    return this.table.findByCapability(capability);
  }

  async close(): Promise<void> {
    await this.stopAdvertising();
    await this.stopBrowsing();
  }

  private async beginAdvertising(): Promise<void> {
    await this.acquireChannel();
    this.announceTimer = setInterval(() => {
      this.announce();
    }, this.announceIntervalMs);
  }

  private async acquireChannel(): Promise<void> {
    this.channelUsers++;
    try {
      if (!this.channelOpen) {
        this.channelOpen = this.channel.open();
      }
      await this.channelOpen;
    } catch (err) {
      this.channelUsers--;
      this.channelOpen = null;
      throw err;
    }
  }

  private async releaseChannel(): Promise<void> {
    this.channelUsers--;
    if (this.channelUsers > 0 || !this.channelOpen) {
      return;
    }
    this.channelOpen = null;
    await this.channel.close();
  }

  private announce(): void {
    if (this.advertised) {
      this.broadcast({ type: 'announce', device: this.advertised });
    }
  }

  private query(): void {
    this.broadcast({ type: 'query', id: this.localId });
  }

  private broadcast(announcement: Announcement): void {
    this.channel.send(encodeAnnouncement(announcement)).catch((err: unknown) => {
      this.logger.warn(`${announcement.type} not sent: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  private handleDatagram(data: Buffer, from: DatagramSource): void {
    const result = parseAnnouncement(data);
    if (!result.ok) {
      this.logger.debug(`dropped datagram from ${from.address}: ${result.reason}`);
      return;
    }

    const { announcement } = result;
    switch (announcement.type) {
      case 'query':
        if (announcement.id !== this.localId) {
          this.announce();
        }
        return;
      case 'withdraw':
        if (this.browsing && announcement.id !== this.localId && this.table.remove(announcement.id)) {
          this.publish({ type: 'peer-disappeared', peerId: announcement.id });
        }
        return;
      case 'announce':
        if (this.browsing && announcement.device.id !== this.localId) {
          this.recordSighting(announcement.device, from);
        }
        return;
    }
  }

  private recordSighting(device: AdvertisedDevice, from: DatagramSource): void {
    const seenAt = this.now();
    const outcome = this.table.upsert({
      peerId: device.id,
      displayName: device.name,
      kind: device.kind,
      address: from.address,
      port: device.port,
      capabilities: [...device.capabilities],
      firstSeen: seenAt,
      lastSeen: seenAt,
    });

    const peer = this.table.get(device.id);
    if (!peer) {
      return;
    }
    if (outcome === 'appeared') {
      this.logger.info(`peer appeared: ${peer.displayName} (${peer.peerId}) at ${peer.address}:${peer.port}`);
      this.publish({ type: 'peer-appeared', peer });
    } else {
      this.publish({ type: 'peer-updated', peer });
    }
  }

  private prune(): void {
    for (const peerId of this.table.prune(this.peerTimeoutMs, this.now())) {
      this.logger.info(`peer timed out: ${peerId}`);
      this.publish({ type: 'peer-disappeared', peerId });
    }
  }

  private publish(event: DiscoveryEvent): void {
    for (const stream of this.streams) {
      stream.push(event);
    }
    this.emit('discovery', event);
  }
}
