import { Duplex } from 'node:stream';
import { NetworkUnavailableError, TransportLostError } from '../errors.js';
import type { AnnouncementChannel, DatagramHandler } from '../discovery/channel.js';
import type { Endpoint, StreamHandler, Transport, TransportListener } from './types.js';

const FIRST_EPHEMERAL_PORT = 40000;
const ANNOUNCEMENT_PORT = 1716;

/**
 * In-process stand-in for a local network.
 *
 * Hosts are identified by address. Streams and datagrams are delivered on a
 * later tick, in order. Marking a host unreachable silently drops everything
 * it sends or should receive, like a cable being pulled: existing streams stay
 * open but go quiet.
 */
export class MemoryNetwork {
  private listeners = new Map<string, StreamHandler>();
  private channels = new Set<MemoryAnnouncementChannel>();
  private unreachable = new Set<string>();
  private nextPort = FIRST_EPHEMERAL_PORT;

  createTransport(address: string): Transport {
    return new MemoryTransport(this, address);
  }

  createAnnouncementChannel(address: string): AnnouncementChannel {
    return new MemoryAnnouncementChannel(this, address);
  }

  setReachable(address: string, reachable: boolean): void {
    if (reachable) {
      this.unreachable.delete(address);
    } else {
      this.unreachable.add(address);
    }
  }

  isReachable(address: string): boolean {
    return !this.unreachable.has(address);
  }

  /** @internal */
  canDeliver(from: string, to: string): boolean {
    return this.isReachable(from) && this.isReachable(to);
  }

  /** @internal */
  allocatePort(): number {
    return this.nextPort++;
  }

  /** @internal */
  bind(address: string, port: number, handler: StreamHandler): void {
    const key = `${address}:${port}`;
    if (this.listeners.has(key)) {
      throw new Error(`Address in use: ${key}`);
    }
    this.listeners.set(key, handler);
  }

  /** @internal */
  unbind(address: string, port: number): void {
    this.listeners.delete(`${address}:${port}`);
  }

  /** @internal */
  connect(from: string, to: Endpoint): Duplex {
    if (!this.canDeliver(from, to.address)) {
      throw new TransportLostError(`${to.address} is unreachable`);
    }
    const handler = this.listeners.get(`${to.address}:${to.port}`);
    if (!handler) {
      throw new TransportLostError(`Connection refused by ${to.address}:${to.port}`);
    }

    const [local, remote] = createLinkedPair(this, from, to.address);
    const remoteEndpoint = { address: from, port: this.allocatePort() };
    setImmediate(() => handler(remote, remoteEndpoint));
    return local;
  }

  /** @internal */
  join(channel: MemoryAnnouncementChannel): void {
    this.channels.add(channel);
  }

  /** @internal */
  leave(channel: MemoryAnnouncementChannel): void {
    this.channels.delete(channel);
  }

  /** @internal */
  multicast(from: string, data: Buffer): void {
    for (const channel of this.channels) {
      if (this.canDeliver(from, channel.address)) {
        const copy = Buffer.from(data);
        setImmediate(() => channel.deliver(copy, { address: from, port: ANNOUNCEMENT_PORT }));
      }
    }
  }
}

/**
 * Two duplex ends; bytes written on one are read from the other.
 */
function createLinkedPair(network: MemoryNetwork, addressA: string, addressB: string): [Duplex, Duplex] {
  const ends: Duplex[] = [];

  const makeEnd = (self: string, other: string, index: number): Duplex => {
    const peer = (): Duplex | undefined => ends[1 - index];
    return new Duplex({
      read() {},
      write(chunk: Buffer, _encoding, callback) {
        const target = peer();
        if (target && network.canDeliver(self, other)) {
          const copy = Buffer.from(chunk);
          setImmediate(() => {
            if (!target.destroyed) target.push(copy);
          });
        }
        callback();
      },
      final(callback) {
        const target = peer();
        if (target && network.canDeliver(self, other)) {
          setImmediate(() => {
            if (!target.destroyed) target.push(null);
          });
        }
        callback();
      },
      destroy(err, callback) {
        const target = peer();
        if (target && network.canDeliver(self, other)) {
          setImmediate(() => {
            if (!target.destroyed) target.destroy();
          });
        }
        callback(err);
      },
    });
  };

  ends.push(makeEnd(addressA, addressB, 0), makeEnd(addressB, addressA, 1));
  return [ends[0], ends[1]];
}

class MemoryTransport implements Transport {
  readonly name = 'memory';
  private network: MemoryNetwork;
  private address: string;

  constructor(network: MemoryNetwork, address: string) {
    this.network = network;
    this.address = address;
  }

  async dial(endpoint: Endpoint, _timeoutMs: number): Promise<Duplex> {
    return this.network.connect(this.address, endpoint);
  }

  async listen(port: number, onStream: StreamHandler): Promise<TransportListener> {
    const boundPort = port === 0 ? this.network.allocatePort() : port;
    this.network.bind(this.address, boundPort, onStream);
    return {
      port: boundPort,
      close: async () => this.network.unbind(this.address, boundPort),
    };
  }
}

class MemoryAnnouncementChannel implements AnnouncementChannel {
  readonly address: string;
  private network: MemoryNetwork;
  private handlers: DatagramHandler[] = [];
  private isOpen = false;

  constructor(network: MemoryNetwork, address: string) {
    this.network = network;
    this.address = address;
  }

  async open(): Promise<void> {
    if (!this.network.isReachable(this.address)) {
      throw new NetworkUnavailableError();
    }
    this.isOpen = true;
    this.network.join(this);
  }

  async send(data: Buffer): Promise<void> {
    if (!this.isOpen) {
      throw new Error('Announcement channel is not open');
    }
    this.network.multicast(this.address, data);
  }

  async close(): Promise<void> {
    this.isOpen = false;
    this.network.leave(this);
  }

  onMessage(handler: DatagramHandler): void {
    this.handlers.push(handler);
  }

  /** @internal */
  deliver(data: Buffer, from: { address: string; port: number }): void {
    if (!this.isOpen) return;
    for (const handler of this.handlers) {
      handler(data, from);
    }
  }
}
