import * as dgram from 'node:dgram';
import { networkInterfaces } from 'node:os';
import { NetworkUnavailableError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

export const DEFAULT_MULTICAST_GROUP = '239.255.77.16';
export const DEFAULT_DISCOVERY_PORT = 1716;

export interface DatagramSource {
  address: string;
  port: number;
}

export type DatagramHandler = (data: Buffer, from: DatagramSource) => void;

/**
 * Broadcast medium used by the discovery engine.
 */
export interface AnnouncementChannel {
  /**
   * @throws NetworkUnavailableError when no local network can be used
   */
  open(): Promise<void>;
  send(data: Buffer): Promise<void>;
  close(): Promise<void>;
  onMessage(handler: DatagramHandler): void;
}

export interface MulticastChannelOptions {
  group?: string;
  port?: number;
  /** Interface address to join the group on; defaults to every interface */
  interfaceAddress?: string;
  createSocket?: () => dgram.Socket;
  logger?: Logger;
}

const NETWORK_ERROR_CODES = new Set(['EADDRNOTAVAIL', 'ENETUNREACH', 'ENODEV', 'EHOSTUNREACH', 'ENETDOWN']);

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * True if at least one non-internal IPv4 interface is up.
 */
export function hasLocalNetwork(): boolean {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const info of addresses ?? []) {
      if (info.family === 'IPv4' && !info.internal) {
        return true;
      }
    }
  }
  return false;
}

/**
 * UDP multicast announcement channel.
 */
export class MulticastChannel implements AnnouncementChannel {
  private socket: dgram.Socket | null = null;
  private handlers: DatagramHandler[] = [];
  private group: string;
  private port: number;
  private interfaceAddress?: string;
  private createSocket: () => dgram.Socket;
  private logger: Logger;

  constructor(options: MulticastChannelOptions = {}) {
    this.group = options.group ?? DEFAULT_MULTICAST_GROUP;
    this.port = options.port ?? DEFAULT_DISCOVERY_PORT;
    this.interfaceAddress = options.interfaceAddress;
    this.createSocket = options.createSocket ?? (() => dgram.createSocket({ type: 'udp4', reuseAddr: true }));
    this.logger = options.logger ?? createLogger('multicast');
  }

  async open(): Promise<void> {
    if (this.socket) {
      return;
    }
    if (!hasLocalNetwork()) {
      throw new NetworkUnavailableError();
    }

    const socket = this.createSocket();

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        socket.close();
        const code = errorCode(err);
        reject(code && NETWORK_ERROR_CODES.has(code) ? new NetworkUnavailableError(err.message, err) : err);
      };

      socket.once('error', onError);
      socket.bind(this.port, () => {
        try {
          socket.addMembership(this.group, this.interfaceAddress);
          socket.setMulticastLoopback(true);
          socket.setMulticastTTL(1);
        } catch (err) {
          onError(err instanceof Error ? err : new Error(String(err)));
          return;
        }
        socket.off('error', onError);
        resolve();
      });
    });

    socket.on('error', (err) => {
      this.logger.warn(`multicast socket error: ${err.message}`);
    });
    socket.on('message', (data, rinfo) => {
      for (const handler of this.handlers) {
        handler(data, { address: rinfo.address, port: rinfo.port });
      }
    });

    this.socket = socket;
    this.logger.debug(`joined ${this.group}:${this.port}`);
  }

  async send(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new Error('Multicast channel is not open');
    }
    await new Promise<void>((resolve, reject) => {
      socket.send(data, this.port, this.group, (err) => {
        if (err) {
          const code = errorCode(err);
          reject(code && NETWORK_ERROR_CODES.has(code) ? new NetworkUnavailableError(err.message, err) : err);
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    await new Promise<void>((resolve) => socket.close(() => resolve()));
  }

  onMessage(handler: DatagramHandler): void {
    this.handlers.push(handler);
  }
}
