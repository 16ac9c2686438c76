import type { Duplex } from 'node:stream';
import WebSocket, { WebSocketServer, createWebSocketStream } from 'ws';
import { ConnectTimeoutError, TransportLostError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { Endpoint, StreamHandler, Transport, TransportListener } from './types.js';

export interface WebSocketTransportOptions {
  /** Interface to listen on (default: all) */
  host?: string;
  /** Request path (default: /lanlink) */
  path?: string;
  logger?: Logger;
}

function formatHost(address: string): string {
  return address.includes(':') ? `[${address}]` : address;
}

/**
 * Frames carried over WebSocket binary messages, for hosts that can only open WebSockets.
 */
export class WebSocketTransport implements Transport {
  readonly name = 'websocket';
  private host?: string;
  private path: string;
  private logger: Logger;

  constructor(options: WebSocketTransportOptions = {}) {
    this.host = options.host;
    this.path = options.path ?? '/lanlink';
    this.logger = options.logger ?? createLogger('websocket');
  }

  dial(endpoint: Endpoint, timeoutMs: number): Promise<Duplex> {
    return new Promise((resolve, reject) => {
      const url = `ws://${formatHost(endpoint.address)}:${endpoint.port}${this.path}`;
      const socket = new WebSocket(url);
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        socket.terminate();
        reject(new ConnectTimeoutError(endpoint.address, endpoint.port, timeoutMs));
      }, timeoutMs);

      socket.once('open', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(createWebSocketStream(socket));
      });

      socket.once('error', (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(new TransportLostError(`Cannot reach ${url}: ${err.message}`, err));
      });
    });
  }

  listen(port: number, onStream: StreamHandler): Promise<TransportListener> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port, host: this.host, path: this.path });

      wss.once('error', reject);

      wss.on('connection', (socket, request) => {
        onStream(createWebSocketStream(socket), {
          address: request.socket.remoteAddress ?? 'unknown',
          port: request.socket.remotePort ?? 0,
        });
      });

      wss.once('listening', () => {
        wss.off('error', reject);
        wss.on('error', (err) => this.logger.error(`websocket listener error: ${err.message}`));

        const address = wss.address();
        const boundPort = typeof address === 'object' ? address.port : port;
        this.logger.debug(`listening on ${this.host ?? '*'}:${boundPort}${this.path}`);

        resolve({
          port: boundPort,
          close: () => new Promise<void>((done) => {
            for (const client of wss.clients) {
              client.terminate();
            }
            wss.close(() => done());
          }),
        });
      });
    });
  }
}
