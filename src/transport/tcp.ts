import net from 'node:net';
import type { Duplex } from 'node:stream';
import { ConnectTimeoutError, TransportLostError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { Endpoint, StreamHandler, Transport, TransportListener } from './types.js';

export interface TcpTransportOptions {
  /** Interface to listen on (default: all) */
  host?: string;
  logger?: Logger;
}

/**
 * Plain TCP with Nagle disabled.
 */
export class TcpTransport implements Transport {
  readonly name = 'tcp';
  private host?: string;
  private logger: Logger;

  constructor(options: TcpTransportOptions = {}) {
    this.host = options.host;
    this.logger = options.logger ?? createLogger('tcp');
  }

  dial(endpoint: Endpoint, timeoutMs: number): Promise<Duplex> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: endpoint.address, port: endpoint.port });

      const cleanup = (): void => {
        clearTimeout(timer);
        socket.off('connect', onConnect);
        socket.off('error', onError);
      };

      const onConnect = (): void => {
        cleanup();
        socket.setNoDelay(true);
        resolve(socket);
      };

      const onError = (err: Error): void => {
        cleanup();
        socket.destroy();
        reject(new TransportLostError(`Cannot reach ${endpoint.address}:${endpoint.port}: ${err.message}`, err));
      };

      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new ConnectTimeoutError(endpoint.address, endpoint.port, timeoutMs));
      }, timeoutMs);

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });
  }

  listen(port: number, onStream: StreamHandler): Promise<TransportListener> {
    return new Promise((resolve, reject) => {
      const sockets = new Set<net.Socket>();
      const server = net.createServer((socket) => {
        socket.setNoDelay(true);
        sockets.add(socket);
        socket.once('close', () => sockets.delete(socket));
        onStream(socket, { address: socket.remoteAddress ?? 'unknown', port: socket.remotePort ?? 0 });
      });

      server.once('error', reject);
      server.listen(port, this.host, () => {
        server.off('error', reject);
        server.on('error', (err) => this.logger.error(`tcp listener error: ${err.message}`));

        const address = server.address();
        const boundPort = address !== null && typeof address === 'object' ? address.port : port;
        this.logger.debug(`listening on ${this.host ?? '*'}:${boundPort}`);

        resolve({
          port: boundPort,
          close: () => new Promise<void>((done) => {
            for (const socket of sockets) {
              socket.destroy();
            }
            server.close(() => done());
          }),
        });
      });
    });
  }
}
