import type { Duplex } from 'node:stream';

/**
 * Host and port of a reachable peer.
 */
export interface Endpoint {
  address: string;
  port: number;
}

/**
 * Called for every accepted connection.
 */
export type StreamHandler = (stream: Duplex, remote: Endpoint) => void;

export interface TransportListener {
  /** Bound port (resolved when listening on port 0) */
  readonly port: number;
  close(): Promise<void>;
}

/**
 * Reliable, ordered byte streams between two hosts.
 */
export interface Transport {
  readonly name: string;
  /**
   * @throws ConnectTimeoutError if no connection is made within `timeoutMs`
   * @throws TransportLostError if the peer cannot be reached
   */
  dial(endpoint: Endpoint, timeoutMs: number): Promise<Duplex>;
  listen(port: number, onStream: StreamHandler): Promise<TransportListener>;
}

/**
 * Turns a raw stream into a secured one (e.g. a TLS or Noise session).
 * Runs once per connection, before any frame is exchanged.
 */
export type StreamWrapper = (stream: Duplex, role: 'initiator' | 'responder', remote: Endpoint) => Promise<Duplex>;

/**
 * Apply `wrapper` to every stream the transport dials or accepts.
 * An accepted stream whose wrapper fails is destroyed and never reaches the handler.
 */
export function wrapTransport(transport: Transport, wrapper: StreamWrapper): Transport {
  return {
    name: transport.name,
    async dial(endpoint, timeoutMs) {
      const stream = await transport.dial(endpoint, timeoutMs);
      try {
        return await wrapper(stream, 'initiator', endpoint);
      } catch (err) {
        stream.destroy();
        throw err;
      }
    },
    listen(port, onStream) {
      return transport.listen(port, (stream, remote) => {
        wrapper(stream, 'responder', remote).then(
          wrapped => onStream(wrapped, remote),
          () => stream.destroy(),
        );
      });
    },
  };
}
