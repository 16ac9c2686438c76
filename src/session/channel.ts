import type { Duplex } from 'node:stream';
import { LinkError, TransportLostError } from '../errors.js';
import { encode, FrameDecoder, type FrameResult } from '../message/codec.js';
import type { AnyEnvelope, DecodedEnvelope } from '../message/envelope.js';
import type { Endpoint } from '../transport/types.js';

export const DEFAULT_FLUSH_TIMEOUT_MS = 1000;

export interface ChannelHandlers {
  envelope(envelope: DecodedEnvelope): void;
  /** A frame that could not be decoded; the channel stays open */
  frameError?(error: LinkError): void;
  /** The stream ended or failed; called at most once */
  closed?(error?: Error): void;
}

export interface FramedChannelOptions {
  maxFrameBytes?: number;
  remote?: Endpoint;
  now?: () => number;
}

/**
 * Envelope stream over a byte stream.
 *
 * Inbound frames are handed to whoever is attached; while nobody is, they are
 * buffered in order. Outbound frames go through a single FIFO writer, so the
 * order of `send()` calls is the order on the wire.
 */
export class FramedChannel {
  readonly remote?: Endpoint;
  private stream: Duplex;
  private decoder: FrameDecoder;
  private maxFrameBytes?: number;
  private now: () => number;
  private handlers: ChannelHandlers | null = null;
  private backlog: FrameResult[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;
  private closeError?: Error;
  private lastActivityAt: number;

  constructor(stream: Duplex, options: FramedChannelOptions = {}) {
    this.stream = stream;
    this.remote = options.remote;
    this.maxFrameBytes = options.maxFrameBytes;
    this.decoder = new FrameDecoder({ maxFrameBytes: options.maxFrameBytes });
    this.now = options.now ?? Date.now;
    this.lastActivityAt = this.now();

    stream.on('data', (chunk: Buffer | string) => this.handleData(typeof chunk === 'string' ? Buffer.from(chunk) : chunk));
    stream.on('end', () => this.handleClosed());
    stream.on('close', () => this.handleClosed());
    stream.on('error', (err: Error) => this.handleClosed(err));
  }

  /**
   * Time of the last inbound frame or non-keepalive outbound frame.
   */
  get lastActivity(): number {
    return this.lastActivityAt;
  }

  /** Frames queued or in flight */
  get pendingWrites(): number {
    return this.pending;
  }

  isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Route inbound frames to `handlers`, starting with any buffered ones.
   */
  attach(handlers: ChannelHandlers): void {
    this.handlers = handlers;
    while (this.handlers === handlers && this.backlog.length > 0) {
      const next = this.backlog.shift();
      if (next) this.deliver(next);
    }
    if (this.handlers === handlers && this.closed) {
      handlers.closed?.(this.closeError);
    }
  }

  detach(): void {
    this.handlers = null;
  }

  /**
   * Wait for the first envelope `select` maps to a value. Envelopes it
   * rejects are dropped, and so are malformed frames (passed to
   * `onFrameError` if given); envelopes after the match stay buffered.
   *
   * @throws TransportLostError if the channel closes or nothing matches in time
   */
  waitFor<T>(
    timeoutMs: number,
    select: (envelope: DecodedEnvelope) => T | undefined,
    onFrameError?: (error: LinkError) => void,
  ): Promise<T> {
    return new Promise((resolve, reject) => {
      const finish = (): void => {
        clearTimeout(timer);
        if (this.handlers === handlers) this.detach();
      };

      const timer = setTimeout(() => {
        finish();
        reject(new TransportLostError(`No reply within ${timeoutMs}ms`));
      }, timeoutMs);

      const handlers: ChannelHandlers = {
        envelope: (envelope) => {
          const value = select(envelope);
          if (value !== undefined) {
            finish();
            resolve(value);
          }
        },
        frameError: (error) => {
          onFrameError?.(error);
        },
        closed: (error) => {
          finish();
          reject(new TransportLostError('Channel closed while waiting for a reply', error));
        },
      };

      this.attach(handlers);
    });
  }

  firstEnvelope(timeoutMs: number, onFrameError?: (error: LinkError) => void): Promise<DecodedEnvelope> {
    return this.waitFor(timeoutMs, envelope => envelope, onFrameError);
  }

  /**
   * Queue an envelope; resolves once it has been written to the stream.
   *
   * @throws PayloadTooLargeError before anything is queued
   * @throws TransportLostError if the stream is gone
   */
  send(envelope: AnyEnvelope): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportLostError());
    }

    let frame: Buffer;
    try {
      frame = encode(envelope, { maxFrameBytes: this.maxFrameBytes });
    } catch (err) {
      return Promise.reject(err);
    }

    if (envelope.kind !== 'ping') {
      this.lastActivityAt = this.now();
    }

    this.pending++;
    const write = this.writeChain.then(() => this.write(frame));
    this.writeChain = write.then(() => undefined, () => undefined);
    return write.finally(() => {
      this.pending--;
    });
  }

  /**
   * Flush queued frames (bounded by `flushTimeoutMs`), then end the stream.
   */
  async close(options: { flushTimeoutMs?: number } = {}): Promise<void> {
    const flushTimeoutMs = options.flushTimeoutMs ?? DEFAULT_FLUSH_TIMEOUT_MS;
    if (this.stream.destroyed) {
      this.handleClosed();
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    await Promise.race([
      this.writeChain,
      new Promise<void>(resolve => {
        timer = setTimeout(resolve, flushTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    await new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(endTimer);
        this.stream.destroy();
        resolve();
      };
      const endTimer = setTimeout(done, flushTimeoutMs);
      this.stream.end(done);
    });
    this.handleClosed();
  }

  /**
   * Drop the stream without flushing.
   */
  destroy(): void {
    this.stream.destroy();
    this.handleClosed();
  }

  private write(frame: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.closed || this.stream.destroyed) {
        reject(new TransportLostError());
        return;
      }
      this.stream.write(frame, (err) => {
        if (err) {
          reject(new TransportLostError(err.message, err));
        } else {
          resolve();
        }
      });
    });
  }

  private handleData(chunk: Buffer): void {
    this.lastActivityAt = this.now();
    for (const result of this.decoder.push(chunk)) {
      if (this.handlers) {
        this.deliver(result);
      } else {
        this.backlog.push(result);
      }
    }
  }

  private deliver(result: FrameResult): void {
    const handlers = this.handlers;
    if (!handlers) {
      this.backlog.push(result);
      return;
    }
    if (result.ok) {
      handlers.envelope(result.envelope);
    } else {
      handlers.frameError?.(result.error);
    }
  }

  private handleClosed(error?: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.closeError = error;
    if (!this.stream.destroyed) {
      this.stream.destroy();
    }
    this.handlers?.closed?.(error);
  }
}
