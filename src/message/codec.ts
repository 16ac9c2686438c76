import { DecodeError, PayloadTooLargeError, type LinkError } from '../errors.js';
import { createEnvelope, isMessageKind, type AnyEnvelope, type DecodedEnvelope } from './envelope.js';
import { isRecord, payloadFromWire, payloadToWire } from './schema.js';

/**
 * Wire protocol version written into every frame.
 * Peers tolerate higher versions as long as the kinds they know keep their shape.
 */
export const PROTOCOL_VERSION = 1;

/** Hard cap on a single serialized frame (64 MiB) */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024;

const NEWLINE = 0x0a;

export interface CodecOptions {
  maxFrameBytes?: number;
}

/**
 * Serialize an envelope to one newline-terminated JSON line.
 * @throws PayloadTooLargeError if the line exceeds the frame cap
 */
export function encode(envelope: AnyEnvelope, options: CodecOptions = {}): Buffer {
  const limit = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  const line = JSON.stringify({
    v: PROTOCOL_VERSION,
    kind: envelope.kind,
    payload: payloadToWire(envelope.payload),
  }) + '\n';

  const size = Buffer.byteLength(line, 'utf-8');
  if (size > limit) {
    throw new PayloadTooLargeError(size, limit);
  }
  return Buffer.from(line, 'utf-8');
}

/**
 * Parse one frame (without or with its trailing newline).
 * Unknown kinds decode to the `unknown` variant; anything structurally invalid throws.
 * @throws DecodeError
 */
export function decode(line: string | Buffer): DecodedEnvelope {
  const text = (typeof line === 'string' ? line : line.toString('utf-8')).trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DecodeError('Frame is not valid JSON', err instanceof Error ? err : undefined);
  }

  if (!isRecord(parsed)) {
    throw new DecodeError('Frame must be a JSON object');
  }

  const { v, kind, payload } = parsed;
  if (v !== undefined && (typeof v !== 'number' || !Number.isInteger(v) || v < 1)) {
    throw new DecodeError('Frame version must be a positive integer');
  }
  if (typeof kind !== 'string' || kind === '') {
    throw new DecodeError('Frame kind must be a non-empty string');
  }

  if (!isMessageKind(kind)) {
    return { kind: 'unknown', rawKind: kind, raw: parsed };
  }

  return createEnvelope(kind, payloadFromWire(kind, payload));
}

export type FrameResult =
  | { ok: true; envelope: DecodedEnvelope }
  | { ok: false; error: LinkError };

/**
 * Reassembles newline-delimited frames from arbitrarily split chunks.
 *
 * A frame's size includes its newline, the same measure encode() applies.
 */
export class FrameDecoder {
  private chunks: Buffer[] = [];
  private pendingBytes = 0;
  private discarding = false;
  private maxFrameBytes: number;

  constructor(options: CodecOptions = {}) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  /**
   * Feed a chunk; returns one result per complete line in arrival order.
   * Only the new chunk is scanned for newlines.
   */
  push(chunk: Buffer): FrameResult[] {
    const results: FrameResult[] = [];

    let start = 0;
    let newline = chunk.indexOf(NEWLINE, start);
    while (newline !== -1) {
      const result = this.completeLine(chunk.subarray(start, newline));
      if (result) results.push(result);
      start = newline + 1;
      newline = chunk.indexOf(NEWLINE, start);
    }

    if (start < chunk.length && !this.discarding) {
      this.chunks.push(chunk.subarray(start));
      this.pendingBytes += chunk.length - start;
      if (this.pendingBytes >= this.maxFrameBytes) {
        // Can no longer fit along with its newline
        results.push({ ok: false, error: new PayloadTooLargeError(this.pendingBytes + 1, this.maxFrameBytes) });
        this.discarding = true;
        this.chunks = [];
        this.pendingBytes = 0;
      }
    }

    return results;
  }

  /**
   * Bytes held for an incomplete frame.
   */
  pending(): number {
    return this.pendingBytes;
  }

  reset(): void {
    this.chunks = [];
    this.pendingBytes = 0;
    this.discarding = false;
  }

  private completeLine(piece: Buffer): FrameResult | undefined {
    if (this.discarding) {
      // Tail of an oversized frame
      this.discarding = false;
      return undefined;
    }

    const size = this.pendingBytes + piece.length + 1;
    const line = this.chunks.length === 0 ? piece : Buffer.concat([...this.chunks, piece]);
    this.chunks = [];
    this.pendingBytes = 0;

    if (size > this.maxFrameBytes) {
      return { ok: false, error: new PayloadTooLargeError(size, this.maxFrameBytes) };
    }
    if (line.toString('utf-8').trim() === '') {
      return undefined;
    }
    return this.decodeLine(line);
  }

  private decodeLine(line: Buffer): FrameResult {
    try {
      return { ok: true, envelope: decode(line) };
    } catch (err) {
      return {
        ok: false,
        error: err instanceof DecodeError ? err : new DecodeError(err instanceof Error ? err.message : String(err)),
      };
    }
  }
}
