import { createLogger, type Logger } from '../logger.js';
import type { Envelope, MessageKind, PayloadMap } from '../message/envelope.js';

export interface MessageContext {
  /** Sender */
  peerId: string;
}

export type MessageHandler<K extends MessageKind> = (
  payload: PayloadMap[K],
  context: MessageContext,
) => void | Promise<void>;

type HandlerTable = { [K in MessageKind]?: Array<MessageHandler<K>> };

/**
 * Routes decoded envelopes to the handlers registered for their kind.
 * A failing handler is logged and does not affect the others.
 */
export class MessageDispatcher {
  private handlers: HandlerTable = {};
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('dispatch');
  }

  /**
   * @returns a function that removes this registration
   */
  register<K extends MessageKind>(kind: K, handler: MessageHandler<K>): () => void {
    const list: Array<MessageHandler<K>> = this.handlers[kind] ?? [];
    list.push(handler);
    this.handlers[kind] = list;

    return () => {
      const index = list.indexOf(handler);
      if (index !== -1) {
        list.splice(index, 1);
      }
    };
  }

  hasHandlers(kind: MessageKind): boolean {
    return (this.handlers[kind]?.length ?? 0) > 0;
  }

  /**
   * @returns the number of handlers invoked (0 means unhandled)
   */
  dispatch<K extends MessageKind>(peerId: string, envelope: Envelope<K>): number {
    const list: Array<MessageHandler<K>> = this.handlers[envelope.kind] ?? [];
    const context: MessageContext = { peerId };

    const snapshot = [...list];
    for (const handler of snapshot) {
      try {
        const result = handler(envelope.payload, context);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportFailure(envelope.kind, peerId, err));
        }
      } catch (err) {
        this.reportFailure(envelope.kind, peerId, err);
      }
    }
    return snapshot.length;
  }

  clear(): void {
    this.handlers = {};
  }

  private reportFailure(kind: MessageKind, peerId: string, err: unknown): void {
    this.logger.error(`${kind} handler failed for ${peerId}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
