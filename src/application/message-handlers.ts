import type { Logger } from 'pino';
import type { Message } from '../domain/index.js';

/** Context handed to every handler invocation. */
export interface HandlerContext {
  readonly log: Logger;
  /** Aborted when the worker is stopping or the processing timeout elapses. */
  readonly signal: AbortSignal;
}

/**
 * Processes one message. Resolve = success, reject = failure.
 *
 * Handlers must tolerate duplicate deliveries of the same `message.id`:
 * delivery is at-least-once.
 */
export type MessageHandler = (message: Message, ctx: HandlerContext) => Promise<void>;

/**
 * Fallback for unknown message types: logs and succeeds, so an unknown
 * type is never dropped without a trace and never retried forever.
 */
export const defaultMessageHandler: MessageHandler = async (message, ctx) => {
  ctx.log.warn(
    { message_id: message.id, type: message.type },
    'No handler registered for message type, acknowledging without processing',
  );
};

/**
 * Maps the `type` discriminator of a message to its handler.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, MessageHandler>();

  constructor(private readonly fallback: MessageHandler = defaultMessageHandler) {}

  register(type: string, handler: MessageHandler): this {
    this.handlers.set(type, handler);
    return this;
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  resolve(type: string): MessageHandler {
    return this.handlers.get(type) ?? this.fallback;
  }

  /** Dispatches a message to the handler for its type. */
  dispatch(message: Message, ctx: HandlerContext): Promise<void> {
    return this.resolve(message.type)(message, ctx);
  }
}
