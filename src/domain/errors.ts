/**
 * Error taxonomy of the delivery pipeline.
 *
 * Connection and declaration failures abort the calling operation.
 * Serialization failures are never retried. Processing failures stay
 * inside the consumer loop and end in a retry or a dead-letter.
 */

export type DeliveryErrorCode =
  | 'CONNECTION_ERROR'
  | 'DECLARATION_ERROR'
  | 'SERIALIZATION_ERROR'
  | 'PUBLISH_ERROR'
  | 'PROCESSING_ERROR';

export abstract class DeliveryError extends Error {
  abstract readonly code: DeliveryErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Broker unreachable after every dial attempt. Fatal at startup. */
export class ConnectionError extends DeliveryError {
  readonly code = 'CONNECTION_ERROR';

  constructor(
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`Failed to connect to broker after ${attempts} attempts: ${describeError(cause)}`, { cause });
  }
}

/** Queue could not be declared; it is unusable until resolved. */
export class DeclarationError extends DeliveryError {
  readonly code = 'DECLARATION_ERROR';

  constructor(
    readonly queueName: string,
    cause: unknown,
  ) {
    super(`Failed to declare queue ${queueName}: ${describeError(cause)}`, { cause });
  }
}

/** Message could not be encoded or decoded. Dropped, never retried. */
export class SerializationError extends DeliveryError {
  readonly code = 'SERIALIZATION_ERROR';
}

/** Broker rejected a write. The caller may retry explicitly. */
export class PublishError extends DeliveryError {
  readonly code = 'PUBLISH_ERROR';

  constructor(
    readonly queueName: string,
    cause: unknown,
  ) {
    super(`Failed to publish to queue ${queueName}: ${describeError(cause)}`, { cause });
  }
}

/** A handler failed to process a message. Retryable up to the retry budget. */
export class ProcessingError extends DeliveryError {
  readonly code = 'PROCESSING_ERROR';
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
