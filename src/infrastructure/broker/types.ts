import type { BackendKind } from '../../domain/index.js';

/**
 * Transport capability the delivery pipeline is written against.
 *
 * The shape follows AMQP 0-9-1: a connection hands out channels, a
 * channel declares queues, writes persistent messages and runs
 * prefetch-bounded consumers that ack or nack each delivery.
 * `rabbitmq` implements it natively; `redis` and `memory` emulate it.
 */

export interface DeclareOptions {
  /** Survives a broker restart. Defaults to true. */
  durable?: boolean;
}

/** One message handed to a consumer and awaiting ack or nack. */
export interface Delivery {
  /** Queue the message was delivered from. */
  readonly queue: string;
  readonly body: Buffer;
  /** True when the broker delivered this message at least once before. */
  readonly redelivered: boolean;
  ack(): Promise<void>;
  /** `requeue = true` puts the message back on its queue; false discards it. */
  nack(requeue: boolean): Promise<void>;
}

export type DeliveryHandler = (delivery: Delivery) => Promise<void>;

export interface SubscribeOptions {
  /**
   * Maximum unacknowledged deliveries held by the channel across all of
   * its consumers.
   */
  prefetch: number;
}

export interface Subscription {
  /** Stops new deliveries. Deliveries already handed out stay unacked. */
  cancel(): Promise<void>;
}

/**
 * Logical channel. Not safe for concurrent writes from several owners:
 * give each worker its own channel, or serialize writes (see Publisher).
 */
export interface BrokerChannel {
  declare(queue: string, options?: DeclareOptions): Promise<void>;
  /** Writes one persistent message to `queue`. */
  send(queue: string, body: Buffer): Promise<void>;
  subscribe(queues: readonly string[], handler: DeliveryHandler, options: SubscribeOptions): Promise<Subscription>;
  /** Pulls one ready message, or null when the queue is empty. */
  get(queue: string): Promise<Delivery | null>;
  /** Ready messages in `queue`. Passive: fails when the queue does not exist. */
  depth(queue: string): Promise<number>;
  /** Closes the channel; its unacknowledged deliveries become redeliverable. */
  close(): Promise<void>;
}

export interface BrokerConnection {
  readonly kind: BackendKind;
  openChannel(): Promise<BrokerChannel>;
  /**
   * Registers a callback for an unexpected connection drop. There is no
   * automatic reconnection; owners are expected to exit.
   */
  onLost(listener: (err: Error) => void): void;
  close(): Promise<void>;
}
