export type {
  BrokerChannel,
  BrokerConnection,
  DeclareOptions,
  Delivery,
  DeliveryHandler,
  SubscribeOptions,
  Subscription,
} from './types.js';
export { connectWithRetry, DEFAULT_CONNECT_RETRY } from './connect.js';
export type { ConnectRetryOptions } from './connect.js';
export { AmqpConnection, AmqpChannel, dialAmqp } from './amqp-broker.js';
export { RedisConnection, RedisChannel, dialRedis } from './redis-broker.js';
export { MemoryBroker, MemoryConnection, MemoryChannel } from './memory-broker.js';
export { createBrokerConnection } from './factory.js';
export type { BrokerSettings } from './factory.js';
