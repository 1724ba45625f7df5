import type { Logger } from 'pino';
import type { BackendKind } from '../../domain/index.js';
import type { BrokerConnection } from './types.js';
import { connectWithRetry } from './connect.js';
import type { ConnectRetryOptions } from './connect.js';
import { dialAmqp } from './amqp-broker.js';
import { dialRedis } from './redis-broker.js';
import { MemoryBroker } from './memory-broker.js';

export interface BrokerSettings {
  backend: BackendKind;
  amqpUrl: string;
  redisUrl: string;
  retry: ConnectRetryOptions;
}

/**
 * Connects to the configured backend with bounded startup retries.
 *
 * Rejects with `ConnectionError` when every attempt failed; the owning
 * process must not proceed.
 */
export async function createBrokerConnection(settings: BrokerSettings, log: Logger): Promise<BrokerConnection> {
  const brokerLog = log.child({ component: 'broker', backend: settings.backend });

  switch (settings.backend) {
    case 'rabbitmq':
      return connectWithRetry(() => dialAmqp(settings.amqpUrl, brokerLog), settings.retry, brokerLog);
    case 'redis':
      return connectWithRetry(() => dialRedis(settings.redisUrl, brokerLog), settings.retry, brokerLog);
    case 'memory':
      brokerLog.warn('Using the in-process broker: messages do not survive a restart');
      return new MemoryBroker(brokerLog).connect();
  }
}
