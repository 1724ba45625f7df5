export { Mutex } from './mutex.js';
export { declareQueue, declareQueueSet } from './queue-declarator.js';
export { Publisher } from './publisher.js';
export { StatsReporter } from './stats-reporter.js';
export { QueueClient } from './queue-client.js';
export { default as queuePlugin } from './queue-plugin.js';
export type { QueuePluginOptions } from './queue-plugin.js';
