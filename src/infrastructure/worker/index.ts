export { ConsumerLoop } from './consumer-loop.js';
export type { ConsumerLoopOptions } from './consumer-loop.js';
export { WorkerPool } from './worker-pool.js';
export type { WorkerPoolOptions, WorkerPoolHandle } from './worker-pool.js';
export { WORKER_BACKEND_KINDS, createWorkerCommand, parseWorkerArgs } from './cli.js';
export type { WorkerBackendKind, WorkerCliOptions } from './cli.js';
