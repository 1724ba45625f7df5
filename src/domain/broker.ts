/** Broker implementations a queue client can run on. */
export type BackendKind = 'rabbitmq' | 'redis' | 'memory';

export const BACKEND_KINDS = ['rabbitmq', 'redis', 'memory'] as const satisfies readonly BackendKind[];

/** Depth of one queue as reported to operators. */
export interface QueueDepth {
  readonly length: number;
  readonly backendKind: BackendKind;
}

/** Per-queue stats entry: a depth, or the reason it could not be read. */
export type QueueStatsEntry = QueueDepth | { readonly error: string };

export type QueueStats = Record<string, QueueStatsEntry>;
