import type { Logger } from 'pino';
import { ConnectionError } from '../../domain/index.js';

export interface ConnectRetryOptions {
  /** Total dial attempts before giving up. */
  attempts: number;
  /** Fixed pause between attempts. */
  intervalMs: number;
}

export const DEFAULT_CONNECT_RETRY: ConnectRetryOptions = {
  attempts: 10,
  intervalMs: 2000,
};

/**
 * Dials the broker with a bounded number of attempts at a fixed interval.
 *
 * Meant for startup only: the interval does not grow and there is no
 * circuit breaker, so it must not be reused as a long-running reconnect
 * loop. Rejects with `ConnectionError` carrying the last failure.
 */
export async function connectWithRetry<T>(
  dial: () => Promise<T>,
  options: ConnectRetryOptions,
  log: Logger,
  sleep: (ms: number) => Promise<void> = defaultSleep,
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const connection = await dial();
      if (attempt > 1) {
        log.info({ attempt }, 'Broker connected after retry');
      }
      return connection;
    } catch (err: unknown) {
      lastError = err;
      log.warn({ err, attempt, maxAttempts: attempts }, 'Broker connection attempt failed');

      if (attempt < attempts) {
        await sleep(options.intervalMs);
      }
    }
  }

  throw new ConnectionError(attempts, lastError);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
