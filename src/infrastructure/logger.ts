import { pino } from 'pino';
import type { Logger } from 'pino';

/** Root logger for processes that do not run inside Fastify. */
export function createLogger(level: string, bindings: Record<string, unknown> = {}): Logger {
  return pino({ level, base: { pid: process.pid, ...bindings } });
}
