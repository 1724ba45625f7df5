import type { Logger } from 'pino';
import type { QueueStats, QueueStatsEntry } from '../../domain/index.js';
import { describeError } from '../../domain/index.js';
import type { BrokerChannel, BrokerConnection } from '../broker/index.js';

/**
 * Reports queue depth for observability. Read-only.
 *
 * Each queue is checked on a short-lived channel of its own: on AMQP a
 * failed passive check closes the channel, and one missing queue must
 * not hide the depth of the others.
 */
export class StatsReporter {
  constructor(
    private readonly connection: BrokerConnection,
    private readonly log: Logger,
  ) {}

  async stats(...queueNames: string[]): Promise<QueueStats> {
    const entries = await Promise.all(
      queueNames.map(async (name) => [name, await this.queueStats(name)] as const),
    );
    return Object.fromEntries(entries);
  }

  private async queueStats(name: string): Promise<QueueStatsEntry> {
    let channel: BrokerChannel | undefined;
    try {
      channel = await this.connection.openChannel();
      const length = await channel.depth(name);
      return { length, backendKind: this.connection.kind };
    } catch (err: unknown) {
      this.log.warn({ err, queue: name }, 'Failed to read queue depth');
      return { error: describeError(err) };
    } finally {
      if (channel) {
        await channel.close().catch((err: unknown) => {
          this.log.debug({ err, queue: name }, 'Stats channel already closed');
        });
      }
    }
  }
}
