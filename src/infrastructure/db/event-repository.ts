import { desc, eq, sql } from 'drizzle-orm';
import type { SecurityEvent } from '../../domain/index.js';
import { SEVERITIES } from '../../domain/index.js';
import type { Database } from './client.js';
import { securityEvents } from './schema.js';
import type { SecurityEventRow } from './schema.js';

/** Fields supplied by the caller; the store assigns `id` and timestamps. */
export interface NewSecurityEvent {
  event_id: string;
  event_type: string;
  severity: SecurityEvent['severity'];
  source: string;
  description: string;
  event_data: Record<string, unknown>;
}

/** Fields an update may change; omitted ones keep their stored value. */
export type SecurityEventChanges = Partial<Omit<NewSecurityEvent, 'event_id'>>;

/** Persistence seam for security events. */
export interface EventRepository {
  insert(event: NewSecurityEvent): Promise<SecurityEvent>;
  /** Newest first. */
  list(): Promise<SecurityEvent[]>;
  findByEventId(eventId: string): Promise<SecurityEvent | undefined>;
  /** Applies `changes` and bumps `updated_at`. Undefined when no such event. */
  update(eventId: string, changes: SecurityEventChanges): Promise<SecurityEvent | undefined>;
  /** False when no such event. */
  delete(eventId: string): Promise<boolean>;
  /** Rejects when the store is unreachable. */
  ping(): Promise<void>;
}

export class DrizzleEventRepository implements EventRepository {
  constructor(private readonly db: Database) {}

  async insert(event: NewSecurityEvent): Promise<SecurityEvent> {
    const rows = await this.db.insert(securityEvents).values(event).returning();
    const row = rows[0];
    if (!row) {
      throw new Error(`Insert of event ${event.event_id} returned no row`);
    }
    return toSecurityEvent(row);
  }

  async list(): Promise<SecurityEvent[]> {
    const rows = await this.db
      .select()
      .from(securityEvents)
      .orderBy(desc(securityEvents.created_at));

    return rows.map(toSecurityEvent);
  }

  async findByEventId(eventId: string): Promise<SecurityEvent | undefined> {
    const rows = await this.db
      .select()
      .from(securityEvents)
      .where(eq(securityEvents.event_id, eventId))
      .limit(1);

    const row = rows[0];
    return row ? toSecurityEvent(row) : undefined;
  }

  async update(eventId: string, changes: SecurityEventChanges): Promise<SecurityEvent | undefined> {
    const rows = await this.db
      .update(securityEvents)
      .set({ ...changes, updated_at: new Date() })
      .where(eq(securityEvents.event_id, eventId))
      .returning();

    const row = rows[0];
    return row ? toSecurityEvent(row) : undefined;
  }

  async delete(eventId: string): Promise<boolean> {
    const rows = await this.db
      .delete(securityEvents)
      .where(eq(securityEvents.event_id, eventId))
      .returning({ id: securityEvents.id });

    return rows.length > 0;
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }
}

function toSecurityEvent(row: SecurityEventRow): SecurityEvent {
  const severity = SEVERITIES.find((s) => s === row.severity);
  if (!severity) {
    throw new Error(`Stored event ${row.event_id} has unknown severity ${row.severity}`);
  }

  return {
    id: row.id,
    event_id: row.event_id,
    event_type: row.event_type,
    severity,
    source: row.source,
    description: row.description,
    event_data: row.event_data,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}
