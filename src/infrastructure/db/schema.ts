import { pgTable, uuid, varchar, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `security_events` table.
 *
 * `id` is the row key; `event_id` is the public identifier that also
 * becomes the id of the published queue message.
 */
export const securityEvents = pgTable('security_events', {
  id: uuid('id').primaryKey().defaultRandom(),
  event_id: varchar('event_id', { length: 255 }).notNull().unique(),
  event_type: varchar('event_type', { length: 100 }).notNull(),
  severity: varchar('severity', { length: 20 }).notNull(),
  source: varchar('source', { length: 255 }).notNull(),
  description: text('description').notNull().default(''),
  event_data: jsonb('event_data').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_security_events_event_type').on(table.event_type),
  index('idx_security_events_severity').on(table.severity),
  index('idx_security_events_created_at').on(table.created_at),
]);

export type SecurityEventRow = typeof securityEvents.$inferSelect;
