import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the typed `db` instance (for queries).
 */
export function createDbClient(databaseUrl: string) {
  const sql = postgres(databaseUrl, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type Sql = ReturnType<typeof createDbClient>['sql'];

/**
 * Creates the `security_events` table when missing. Stands in for
 * `drizzle-kit migrate` on local runs.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS security_events (
      id           UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      event_id     VARCHAR(255) UNIQUE NOT NULL,
      event_type   VARCHAR(100) NOT NULL,
      severity     VARCHAR(20)  NOT NULL CHECK (severity IN ('low', 'medium', 'high', 'critical')),
      source       VARCHAR(255) NOT NULL,
      description  TEXT         NOT NULL DEFAULT '',
      event_data   JSONB        NOT NULL DEFAULT '{}',
      created_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at   TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_security_events_event_type ON security_events (event_type)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_security_events_severity ON security_events (severity)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_security_events_created_at ON security_events (created_at)`);
}
