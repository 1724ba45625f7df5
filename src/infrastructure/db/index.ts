export { securityEvents } from './schema.js';
export type { SecurityEventRow } from './schema.js';
export { createDbClient, ensureSchema } from './client.js';
export type { Database, Sql } from './client.js';
export { DrizzleEventRepository } from './event-repository.js';
export type { EventRepository, NewSecurityEvent, SecurityEventChanges } from './event-repository.js';
export { InMemoryEventRepository } from './in-memory-event-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
