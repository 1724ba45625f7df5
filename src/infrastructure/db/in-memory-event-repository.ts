import { randomUUID } from 'node:crypto';
import type { SecurityEvent } from '../../domain/index.js';
import type { EventRepository, NewSecurityEvent, SecurityEventChanges } from './event-repository.js';

/**
 * Event store held in process memory. Used by tests and by the server
 * when it runs against the in-memory broker.
 */
export class InMemoryEventRepository implements EventRepository {
  private readonly events = new Map<string, SecurityEvent>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insert(event: NewSecurityEvent): Promise<SecurityEvent> {
    if (this.events.has(event.event_id)) {
      throw new Error(`Event ${event.event_id} already exists`);
    }

    const timestamp = this.now().toISOString();
    const stored: SecurityEvent = { id: randomUUID(), ...event, created_at: timestamp, updated_at: timestamp };
    this.events.set(stored.event_id, stored);
    return stored;
  }

  async list(): Promise<SecurityEvent[]> {
    // Stable for equal timestamps: later inserts first.
    return [...this.events.values()].reverse().sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  async findByEventId(eventId: string): Promise<SecurityEvent | undefined> {
    return this.events.get(eventId);
  }

  async update(eventId: string, changes: SecurityEventChanges): Promise<SecurityEvent | undefined> {
    const existing = this.events.get(eventId);
    if (!existing) return undefined;

    const updated: SecurityEvent = {
      ...existing,
      event_type: changes.event_type ?? existing.event_type,
      severity: changes.severity ?? existing.severity,
      source: changes.source ?? existing.source,
      description: changes.description ?? existing.description,
      event_data: changes.event_data ?? existing.event_data,
      updated_at: this.now().toISOString(),
    };
    this.events.set(eventId, updated);
    return updated;
  }

  async delete(eventId: string): Promise<boolean> {
    return this.events.delete(eventId);
  }

  async ping(): Promise<void> {
    // Always reachable
  }
}
