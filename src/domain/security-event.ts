/**
 * Security event as stored by the HTTP layer and carried inside a
 * `security_event` message payload.
 */

export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Free-form details attached to a security event. */
export type SecurityEventData = Record<string, unknown>;

export interface SecurityEvent {
  readonly id: string;
  readonly event_id: string;
  readonly event_type: string;
  readonly severity: Severity;
  readonly source: string;
  readonly description: string;
  readonly event_data: SecurityEventData;
  readonly created_at: string; // ISO-8601
  readonly updated_at: string; // ISO-8601
}
