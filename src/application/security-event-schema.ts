import { z } from 'zod';
import { SEVERITIES } from '../domain/index.js';

/**
 * Zod schema for an inbound security event.
 *
 * `event_data` is an open object so producers can attach whatever
 * context their source emits.
 */
export const createSecurityEventSchema = z.object({
  event_type: z.string().min(1).max(100),
  severity: z.enum(SEVERITIES),
  source: z.string().min(1).max(255),
  description: z.string().default(''),
  event_data: z.record(z.string(), z.unknown()).default({}),
});

export type CreateSecurityEventInput = z.infer<typeof createSecurityEventSchema>;

/**
 * Zod schema for a partial update. Omitted fields keep their stored
 * value; `event_id` cannot be changed.
 */
export const updateSecurityEventSchema = z
  .object({
    event_type: z.string().min(1).max(100),
    severity: z.enum(SEVERITIES),
    source: z.string().min(1).max(255),
    description: z.string(),
    event_data: z.record(z.string(), z.unknown()),
  })
  .partial()
  .refine((changes) => Object.keys(changes).length > 0, {
    message: 'At least one field must be provided',
  });

export type UpdateSecurityEventInput = z.infer<typeof updateSecurityEventSchema>;
