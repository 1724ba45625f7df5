export { messageWireSchema, encodeMessage, decodeMessage } from './message-codec.js';
export type { MessageWire } from './message-codec.js';
export { createSecurityEventSchema, updateSecurityEventSchema } from './security-event-schema.js';
export type { CreateSecurityEventInput, UpdateSecurityEventInput } from './security-event-schema.js';
export { decideFailureOutcome } from './retry-policy.js';
export type { FailureOutcome } from './retry-policy.js';
export { HandlerRegistry, defaultMessageHandler } from './message-handlers.js';
export type { MessageHandler, HandlerContext } from './message-handlers.js';
export { securityEventHandler } from './security-event-handler.js';
export { recordSecurityEvent } from './record-security-event.js';
export type {
  SecurityEventPublisher,
  RecordSecurityEventDeps,
  RecordedSecurityEvent,
} from './record-security-event.js';
