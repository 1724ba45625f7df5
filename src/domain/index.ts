export type { Message, MessagePayload, QueueSet } from './message.js';
export {
  MAX_RETRIES,
  SECURITY_EVENTS_QUEUE,
  SECURITY_EVENT_MESSAGE_TYPE,
  retryQueueName,
  deadQueueName,
  queueSet,
  withFailedAttempt,
} from './message.js';
export type { BackendKind, QueueDepth, QueueStatsEntry, QueueStats } from './broker.js';
export { BACKEND_KINDS } from './broker.js';
export type { SecurityEvent, SecurityEventData, Severity } from './security-event.js';
export { SEVERITIES } from './security-event.js';
export type { DeliveryErrorCode } from './errors.js';
export {
  DeliveryError,
  ConnectionError,
  DeclarationError,
  SerializationError,
  PublishError,
  ProcessingError,
  describeError,
} from './errors.js';
