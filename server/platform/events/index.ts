// 事件层：统一导出
export { RedisStreamEventBus } from './event-bus';
export type {
  DeadLetter,
  EventBusOptions,
  EventBusStats,
  EventHandler,
  EventPublisher,
  HandlerFailure,
} from './event-bus';

export { createEvent, decodeEvent, encodeEvent, toWire, withRetry, withRetryReset } from './event';
export type { DomainEvent, EventData, EventMetadata, EventWireFormat } from './event';

export { ALL_EVENT_TYPES, EventType, eventCategory, isEventType } from './event-types';
export type { EventCategory } from './event-types';

export { MemoryStreamLog, compareStreamIds, parseStreamId } from './stream-log';
export type { PendingSummary, ReadGroupOptions, StreamEntry, StreamLog, StreamReader } from './stream-log';

export { InvestigationEventHandler, InvestigationProjection, LoggingEventHandler } from './handlers';
