/**
 * 事件值对象 + 线格式编解码
 *
 * 线格式（流字段 `event`，JSON）：
 *   { id, type, timestamp(ISO-8601), data, metadata, retry_count }
 * type / timestamp 另外以独立字段写入流，供轻量过滤。
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { MalformedMessageError } from '../../core/errors';
import { type EventType, isEventType } from './event-types';

export type EventData = Record<string, unknown>;
export type EventMetadata = Record<string, unknown>;

export interface DomainEvent {
  readonly id: string;
  readonly type: EventType;
  readonly timestamp: Date;
  readonly data: Readonly<EventData>;
  readonly metadata: Readonly<EventMetadata>;
  /** 已经历的重投次数，首次发布为 0 */
  readonly retryCount: number;
}

export interface EventWireFormat {
  id: string;
  type: EventType;
  timestamp: string;
  data: EventData;
  metadata: EventMetadata;
  retry_count: number;
}

export function createEvent(
  type: EventType,
  data: EventData,
  metadata: EventMetadata = {},
): DomainEvent {
  return Object.freeze({
    id: randomUUID(),
    type,
    timestamp: new Date(),
    data: Object.freeze({ ...data }),
    metadata: Object.freeze({ ...metadata }),
    retryCount: 0,
  });
}

/** 重投用：新对象，retryCount + 1，metadata 复制一份 */
export function withRetry(event: DomainEvent): DomainEvent {
  return Object.freeze({
    ...event,
    metadata: Object.freeze({ ...event.metadata }),
    retryCount: event.retryCount + 1,
  });
}

/** DLQ 重放用：同一逻辑事件，重试预算清零 */
export function withRetryReset(event: DomainEvent): DomainEvent {
  return Object.freeze({
    ...event,
    metadata: Object.freeze({ ...event.metadata }),
    retryCount: 0,
  });
}

export function toWire(event: DomainEvent): EventWireFormat {
  return {
    id: event.id,
    type: event.type,
    timestamp: event.timestamp.toISOString(),
    data: { ...event.data },
    metadata: { ...event.metadata },
    retry_count: event.retryCount,
  };
}

export function encodeEvent(event: DomainEvent): string {
  return JSON.stringify(toWire(event));
}

// ============================================================
// 解码
// ============================================================

const wireSchema = z.object({
  id: z.string().min(1),
  type: z.custom<EventType>(
    (value) => typeof value === 'string' && isEventType(value),
    { message: 'unknown event type' },
  ),
  timestamp: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'invalid timestamp'),
  data: z.record(z.unknown()),
  metadata: z.record(z.unknown()).default({}),
  retry_count: z.number().int().min(0).optional(),
});

const legacyRetryCount = z.number().int().min(0).catch(0);

export function decodeEvent(raw: string): DomainEvent {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new MalformedMessageError('Event envelope is not valid JSON', {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = wireSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new MalformedMessageError(`Invalid event envelope: ${issues.join('; ')}`, { issues });
  }

  const wire = parsed.data;
  // 旧格式把重投次数放在 metadata.retry_count
  const retryCount = wire.retry_count ?? legacyRetryCount.parse(wire.metadata.retry_count ?? 0);

  return Object.freeze({
    id: wire.id,
    type: wire.type,
    timestamp: new Date(wire.timestamp),
    data: Object.freeze(wire.data),
    metadata: Object.freeze(wire.metadata),
    retryCount,
  });
}
