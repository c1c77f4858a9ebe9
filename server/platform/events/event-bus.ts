/**
 * ============================================================================
 * 持久化事件总线：RedisStreamEventBus
 * ============================================================================
 *
 * 职责：
 *   1. 发布：按事件分类写入 "{prefix}:{category}" 流（MAXLEN ~ 截断）
 *   2. 订阅：每个分类一个消费者组 + 一个消费循环（XREADGROUP BLOCK）
 *   3. 重试：处理失败的事件以 retryCount + 1 重新追加到同一流
 *   4. 死信：重试耗尽后写入 "{prefix}:dlq"，附带每个处理器的错误
 *   5. 待确认恢复：启动时先重放本消费者名下未确认的条目（至少一次）
 *   6. 死信查看 / 重放
 *
 * 投递语义：至少一次。处置（成功/重试/死信）确定后才 XACK；
 * 处置本身写入失败时条目保持待确认，下次启动时恢复。
 */

import { randomUUID } from 'crypto';
import { MalformedMessageError, errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { type MetricsCollector, metricsCollector } from '../middleware/metricsCollector';
import {
  type DomainEvent,
  type EventData,
  type EventMetadata,
  createEvent,
  decodeEvent,
  encodeEvent,
  withRetry,
  withRetryReset,
} from './event';
import { type EventCategory, type EventType, eventCategory } from './event-types';
import type { StreamEntry, StreamLog, StreamReader } from './stream-log';

const log = createModuleLogger('event-bus');

// ============================================================================
// 类型
// ============================================================================

export interface EventHandler {
  /** 用于日志与死信中的错误归属 */
  readonly name: string;
  readonly eventTypes: readonly EventType[];
  handle(event: DomainEvent): Promise<void>;
  /** 处理失败后的回调；自身抛出的错误只记录 */
  onError?(event: DomainEvent, error: unknown): Promise<void>;
}

/** 写侧只需要发布能力 */
export interface EventPublisher {
  publish(type: EventType, data: EventData, metadata?: EventMetadata): Promise<string>;
}

export interface EventBusOptions {
  streamPrefix: string;
  consumerGroup: string;
  maxRetries: number;
  maxStreamLength: number;
  dlqMaxLength: number;
  batchSize: number;
  blockMs: number;
  errorBackoffMs: number;
}

const DEFAULT_OPTIONS: EventBusOptions = {
  streamPrefix: 'events',
  consumerGroup: 'cidadao-ai',
  maxRetries: 3,
  maxStreamLength: 10000,
  dlqMaxLength: 1000,
  batchSize: 10,
  blockMs: 1000,
  errorBackoffMs: 1000,
};

export interface EventBusStats {
  eventsPublished: number;
  eventsProcessed: number;
  eventsFailed: number;
  eventsRetried: number;
  eventsDropped: number;
  handlersRegistered: number;
  eventTypesHandled: EventType[];
  consumersActive: number;
  running: boolean;
}

export interface HandlerFailure {
  handler: string;
  error: string;
}

export interface DeadLetter {
  entryId: string;
  /** 无法解码的条目为 null，原文见 rawEvent */
  event: DomainEvent | null;
  rawEvent: string;
  errors: HandlerFailure[];
  failedAt: Date | null;
  sourceStream: string | null;
}

interface Consumer {
  category: EventCategory;
  stream: string;
  reader: StreamReader;
  loop: Promise<void>;
}

// ============================================================================
// 事件总线
// ============================================================================

export class RedisStreamEventBus implements EventPublisher {
  private readonly options: EventBusOptions;
  private handlers = new Map<EventType, EventHandler[]>();
  private consumers: Consumer[] = [];
  private running = false;
  private stopping = false;
  private starting: Promise<void> | null = null;
  private consumerName: string | null = null;
  private backoffWakers = new Set<() => void>();

  private stats = {
    eventsPublished: 0,
    eventsProcessed: 0,
    eventsFailed: 0,
    eventsRetried: 0,
    eventsDropped: 0,
  };

  constructor(
    private readonly streamLog: StreamLog,
    options: Partial<EventBusOptions> = {},
    private readonly metrics: MetricsCollector = metricsCollector,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  streamName(category: EventCategory): string {
    return `${this.options.streamPrefix}:${category}`;
  }

  get deadLetterStream(): string {
    return `${this.options.streamPrefix}:dlq`;
  }

  // ==========================================================================
  // 发布
  // ==========================================================================

  /**
   * 发布事件，返回事件 ID（不是流条目 ID）
   * @throws TransportError 日志存储不可用；总线不重试
   */
  async publish(type: EventType, data: EventData, metadata: EventMetadata = {}): Promise<string> {
    const event = createEvent(type, data, metadata);
    const category = eventCategory(type);
    const stream = this.streamName(category);

    await this.streamLog.append(stream, this.toFields(event), this.options.maxStreamLength);

    this.stats.eventsPublished++;
    this.metrics.recordEvent(category, 'published');
    log.debug(`Published event ${event.id} of type ${type} to ${stream}`);
    return event.id;
  }

  // ==========================================================================
  // 订阅
  // ==========================================================================

  /**
   * 注册处理器；同一类型可有多个处理器，全部调用
   * @param types 默认使用 handler.eventTypes
   */
  registerHandler(handler: EventHandler, types?: readonly EventType[]): void {
    const toRegister = types ?? handler.eventTypes;
    for (const type of toRegister) {
      const list = this.handlers.get(type) ?? [];
      list.push(handler);
      this.handlers.set(type, list);
      log.info(`Registered handler ${handler.name} for ${type}`);

      if (this.running && !this.consumers.some(c => c.category === eventCategory(type))) {
        log.warn(`Handler ${handler.name} registered for ${type} while running; restart the bus to consume ${this.streamName(eventCategory(type))}`);
      }
    }
  }

  /**
   * 启动消费：每个已注册分类一个消费者组 + 一个消费循环
   */
  async start(consumerName?: string): Promise<void> {
    if (this.starting) return this.starting;
    if (this.running) {
      log.warn('Event bus already running');
      return;
    }

    this.stopping = false;
    this.starting = this.launch(consumerName);
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  private async launch(consumerName?: string): Promise<void> {
    const name = consumerName ?? `consumer-${randomUUID().replace(/-/g, '').slice(0, 8)}`;
    const categories = new Set<EventCategory>();
    for (const type of this.handlers.keys()) {
      categories.add(eventCategory(type));
    }

    for (const category of categories) {
      const stream = this.streamName(category);
      const created = await this.streamLog.createGroup(stream, this.options.consumerGroup, '0');
      if (created) {
        log.info(`Created consumer group ${this.options.consumerGroup} for ${stream}`);
      }
    }

    // 建组期间收到 stop()
    if (this.stopping) {
      log.info('Event bus stopped during startup, consumers not launched');
      return;
    }

    this.running = true;
    this.consumerName = name;

    for (const category of categories) {
      const stream = this.streamName(category);
      const reader = this.streamLog.openReader(`${name}:${category}`);
      const loop = this.consume(category, stream, name, reader);
      this.consumers.push({ category, stream, reader, loop });
    }

    log.info(`Event bus started with ${this.consumers.length} consumers (consumer=${name})`);
  }

  /**
   * 停止所有消费循环并等待其退出；幂等。启动进行中时等待启动结束后再停
   */
  async stop(): Promise<void> {
    if (this.starting) {
      this.stopping = true;
      // 启动失败由 start() 的调用方处理
      await Promise.allSettled([this.starting]);
    }
    if (!this.running) return;
    this.stopping = true;

    for (const wake of [...this.backoffWakers]) wake();

    const consumers = this.consumers;
    await Promise.all(consumers.map(c => c.reader.close()));
    await Promise.all(consumers.map(c => c.loop));

    this.consumers = [];
    this.running = false;
    this.consumerName = null;
    log.info('Event bus stopped');
  }

  getStats(): EventBusStats {
    let handlersRegistered = 0;
    for (const list of this.handlers.values()) handlersRegistered += list.length;
    return {
      ...this.stats,
      handlersRegistered,
      eventTypesHandled: [...this.handlers.keys()],
      consumersActive: this.consumers.length,
      running: this.running,
    };
  }

  getConsumerName(): string | null {
    return this.consumerName;
  }

  // ==========================================================================
  // 死信
  // ==========================================================================

  /** 最近的死信（新的在前） */
  async getDeadLetters(limit: number = 50): Promise<DeadLetter[]> {
    const entries = await this.streamLog.revRange(this.deadLetterStream, '+', '-', limit);
    return entries.map(entry => this.toDeadLetter(entry));
  }

  /**
   * 重放死信：重试预算清零后追加回原分类流，并删除死信条目
   * @returns 条目不存在时 false
   * @throws MalformedMessageError 死信中的事件无法解码
   */
  async replayDeadLetter(entryId: string): Promise<boolean> {
    const [entry] = await this.streamLog.range(this.deadLetterStream, entryId, entryId, 1);
    if (!entry) return false;

    const raw = entry.fields.event;
    if (raw === undefined) {
      throw new MalformedMessageError('Dead letter has no event field', { entryId });
    }
    const event = withRetryReset(decodeEvent(raw));
    const stream = this.streamName(eventCategory(event.type));

    await this.streamLog.append(stream, this.toFields(event), this.options.maxStreamLength);
    await this.streamLog.delete(this.deadLetterStream, [entryId]);
    log.info(`Replayed dead letter ${entryId} (event ${event.id}) to ${stream}`);
    return true;
  }

  // ==========================================================================
  // 消费循环
  // ==========================================================================

  private async consume(category: EventCategory, stream: string, consumer: string, reader: StreamReader): Promise<void> {
    const clog = log.child(category, { stream, consumer });
    clog.info('Starting consumer');
    const group = this.options.consumerGroup;
    // 先按 ID 递增重放本消费者的待确认条目，读空后切到新消息
    let recoverFrom: string | null = '0';

    while (!this.stopping) {
      try {
        const entries: StreamEntry[] = recoverFrom !== null
          ? await reader.readGroup(group, consumer, stream, { count: this.options.batchSize, fromId: recoverFrom })
          : await reader.readGroup(group, consumer, stream, { count: this.options.batchSize, blockMs: this.options.blockMs });

        if (recoverFrom !== null) {
          if (entries.length === 0) {
            recoverFrom = null;
            continue;
          }
          clog.info(`Recovering ${entries.length} pending entries`);
          recoverFrom = entries[entries.length - 1].id;
        }

        for (const entry of entries) {
          if (this.stopping) break;
          await this.processEntry(category, stream, entry);
        }
      } catch (err) {
        if (this.stopping) break;
        clog.error('Error consuming from stream:', err);
        await this.backoff();
      }
    }

    clog.info('Consumer exited');
  }

  private async processEntry(category: EventCategory, stream: string, entry: StreamEntry): Promise<void> {
    if (entry.trimmed) {
      log.warn(`Pending entry ${entry.id} on ${stream} was trimmed before it was processed, acknowledging`);
      this.stats.eventsDropped++;
      this.metrics.recordEvent(category, 'dropped');
      await this.ack(stream, entry.id);
      return;
    }

    const raw = entry.fields.event;

    let event: DomainEvent;
    try {
      if (raw === undefined) {
        throw new MalformedMessageError('Stream entry has no event field', { entryId: entry.id });
      }
      event = decodeEvent(raw);
    } catch (err) {
      log.error(`Malformed entry ${entry.id} on ${stream}, moving to DLQ: ${errorMessage(err)}`);
      const parked = await this.writeDeadLetter(
        raw ?? JSON.stringify(entry.fields),
        [{ handler: 'decoder', error: errorMessage(err) }],
        stream,
      );
      if (!parked) return;
      this.stats.eventsFailed++;
      this.metrics.recordEvent(category, 'failed');
      await this.ack(stream, entry.id);
      return;
    }

    const handlers = this.handlers.get(event.type) ?? [];
    if (handlers.length === 0) {
      log.warn(`No handlers for event type ${event.type}, dropping ${event.id}`);
      this.stats.eventsDropped++;
      this.metrics.recordEvent(category, 'dropped');
      await this.ack(stream, entry.id);
      return;
    }

    const failures: HandlerFailure[] = [];
    for (const handler of handlers) {
      try {
        await handler.handle(event);
      } catch (err) {
        log.error(`Handler ${handler.name} failed for ${event.type} (${event.id}): ${errorMessage(err)}`);
        failures.push({ handler: handler.name, error: errorMessage(err) });
        await this.notifyHandlerError(handler, event, err);
      }
    }

    if (failures.length === 0) {
      this.stats.eventsProcessed++;
      this.metrics.recordEvent(category, 'processed');
      await this.ack(stream, entry.id);
      return;
    }

    if (event.retryCount < this.options.maxRetries) {
      const retry = withRetry(event);
      try {
        await this.streamLog.append(stream, this.toFields(retry), this.options.maxStreamLength);
      } catch (err) {
        log.error(`Failed to requeue event ${event.id}, leaving entry ${entry.id} pending:`, err);
        return;
      }
      this.stats.eventsRetried++;
      this.metrics.recordEvent(category, 'retried');
      log.debug(`Requeued event ${event.id} (retry ${retry.retryCount}/${this.options.maxRetries})`);
    } else {
      const parked = await this.writeDeadLetter(encodeEvent(event), failures, stream);
      if (!parked) return;
      this.stats.eventsFailed++;
      this.metrics.recordEvent(category, 'failed');
      log.error(`Event ${event.id} moved to DLQ after ${this.options.maxRetries} retries`);
    }

    await this.ack(stream, entry.id);
  }

  // ==========================================================================
  // 内部工具
  // ==========================================================================

  private toFields(event: DomainEvent): Record<string, string> {
    return {
      event: encodeEvent(event),
      type: event.type,
      timestamp: event.timestamp.toISOString(),
    };
  }

  private async writeDeadLetter(rawEvent: string, failures: HandlerFailure[], sourceStream: string): Promise<boolean> {
    try {
      await this.streamLog.append(
        this.deadLetterStream,
        {
          event: rawEvent,
          errors: JSON.stringify(failures),
          failed_at: new Date().toISOString(),
          stream: sourceStream,
        },
        this.options.dlqMaxLength,
      );
      return true;
    } catch (err) {
      log.error(`Failed to write dead letter for ${sourceStream}, leaving entry pending:`, err);
      return false;
    }
  }

  private async ack(stream: string, entryId: string): Promise<void> {
    try {
      await this.streamLog.ack(stream, this.options.consumerGroup, [entryId]);
    } catch (err) {
      // 未确认的条目会在下次启动时经待确认恢复重新处理
      log.error(`Failed to ack ${entryId} on ${stream}:`, err);
    }
  }

  private async notifyHandlerError(handler: EventHandler, event: DomainEvent, error: unknown): Promise<void> {
    if (!handler.onError) return;
    try {
      await handler.onError(event, error);
    } catch (hookErr) {
      log.warn(`onError of ${handler.name} threw: ${errorMessage(hookErr)}`);
    }
  }

  private backoff(): Promise<void> {
    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.backoffWakers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, this.options.errorBackoffMs);
      this.backoffWakers.add(wake);
    });
  }

  private toDeadLetter(entry: StreamEntry): DeadLetter {
    const rawEvent = entry.fields.event ?? '';
    let event: DomainEvent | null = null;
    try {
      event = decodeEvent(rawEvent);
    } catch (err) {
      log.debug(`Dead letter ${entry.id} holds an undecodable event: ${errorMessage(err)}`);
    }

    const failedAt = entry.fields.failed_at ? new Date(entry.fields.failed_at) : null;
    return {
      entryId: entry.id,
      event,
      rawEvent,
      errors: parseFailures(entry.fields.errors),
      failedAt: failedAt && !Number.isNaN(failedAt.getTime()) ? failedAt : null,
      sourceStream: entry.fields.stream ?? null,
    };
  }
}

function parseFailures(raw: string | undefined): HandlerFailure[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [{ handler: 'unknown', error: raw }];
  }
  if (!Array.isArray(parsed)) return [];
  const failures: HandlerFailure[] = [];
  for (const item of parsed) {
    if (item && typeof item === 'object' && 'handler' in item && 'error' in item) {
      failures.push({ handler: String(item.handler), error: String(item.error) });
    }
  }
  return failures;
}
