/**
 * RedisStreamEventBus 测试：基于进程内 MemoryStreamLog
 *
 * 覆盖：发布 / 消费 / 丢弃 / 重试 → 死信 / 解码失败 / 待确认恢复 / 重启 / 死信重放 / 启停竞争
 */
import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('../../../core/logger', () => ({
  createModuleLogger: function mockLogger(): object {
    return { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn(), child: mockLogger };
  },
}));

import { MetricsCollector } from '../../middleware/metricsCollector';
import type { DomainEvent } from '../event';
import { RedisStreamEventBus, type EventBusOptions } from '../event-bus';
import { EventType } from '../event-types';
import { MemoryStreamLog } from '../stream-log';

const GROUP = 'cidadao-ai';

function createBus(options: Partial<EventBusOptions> = {}) {
  const streamLog = new MemoryStreamLog();
  const metrics = new MetricsCollector();
  const bus = new RedisStreamEventBus(streamLog, { blockMs: 10, errorBackoffMs: 10, ...options }, metrics);
  buses.push(bus);
  return { streamLog, bus, metrics };
}

function recorder() {
  return vi.fn(async (_event: DomainEvent): Promise<void> => undefined);
}

async function eventCount(metrics: MetricsCollector, category: string, outcome: string): Promise<number> {
  const data = await metrics.getRegistry().getSingleMetric('cqrs_eventbus_events_total')?.get();
  return data?.values.find(v => v.labels.category === category && v.labels.outcome === outcome)?.value ?? 0;
}

const buses: RedisStreamEventBus[] = [];

afterEach(async () => {
  await Promise.all(buses.splice(0).map(bus => bus.stop()));
});

describe('发布', () => {
  it('按分类写入流并返回事件 ID', async () => {
    const { streamLog, bus, metrics } = createBus();

    const eventId = await bus.publish(EventType.CHAT_MESSAGE_RECEIVED, { sessionId: 's1' }, { commandId: 'c1' });

    const entries = await streamLog.range('events:chat');
    expect(entries).toHaveLength(1);
    expect(entries[0].fields.type).toBe('chat.message.received');
    expect(JSON.parse(entries[0].fields.event)).toMatchObject({
      id: eventId,
      data: { sessionId: 's1' },
      metadata: { commandId: 'c1' },
      retry_count: 0,
    });
    expect(bus.getStats().eventsPublished).toBe(1);
    expect(await eventCount(metrics, 'chat', 'published')).toBe(1);
  });

  it('MAXLEN 限制流长度', async () => {
    const { streamLog, bus } = createBus({ maxStreamLength: 5 });
    for (let i = 0; i < 8; i++) {
      await bus.publish(EventType.SYSTEM_HEALTH_CHECK, { i });
    }
    expect(await streamLog.length('events:system')).toBe(5);
  });

  it('日志存储失败时抛出，不计入发布数', async () => {
    const { streamLog, bus } = createBus();
    await streamLog.close();
    await expect(bus.publish(EventType.CACHE_INVALIDATED, {})).rejects.toThrow('MemoryStreamLog is closed');
    expect(bus.getStats().eventsPublished).toBe(0);
  });
});

describe('消费', () => {
  it('处理成功后确认', async () => {
    const { streamLog, bus, metrics } = createBus();
    const handle = recorder();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.CHAT_MESSAGE_RECEIVED], handle });
    await bus.start('worker-1');

    const eventId = await bus.publish(EventType.CHAT_MESSAGE_RECEIVED, { sessionId: 's1' });

    await vi.waitFor(() => expect(bus.getStats().eventsProcessed).toBe(1));
    expect(handle).toHaveBeenCalledTimes(1);
    expect(handle.mock.calls[0][0].id).toBe(eventId);
    expect((await streamLog.pending('events:chat', GROUP)).count).toBe(0);
    expect(await eventCount(metrics, 'chat', 'processed')).toBe(1);
  });

  it('同一类型的多个处理器全部被调用', async () => {
    const { bus } = createBus();
    const first = recorder();
    const second = recorder();
    bus.registerHandler({ name: 'First', eventTypes: [EventType.ANOMALY_DETECTED], handle: first });
    bus.registerHandler({ name: 'Second', eventTypes: [EventType.ANOMALY_DETECTED], handle: second });
    await bus.start();

    await bus.publish(EventType.ANOMALY_DETECTED, { score: 0.97 });

    await vi.waitFor(() => expect(bus.getStats().eventsProcessed).toBe(1));
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
    expect(bus.getStats().handlersRegistered).toBe(2);
  });

  it('没有处理器的类型被丢弃并确认', async () => {
    const { streamLog, bus, metrics } = createBus();
    const handle = recorder();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.CHAT_MESSAGE_RECEIVED], handle });
    await bus.start();

    await bus.publish(EventType.CHAT_RESPONSE_SENT, { sessionId: 's1' });

    await vi.waitFor(() => expect(bus.getStats().eventsDropped).toBe(1));
    expect(handle).not.toHaveBeenCalled();
    expect((await streamLog.pending('events:chat', GROUP)).count).toBe(0);
    expect(await eventCount(metrics, 'chat', 'dropped')).toBe(1);
  });

  it('三个分类的 100 个事件各处理一次，每个处理器按发布顺序只收到本分类的事件', async () => {
    const { bus } = createBus({ batchSize: 7 });
    const types = [EventType.INVESTIGATION_CREATED, EventType.AGENT_TASK_STARTED, EventType.CHAT_MESSAGE_RECEIVED];
    const handlers = types.map(() => recorder());
    types.forEach((type, i) => {
      bus.registerHandler({ name: `Recorder-${type}`, eventTypes: [type], handle: handlers[i] });
    });
    await bus.start();
    expect(bus.getStats().consumersActive).toBe(3);

    const published: string[][] = [[], [], []];
    for (let i = 0; i < 100; i++) {
      published[i % 3].push(await bus.publish(types[i % 3], { i }));
    }

    await vi.waitFor(() => expect(bus.getStats().eventsProcessed).toBe(100), { timeout: 5000 });
    handlers.forEach((handle, i) => {
      expect(handle.mock.calls.map(([event]) => event.id)).toEqual(published[i]);
      expect(handle.mock.calls.every(([event]) => event.type === types[i])).toBe(true);
    });
    expect(published.map(ids => ids.length)).toEqual([34, 33, 33]);
  });

  it('处理器持续失败：重试 maxRetries 次后只进入死信一次', async () => {
    const { streamLog, bus, metrics } = createBus({ maxRetries: 3 });
    const handle = vi.fn(async (_event: DomainEvent): Promise<void> => {
      throw new Error('boom');
    });
    bus.registerHandler({ name: 'Failing', eventTypes: [EventType.CHAT_MESSAGE_RECEIVED], handle });
    await bus.start();

    const eventId = await bus.publish(EventType.CHAT_MESSAGE_RECEIVED, { sessionId: 's1' });

    await vi.waitFor(() => expect(bus.getStats().eventsFailed).toBe(1));
    expect(handle.mock.calls.map(([event]) => event.retryCount)).toEqual([0, 1, 2, 3]);
    expect(handle.mock.calls.every(([event]) => event.id === eventId)).toBe(true);

    const stats = bus.getStats();
    expect(stats.eventsRetried).toBe(3);
    expect(stats.eventsPublished).toBe(1);
    expect(stats.eventsProcessed).toBe(0);

    const dead = await bus.getDeadLetters();
    expect(dead).toHaveLength(1);
    expect(dead[0].event?.id).toBe(eventId);
    expect(dead[0].event?.retryCount).toBe(3);
    expect(dead[0].errors).toEqual([{ handler: 'Failing', error: 'boom' }]);
    expect(dead[0].sourceStream).toBe('events:chat');
    expect(dead[0].failedAt).toBeInstanceOf(Date);
    expect((await streamLog.pending('events:chat', GROUP)).count).toBe(0);
    expect(await eventCount(metrics, 'chat', 'retried')).toBe(3);
  });

  it('处理失败时调用 onError，onError 抛错不影响处置', async () => {
    const { bus } = createBus({ maxRetries: 0 });
    const onError = vi.fn(async (_event: DomainEvent, _error: unknown): Promise<void> => {
      throw new Error('hook failed');
    });
    bus.registerHandler({
      name: 'Failing',
      eventTypes: [EventType.ANOMALY_CONFIRMED],
      handle: async () => {
        throw new Error('handler failed');
      },
      onError,
    });
    await bus.start();

    await bus.publish(EventType.ANOMALY_CONFIRMED, {});

    await vi.waitFor(() => expect(bus.getStats().eventsFailed).toBe(1));
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][1]).toEqual(new Error('handler failed'));
  });

  it('无法解码的条目进入死信并确认', async () => {
    const { streamLog, bus } = createBus();
    const handle = recorder();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.CHAT_MESSAGE_RECEIVED], handle });
    await bus.start();

    await streamLog.append('events:chat', { event: '{broken' });

    await vi.waitFor(() => expect(bus.getStats().eventsFailed).toBe(1));
    expect(handle).not.toHaveBeenCalled();

    const [dead] = await bus.getDeadLetters();
    expect(dead.event).toBeNull();
    expect(dead.rawEvent).toBe('{broken');
    expect(dead.errors).toEqual([{ handler: 'decoder', error: 'Event envelope is not valid JSON' }]);
    expect((await streamLog.pending('events:chat', GROUP)).count).toBe(0);
  });
});

describe('至少一次投递', () => {
  it('启动时恢复本消费者名下未确认的条目', async () => {
    const { streamLog, bus } = createBus();
    const handle = recorder();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.CHAT_MESSAGE_RECEIVED], handle });

    const first = await bus.publish(EventType.CHAT_MESSAGE_RECEIVED, { n: 1 });
    const second = await bus.publish(EventType.CHAT_MESSAGE_RECEIVED, { n: 2 });

    // 模拟上次进程读取后崩溃、未确认
    await streamLog.createGroup('events:chat', GROUP, '0');
    const crashed = streamLog.openReader('crashed');
    await crashed.readGroup(GROUP, 'worker-1', 'events:chat', { count: 10 });
    await crashed.close();
    expect((await streamLog.pending('events:chat', GROUP)).count).toBe(2);

    await bus.start('worker-1');

    await vi.waitFor(() => expect(bus.getStats().eventsProcessed).toBe(2));
    expect(handle.mock.calls.map(([event]) => event.id)).toEqual([first, second]);
    expect((await streamLog.pending('events:chat', GROUP)).count).toBe(0);
  });

  it('待确认条目已被删除时确认并跳过，后续待确认条目照常恢复', async () => {
    const { streamLog, bus } = createBus({ batchSize: 2 });
    const handle = recorder();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.CHAT_MESSAGE_RECEIVED], handle });

    await bus.publish(EventType.CHAT_MESSAGE_RECEIVED, { n: 1 });
    await bus.publish(EventType.CHAT_MESSAGE_RECEIVED, { n: 2 });
    const third = await bus.publish(EventType.CHAT_MESSAGE_RECEIVED, { n: 3 });

    await streamLog.createGroup('events:chat', GROUP, '0');
    const crashed = streamLog.openReader('crashed');
    const delivered = await crashed.readGroup(GROUP, 'worker-1', 'events:chat', { count: 10 });
    await crashed.close();
    // 前两条在确认前被截断，只剩待确认记录
    await streamLog.delete('events:chat', [delivered[0].id, delivered[1].id]);

    await bus.start('worker-1');

    await vi.waitFor(() => expect(bus.getStats().eventsProcessed).toBe(1));
    expect(handle.mock.calls.map(([event]) => event.id)).toEqual([third]);
    expect(bus.getStats().eventsDropped).toBe(2);
    expect((await streamLog.pending('events:chat', GROUP)).count).toBe(0);
  });

  it('已确认的事件在重启后不会重投', async () => {
    const { bus } = createBus();
    const handle = recorder();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.INVESTIGATION_CREATED], handle });
    await bus.start('worker-1');

    for (let i = 0; i < 3; i++) {
      await bus.publish(EventType.INVESTIGATION_CREATED, { investigationId: `inv-${i}` });
    }
    await vi.waitFor(() => expect(bus.getStats().eventsProcessed).toBe(3));

    await bus.stop();
    await bus.start('worker-1');
    await bus.publish(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-3' });

    await vi.waitFor(() => expect(bus.getStats().eventsProcessed).toBe(4));
    expect(handle).toHaveBeenCalledTimes(4);
    expect(handle.mock.calls[3][0].data).toEqual({ investigationId: 'inv-3' });
  });

  it('start 之前发布的事件在组创建后仍被消费', async () => {
    const { bus } = createBus();
    const handle = recorder();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.AGENT_TASK_COMPLETED], handle });

    await bus.publish(EventType.AGENT_TASK_COMPLETED, { taskId: 't1' });
    await bus.start();

    await vi.waitFor(() => expect(handle).toHaveBeenCalledTimes(1));
  });
});

describe('死信重放', () => {
  it('重放时重试次数清零并删除死信', async () => {
    const { bus } = createBus({ maxRetries: 0 });
    let failing = true;
    const handle = vi.fn(async (_event: DomainEvent): Promise<void> => {
      if (failing) throw new Error('downstream unavailable');
    });
    bus.registerHandler({ name: 'Flaky', eventTypes: [EventType.ANOMALY_DETECTED], handle });
    await bus.start();

    const eventId = await bus.publish(EventType.ANOMALY_DETECTED, { score: 0.5 });
    await vi.waitFor(() => expect(bus.getStats().eventsFailed).toBe(1));

    const [dead] = await bus.getDeadLetters();
    failing = false;
    expect(await bus.replayDeadLetter(dead.entryId)).toBe(true);

    await vi.waitFor(() => expect(bus.getStats().eventsProcessed).toBe(1));
    const replayed = handle.mock.calls[1][0];
    expect(replayed.id).toBe(eventId);
    expect(replayed.retryCount).toBe(0);
    expect(await bus.getDeadLetters()).toEqual([]);
  });

  it('不存在的死信返回 false', async () => {
    const { bus } = createBus();
    expect(await bus.replayDeadLetter('1-0')).toBe(false);
  });

  it('getDeadLetters 新的在前并受 limit 限制', async () => {
    const { streamLog, bus } = createBus();
    await streamLog.append('events:dlq', { event: 'a', errors: '[]', failed_at: 'not-a-date', stream: 'events:chat' });
    await streamLog.append('events:dlq', { event: 'b', errors: 'oops' });

    const dead = await bus.getDeadLetters(1);
    expect(dead).toHaveLength(1);
    expect(dead[0].rawEvent).toBe('b');
    expect(dead[0].errors).toEqual([{ handler: 'unknown', error: 'oops' }]);
    expect(dead[0].sourceStream).toBeNull();

    const [, older] = await bus.getDeadLetters();
    expect(older.failedAt).toBeNull();
  });
});

describe('生命周期', () => {
  it('stop 幂等并清理消费者', async () => {
    const { bus } = createBus();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.CACHE_INVALIDATED], handle: recorder() });
    await bus.start('worker-9');
    expect(bus.getConsumerName()).toBe('worker-9');
    expect(bus.getStats()).toMatchObject({ running: true, consumersActive: 1, eventTypesHandled: ['cache.invalidated'] });

    await bus.stop();
    await bus.stop();

    expect(bus.getStats()).toMatchObject({ running: false, consumersActive: 0 });
    expect(bus.getConsumerName()).toBeNull();
  });

  it('启动过程中调用 stop 不会留下消费循环', async () => {
    const { bus } = createBus();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.CACHE_INVALIDATED], handle: recorder() });

    const starting = bus.start('worker-1');
    await bus.stop();
    await starting;

    expect(bus.getStats()).toMatchObject({ running: false, consumersActive: 0 });
    expect(bus.getConsumerName()).toBeNull();

    await bus.start('worker-1');
    expect(bus.getStats()).toMatchObject({ running: true, consumersActive: 1 });
  });

  it('未指定消费者名时自动生成', async () => {
    const { bus } = createBus();
    bus.registerHandler({ name: 'Recorder', eventTypes: [EventType.CACHE_INVALIDATED], handle: recorder() });
    await bus.start();
    expect(bus.getConsumerName()).toMatch(/^consumer-[0-9a-f]{8}$/);
  });
});
