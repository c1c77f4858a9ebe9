/**
 * 内置命令处理器测试：发布的事件与返回结果
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../core/logger', () => ({
  createModuleLogger: () => ({ info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn() }),
}));

import type { EventData, EventMetadata } from '../../events/event';
import type { EventPublisher } from '../../events/event-bus';
import type { EventType } from '../../events/event-types';
import { CircuitBreakerRegistry } from '../../middleware/circuitBreaker';
import { MetricsCollector } from '../../middleware/metricsCollector';
import {
  type AgentTask,
  CancelInvestigationHandler,
  CreateInvestigationHandler,
  ExecuteAgentTaskHandler,
  SendChatMessageHandler,
  UpdateInvestigationHandler,
} from '../command-handlers';
import { createCommand } from '../commands';

class RecordingPublisher implements EventPublisher {
  readonly published: Array<{ type: EventType; data: EventData; metadata?: EventMetadata }> = [];

  async publish(type: EventType, data: EventData, metadata?: EventMetadata): Promise<string> {
    this.published.push({ type, data, metadata });
    return `evt-${this.published.length}`;
  }
}

describe('调查命令', () => {
  let events: RecordingPublisher;

  beforeEach(() => {
    events = new RecordingPublisher();
  });

  it('CreateInvestigationHandler 发布 investigation.created', async () => {
    const command = createCommand('investigation.create', { query: 'municipal contracts' }, { userId: 'u1' });

    const result = await new CreateInvestigationHandler(events).handle(command);

    expect(result.success).toBe(true);
    expect(result.eventsPublished).toBe(1);
    expect(result.data).toEqual({ investigationId: expect.stringMatching(/^[0-9a-f-]{36}$/) });
    expect(events.published).toEqual([{
      type: 'investigation.created',
      data: {
        investigationId: expect.any(String),
        query: 'municipal contracts',
        userId: 'u1',
        dataSources: null,
        priority: 'medium',
      },
      metadata: { commandId: command.commandId },
    }]);
    expect(result.data).toEqual({ investigationId: events.published[0].data.investigationId });
  });

  it('UpdateInvestigationHandler 按状态选择事件类型并合并结果', async () => {
    const handler = new UpdateInvestigationHandler(events);
    const command = createCommand('investigation.update', {
      investigationId: 'inv-1',
      status: 'completed',
      results: { findings: ['f1'], confidenceScore: 0.8 },
    });

    const result = await handler.handle(command);

    expect(result.data).toEqual({ investigationId: 'inv-1', status: 'completed', eventId: 'evt-1' });
    expect(events.published[0]).toEqual({
      type: 'investigation.completed',
      data: { findings: ['f1'], confidenceScore: 0.8, investigationId: 'inv-1' },
      metadata: { commandId: command.commandId },
    });
  });

  it('UpdateInvestigationHandler failed 状态携带错误信息', async () => {
    await new UpdateInvestigationHandler(events).handle(
      createCommand('investigation.update', { investigationId: 'inv-1', status: 'failed', error: 'source offline' }),
    );
    expect(events.published[0].type).toBe('investigation.failed');
    expect(events.published[0].data).toEqual({ investigationId: 'inv-1', error: 'source offline' });
  });

  it('CancelInvestigationHandler 记录取消人和原因', async () => {
    const result = await new CancelInvestigationHandler(events).handle(
      createCommand('investigation.cancel', { investigationId: 'inv-2' }, { userId: 'u9' }),
    );
    expect(result.data).toEqual({ investigationId: 'inv-2' });
    expect(events.published[0].type).toBe('investigation.cancelled');
    expect(events.published[0].data).toEqual({ investigationId: 'inv-2', reason: null, cancelledBy: 'u9' });
  });
});

describe('SendChatMessageHandler', () => {
  it('发布 chat.message.received', async () => {
    const events = new RecordingPublisher();
    const result = await new SendChatMessageHandler(events).handle(
      createCommand('chat.message.send', { sessionId: 's1', message: 'hi' }),
    );
    expect(result.data).toEqual({ sessionId: 's1', eventId: 'evt-1' });
    expect(events.published[0].data).toEqual({ sessionId: 's1', message: 'hi', userId: null, context: {} });
  });
});

describe('ExecuteAgentTaskHandler', () => {
  let events: RecordingPublisher;
  let breakers: CircuitBreakerRegistry;
  const execute = vi.fn(async (_task: AgentTask): Promise<unknown> => ({ summary: 'ok' }));

  beforeEach(() => {
    events = new RecordingPublisher();
    breakers = new CircuitBreakerRegistry({ failureThreshold: 2, timeoutSeconds: 30 }, new MetricsCollector());
    execute.mockReset();
    execute.mockResolvedValue({ summary: 'ok' });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const agentCommand = (timeoutMs?: number) => createCommand(
    'agent.task.execute',
    { agentName: 'analyst', taskType: 'summarize', payload: { text: 'abc' }, timeoutMs },
    { userId: 'u1' },
  );

  it('成功时发布 started 与 completed', async () => {
    const handler = new ExecuteAgentTaskHandler(events, breakers, { execute });

    const result = await handler.handle(agentCommand());

    expect(result.success).toBe(true);
    expect(result.eventsPublished).toBe(2);
    expect(events.published.map(e => e.type)).toEqual(['agent.task.started', 'agent.task.completed']);
    expect(execute).toHaveBeenCalledWith(expect.objectContaining({
      agentName: 'analyst',
      taskType: 'summarize',
      payload: { text: 'abc' },
      userId: 'u1',
    }));
    const taskId = execute.mock.calls[0][0].taskId;
    expect(result.data).toEqual({ taskId, result: { summary: 'ok' } });
    expect(breakers.has('agent:analyst')).toBe(true);
  });

  it('执行失败时发布 failed 并返回失败结果', async () => {
    execute.mockRejectedValue(new Error('model offline'));
    const handler = new ExecuteAgentTaskHandler(events, breakers, { execute });

    const result = await handler.handle(agentCommand());

    expect(result).toMatchObject({ success: false, error: 'model offline', eventsPublished: 2 });
    expect(events.published[1]).toMatchObject({
      type: 'agent.task.failed',
      data: { agentName: 'analyst', error: 'model offline', circuitOpen: false },
    });
  });

  it('断路器打开后不再调用执行器', async () => {
    execute.mockRejectedValue(new Error('model offline'));
    const handler = new ExecuteAgentTaskHandler(events, breakers, { execute });

    await handler.handle(agentCommand());
    await handler.handle(agentCommand());
    const result = await handler.handle(agentCommand());

    expect(execute).toHaveBeenCalledTimes(2);
    expect(breakers.getBreaker('agent:analyst').getState()).toBe('open');
    expect(result.error).toBe('Circuit breaker agent:analyst is open, service unavailable');
    expect(result.eventsPublished).toBe(2);
    expect(events.published[5].data.circuitOpen).toBe(true);
  });

  it('completed 发布失败时抛出，不发布 failed', async () => {
    class FlakyPublisher extends RecordingPublisher {
      async publish(type: EventType, data: EventData, metadata?: EventMetadata): Promise<string> {
        if (type === 'agent.task.completed') throw new Error('stream unavailable');
        return super.publish(type, data, metadata);
      }
    }
    const flaky = new FlakyPublisher();
    const handler = new ExecuteAgentTaskHandler(flaky, breakers, { execute });

    await expect(handler.handle(agentCommand())).rejects.toThrow('stream unavailable');

    expect(flaky.published.map(e => e.type)).toEqual(['agent.task.started']);
    expect(breakers.getBreaker('agent:analyst').getStatus().stats).toMatchObject({ successfulCalls: 1, failedCalls: 0 });
  });

  it('超过 timeoutMs 时失败', async () => {
    vi.useFakeTimers();
    execute.mockImplementation(() => new Promise<unknown>(() => undefined));
    const handler = new ExecuteAgentTaskHandler(events, breakers, { execute });

    const pending = handler.handle(agentCommand(50));
    await vi.advanceTimersByTimeAsync(100);
    const result = await pending;

    expect(result.success).toBe(false);
    expect(result.error).toBe('Agent analyst task summarize timed out after 50ms');
    expect(breakers.getBreaker('agent:analyst').getStatus().failureCount).toBe(1);
  });
});
