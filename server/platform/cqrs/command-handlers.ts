/**
 * 内置命令处理器：调查生命周期 / Agent 任务 / 对话消息
 */

import { randomUUID } from 'crypto';
import { CircuitBreakerOpenError, errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import type { EventPublisher } from '../events/event-bus';
import { EventType } from '../events/event-types';
import { type CircuitBreakerRegistry, withTimeout } from '../middleware/circuitBreaker';
import type { CommandHandler } from './command-bus';
import { type Command, type CommandResult, commandFailed, commandSucceeded } from './commands';

const log = createModuleLogger('command-handlers');

// ============================================================
// 调查
// ============================================================

export class CreateInvestigationHandler implements CommandHandler<'investigation.create'> {
  readonly name = 'CreateInvestigationHandler';
  readonly commandType = 'investigation.create';

  constructor(private readonly events: EventPublisher) {}

  async handle(command: Command<'investigation.create'>): Promise<CommandResult> {
    const investigationId = randomUUID();
    const { query, dataSources, priority } = command.payload;

    await this.events.publish(
      EventType.INVESTIGATION_CREATED,
      {
        investigationId,
        query,
        userId: command.userId ?? null,
        dataSources: dataSources ?? null,
        priority: priority ?? 'medium',
      },
      { commandId: command.commandId },
    );

    log.info(`Investigation ${investigationId} created`);
    return commandSucceeded(command.commandId, { investigationId }, 1);
  }
}

const STATUS_EVENTS = {
  started: EventType.INVESTIGATION_STARTED,
  completed: EventType.INVESTIGATION_COMPLETED,
  failed: EventType.INVESTIGATION_FAILED,
} as const;

export class UpdateInvestigationHandler implements CommandHandler<'investigation.update'> {
  readonly name = 'UpdateInvestigationHandler';
  readonly commandType = 'investigation.update';

  constructor(private readonly events: EventPublisher) {}

  async handle(command: Command<'investigation.update'>): Promise<CommandResult> {
    const { investigationId, status, results, error } = command.payload;
    const eventId = await this.events.publish(
      STATUS_EVENTS[status],
      { ...results, investigationId, ...(error !== undefined ? { error } : {}) },
      { commandId: command.commandId },
    );
    return commandSucceeded(command.commandId, { investigationId, status, eventId }, 1);
  }
}

export class CancelInvestigationHandler implements CommandHandler<'investigation.cancel'> {
  readonly name = 'CancelInvestigationHandler';
  readonly commandType = 'investigation.cancel';

  constructor(private readonly events: EventPublisher) {}

  async handle(command: Command<'investigation.cancel'>): Promise<CommandResult> {
    const { investigationId, reason } = command.payload;
    await this.events.publish(
      EventType.INVESTIGATION_CANCELLED,
      { investigationId, reason: reason ?? null, cancelledBy: command.userId ?? null },
      { commandId: command.commandId },
    );
    log.info(`Investigation ${investigationId} cancelled`);
    return commandSucceeded(command.commandId, { investigationId }, 1);
  }
}

// ============================================================
// Agent 任务
// ============================================================

export interface AgentTask {
  taskId: string;
  agentName: string;
  taskType: string;
  payload: Record<string, unknown>;
  userId?: string;
}

/** Agent 的实际执行方（外部协作者） */
export interface AgentTaskExecutor {
  execute(task: AgentTask): Promise<unknown>;
}

/**
 * 通过 "agent:<agentName>" 断路器调用执行器，发布 started → completed / failed
 */
export class ExecuteAgentTaskHandler implements CommandHandler<'agent.task.execute'> {
  readonly name = 'ExecuteAgentTaskHandler';
  readonly commandType = 'agent.task.execute';

  constructor(
    private readonly events: EventPublisher,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly executor: AgentTaskExecutor,
  ) {}

  async handle(command: Command<'agent.task.execute'>): Promise<CommandResult> {
    const { agentName, taskType, payload, timeoutMs } = command.payload;
    const task: AgentTask = {
      taskId: randomUUID(),
      agentName,
      taskType,
      payload: payload ?? {},
      userId: command.userId,
    };
    const metadata = { commandId: command.commandId };

    await this.events.publish(EventType.AGENT_TASK_STARTED, { taskId: task.taskId, agentName, taskType }, metadata);

    const breaker = this.breakers.getBreaker(`agent:${agentName}`);
    let result: unknown;
    try {
      result = await breaker.call(() => {
        const running = this.executor.execute(task);
        return timeoutMs === undefined ? running : withTimeout(running, timeoutMs, `Agent ${agentName} task ${taskType}`);
      });
    } catch (err) {
      const circuitOpen = err instanceof CircuitBreakerOpenError;
      await this.events.publish(
        EventType.AGENT_TASK_FAILED,
        { taskId: task.taskId, agentName, taskType, error: errorMessage(err), circuitOpen },
        metadata,
      );
      log.warn(`Agent task ${task.taskId} (${agentName}/${taskType}) failed: ${errorMessage(err)}`);
      return commandFailed(command.commandId, errorMessage(err), 2);
    }

    // 执行已成功；completed 发布失败交给总线转为失败结果，不再发布 failed
    await this.events.publish(EventType.AGENT_TASK_COMPLETED, { taskId: task.taskId, agentName, taskType, result }, metadata);
    return commandSucceeded(command.commandId, { taskId: task.taskId, result }, 2);
  }
}

// ============================================================
// 对话
// ============================================================

export class SendChatMessageHandler implements CommandHandler<'chat.message.send'> {
  readonly name = 'SendChatMessageHandler';
  readonly commandType = 'chat.message.send';

  constructor(private readonly events: EventPublisher) {}

  async handle(command: Command<'chat.message.send'>): Promise<CommandResult> {
    const { sessionId, message, context } = command.payload;
    const eventId = await this.events.publish(
      EventType.CHAT_MESSAGE_RECEIVED,
      { sessionId, message, userId: command.userId ?? null, context: context ?? {} },
      { commandId: command.commandId },
    );
    return commandSucceeded(command.commandId, { sessionId, eventId }, 1);
  }
}
