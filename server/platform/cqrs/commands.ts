/**
 * 命令定义：写侧消息
 *
 * 命令以 type 判别式区分，payload 类型由 CommandPayloads 表按 type 给出。
 * 外部模块可以通过声明合并扩展该表：
 *
 *   declare module '../platform/cqrs/commands' {
 *     interface CommandPayloads { 'report.export': { reportId: string } }
 *   }
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';

// ============================================================
// 内置命令 payload
// ============================================================

export const investigationPrioritySchema = z.enum(['low', 'medium', 'high']);

export const createInvestigationSchema = z.object({
  query: z.string().min(1),
  dataSources: z.array(z.string()).optional(),
  priority: investigationPrioritySchema.optional(),
});

export const updateInvestigationSchema = z.object({
  investigationId: z.string().min(1),
  status: z.enum(['started', 'completed', 'failed']),
  results: z.record(z.unknown()).optional(),
  error: z.string().optional(),
});

export const cancelInvestigationSchema = z.object({
  investigationId: z.string().min(1),
  reason: z.string().optional(),
});

export const executeAgentTaskSchema = z.object({
  agentName: z.string().min(1),
  taskType: z.string().min(1),
  payload: z.record(z.unknown()).optional(),
  /** 单次执行超时(ms) */
  timeoutMs: z.number().int().positive().optional(),
});

export const sendChatMessageSchema = z.object({
  sessionId: z.string().min(1),
  message: z.string().min(1),
  context: z.record(z.unknown()).optional(),
});

export interface CommandPayloads {
  'investigation.create': z.infer<typeof createInvestigationSchema>;
  'investigation.update': z.infer<typeof updateInvestigationSchema>;
  'investigation.cancel': z.infer<typeof cancelInvestigationSchema>;
  'agent.task.execute': z.infer<typeof executeAgentTaskSchema>;
  'chat.message.send': z.infer<typeof sendChatMessageSchema>;
}

export type CommandType = keyof CommandPayloads;

/** ValidationMiddleware 默认使用的 schema 表 */
export const commandSchemas: { readonly [K in CommandType]: z.ZodType<CommandPayloads[K]> } = {
  'investigation.create': createInvestigationSchema,
  'investigation.update': updateInvestigationSchema,
  'investigation.cancel': cancelInvestigationSchema,
  'agent.task.execute': executeAgentTaskSchema,
  'chat.message.send': sendChatMessageSchema,
};

// ============================================================
// 命令与结果
// ============================================================

export type CommandMetadata = Record<string, unknown>;

export interface Command<K extends CommandType = CommandType> {
  readonly commandId: string;
  readonly type: K;
  readonly timestamp: Date;
  readonly userId?: string;
  readonly metadata: Readonly<CommandMetadata>;
  readonly payload: CommandPayloads[K];
}

export interface CommandOptions {
  userId?: string;
  metadata?: CommandMetadata;
  commandId?: string;
}

export function createCommand<K extends CommandType>(
  type: K,
  payload: CommandPayloads[K],
  options: CommandOptions = {},
): Command<K> {
  return Object.freeze({
    commandId: options.commandId ?? randomUUID(),
    type,
    timestamp: new Date(),
    userId: options.userId,
    metadata: Object.freeze({ ...options.metadata }),
    payload,
  });
}

export interface CommandResult {
  readonly success: boolean;
  readonly commandId: string;
  readonly data?: unknown;
  readonly error?: string;
  readonly eventsPublished: number;
}

export function commandSucceeded(commandId: string, data?: unknown, eventsPublished: number = 0): CommandResult {
  return Object.freeze({ success: true, commandId, data, eventsPublished });
}

export function commandFailed(commandId: string, error: string, eventsPublished: number = 0): CommandResult {
  return Object.freeze({ success: false, commandId, error, eventsPublished });
}
