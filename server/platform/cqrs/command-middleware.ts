/**
 * 命令总线中间件：日志 / 校验 / 指标
 */

import type { z } from 'zod';
import { ValidationError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { type MetricsCollector, metricsCollector } from '../middleware/metricsCollector';
import type { CommandMiddleware } from './command-bus';
import { type Command, type CommandResult, type CommandType, commandSchemas } from './commands';

const log = createModuleLogger('command-middleware');

/**
 * 记录命令开始与结果，超过 slowCommandMs 时告警
 */
export class LoggingMiddleware implements CommandMiddleware {
  readonly name = 'logging';
  private startedAt = new Map<string, number>();

  constructor(private readonly slowCommandMs: number = 1000) {}

  async beforeExecute<K extends CommandType>(command: Command<K>): Promise<Command<K>> {
    this.startedAt.set(command.commandId, Date.now());
    log.info(`Executing command ${command.type} (id: ${command.commandId})`);
    return command;
  }

  async afterExecute<K extends CommandType>(command: Command<K>, result: CommandResult): Promise<CommandResult> {
    const started = this.startedAt.get(command.commandId);
    this.startedAt.delete(command.commandId);
    const elapsed = started === undefined ? 0 : Date.now() - started;

    if (result.success) {
      log.info(`Command ${command.commandId} succeeded (events: ${result.eventsPublished}, ${elapsed}ms)`);
    } else {
      log.error(`Command ${command.commandId} failed: ${result.error}`);
    }
    if (elapsed > this.slowCommandMs) {
      log.warn(`Slow command detected: ${command.type} took ${elapsed}ms`);
    }
    return result;
  }
}

/**
 * 按命令类型用 zod 校验 payload；校验失败抛 ValidationError，由总线转为失败结果
 */
export class ValidationMiddleware implements CommandMiddleware {
  readonly name = 'validation';
  private readonly schemas: ReadonlyMap<string, z.ZodTypeAny>;

  constructor(schemas: { readonly [K in CommandType]?: z.ZodTypeAny } = commandSchemas) {
    this.schemas = new Map(Object.entries(schemas).filter((e): e is [string, z.ZodTypeAny] => e[1] !== undefined));
  }

  async beforeExecute<K extends CommandType>(command: Command<K>): Promise<Command<K>> {
    const schema = this.schemas.get(command.type);
    if (!schema) return command;

    const parsed = schema.safeParse(command.payload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '<payload>'}: ${issue.message}`);
      throw new ValidationError(`Invalid ${command.type} command: ${issues.join('; ')}`, {
        commandId: command.commandId,
        issues,
      });
    }
    return command;
  }
}

/**
 * 命令计数与耗时写入 prom-client
 */
export class MetricsMiddleware implements CommandMiddleware {
  readonly name = 'metrics';
  private startedAt = new Map<string, number>();

  constructor(private readonly metrics: MetricsCollector = metricsCollector) {}

  async beforeExecute<K extends CommandType>(command: Command<K>): Promise<Command<K>> {
    this.startedAt.set(command.commandId, performance.now());
    return command;
  }

  async afterExecute<K extends CommandType>(command: Command<K>, result: CommandResult): Promise<CommandResult> {
    const started = this.startedAt.get(command.commandId);
    this.startedAt.delete(command.commandId);
    const seconds = started === undefined ? undefined : (performance.now() - started) / 1000;
    this.metrics.recordCommand(command.type, result.success, seconds);
    return result;
  }
}
