/**
 * 命令总线：中介者模式
 *
 * execute() 流程：
 *   1. beforeExecute（注册顺序），可替换命令
 *   2. 按 type 查找处理器（同类型重复注册时先注册者生效）
 *   3. 处理器执行；无处理器或处理器抛错都转为失败结果
 *   4. afterExecute（逆序），可替换结果
 *   5. 统计
 *
 * 中间件抛错直接中止本次命令并返回失败结果，execute() 永不抛出。
 */

import { HandlerNotFoundError, errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import {
  type Command,
  type CommandResult,
  type CommandType,
  commandFailed,
} from './commands';

const log = createModuleLogger('command-bus');

// ============================================================
// 处理器与中间件
// ============================================================

export interface CommandHandler<K extends CommandType = CommandType> {
  readonly name: string;
  readonly commandType: K;
  handle(command: Command<K>): Promise<CommandResult>;
}

export interface CommandMiddleware {
  readonly name: string;
  beforeExecute?<K extends CommandType>(command: Command<K>): Promise<Command<K>>;
  afterExecute?<K extends CommandType>(command: Command<K>, result: CommandResult): Promise<CommandResult>;
}

export interface CommandBusStats {
  commandsProcessed: number;
  commandsSucceeded: number;
  commandsFailed: number;
  handlersRegistered: number;
  middlewareRegistered: number;
  successRate: number;
}

type HandlerTable = { [K in CommandType]?: CommandHandler<K> };

// ============================================================
// 命令总线
// ============================================================

export class CommandBus {
  private handlers: HandlerTable = {};
  private handlersRegistered = 0;
  private middleware: CommandMiddleware[] = [];

  private stats = {
    commandsProcessed: 0,
    commandsSucceeded: 0,
    commandsFailed: 0,
  };

  registerHandler<K extends CommandType>(handler: CommandHandler<K>): void {
    this.handlersRegistered++;
    const existing = this.handlers[handler.commandType];
    if (existing) {
      log.warn(`Handler ${handler.name} ignored for ${handler.commandType}: ${existing.name} registered first`);
      return;
    }
    const handlers: { [P in K]?: CommandHandler<P> } = this.handlers;
    handlers[handler.commandType] = handler;
    log.info(`Registered command handler: ${handler.name} (${handler.commandType})`);
  }

  registerMiddleware(middleware: CommandMiddleware): void {
    this.middleware.push(middleware);
    log.info(`Registered command middleware: ${middleware.name}`);
  }

  hasHandler(type: CommandType): boolean {
    return this.handlers[type] !== undefined;
  }

  async execute<K extends CommandType>(command: Command<K>): Promise<CommandResult> {
    let current = command;
    let result: CommandResult;
    // beforeExecute 已完成的中间件数；中止时只对它们逆序回调 afterExecute
    let entered = 0;

    try {
      for (const mw of this.middleware) {
        if (mw.beforeExecute) current = await mw.beforeExecute(current);
        entered++;
      }
      result = await this.dispatch(current);
    } catch (err) {
      log.error(`Command ${current.type} (${current.commandId}) aborted by middleware:`, err);
      result = commandFailed(current.commandId, errorMessage(err));
    }

    for (let i = entered - 1; i >= 0; i--) {
      const mw = this.middleware[i];
      if (!mw.afterExecute) continue;
      try {
        result = await mw.afterExecute(current, result);
      } catch (err) {
        log.error(`Middleware ${mw.name} afterExecute failed for ${current.commandId}:`, err);
        result = commandFailed(current.commandId, errorMessage(err), result.eventsPublished);
      }
    }

    this.stats.commandsProcessed++;
    if (result.success) {
      this.stats.commandsSucceeded++;
    } else {
      this.stats.commandsFailed++;
    }
    return Object.isFrozen(result) ? result : Object.freeze({ ...result });
  }

  getStats(): CommandBusStats {
    const { commandsProcessed, commandsSucceeded } = this.stats;
    return {
      ...this.stats,
      handlersRegistered: this.handlersRegistered,
      middlewareRegistered: this.middleware.length,
      successRate: commandsProcessed > 0 ? commandsSucceeded / commandsProcessed : 0,
    };
  }

  private async dispatch<K extends CommandType>(command: Command<K>): Promise<CommandResult> {
    const handler = this.handlers[command.type];
    if (!handler) {
      const notFound = new HandlerNotFoundError('command', command.type);
      log.warn(notFound.message);
      return commandFailed(command.commandId, notFound.message);
    }

    try {
      return await handler.handle(command);
    } catch (err) {
      log.error(`Command handler ${handler.name} failed for ${command.commandId}:`, err);
      return commandFailed(command.commandId, errorMessage(err));
    }
  }
}
