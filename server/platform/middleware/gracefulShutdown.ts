/**
 * 优雅关闭模块 - 平台基础设施层
 *
 * 处理 SIGTERM/SIGINT 信号，确保：
 * 1. 停止事件总线消费循环（进行中的消息未确认则留在待确认列表）
 * 2. 停止缓存清理定时器
 * 3. 断开日志存储连接
 *
 * 钩子按优先级执行，单个钩子失败或超时不影响后续钩子。
 *
 * 架构位置: server/platform/middleware/ (平台基础层)
 * 依赖: server/core/logger
 */

import { errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';

const log = createModuleLogger('graceful-shutdown');

// ============================================================
// 类型定义
// ============================================================

export interface ShutdownHook {
  name: string;
  priority: number;  // 越小越先执行
  handler: () => Promise<void>;
}

export interface ShutdownOptions {
  /** 最大等待时间(ms)，超过则强制退出 */
  timeout: number;
  /** 单个钩子的超时(ms) */
  hookTimeout: number;
  /** 进程退出函数（测试中替换） */
  exit: (code: number) => void;
}

export interface HookOutcome {
  name: string;
  ok: boolean;
  durationMs: number;
  error?: string;
}

const DEFAULT_OPTIONS: ShutdownOptions = {
  timeout: 30000,
  hookTimeout: 10000,
  exit: (code) => process.exit(code),
};

// ============================================================
// 优雅关闭管理器
// ============================================================

export class GracefulShutdownManager {
  private hooks: ShutdownHook[] = [];
  private isShuttingDown = false;
  private signalHandlersRegistered = false;
  private options: ShutdownOptions;

  constructor(options?: Partial<ShutdownOptions>) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  configure(options: Partial<ShutdownOptions>): void {
    this.options = { ...this.options, ...options };
  }

  /**
   * 注册关闭钩子
   * @param name 钩子名称（用于日志）
   * @param priority 优先级（越小越先执行，默认 100）
   */
  addHook(name: string, handler: () => Promise<void>, priority: number = 100): void {
    this.hooks.push({ name, priority, handler });
    // sort 是稳定的，同优先级保持注册顺序
    this.hooks.sort((a, b) => a.priority - b.priority);
    log.debug(`Shutdown hook registered: ${name} (priority=${priority})`);
  }

  removeHook(name: string): void {
    this.hooks = this.hooks.filter(h => h.name !== name);
  }

  /**
   * 注册进程信号处理器（重复调用无效）
   */
  registerSignalHandlers(): void {
    if (this.signalHandlersRegistered) return;
    this.signalHandlersRegistered = true;

    const shutdown = (signal: string) => {
      this.initiateShutdown(signal).catch((err: unknown) => {
        log.error('Shutdown failed:', err);
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

    process.on('uncaughtException', (err) => {
      log.error('Uncaught exception, initiating shutdown:', err);
      shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      // 只记录，不关闭
      log.error('Unhandled rejection:', reason);
    });

    log.info('Signal handlers registered (SIGTERM, SIGINT, uncaughtException)');
  }

  /**
   * 发起优雅关闭流程，结束时调用 exit
   */
  async initiateShutdown(signal: string): Promise<void> {
    if (this.isShuttingDown) {
      log.warn(`Shutdown already in progress, ignoring ${signal}`);
      return;
    }

    this.isShuttingDown = true;
    const startTime = Date.now();
    log.info(`Received ${signal}, starting graceful shutdown...`);

    const forceExitTimer = setTimeout(() => {
      log.error(`Graceful shutdown timed out after ${this.options.timeout}ms, forcing exit`);
      this.options.exit(1);
    }, this.options.timeout);
    forceExitTimer.unref();

    const outcomes = await this.runHooks();
    clearTimeout(forceExitTimer);

    const failed = outcomes.filter(o => !o.ok).length;
    log.info(`Graceful shutdown completed in ${Date.now() - startTime}ms (${failed} hook failures)`);
    this.options.exit(failed > 0 ? 1 : 0);
  }

  /**
   * 按优先级执行所有钩子，不退出进程
   */
  async runHooks(): Promise<HookOutcome[]> {
    log.info(`Executing ${this.hooks.length} shutdown hooks...`);
    const outcomes: HookOutcome[] = [];

    for (const hook of this.hooks) {
      const start = Date.now();
      try {
        await this.withHookTimeout(hook);
        outcomes.push({ name: hook.name, ok: true, durationMs: Date.now() - start });
        log.info(`  ✓ ${hook.name} (${Date.now() - start}ms)`);
      } catch (err) {
        // 继续执行其他钩子
        outcomes.push({ name: hook.name, ok: false, durationMs: Date.now() - start, error: errorMessage(err) });
        log.error(`  ✗ ${hook.name} failed:`, err);
      }
    }

    return outcomes;
  }

  getStatus(): {
    isShuttingDown: boolean;
    registeredHooks: string[];
  } {
    return {
      isShuttingDown: this.isShuttingDown,
      registeredHooks: this.hooks.map(h => `${h.name} (p=${h.priority})`),
    };
  }

  // ============================================================
  // 内部方法
  // ============================================================

  private withHookTimeout(hook: ShutdownHook): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Hook "${hook.name}" timed out`));
      }, this.options.hookTimeout);
      timer.unref();

      hook.handler().then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }
}

// ============================================================
// 单例导出
// ============================================================

export const gracefulShutdown = new GracefulShutdownManager();
