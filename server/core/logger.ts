/**
 * 统一日志框架
 * 结构化模块日志器，消息核心所有模块共用
 *
 * 使用方式：
 *   import { createModuleLogger } from '../core/logger';
 *   const log = createModuleLogger('event-bus');
 *   log.info({ stream, group }, 'Consumer group created');
 *   log.error('Handler failed', err);
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  level: LogLevel;
  module: string;
  timestamp: string;
  message: string;
  [key: string]: unknown;
}

interface LoggerOptions {
  level?: LogLevel;
  module?: string;
  pretty?: boolean;
  /** 附加到每条日志的固定字段（如 stream / consumer） */
  bindings?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',   // gray
  debug: '\x1b[36m',   // cyan
  info: '\x1b[32m',    // green
  warn: '\x1b[33m',    // yellow
  error: '\x1b[31m',   // red
  fatal: '\x1b[35m',   // magenta
};

const RESET = '\x1b[0m';

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/** 把 Error 展开成可序列化对象（JSON.stringify 会丢掉 message/stack） */
function serializeError(err: Error): Record<string, unknown> {
  return { name: err.name, message: err.message, stack: err.stack };
}

// ============================================
// Logger 核心类
// ============================================

export class Logger {
  private overrideLevel: number | null;
  private module: string;
  private pretty: boolean;
  private bindings: Record<string, unknown>;
  // logger 在 config 之前加载，这里直接读取 process.env 作为引导值
  private static globalLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
  private static logBuffer: LogEntry[] = [];
  private static maxBufferSize = parseInt(process.env.LOG_BUFFER_SIZE || '1000', 10);
  private static listeners: Array<(entry: LogEntry) => void> = [];

  constructor(options: LoggerOptions = {}) {
    // 仅当显式传入 level 时才固化，否则动态跟随 globalLevel
    this.overrideLevel = options.level ? LOG_LEVELS[options.level] : null;
    this.module = options.module || 'app';
    this.pretty = options.pretty ?? (process.env.NODE_ENV !== 'production');
    this.bindings = options.bindings ?? {};
  }

  private get effectiveLevel(): number {
    return this.overrideLevel ?? LOG_LEVELS[Logger.globalLevel];
  }

  static setGlobalLevel(level: LogLevel): void {
    Logger.globalLevel = level;
  }

  static getGlobalLevel(): LogLevel {
    return Logger.globalLevel;
  }

  /** 注册日志监听器（用于日志聚合/告警） */
  static addListener(fn: (entry: LogEntry) => void): () => void {
    Logger.listeners.push(fn);
    return () => {
      Logger.listeners = Logger.listeners.filter(l => l !== fn);
    };
  }

  /** 获取最近的日志缓冲区（用于诊断） */
  static getRecentLogs(count = 100): LogEntry[] {
    return Logger.logBuffer.slice(-count);
  }

  /** 创建子日志器：模块名加后缀，bindings 与父级合并 */
  child(subModule: string, bindings: Record<string, unknown> = {}): Logger {
    return new Logger({
      module: `${this.module}:${subModule}`,
      pretty: this.pretty,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  trace(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('trace', data, message);
  }

  debug(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('debug', data, message);
  }

  info(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('info', data, message);
  }

  warn(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('warn', data, message);
  }

  error(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('error', data, message);
  }

  fatal(data: Record<string, unknown> | string, message?: unknown): void {
    this.log('fatal', data, message);
  }

  private log(level: LogLevel, data: Record<string, unknown> | string, message?: unknown): void {
    if (LOG_LEVELS[level] < this.effectiveLevel) return;

    const timestamp = new Date().toISOString();
    let msg: string;
    const extra: Record<string, unknown> = { ...this.bindings };

    if (typeof data === 'string') {
      msg = data;
      // 第二参数是非字符串值（如 Error 对象）时附加到 err 字段
      if (message !== undefined && typeof message !== 'string') {
        extra.err = message instanceof Error ? serializeError(message) : message;
      } else if (typeof message === 'string') {
        msg = `${data} ${message}`;
      }
    } else {
      msg = typeof message === 'string' ? message : (message !== undefined ? String(message) : '');
      for (const [key, value] of Object.entries(data)) {
        extra[key] = value instanceof Error ? serializeError(value) : value;
      }
    }

    const entry: LogEntry = {
      ...extra,
      level,
      module: this.module,
      timestamp,
      message: msg,
    };

    Logger.logBuffer.push(entry);
    if (Logger.logBuffer.length > Logger.maxBufferSize) {
      Logger.logBuffer = Logger.logBuffer.slice(-Math.floor(Logger.maxBufferSize * 0.6));
    }

    for (const listener of Logger.listeners) {
      try {
        listener(entry);
      } catch (err) {
        process.stderr.write(`[logger] listener failed: ${String(err)}\n`);
      }
    }

    if (this.pretty) {
      this.prettyPrint(level, timestamp, msg, extra);
    } else {
      const output = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
      output.write(JSON.stringify(entry) + '\n');
    }
  }

  private prettyPrint(
    level: LogLevel,
    timestamp: string,
    msg: string,
    extra: Record<string, unknown>,
  ): void {
    const color = LEVEL_COLORS[level];
    const time = timestamp.slice(11, 23); // HH:mm:ss.SSS
    const levelStr = level.toUpperCase().padEnd(5);
    const moduleStr = `[${this.module}]`;

    let extraStr = '';
    if (Object.keys(extra).length > 0) {
      const { err, ...rest } = extra;
      if (err && typeof err === 'object' && 'stack' in err && typeof err.stack === 'string') {
        extraStr = `\n  ${err.stack}`;
        if (Object.keys(rest).length > 0) {
          extraStr += `\n  ${JSON.stringify(rest)}`;
        }
      } else {
        extraStr = ` ${JSON.stringify(extra)}`;
      }
    }

    const output = level === 'error' || level === 'fatal' ? process.stderr : process.stdout;
    output.write(`${color}${time} ${levelStr}${RESET} ${moduleStr} ${msg}${extraStr}\n`);
  }
}

// ============================================
// 导出 API
// ============================================

/** 全局根日志器 */
export const logger = new Logger({ module: 'core' });

/** 创建模块级日志器 */
export function createModuleLogger(module: string): Logger {
  return new Logger({ module });
}

export function setLogLevel(level: LogLevel): void {
  Logger.setGlobalLevel(level);
}

export function addLogListener(fn: (entry: LogEntry) => void): () => void {
  return Logger.addListener(fn);
}

export function getRecentLogs(count?: number): LogEntry[] {
  return Logger.getRecentLogs(count);
}
