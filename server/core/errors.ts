/**
 * 统一错误体系
 * 分层错误类 + 错误码 + HTTP 状态码映射（供上层 Web 层转换响应）
 *
 * 使用方式：
 *   import { TransportError, CircuitBreakerOpenError } from '../core/errors';
 *   throw new TransportError('redis', 'XADD failed', { stream });
 *   throw new CircuitBreakerOpenError('agent:analyst');
 */

// ============================================
// 错误码枚举
// ============================================

export enum ErrorCode {
  // 通用错误 (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  SERVICE_UNAVAILABLE = 1003,
  TIMEOUT = 1004,

  // 验证错误 (2xxx)
  VALIDATION = 2000,

  // 资源/路由错误 (4xxx)
  NOT_FOUND = 4000,
  HANDLER_NOT_FOUND = 4004,

  // 连接错误 (5xxx)
  CONNECTION_FAILED = 5000,
  TRANSPORT = 5005,

  // 协议错误 (6xxx)
  MALFORMED_MESSAGE = 6002,

  // 外部服务错误 (7xxx)
  EXTERNAL_SERVICE = 7000,
  CIRCUIT_OPEN = 7003,
}

const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.UNKNOWN]: 500,
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
  [ErrorCode.TIMEOUT]: 504,
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.HANDLER_NOT_FOUND]: 501,
  [ErrorCode.CONNECTION_FAILED]: 502,
  [ErrorCode.TRANSPORT]: 503,
  [ErrorCode.MALFORMED_MESSAGE]: 400,
  [ErrorCode.EXTERNAL_SERVICE]: 502,
  [ErrorCode.CIRCUIT_OPEN]: 503,
};

// ============================================
// 基础错误类
// ============================================

export class CoreError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Record<string, unknown> = {},
    isOperational = true,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code] ?? 500;
    this.context = context;
    this.timestamp = new Date().toISOString();
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /** 序列化为 API 响应格式 */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================
// 具体错误类
// ============================================

/** 验证错误 */
export class ValidationError extends CoreError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.VALIDATION, context);
  }
}

/** 资源未找到 */
export class NotFoundError extends CoreError {
  constructor(resource: string, id?: string | number, context: Record<string, unknown> = {}) {
    const msg = id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`;
    super(msg, ErrorCode.NOT_FOUND, { resource, id, ...context });
  }
}

/** 没有处理器（命令/查询路由失败） */
export class HandlerNotFoundError extends CoreError {
  constructor(kind: 'command' | 'query', type: string) {
    super(`No handler found for ${kind}: ${type}`, ErrorCode.HANDLER_NOT_FOUND, { kind, type });
  }
}

/** 连接错误 */
export class ConnectionError extends CoreError {
  constructor(target: string, message: string, context: Record<string, unknown> = {}) {
    super(`Connection to ${target} failed: ${message}`, ErrorCode.CONNECTION_FAILED, { target, ...context });
  }
}

/** 日志存储（Redis Streams）读写失败 */
export class TransportError extends CoreError {
  constructor(target: string, message: string, context: Record<string, unknown> = {}) {
    super(`Transport '${target}': ${message}`, ErrorCode.TRANSPORT, { target, ...context });
  }
}

/** 操作超时 */
export class TimeoutError extends CoreError {
  constructor(operation: string, timeoutMs: number, context: Record<string, unknown> = {}) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCode.TIMEOUT, { operation, timeoutMs, ...context });
  }
}

/** 无法解码的流消息 */
export class MalformedMessageError extends CoreError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, ErrorCode.MALFORMED_MESSAGE, context);
  }
}

/** 外部服务错误 */
export class ExternalServiceError extends CoreError {
  constructor(service: string, message: string, context: Record<string, unknown> = {}) {
    super(`External service '${service}': ${message}`, ErrorCode.EXTERNAL_SERVICE, { service, ...context });
  }
}

/** 断路器打开，调用被快速拒绝 */
export class CircuitBreakerOpenError extends CoreError {
  constructor(breaker: string, context: Record<string, unknown> = {}) {
    super(`Circuit breaker ${breaker} is open, service unavailable`, ErrorCode.CIRCUIT_OPEN, { breaker, ...context });
  }
}

// ============================================
// 错误处理工具
// ============================================

export function isCoreError(err: unknown): err is CoreError {
  return err instanceof CoreError;
}

/** 判断是否为可恢复的运营性错误 */
export function isOperationalError(err: unknown): boolean {
  if (isCoreError(err)) return err.isOperational;
  return false;
}

/** 提取错误消息（未知抛出值转字符串） */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 将未知错误包装为 CoreError */
export function wrapError(err: unknown, context: Record<string, unknown> = {}): CoreError {
  if (isCoreError(err)) return err;

  if (err instanceof Error) {
    return new CoreError(err.message, ErrorCode.INTERNAL, {
      originalName: err.name,
      stack: err.stack,
      ...context,
    });
  }

  return new CoreError(String(err), ErrorCode.UNKNOWN, context);
}

/** 安全执行异步操作，捕获并包装错误 */
export async function safeExec<T>(
  fn: () => Promise<T>,
  context: Record<string, unknown> = {},
): Promise<[T, null] | [null, CoreError]> {
  try {
    const result = await fn();
    return [result, null];
  } catch (err) {
    return [null, wrapError(err, context)];
  }
}
