/**
 * 断路器中间件 - 平台基础设施层
 *
 * 保护命令/事件处理器调用的下游依赖，避免故障级联。
 * 每个依赖名一个独立实例，三态模型（Closed → Open → Half-Open）：
 *
 *   CLOSED    连续失败达到 failureThreshold → OPEN；任一成功清零失败计数
 *   OPEN      直接拒绝（CircuitBreakerOpenError），冷却 timeoutSeconds 后
 *             下一次调用触发 → HALF_OPEN，该调用不占探测名额
 *   HALF_OPEN 另外最多放行 halfOpenMaxCalls 个探测；成功达到 successThreshold
 *             → CLOSED（计数全部清零）；任一失败 → OPEN。
 *             名额用尽且 timeoutSeconds 内没有结论时重新开一轮探测
 *
 * 状态记账全部在 await 之间同步完成，事件循环上天然原子，无需加锁。
 *
 * 架构位置: server/platform/middleware/ (平台基础层)
 * 依赖: server/core/logger, server/core/errors, metricsCollector
 */

import { EventEmitter } from 'events';
import { CircuitBreakerOpenError, TimeoutError, ValidationError, errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { type MetricsCollector, metricsCollector } from './metricsCollector';

const log = createModuleLogger('circuit-breaker');

// ============================================================
// 断路器配置
// ============================================================

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  /** CLOSED 态连续失败多少次后熔断 */
  failureThreshold: number;
  /** HALF_OPEN 态成功多少次后恢复 */
  successThreshold: number;
  /** OPEN 态冷却时间(秒) */
  timeoutSeconds: number;
  /** HALF_OPEN 态最多放行的探测数（不含触发转换的那一次） */
  halfOpenMaxCalls: number;
  /** 单次调用超时(ms)，超时计为失败；不设置则不限时 */
  callTimeoutMs?: number;
  /** 返回 false 的错误原样抛出，不计入失败（如参数校验错误） */
  isFailure?: (err: unknown) => boolean;
}

const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  successThreshold: 2,
  timeoutSeconds: 60,
  halfOpenMaxCalls: 3,
};

/** 常见依赖的默认配置 */
const SERVICE_DEFAULTS: Record<string, Partial<CircuitBreakerOptions>> = {
  transparency_api: { failureThreshold: 3, timeoutSeconds: 30, successThreshold: 2, callTimeoutMs: 15000 },
  llm_service: { failureThreshold: 5, timeoutSeconds: 60, successThreshold: 3, callTimeoutMs: 30000 },
  database: { failureThreshold: 2, timeoutSeconds: 10, successThreshold: 1, callTimeoutMs: 5000 },
  redis: { failureThreshold: 3, timeoutSeconds: 20, successThreshold: 2, callTimeoutMs: 3000 },
};

export interface CircuitBreakerStats {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  rejectedCalls: number;
  timeouts: number;
  stateChanges: number;
}

export interface CircuitBreakerStatus {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  halfOpenCalls: number;
  lastFailureTime: Date | null;
  openedAt: Date | null;
  config: {
    failureThreshold: number;
    successThreshold: number;
    timeoutSeconds: number;
    halfOpenMaxCalls: number;
    callTimeoutMs: number | null;
  };
  stats: CircuitBreakerStats;
}

export interface StateChange {
  name: string;
  from: CircuitState;
  to: CircuitState;
}

export type StateChangeListener = (change: StateChange) => void;

// ============================================================
// 断路器
// ============================================================

export class CircuitBreaker extends EventEmitter {
  readonly name: string;
  private readonly options: CircuitBreakerOptions;
  private readonly metrics: MetricsCollector;

  private state: CircuitState = 'closed';
  private failureCount = 0;
  private successCount = 0;
  private halfOpenCalls = 0;
  private lastFailureTime: number | null = null;
  private openedAt: number | null = null;
  private halfOpenedAt: number | null = null;

  private stats: CircuitBreakerStats = {
    totalCalls: 0,
    successfulCalls: 0,
    failedCalls: 0,
    rejectedCalls: 0,
    timeouts: 0,
    stateChanges: 0,
  };

  constructor(name: string, options: Partial<CircuitBreakerOptions> = {}, metrics: MetricsCollector = metricsCollector) {
    super();
    this.name = name;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    if (this.options.successThreshold > this.options.halfOpenMaxCalls + 1) {
      throw new ValidationError(
        `Circuit breaker ${name}: successThreshold (${this.options.successThreshold}) must not exceed halfOpenMaxCalls + 1 (${this.options.halfOpenMaxCalls + 1})`,
      );
    }
    this.metrics = metrics;
    this.metrics.setCircuitBreakerState(name, 'closed');
  }

  getState(): CircuitState {
    return this.state;
  }

  /**
   * 通过断路器执行异步调用
   * @throws CircuitBreakerOpenError 未被放行时，fn 不会被调用
   */
  async call<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>,
    ...args: TArgs
  ): Promise<TResult> {
    this.stats.totalCalls++;
    const usesProbeSlot = this.admit();

    let result: TResult;
    try {
      result = await this.invoke(fn, args);
    } catch (err) {
      if (this.options.isFailure && !this.options.isFailure(err)) {
        // 不计入结论的探测归还名额
        if (usesProbeSlot && this.state === 'half_open' && this.halfOpenCalls > 0) {
          this.halfOpenCalls--;
        }
        throw err;
      }
      this.onFailure(err);
      throw err;
    }
    this.onSuccess();
    return result;
  }

  /** 手动恢复到 CLOSED（运维操作） */
  reset(): void {
    this.transitionTo('closed');
    this.clearCounters();
    this.lastFailureTime = null;
    log.info(`[${this.name}] Circuit manually reset`);
  }

  /** 强制熔断（维护模式） */
  forceOpen(): void {
    this.open();
    log.warn(`[${this.name}] Circuit force-opened`);
  }

  getStatus(): CircuitBreakerStatus {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      halfOpenCalls: this.halfOpenCalls,
      lastFailureTime: this.lastFailureTime === null ? null : new Date(this.lastFailureTime),
      openedAt: this.openedAt === null ? null : new Date(this.openedAt),
      config: {
        failureThreshold: this.options.failureThreshold,
        successThreshold: this.options.successThreshold,
        timeoutSeconds: this.options.timeoutSeconds,
        halfOpenMaxCalls: this.options.halfOpenMaxCalls,
        callTimeoutMs: this.options.callTimeoutMs ?? null,
      },
      stats: { ...this.stats },
    };
  }

  onStateChange(listener: StateChangeListener): () => void {
    this.on('stateChange', listener);
    return () => {
      this.off('stateChange', listener);
    };
  }

  // ============================================================
  // 状态转换
  // ============================================================

  /** 放行则返回该调用是否占用了半开探测名额；否则抛出 */
  private admit(): boolean {
    const cooldownMs = this.options.timeoutSeconds * 1000;

    if (this.state === 'open') {
      const elapsed = this.openedAt === null ? Infinity : Date.now() - this.openedAt;
      if (elapsed < cooldownMs) {
        this.reject('open');
      }
      this.transitionTo('half_open');
      this.startProbeWindow();
      return false;
    }

    if (this.state !== 'half_open') return false;

    if (this.halfOpenCalls >= this.options.halfOpenMaxCalls) {
      const stalledMs = this.halfOpenedAt === null ? Infinity : Date.now() - this.halfOpenedAt;
      if (stalledMs < cooldownMs) {
        this.reject('half-open probe limit reached');
      }
      log.info(`[${this.name}] Half-open probes inconclusive for ${this.options.timeoutSeconds}s, starting a new probe window`);
      this.startProbeWindow();
      return false;
    }
    this.halfOpenCalls++;
    return true;
  }

  private startProbeWindow(): void {
    this.successCount = 0;
    this.halfOpenCalls = 0;
    this.halfOpenedAt = Date.now();
  }

  private reject(reason: string): never {
    this.stats.rejectedCalls++;
    this.metrics.recordCircuitBreakerRequest(this.name, 'reject');
    log.debug(`[${this.name}] Call rejected (${reason})`);
    const retryInMs = this.openedAt === null
      ? 0
      : Math.max(0, this.options.timeoutSeconds * 1000 - (Date.now() - this.openedAt));
    throw new CircuitBreakerOpenError(this.name, { state: this.state, retryInMs });
  }

  private onSuccess(): void {
    this.stats.successfulCalls++;
    this.metrics.recordCircuitBreakerRequest(this.name, 'success');

    if (this.state === 'half_open') {
      this.successCount++;
      if (this.successCount >= this.options.successThreshold) {
        this.transitionTo('closed');
        this.clearCounters();
      }
    } else if (this.state === 'closed') {
      this.failureCount = 0;
    }
  }

  private onFailure(err: unknown): void {
    const timedOut = err instanceof TimeoutError;
    this.stats.failedCalls++;
    if (timedOut) this.stats.timeouts++;
    this.metrics.recordCircuitBreakerRequest(this.name, timedOut ? 'timeout' : 'failure');
    this.lastFailureTime = Date.now();

    if (this.state === 'half_open') {
      log.warn(`[${this.name}] Probe failed, reopening: ${errorMessage(err)}`);
      this.open();
      return;
    }

    this.failureCount++;
    if (this.state === 'closed' && this.failureCount >= this.options.failureThreshold) {
      log.warn(`[${this.name}] Circuit OPENED after ${this.failureCount} consecutive failures: ${errorMessage(err)}`);
      this.open();
    }
  }

  private open(): void {
    this.transitionTo('open');
    this.openedAt = Date.now();
    this.successCount = 0;
    this.halfOpenCalls = 0;
    this.halfOpenedAt = null;
  }

  private clearCounters(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.halfOpenCalls = 0;
    this.openedAt = null;
    this.halfOpenedAt = null;
  }

  private transitionTo(next: CircuitState): void {
    const from = this.state;
    if (from === next) return;
    this.state = next;
    this.stats.stateChanges++;
    this.metrics.setCircuitBreakerState(this.name, next);
    if (next === 'closed') {
      log.info(`[${this.name}] Circuit CLOSED`);
    } else if (next === 'half_open') {
      log.info(`[${this.name}] Circuit HALF-OPEN, probing`);
    }
    const change: StateChange = { name: this.name, from, to: next };
    this.emit('stateChange', change);
  }

  private invoke<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>,
    args: TArgs,
  ): Promise<TResult> {
    const timeoutMs = this.options.callTimeoutMs;
    if (timeoutMs === undefined) return fn(...args);
    return withTimeout(fn(...args), timeoutMs, `Circuit ${this.name} call`);
  }
}

/**
 * 超时则以 TimeoutError 拒绝；原 Promise 不会被取消
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

// ============================================================
// 断路器注册表
// ============================================================

export type OverallHealth = 'healthy' | 'degraded' | 'critical';

export interface BreakerHealthStatus {
  overallHealth: OverallHealth;
  totalServices: number;
  healthyServices: string[];
  degradedServices: string[];
  failedServices: string[];
  /** 0..1，CLOSED 占比；没有断路器时为 1 */
  healthScore: number;
}

export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();
  private defaults = new Map<string, Partial<CircuitBreakerOptions>>();
  private stateChangeListeners: StateChangeListener[] = [];

  constructor(
    private readonly baseOptions: Partial<CircuitBreakerOptions> = {},
    private readonly metrics: MetricsCollector = metricsCollector,
  ) {}

  /** 为某个依赖名登记默认参数（创建前生效） */
  registerDefaults(name: string, options: Partial<CircuitBreakerOptions>): void {
    this.defaults.set(name, options);
  }

  /** 登记常见依赖（transparency_api / llm_service / database / redis）的默认参数 */
  registerServiceDefaults(): void {
    for (const [name, options] of Object.entries(SERVICE_DEFAULTS)) {
      this.registerDefaults(name, options);
    }
  }

  /**
   * 获取或创建断路器。已存在时直接返回，options 被忽略。
   */
  getBreaker(name: string, options: Partial<CircuitBreakerOptions> = {}): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    const breaker = new CircuitBreaker(
      name,
      { ...this.baseOptions, ...this.defaults.get(name), ...options },
      this.metrics,
    );
    breaker.onStateChange(change => this.notifyStateChange(change));
    this.breakers.set(name, breaker);

    const status = breaker.getStatus();
    log.info(`[${name}] Circuit breaker registered (failureThreshold=${status.config.failureThreshold}, timeout=${status.config.timeoutSeconds}s)`);
    return breaker;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  /**
   * 包装一个异步函数，使其受断路器保护
   *
   * @example
   * const search = registry.wrap('transparency_api', client.search.bind(client));
   * const hits = await search('contracts');
   */
  wrap<TArgs extends unknown[], TResult>(
    name: string,
    fn: (...args: TArgs) => Promise<TResult>,
    options?: Partial<CircuitBreakerOptions>,
  ): (...args: TArgs) => Promise<TResult> {
    const breaker = this.getBreaker(name, options);
    return (...args: TArgs) => breaker.call(fn, ...args);
  }

  getAllStatus(): Record<string, CircuitBreakerStatus> {
    const result: Record<string, CircuitBreakerStatus> = {};
    for (const [name, breaker] of this.breakers) {
      result[name] = breaker.getStatus();
    }
    return result;
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }

  getHealthStatus(): BreakerHealthStatus {
    const healthyServices: string[] = [];
    const degradedServices: string[] = [];
    const failedServices: string[] = [];

    for (const [name, breaker] of this.breakers) {
      switch (breaker.getState()) {
        case 'closed':
          healthyServices.push(name);
          break;
        case 'half_open':
          degradedServices.push(name);
          break;
        case 'open':
          failedServices.push(name);
          break;
      }
    }

    let overallHealth: OverallHealth = 'healthy';
    if (failedServices.length > 0) {
      overallHealth = healthyServices.length === 0 ? 'critical' : 'degraded';
    } else if (degradedServices.length > 0) {
      overallHealth = 'degraded';
    }

    const total = this.breakers.size;
    return {
      overallHealth,
      totalServices: total,
      healthyServices,
      degradedServices,
      failedServices,
      healthScore: total > 0 ? healthyServices.length / total : 1,
    };
  }

  /**
   * 监听任一断路器的状态变化
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.stateChangeListeners.push(listener);
    return () => {
      this.stateChangeListeners = this.stateChangeListeners.filter(l => l !== listener);
    };
  }

  private notifyStateChange(change: StateChange): void {
    for (const listener of this.stateChangeListeners) {
      try {
        listener(change);
      } catch (err) {
        log.error('State change listener error:', err);
      }
    }
  }
}
