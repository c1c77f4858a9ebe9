/**
 * Prometheus 指标收集器 - 平台基础设施层
 *
 * 基于 prom-client 记录消息核心的运行指标，供上层 /metrics 端点抓取。
 *
 * 指标覆盖：
 * - 命令总线：执行计数（按命令类型/结果）与耗时
 * - 查询总线：执行计数（按查询类型/结果/缓存命中）
 * - 事件总线：发布/处理/重投/死信/丢弃计数（按分类）
 * - 断路器：状态与调用结果
 * - Node.js 默认指标（可选）
 *
 * 架构位置: server/platform/middleware/ (平台基础层)
 * 依赖: prom-client, server/core/logger
 */

import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';
import { createModuleLogger } from '../../core/logger';

const log = createModuleLogger('metrics-collector');

export type EventOutcome = 'published' | 'processed' | 'retried' | 'failed' | 'dropped';
export type BreakerStateName = 'closed' | 'open' | 'half_open';
export type BreakerCallResult = 'success' | 'failure' | 'timeout' | 'reject';

const BREAKER_STATE_VALUE: Record<BreakerStateName, number> = {
  closed: 0,
  half_open: 1,
  open: 2,
};

// ============================================================
// 指标收集器类
// ============================================================

export class MetricsCollector {
  private readonly register: Registry;
  private defaultMetricsEnabled = false;

  private readonly commandsTotal: Counter<'command_type' | 'result'>;
  private readonly commandDuration: Histogram<'command_type'>;
  private readonly queriesTotal: Counter<'query_type' | 'result' | 'cache'>;
  private readonly eventsTotal: Counter<'category' | 'outcome'>;
  private readonly circuitBreakerState: Gauge<'service'>;
  private readonly circuitBreakerRequestsTotal: Counter<'service' | 'result'>;

  constructor(defaultLabels: Record<string, string> = {}) {
    this.register = new Registry();
    this.register.setDefaultLabels({
      app: 'cqrs-messaging-core',
      env: process.env.NODE_ENV || 'development',
      ...defaultLabels,
    });

    this.commandsTotal = new Counter({
      name: 'cqrs_commands_total',
      help: 'Total number of commands executed by the command bus',
      labelNames: ['command_type', 'result'] as const,
      registers: [this.register],
    });

    this.commandDuration = new Histogram({
      name: 'cqrs_command_duration_seconds',
      help: 'Command execution duration in seconds',
      labelNames: ['command_type'] as const,
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [this.register],
    });

    this.queriesTotal = new Counter({
      name: 'cqrs_queries_total',
      help: 'Total number of queries executed by the query bus',
      labelNames: ['query_type', 'result', 'cache'] as const,
      registers: [this.register],
    });

    this.eventsTotal = new Counter({
      name: 'cqrs_eventbus_events_total',
      help: 'Event bus events by stream category and outcome',
      labelNames: ['category', 'outcome'] as const,
      registers: [this.register],
    });

    this.circuitBreakerState = new Gauge({
      name: 'cqrs_circuit_breaker_state',
      help: 'Circuit breaker state (0=closed, 1=halfOpen, 2=open)',
      labelNames: ['service'] as const,
      registers: [this.register],
    });

    this.circuitBreakerRequestsTotal = new Counter({
      name: 'cqrs_circuit_breaker_requests_total',
      help: 'Total requests through circuit breakers',
      labelNames: ['service', 'result'] as const,
      registers: [this.register],
    });
  }

  // ============================================================
  // 业务指标记录方法（供其他模块调用）
  // ============================================================

  recordCommand(commandType: string, success: boolean, durationSeconds?: number): void {
    this.commandsTotal.inc({ command_type: commandType, result: success ? 'success' : 'failure' });
    if (durationSeconds !== undefined) {
      this.commandDuration.observe({ command_type: commandType }, durationSeconds);
    }
  }

  recordQuery(queryType: string, success: boolean, fromCache: boolean): void {
    this.queriesTotal.inc({
      query_type: queryType,
      result: success ? 'success' : 'failure',
      cache: fromCache ? 'hit' : 'miss',
    });
  }

  recordEvent(category: string, outcome: EventOutcome): void {
    this.eventsTotal.inc({ category, outcome });
  }

  setCircuitBreakerState(service: string, state: BreakerStateName): void {
    this.circuitBreakerState.set({ service }, BREAKER_STATE_VALUE[state]);
  }

  recordCircuitBreakerRequest(service: string, result: BreakerCallResult): void {
    this.circuitBreakerRequestsTotal.inc({ service, result });
  }

  /**
   * 启用 Node.js 默认指标（CPU、内存、事件循环延迟、GC 等）
   */
  enableDefaultMetrics(): void {
    if (this.defaultMetricsEnabled) return;
    collectDefaultMetrics({ register: this.register, prefix: 'cqrs_' });
    this.defaultMetricsEnabled = true;
    log.info(`Default metrics enabled (${this.register.getMetricsAsArray().length} metrics registered)`);
  }

  /** Prometheus 文本格式 */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }

  getContentType(): string {
    return this.register.contentType;
  }

  getRegistry(): Registry {
    return this.register;
  }

  /** 清零所有指标（保留注册） */
  reset(): void {
    this.register.resetMetrics();
  }
}

// ============================================================
// 单例导出
// ============================================================

export const metricsCollector = new MetricsCollector();
