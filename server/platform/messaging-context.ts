/**
 * 消息核心装配
 *
 * 按配置创建 事件总线 / 命令总线 / 查询总线 / 断路器注册表 / 读模型，
 * 注册内置处理器与中间件，并把读模型投影接到查询缓存失效上。
 * 未配置 Redis 时事件日志使用进程内实现（仅适合开发与测试）。
 */

import type Redis from 'ioredis';
import { type AppConfig, config as defaultConfig } from '../core/config';
import { errorMessage } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import { MultiLevelCache } from '../lib/cache/cacheService';
import { RedisStreamLog, createRedisConnection } from '../lib/clients/redis.client';
import {
  type AgentTaskExecutor,
  CancelInvestigationHandler,
  CommandBus,
  CreateInvestigationHandler,
  ExecuteAgentTaskHandler,
  GetInvestigationHandler,
  InvestigationReadModel,
  InvestigationStatsHandler,
  LoggingMiddleware,
  MetricsMiddleware,
  PerformanceMiddleware,
  QueryBus,
  SearchInvestigationsHandler,
  SendChatMessageHandler,
  UpdateInvestigationHandler,
  ValidationMiddleware,
} from './cqrs';
import {
  InvestigationEventHandler,
  InvestigationProjection,
  LoggingEventHandler,
  MemoryStreamLog,
  RedisStreamEventBus,
  type StreamLog,
} from './events';
import { CircuitBreakerRegistry } from './middleware/circuitBreaker';
import { type MetricsCollector, metricsCollector } from './middleware/metricsCollector';

const log = createModuleLogger('messaging');

export interface MessagingContextOptions {
  config?: AppConfig;
  /** 直接注入事件日志（测试用），优先于 Redis 配置 */
  streamLog?: StreamLog;
  /** 复用已有连接；不传且配置启用 Redis 时自行创建 */
  redis?: Redis;
  /** 不提供时不注册 agent.task.execute */
  agentExecutor?: AgentTaskExecutor;
  metrics?: MetricsCollector;
}

export interface MessagingContext {
  readonly config: AppConfig;
  readonly streamLog: StreamLog;
  readonly eventBus: RedisStreamEventBus;
  readonly commandBus: CommandBus;
  readonly queryBus: QueryBus;
  readonly cache: MultiLevelCache;
  readonly breakers: CircuitBreakerRegistry;
  readonly readModel: InvestigationReadModel;
  readonly metrics: MetricsCollector;
  /** 是否由本上下文创建（关闭时一并释放） */
  readonly ownsStreamLog: boolean;
}

const INVESTIGATION_QUERIES = ['investigation.get', 'investigation.search', 'investigation.stats'] as const;

export function createMessagingContext(options: MessagingContextOptions = {}): MessagingContext {
  const cfg = options.config ?? defaultConfig;
  const metrics = options.metrics ?? metricsCollector;

  let redis: Redis | null = options.redis ?? null;
  let streamLog: StreamLog;
  let ownsStreamLog = true;

  if (options.streamLog) {
    streamLog = options.streamLog;
    ownsStreamLog = false;
  } else if (redis || cfg.redis.enabled) {
    redis = redis ?? createRedisConnection(cfg.redis);
    streamLog = new RedisStreamLog(redis);
    ownsStreamLog = options.redis === undefined;
  } else {
    log.warn('Redis not configured, using in-memory event log (development only)');
    streamLog = new MemoryStreamLog();
  }

  const cache = new MultiLevelCache(
    {
      l1: { maxSize: cfg.queryCache.maxEntries, ttl: cfg.queryCache.defaultTtlSeconds },
      l2: { enabled: cfg.queryCache.l2Enabled, ttl: cfg.queryCache.defaultTtlSeconds },
    },
    redis ?? undefined,
  );

  const breakers = new CircuitBreakerRegistry(cfg.circuitBreaker, metrics);
  breakers.registerServiceDefaults();

  const eventBus = new RedisStreamEventBus(
    streamLog,
    {
      streamPrefix: cfg.eventBus.streamPrefix,
      consumerGroup: cfg.eventBus.consumerGroup,
      maxRetries: cfg.eventBus.maxRetries,
      maxStreamLength: cfg.eventBus.maxStreamLength,
      dlqMaxLength: cfg.eventBus.dlqMaxLength,
      batchSize: cfg.eventBus.batchSize,
      blockMs: cfg.eventBus.blockMs,
      errorBackoffMs: cfg.eventBus.errorBackoffMs,
    },
    metrics,
  );

  const queryBus = new QueryBus(
    cache,
    { defaultTtlSeconds: cfg.queryCache.defaultTtlSeconds, keyPrefix: cfg.queryCache.keyPrefix },
    metrics,
  );
  const readModel = new InvestigationReadModel();

  // 读侧
  queryBus.registerMiddleware(new PerformanceMiddleware(cfg.queryBus.slowQueryMs));
  queryBus.registerHandler(new GetInvestigationHandler(readModel));
  queryBus.registerHandler(new SearchInvestigationsHandler(readModel));
  queryBus.registerHandler(new InvestigationStatsHandler(readModel));

  // 写侧
  const commandBus = new CommandBus();
  commandBus.registerMiddleware(new LoggingMiddleware(cfg.commandBus.slowCommandMs));
  commandBus.registerMiddleware(new MetricsMiddleware(metrics));
  commandBus.registerMiddleware(new ValidationMiddleware());
  commandBus.registerHandler(new CreateInvestigationHandler(eventBus));
  commandBus.registerHandler(new UpdateInvestigationHandler(eventBus));
  commandBus.registerHandler(new CancelInvestigationHandler(eventBus));
  commandBus.registerHandler(new SendChatMessageHandler(eventBus));
  if (options.agentExecutor) {
    commandBus.registerHandler(new ExecuteAgentTaskHandler(eventBus, breakers, options.agentExecutor));
  }

  // 事件 → 读模型 → 缓存失效
  eventBus.registerHandler(new LoggingEventHandler());
  eventBus.registerHandler(new InvestigationEventHandler());
  eventBus.registerHandler(
    new InvestigationProjection(readModel, async () => {
      for (const type of INVESTIGATION_QUERIES) {
        await queryBus.invalidate(type);
      }
    }),
  );

  log.info(`Messaging context ready (event log: ${options.streamLog ? 'injected' : redis ? 'redis' : 'memory'})`);

  return {
    config: cfg,
    streamLog,
    eventBus,
    commandBus,
    queryBus,
    cache,
    breakers,
    readModel,
    metrics,
    ownsStreamLog,
  };
}

const closed = new WeakSet<MessagingContext>();

/**
 * 停止消费并释放连接；重复调用无副作用
 */
export async function closeMessagingContext(ctx: MessagingContext): Promise<void> {
  if (closed.has(ctx)) return;
  closed.add(ctx);

  await ctx.eventBus.stop();
  ctx.cache.stop();
  if (ctx.ownsStreamLog) {
    try {
      await ctx.streamLog.close();
    } catch (err) {
      log.warn(`Failed to close event log: ${errorMessage(err)}`);
    }
  }
  log.info('Messaging context closed');
}
