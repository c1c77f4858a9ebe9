/**
 * 统一配置中心
 * Redis 连接、事件总线、查询缓存、断路器默认值的唯一来源
 *
 * 使用方式：
 *   import { config } from '../core/config';
 *   const prefix = config.eventBus.streamPrefix;
 *
 * 环境变量优先级：
 *   环境变量 > .env 文件（见 env-loader.ts） > 默认值
 *
 * 零依赖原则：本文件仅依赖传入的环境变量表，不导入任何其他模块
 */

type EnvSource = Record<string, string | undefined>;

// ============================================
// 辅助函数
// ============================================

function makeReaders(source: EnvSource) {
  const env = (key: string, defaultValue: string): string => source[key] || defaultValue;

  const envInt = (key: string, defaultValue: number): number => {
    const v = source[key];
    return v ? parseInt(v, 10) : defaultValue;
  };

  const envBool = (key: string, defaultValue: boolean): boolean => {
    const v = source[key];
    if (!v) return defaultValue;
    return v === 'true' || v === '1' || v === 'yes';
  };

  const envOptional = (key: string): string | undefined => source[key] || undefined;

  return { env, envInt, envBool, envOptional };
}

// ============================================
// 配置结构
// ============================================

/**
 * 从环境变量表构建配置。
 * 枚举类字段保留原始字符串，由 config-schema.ts 负责校验取值范围。
 */
export function loadConfig(source: EnvSource = process.env) {
  const { env, envInt, envBool, envOptional } = makeReaders(source);

  const redisUrl = envOptional('REDIS_URL');
  const redisHost = envOptional('REDIS_HOST');

  return {
    /** 应用基础配置 */
    app: {
      name: env('APP_NAME', 'cqrs-messaging-core'),
      env: env('NODE_ENV', 'development'),
      logLevel: env('LOG_LEVEL', 'info'),
    },

    /** Redis（事件日志 + L2 查询缓存） */
    redis: {
      /** 未配置 REDIS_URL / REDIS_HOST 时退化为进程内存实现 */
      enabled: Boolean(redisUrl || redisHost),
      url: redisUrl,
      host: redisHost || 'localhost',
      port: envInt('REDIS_PORT', 6379),
      password: envOptional('REDIS_PASSWORD'),
      db: envInt('REDIS_DB', 0),
      keyPrefix: env('REDIS_KEY_PREFIX', ''),
      maxRetriesPerRequest: envInt('REDIS_MAX_RETRIES', 3),
      /** 重连退避步长(ms) */
      retryDelayMs: envInt('REDIS_RETRY_DELAY_MS', 100),
      maxConnectionAttempts: envInt('REDIS_MAX_CONNECTION_ATTEMPTS', 5),
    },

    /** 事件总线（Redis Streams） */
    eventBus: {
      streamPrefix: env('EVENT_STREAM_PREFIX', 'events'),
      consumerGroup: env('EVENT_CONSUMER_GROUP', 'cidadao-ai'),
      consumerName: envOptional('EVENT_CONSUMER_NAME'),
      maxRetries: envInt('EVENT_MAX_RETRIES', 3),
      /** 每个分类流保留的最大条数（近似截断） */
      maxStreamLength: envInt('EVENT_STREAM_MAXLEN', 10000),
      dlqMaxLength: envInt('EVENT_DLQ_MAXLEN', 1000),
      batchSize: envInt('EVENT_READ_COUNT', 10),
      blockMs: envInt('EVENT_READ_BLOCK_MS', 1000),
      errorBackoffMs: envInt('EVENT_ERROR_BACKOFF_MS', 1000),
    },

    /** 查询缓存 */
    queryCache: {
      defaultTtlSeconds: envInt('QUERY_CACHE_TTL', 300),
      maxEntries: envInt('QUERY_CACHE_MAX_ENTRIES', 10000),
      l2Enabled: envBool('QUERY_CACHE_L2', false),
      keyPrefix: env('QUERY_CACHE_PREFIX', 'query:'),
    },

    /** 断路器默认参数 */
    circuitBreaker: {
      failureThreshold: envInt('CB_FAILURE_THRESHOLD', 5),
      successThreshold: envInt('CB_SUCCESS_THRESHOLD', 2),
      timeoutSeconds: envInt('CB_TIMEOUT_SECONDS', 60),
      halfOpenMaxCalls: envInt('CB_HALF_OPEN_MAX_CALLS', 3),
    },

    /** 命令总线 */
    commandBus: {
      slowCommandMs: envInt('SLOW_COMMAND_MS', 1000),
    },

    /** 查询总线 */
    queryBus: {
      slowQueryMs: envInt('SLOW_QUERY_MS', 1000),
    },

    /** 优雅关闭 */
    shutdown: {
      timeoutMs: envInt('SHUTDOWN_TIMEOUT_MS', 30000),
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();
