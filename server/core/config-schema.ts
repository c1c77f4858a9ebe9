/**
 * ============================================================================
 * 配置验证 Schema：Zod 强类型验证
 * ============================================================================
 *
 * 用途：
 *   1. 启动时验证所有环境变量的类型和范围
 *   2. 生产环境强制使用真实 Redis（内存事件日志不跨进程、不持久）
 *
 * 使用方式：
 *   import { validateConfigWithSchema } from './config-schema';
 *   const result = validateConfigWithSchema(config);
 *   if (!result.success) process.exit(1);
 *
 * ============================================================================
 */

import { z } from 'zod';
import type { AppConfig } from './config';
import { createModuleLogger } from './logger';

const log = createModuleLogger('config-validator');

// ============================================================
// Schema 定义
// ============================================================

const portSchema = z.number().int().min(1).max(65535);
const positiveInt = z.number().int().min(1);

const appSchema = z.object({
  name: z.string().min(1),
  env: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
});

const redisSchema = z.object({
  enabled: z.boolean(),
  url: z.string().regex(/^rediss?:\/\//, 'must start with redis:// or rediss://').optional(),
  host: z.string().min(1),
  port: portSchema,
  password: z.string().optional(),
  db: z.number().int().min(0).max(15),
  keyPrefix: z.string(),
  maxRetriesPerRequest: z.number().int().min(0).max(100),
  retryDelayMs: positiveInt,
  maxConnectionAttempts: positiveInt,
});

const eventBusSchema = z.object({
  streamPrefix: z.string().min(1).regex(/^[^:\s]+$/, 'must not contain ":" or whitespace'),
  consumerGroup: z.string().min(1),
  consumerName: z.string().min(1).optional(),
  maxRetries: z.number().int().min(0).max(100),
  maxStreamLength: positiveInt,
  dlqMaxLength: positiveInt,
  batchSize: z.number().int().min(1).max(1000),
  blockMs: z.number().int().min(1).max(60000),
  errorBackoffMs: z.number().int().min(0),
});

const queryCacheSchema = z.object({
  defaultTtlSeconds: positiveInt,
  maxEntries: positiveInt,
  l2Enabled: z.boolean(),
  keyPrefix: z.string().min(1),
});

const circuitBreakerSchema = z.object({
  failureThreshold: positiveInt,
  successThreshold: positiveInt,
  timeoutSeconds: z.number().min(0),
  halfOpenMaxCalls: positiveInt,
});

/** 完整配置 Schema */
const configSchema = z.object({
  app: appSchema,
  redis: redisSchema,
  eventBus: eventBusSchema,
  queryCache: queryCacheSchema,
  circuitBreaker: circuitBreakerSchema,
  commandBus: z.object({ slowCommandMs: positiveInt }),
  queryBus: z.object({ slowQueryMs: positiveInt }),
  shutdown: z.object({ timeoutMs: positiveInt }),
}).superRefine((cfg, ctx) => {
  if (cfg.circuitBreaker.successThreshold > cfg.circuitBreaker.halfOpenMaxCalls + 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['circuitBreaker', 'successThreshold'],
      message: 'must not exceed halfOpenMaxCalls + 1, otherwise a half-open breaker can never close',
    });
  }
});

// ============================================================
// 公开 API
// ============================================================

export interface ConfigValidationResult {
  success: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * 使用 Zod Schema 验证配置
 */
export function validateConfigWithSchema(cfg: AppConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // 第一层：Zod schema 验证（类型 + 范围）
  const result = configSchema.safeParse(cfg);
  if (!result.success) {
    for (const issue of result.error.issues) {
      errors.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }

  // 第二层：生产环境业务规则
  if (cfg.app.env === 'production' && !cfg.redis.enabled) {
    errors.push('[CRITICAL] redis: REDIS_URL or REDIS_HOST must be set in production');
  }

  // 第三层：开发环境警告
  if (cfg.app.env === 'development' && !cfg.redis.enabled) {
    warnings.push('redis: not configured, using in-memory event log (acceptable in development)');
  }
  if (cfg.queryCache.l2Enabled && !cfg.redis.enabled) {
    warnings.push('queryCache.l2Enabled: ignored because redis is not configured');
  }

  for (const e of errors) log.error(`Config error: ${e}`);
  for (const w of warnings) log.warn(`Config warning: ${w}`);

  return { success: errors.length === 0, errors, warnings };
}
