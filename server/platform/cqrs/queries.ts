/**
 * 查询定义：读侧消息
 *
 * QueryDefinitions 按 type 给出参数与结果类型；结果 schema 用于校验缓存命中
 * （L2 中的 JSON 可能来自旧版本，Date 也需要还原）。
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { investigationStatusSchema, investigationViewSchema } from './read-model';

// ============================================================
// 内置查询
// ============================================================

export const getInvestigationParamsSchema = z.object({
  investigationId: z.string().min(1),
  includeFindings: z.boolean().optional(),
  includeAnomalies: z.boolean().optional(),
});

export const searchInvestigationsParamsSchema = z.object({
  status: investigationStatusSchema.optional(),
  userId: z.string().optional(),
  sortBy: z.enum(['createdAt', 'updatedAt']).optional(),
  order: z.enum(['asc', 'desc']).optional(),
  limit: z.number().int().min(1).max(100).optional(),
  offset: z.number().int().min(0).optional(),
});

export const investigationStatsParamsSchema = z.object({
  userId: z.string().optional(),
  /** ISO-8601 */
  dateFrom: z.string().datetime().optional(),
  dateTo: z.string().datetime().optional(),
});

export const investigationDetailSchema = investigationViewSchema.extend({
  findings: z.array(z.unknown()).nullable(),
  anomalies: z.array(z.unknown()).nullable(),
});

export const investigationListSchema = z.array(investigationViewSchema);

export const investigationStatsSchema = z.object({
  total: z.number(),
  byStatus: z.object({
    pending: z.number(),
    running: z.number(),
    completed: z.number(),
    failed: z.number(),
    cancelled: z.number(),
  }),
});

export interface QueryDefinitions {
  'investigation.get': {
    params: z.infer<typeof getInvestigationParamsSchema>;
    result: z.infer<typeof investigationDetailSchema>;
  };
  'investigation.search': {
    params: z.infer<typeof searchInvestigationsParamsSchema>;
    result: z.infer<typeof investigationListSchema>;
  };
  'investigation.stats': {
    params: z.infer<typeof investigationStatsParamsSchema>;
    result: z.infer<typeof investigationStatsSchema>;
  };
}

export type QueryType = keyof QueryDefinitions;
export type QueryParams<K extends QueryType> = QueryDefinitions[K]['params'];
export type QueryData<K extends QueryType> = QueryDefinitions[K]['result'];

// ============================================================
// 查询与结果
// ============================================================

export interface Query<K extends QueryType = QueryType> {
  readonly queryId: string;
  readonly type: K;
  readonly timestamp: Date;
  readonly userId?: string;
  readonly useCache: boolean;
  /** 缓存秒数，未设置时使用默认 TTL */
  readonly cacheTtl?: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly params: QueryParams<K>;
}

export interface QueryOptions {
  userId?: string;
  useCache?: boolean;
  cacheTtl?: number;
  metadata?: Record<string, unknown>;
}

export function createQuery<K extends QueryType>(
  type: K,
  params: QueryParams<K>,
  options: QueryOptions = {},
): Query<K> {
  return Object.freeze({
    queryId: randomUUID(),
    type,
    timestamp: new Date(),
    userId: options.userId,
    useCache: options.useCache ?? true,
    cacheTtl: options.cacheTtl,
    metadata: Object.freeze({ ...options.metadata }),
    params,
  });
}

export interface QueryResult<T = unknown> {
  readonly success: boolean;
  readonly queryId: string;
  readonly data?: T;
  readonly error?: string;
  readonly fromCache: boolean;
  readonly executionTimeMs: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}
