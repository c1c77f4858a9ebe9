/**
 * 查询总线：读侧中介者，带结果缓存
 *
 * 缓存键：<prefix><type>:<sha256(规范化 JSON {type, params, userId})>
 * 参数对象键顺序不同也会命中同一条目。命中时用处理器的 resultSchema 校验，
 * 校验不通过的条目删除后按未命中处理。
 *
 * 只有成功结果写入缓存；execute() 永不抛出。
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { HandlerNotFoundError, errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import type { MultiLevelCache } from '../../lib/cache/cacheService';
import { type MetricsCollector, metricsCollector } from '../middleware/metricsCollector';
import type { Query, QueryData, QueryResult, QueryType } from './queries';

const log = createModuleLogger('query-bus');

// ============================================================
// 处理器与中间件
// ============================================================

export interface QueryHandlerOutput<T> {
  data: T;
  metadata?: Record<string, unknown>;
}

export interface QueryHandler<K extends QueryType = QueryType> {
  readonly name: string;
  readonly queryType: K;
  /** 校验缓存命中的数据 */
  readonly resultSchema: z.ZodType<QueryData<K>, z.ZodTypeDef, unknown>;
  handle(query: Query<K>): Promise<QueryHandlerOutput<QueryData<K>>>;
}

export interface QueryMiddleware {
  readonly name: string;
  beforeExecute?<K extends QueryType>(query: Query<K>): Promise<Query<K>>;
  afterExecute?<K extends QueryType>(
    query: Query<K>,
    result: QueryResult<QueryData<K>>,
  ): Promise<QueryResult<QueryData<K>>>;
}

export interface QueryBusOptions {
  /** 默认缓存秒数 */
  defaultTtlSeconds: number;
  keyPrefix: string;
}

export interface QueryBusStats {
  queriesProcessed: number;
  queriesSucceeded: number;
  queriesFailed: number;
  cacheHits: number;
  handlersRegistered: number;
  middlewareRegistered: number;
  successRate: number;
  cacheHitRate: number;
  avgExecutionTimeMs: number;
}

type QueryHandlerTable = { [K in QueryType]?: QueryHandler<K> };

const cacheEntrySchema = z.object({ data: z.unknown(), metadata: z.record(z.unknown()) });

// ============================================================
// 缓存键
// ============================================================

/** 递归排序对象键，丢弃 undefined 值 */
function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const item: unknown = Reflect.get(value, key);
      if (item !== undefined) sorted[key] = canonicalize(item);
    }
    return sorted;
  }
  return value;
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function buildCacheKey(prefix: string, query: Query): string {
  const digest = createHash('sha256')
    .update(canonicalJson({ type: query.type, params: query.params, userId: query.userId ?? null }))
    .digest('hex');
  return `${prefix}${query.type}:${digest}`;
}

// ============================================================
// 查询总线
// ============================================================

export class QueryBus {
  private handlers: QueryHandlerTable = {};
  private handlersRegistered = 0;
  private middleware: QueryMiddleware[] = [];
  private readonly options: QueryBusOptions;

  private stats = {
    queriesProcessed: 0,
    queriesSucceeded: 0,
    queriesFailed: 0,
    cacheHits: 0,
    totalExecutionTimeMs: 0,
  };

  constructor(
    private readonly cache: MultiLevelCache,
    options: Partial<QueryBusOptions> = {},
    private readonly metrics: MetricsCollector = metricsCollector,
  ) {
    this.options = {
      defaultTtlSeconds: options.defaultTtlSeconds ?? 300,
      keyPrefix: options.keyPrefix ?? 'query:',
    };
  }

  registerHandler<K extends QueryType>(handler: QueryHandler<K>): void {
    this.handlersRegistered++;
    const existing = this.handlers[handler.queryType];
    if (existing) {
      log.warn(`Handler ${handler.name} ignored for ${handler.queryType}: ${existing.name} registered first`);
      return;
    }
    const handlers: { [P in K]?: QueryHandler<P> } = this.handlers;
    handlers[handler.queryType] = handler;
    log.info(`Registered query handler: ${handler.name} (${handler.queryType})`);
  }

  registerMiddleware(middleware: QueryMiddleware): void {
    this.middleware.push(middleware);
    log.info(`Registered query middleware: ${middleware.name}`);
  }

  hasHandler(type: QueryType): boolean {
    return this.handlers[type] !== undefined;
  }

  async execute<K extends QueryType>(query: Query<K>): Promise<QueryResult<QueryData<K>>> {
    const started = performance.now();
    let current = query;
    let result: QueryResult<QueryData<K>>;

    try {
      for (const mw of this.middleware) {
        if (mw.beforeExecute) current = await mw.beforeExecute(current);
      }

      result = await this.dispatch(current, started);

      for (let i = this.middleware.length - 1; i >= 0; i--) {
        const mw = this.middleware[i];
        if (mw.afterExecute) result = await mw.afterExecute(current, result);
      }
    } catch (err) {
      log.error(`Query ${current.type} (${current.queryId}) aborted by middleware:`, err);
      result = {
        success: false,
        queryId: current.queryId,
        error: errorMessage(err),
        fromCache: false,
        executionTimeMs: performance.now() - started,
        metadata: {},
      };
    }

    this.stats.queriesProcessed++;
    this.stats.totalExecutionTimeMs += result.executionTimeMs;
    if (result.success) {
      this.stats.queriesSucceeded++;
      if (result.fromCache) this.stats.cacheHits++;
    } else {
      this.stats.queriesFailed++;
    }
    this.metrics.recordQuery(current.type, result.success, result.fromCache);

    return Object.freeze({ ...result });
  }

  /**
   * 失效缓存
   * @param type 省略时失效全部查询缓存
   * @returns L1 中删除的条目数
   */
  async invalidate(type?: QueryType): Promise<number> {
    const pattern = type ? `${this.options.keyPrefix}${type}:*` : `${this.options.keyPrefix}*`;
    const removed = await this.cache.deletePattern(pattern);
    log.debug(`Invalidated ${removed} cached queries (${pattern})`);
    return removed;
  }

  getStats(): QueryBusStats {
    const { queriesProcessed, queriesSucceeded, cacheHits, totalExecutionTimeMs } = this.stats;
    return {
      queriesProcessed,
      queriesSucceeded,
      queriesFailed: this.stats.queriesFailed,
      cacheHits,
      handlersRegistered: this.handlersRegistered,
      middlewareRegistered: this.middleware.length,
      successRate: queriesProcessed > 0 ? queriesSucceeded / queriesProcessed : 0,
      cacheHitRate: queriesSucceeded > 0 ? cacheHits / queriesSucceeded : 0,
      avgExecutionTimeMs: queriesProcessed > 0 ? totalExecutionTimeMs / queriesProcessed : 0,
    };
  }

  private async dispatch<K extends QueryType>(query: Query<K>, started: number): Promise<QueryResult<QueryData<K>>> {
    const elapsed = (): number => performance.now() - started;
    const handler: QueryHandler<K> | undefined = this.handlers[query.type];
    if (!handler) {
      const notFound = new HandlerNotFoundError('query', query.type);
      log.warn(notFound.message);
      return { success: false, queryId: query.queryId, error: notFound.message, fromCache: false, executionTimeMs: elapsed(), metadata: {} };
    }

    const key = query.useCache ? buildCacheKey(this.options.keyPrefix, query) : null;

    if (key) {
      const cached = await this.readCache(key, handler);
      if (cached) {
        log.debug(`Cache hit for ${query.type} (${query.queryId})`);
        return {
          success: true,
          queryId: query.queryId,
          data: cached.data,
          fromCache: true,
          executionTimeMs: elapsed(),
          metadata: cached.metadata,
        };
      }
    }

    let output: QueryHandlerOutput<QueryData<K>>;
    try {
      output = await handler.handle(query);
    } catch (err) {
      log.error(`Query handler ${handler.name} failed for ${query.queryId}:`, err);
      return { success: false, queryId: query.queryId, error: errorMessage(err), fromCache: false, executionTimeMs: elapsed(), metadata: {} };
    }

    const metadata = output.metadata ?? {};
    if (key) {
      const ttl = query.cacheTtl ?? this.options.defaultTtlSeconds;
      // L1 保存副本，调用方修改返回值不影响后续命中
      await this.cache.set(key, structuredClone({ data: output.data, metadata }), { l1TTL: ttl, l2TTL: ttl });
    }

    return {
      success: true,
      queryId: query.queryId,
      data: output.data,
      fromCache: false,
      executionTimeMs: elapsed(),
      metadata,
    };
  }

  private async readCache<K extends QueryType>(
    key: string,
    handler: QueryHandler<K>,
  ): Promise<{ data: QueryData<K>; metadata: Record<string, unknown> } | null> {
    const raw = await this.cache.get(key);
    if (raw === undefined) return null;

    const entry = cacheEntrySchema.safeParse(raw);
    const data = entry.success ? handler.resultSchema.safeParse(entry.data.data) : null;
    if (!entry.success || !data?.success) {
      log.warn(`Dropping cached ${handler.queryType} entry that no longer matches its schema`);
      await this.cache.delete(key);
      return null;
    }
    return { data: data.data, metadata: entry.data.metadata };
  }
}
