/**
 * 查询总线中间件
 */

import { createModuleLogger } from '../../core/logger';
import type { QueryMiddleware } from './query-bus';
import type { Query, QueryData, QueryResult, QueryType } from './queries';

const log = createModuleLogger('query-middleware');

/**
 * 执行时间超过 slowQueryMs 时告警；缓存命中不计入慢查询
 */
export class PerformanceMiddleware implements QueryMiddleware {
  readonly name = 'performance';

  constructor(private readonly slowQueryMs: number = 1000) {}

  async afterExecute<K extends QueryType>(
    query: Query<K>,
    result: QueryResult<QueryData<K>>,
  ): Promise<QueryResult<QueryData<K>>> {
    if (!result.fromCache && result.executionTimeMs > this.slowQueryMs) {
      log.warn(`Slow query detected: ${query.type} took ${result.executionTimeMs.toFixed(1)}ms`);
    }
    if (!result.success) {
      log.warn(`Query ${query.type} (${query.queryId}) failed: ${result.error}`);
    }
    return result;
  }
}
