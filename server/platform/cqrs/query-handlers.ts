/**
 * 内置查询处理器：调查详情 / 搜索 / 统计，数据来自 InvestigationReadModel
 */

import { NotFoundError } from '../../core/errors';
import type { QueryHandler, QueryHandlerOutput } from './query-bus';
import {
  type Query,
  type QueryData,
  investigationDetailSchema,
  investigationListSchema,
  investigationStatsSchema,
} from './queries';
import type { InvestigationReadModel } from './read-model';

export const DEFAULT_SEARCH_LIMIT = 20;

export class GetInvestigationHandler implements QueryHandler<'investigation.get'> {
  readonly name = 'GetInvestigationHandler';
  readonly queryType = 'investigation.get';
  readonly resultSchema = investigationDetailSchema;

  constructor(private readonly readModel: InvestigationReadModel) {}

  async handle(query: Query<'investigation.get'>): Promise<QueryHandlerOutput<QueryData<'investigation.get'>>> {
    const { investigationId, includeFindings, includeAnomalies } = query.params;
    const view = this.readModel.get(investigationId);
    if (!view) {
      throw new NotFoundError('Investigation', investigationId);
    }
    return {
      data: {
        ...view,
        findings: includeFindings === false ? null : view.findings,
        anomalies: includeAnomalies === false ? null : view.anomalies,
      },
    };
  }
}

export class SearchInvestigationsHandler implements QueryHandler<'investigation.search'> {
  readonly name = 'SearchInvestigationsHandler';
  readonly queryType = 'investigation.search';
  readonly resultSchema = investigationListSchema;

  constructor(private readonly readModel: InvestigationReadModel) {}

  async handle(query: Query<'investigation.search'>): Promise<QueryHandlerOutput<QueryData<'investigation.search'>>> {
    const params = query.params;
    const limit = params.limit ?? DEFAULT_SEARCH_LIMIT;
    const offset = params.offset ?? 0;
    const { items, total } = this.readModel.search({
      status: params.status,
      userId: params.userId,
      sortBy: params.sortBy ?? 'createdAt',
      order: params.order ?? 'desc',
      limit,
      offset,
    });
    return {
      data: items,
      metadata: { total, limit, offset, hasMore: offset + items.length < total },
    };
  }
}

export class InvestigationStatsHandler implements QueryHandler<'investigation.stats'> {
  readonly name = 'InvestigationStatsHandler';
  readonly queryType = 'investigation.stats';
  readonly resultSchema = investigationStatsSchema;

  constructor(private readonly readModel: InvestigationReadModel) {}

  async handle(query: Query<'investigation.stats'>): Promise<QueryHandlerOutput<QueryData<'investigation.stats'>>> {
    const { userId, dateFrom, dateTo } = query.params;
    return {
      data: this.readModel.stats({
        userId,
        from: dateFrom ? new Date(dateFrom) : undefined,
        to: dateTo ? new Date(dateTo) : undefined,
      }),
    };
  }
}
