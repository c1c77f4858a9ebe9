/**
 * 调查读模型：由 InvestigationProjection 从事件流构建的反规范化视图
 *
 * 投影按事件 ID 去重，重复投递（至少一次）不会改变结果。去重记录挂在各调查名下，
 * 只随调查数量增长；非调查事件不记录。
 * 终态（completed / failed / cancelled）之后到达的 started 被忽略。
 * 对外返回的视图都是副本，调用方修改不影响读模型。
 */

import { z } from 'zod';
import type { DomainEvent } from '../events/event';
import { EventType } from '../events/event-types';

// ============================================================
// 视图
// ============================================================

export const investigationStatusSchema = z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']);
export type InvestigationStatus = z.infer<typeof investigationStatusSchema>;

export const investigationViewSchema = z.object({
  investigationId: z.string(),
  userId: z.string().nullable(),
  query: z.string().nullable(),
  priority: z.string(),
  status: investigationStatusSchema,
  // L2 缓存经 JSON 往返后 Date 变成字符串
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  findings: z.array(z.unknown()),
  anomalies: z.array(z.unknown()),
  confidenceScore: z.number().nullable(),
  error: z.string().nullable(),
  cancelReason: z.string().nullable(),
});
export type InvestigationView = z.infer<typeof investigationViewSchema>;

export type InvestigationSortField = 'createdAt' | 'updatedAt';

export interface InvestigationSearchCriteria {
  status?: InvestigationStatus;
  userId?: string;
  sortBy: InvestigationSortField;
  order: 'asc' | 'desc';
  limit: number;
  offset: number;
}

export interface InvestigationStatsCriteria {
  userId?: string;
  from?: Date;
  to?: Date;
}

export interface InvestigationStats {
  total: number;
  byStatus: Record<InvestigationStatus, number>;
}

// ============================================================
// 事件数据
// ============================================================

const createdData = z.object({
  investigationId: z.string().min(1),
  query: z.string().optional(),
  userId: z.string().nullish(),
  priority: z.string().optional(),
});

const idData = z.object({ investigationId: z.string().min(1) });

const completedData = idData.extend({
  findings: z.array(z.unknown()).optional(),
  anomalies: z.array(z.unknown()).optional(),
  confidenceScore: z.number().optional(),
});

const failedData = idData.extend({ error: z.string().optional() });
const cancelledData = idData.extend({ reason: z.string().optional() });

const TERMINAL: ReadonlySet<InvestigationStatus> = new Set(['completed', 'failed', 'cancelled']);

const INVESTIGATION_EVENTS: ReadonlySet<EventType> = new Set([
  EventType.INVESTIGATION_CREATED,
  EventType.INVESTIGATION_STARTED,
  EventType.INVESTIGATION_COMPLETED,
  EventType.INVESTIGATION_FAILED,
  EventType.INVESTIGATION_CANCELLED,
]);

// ============================================================
// 读模型
// ============================================================

export class InvestigationReadModel {
  private views = new Map<string, InvestigationView>();
  /** investigationId → 已应用的事件 ID */
  private appliedEvents = new Map<string, Set<string>>();

  /**
   * 应用一个调查事件
   * @returns 变更后的视图；非调查事件、重复事件或被忽略时返回 null
   * @throws ZodError 事件数据缺少 investigationId 等必需字段
   */
  apply(event: DomainEvent): InvestigationView | null {
    if (!INVESTIGATION_EVENTS.has(event.type)) return null;

    const { investigationId } = idData.parse(event.data);
    const applied = this.appliedEvents.get(investigationId) ?? new Set<string>();
    if (applied.has(event.id)) return null;

    const view = this.project(event);
    if (view) {
      this.views.set(view.investigationId, view);
    }
    applied.add(event.id);
    this.appliedEvents.set(investigationId, applied);
    return view ? structuredClone(view) : null;
  }

  get(investigationId: string): InvestigationView | undefined {
    const view = this.views.get(investigationId);
    return view ? structuredClone(view) : undefined;
  }

  search(criteria: InvestigationSearchCriteria): { items: InvestigationView[]; total: number } {
    const matched = [...this.views.values()].filter(view =>
      (criteria.status === undefined || view.status === criteria.status)
      && (criteria.userId === undefined || view.userId === criteria.userId),
    );

    const direction = criteria.order === 'asc' ? 1 : -1;
    matched.sort((a, b) => {
      const diff = a[criteria.sortBy].getTime() - b[criteria.sortBy].getTime();
      return diff !== 0 ? diff * direction : a.investigationId.localeCompare(b.investigationId);
    });

    return {
      items: matched.slice(criteria.offset, criteria.offset + criteria.limit).map(view => structuredClone(view)),
      total: matched.length,
    };
  }

  stats(criteria: InvestigationStatsCriteria = {}): InvestigationStats {
    const byStatus: Record<InvestigationStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    let total = 0;

    for (const view of this.views.values()) {
      if (criteria.userId !== undefined && view.userId !== criteria.userId) continue;
      if (criteria.from && view.createdAt < criteria.from) continue;
      if (criteria.to && view.createdAt > criteria.to) continue;
      byStatus[view.status]++;
      total++;
    }

    return { total, byStatus };
  }

  size(): number {
    return this.views.size;
  }

  /** 去重记录中的事件 ID 总数 */
  appliedEventCount(): number {
    let count = 0;
    for (const ids of this.appliedEvents.values()) count += ids.size;
    return count;
  }

  clear(): void {
    this.views.clear();
    this.appliedEvents.clear();
  }

  private project(event: DomainEvent): InvestigationView | null {
    switch (event.type) {
      case EventType.INVESTIGATION_CREATED: {
        const data = createdData.parse(event.data);
        const existing = this.views.get(data.investigationId);
        if (existing) {
          // started 先于 created 到达时补全创建信息
          return {
            ...existing,
            query: existing.query ?? data.query ?? null,
            userId: existing.userId ?? data.userId ?? null,
            createdAt: event.timestamp < existing.createdAt ? event.timestamp : existing.createdAt,
          };
        }
        return {
          investigationId: data.investigationId,
          userId: data.userId ?? null,
          query: data.query ?? null,
          priority: data.priority ?? 'medium',
          status: 'pending',
          createdAt: event.timestamp,
          updatedAt: event.timestamp,
          findings: [],
          anomalies: [],
          confidenceScore: null,
          error: null,
          cancelReason: null,
        };
      }

      case EventType.INVESTIGATION_STARTED: {
        const data = idData.parse(event.data);
        const current = this.viewFor(data.investigationId, event);
        if (TERMINAL.has(current.status)) return null;
        return { ...current, status: 'running', updatedAt: event.timestamp };
      }

      case EventType.INVESTIGATION_COMPLETED: {
        const data = completedData.parse(event.data);
        const current = this.viewFor(data.investigationId, event);
        return {
          ...current,
          status: 'completed',
          findings: data.findings ?? current.findings,
          anomalies: data.anomalies ?? current.anomalies,
          confidenceScore: data.confidenceScore ?? current.confidenceScore,
          updatedAt: event.timestamp,
        };
      }

      case EventType.INVESTIGATION_FAILED: {
        const data = failedData.parse(event.data);
        const current = this.viewFor(data.investigationId, event);
        return { ...current, status: 'failed', error: data.error ?? 'unknown error', updatedAt: event.timestamp };
      }

      case EventType.INVESTIGATION_CANCELLED: {
        const data = cancelledData.parse(event.data);
        const current = this.viewFor(data.investigationId, event);
        if (TERMINAL.has(current.status)) return null;
        return { ...current, status: 'cancelled', cancelReason: data.reason ?? null, updatedAt: event.timestamp };
      }

      default:
        return null;
    }
  }

  private viewFor(investigationId: string, event: DomainEvent): InvestigationView {
    return this.views.get(investigationId) ?? {
      investigationId,
      userId: null,
      query: null,
      priority: 'medium',
      status: 'pending',
      createdAt: event.timestamp,
      updatedAt: event.timestamp,
      findings: [],
      anomalies: [],
      confidenceScore: null,
      error: null,
      cancelReason: null,
    };
  }
}
