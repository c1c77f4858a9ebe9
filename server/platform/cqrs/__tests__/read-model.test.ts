/**
 * 调查读模型：投影、去重、乱序与检索
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { type DomainEvent, type EventData, createEvent } from '../../events/event';
import { EventType } from '../../events/event-types';
import { InvestigationReadModel, type InvestigationSearchCriteria } from '../read-model';

function at(type: EventType, data: EventData, iso: string): DomainEvent {
  return { ...createEvent(type, data), timestamp: new Date(iso) };
}

function criteria(overrides: Partial<InvestigationSearchCriteria> = {}): InvestigationSearchCriteria {
  return { sortBy: 'createdAt', order: 'desc', limit: 20, offset: 0, ...overrides };
}

describe('InvestigationReadModel 投影', () => {
  let model: InvestigationReadModel;

  beforeEach(() => {
    model = new InvestigationReadModel();
  });

  it('created 生成 pending 视图并填充默认值', () => {
    const view = model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-1', query: 'why is p99 up' }, '2026-03-01T00:00:00.000Z'));

    expect(view).toEqual({
      investigationId: 'inv-1',
      userId: null,
      query: 'why is p99 up',
      priority: 'medium',
      status: 'pending',
      createdAt: new Date('2026-03-01T00:00:00.000Z'),
      updatedAt: new Date('2026-03-01T00:00:00.000Z'),
      findings: [],
      anomalies: [],
      confidenceScore: null,
      error: null,
      cancelReason: null,
    });
    expect(model.get('inv-1')).toEqual(view);
  });

  it('同一事件重复投递只应用一次', () => {
    const created = at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-1' }, '2026-03-01T00:00:00.000Z');
    const started = at(EventType.INVESTIGATION_STARTED, { investigationId: 'inv-1' }, '2026-03-01T00:01:00.000Z');
    model.apply(created);
    model.apply(started);

    expect(model.apply(created)).toBeNull();
    expect(model.get('inv-1')?.status).toBe('running');
    expect(model.size()).toBe(1);
  });

  it('终态之后到达的 started / cancelled 被忽略', () => {
    model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-1' }, '2026-03-01T00:00:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_COMPLETED, {
      investigationId: 'inv-1',
      findings: ['disk saturation'],
      confidenceScore: 0.8,
    }, '2026-03-01T00:05:00.000Z'));

    expect(model.apply(at(EventType.INVESTIGATION_STARTED, { investigationId: 'inv-1' }, '2026-03-01T00:06:00.000Z'))).toBeNull();
    expect(model.apply(at(EventType.INVESTIGATION_CANCELLED, { investigationId: 'inv-1', reason: 'late' }, '2026-03-01T00:07:00.000Z'))).toBeNull();

    const view = model.get('inv-1');
    expect(view?.status).toBe('completed');
    expect(view?.findings).toEqual(['disk saturation']);
    expect(view?.confidenceScore).toBe(0.8);
    expect(view?.updatedAt).toEqual(new Date('2026-03-01T00:05:00.000Z'));
  });

  it('started 先于 created 到达时由 created 补全', () => {
    model.apply(at(EventType.INVESTIGATION_STARTED, { investigationId: 'inv-1' }, '2026-03-01T00:02:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-1', query: 'q', userId: 'u1' }, '2026-03-01T00:00:00.000Z'));

    const view = model.get('inv-1');
    expect(view?.status).toBe('running');
    expect(view?.query).toBe('q');
    expect(view?.userId).toBe('u1');
    expect(view?.createdAt).toEqual(new Date('2026-03-01T00:00:00.000Z'));
  });

  it('failed 没有错误信息时记为 unknown error', () => {
    model.apply(at(EventType.INVESTIGATION_FAILED, { investigationId: 'inv-1' }, '2026-03-01T00:00:00.000Z'));
    expect(model.get('inv-1')?.status).toBe('failed');
    expect(model.get('inv-1')?.error).toBe('unknown error');
  });

  it('cancelled 记录原因', () => {
    model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-1' }, '2026-03-01T00:00:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_CANCELLED, { investigationId: 'inv-1', reason: 'duplicate' }, '2026-03-01T00:01:00.000Z'));
    expect(model.get('inv-1')?.cancelReason).toBe('duplicate');
  });

  it('非调查事件不产生视图', () => {
    expect(model.apply(createEvent(EventType.CHAT_MESSAGE_RECEIVED, { message: 'hi' }))).toBeNull();
    expect(model.size()).toBe(0);
  });

  it('缺少 investigationId 时抛出', () => {
    expect(() => model.apply(createEvent(EventType.INVESTIGATION_STARTED, {}))).toThrow();
  });

  it('去重记录只保留调查事件，按调查归组', () => {
    for (let i = 0; i < 50; i++) {
      model.apply(createEvent(EventType.CHAT_MESSAGE_RECEIVED, { message: `m${i}` }));
    }
    model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-1' }, '2026-03-01T00:00:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_STARTED, { investigationId: 'inv-1' }, '2026-03-01T00:01:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-2' }, '2026-03-01T00:02:00.000Z'));

    expect(model.appliedEventCount()).toBe(3);
  });

  it('返回的视图是副本，修改不影响读模型', () => {
    const created = model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-1' }, '2026-03-01T00:00:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_COMPLETED, {
      investigationId: 'inv-1',
      findings: ['disk saturation'],
    }, '2026-03-01T00:05:00.000Z'));
    if (created) created.status = 'failed';

    const fetched = model.get('inv-1');
    if (fetched) {
      fetched.status = 'cancelled';
      fetched.findings.push('tampered');
    }
    const [listed] = model.search(criteria()).items;
    listed.status = 'running';

    expect(model.get('inv-1')?.status).toBe('completed');
    expect(model.get('inv-1')?.findings).toEqual(['disk saturation']);
    expect(model.stats().byStatus).toEqual({ pending: 0, running: 0, completed: 1, failed: 0, cancelled: 0 });
  });

  it('clear 同时清空去重记录', () => {
    const created = at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-1' }, '2026-03-01T00:00:00.000Z');
    model.apply(created);
    model.clear();
    expect(model.apply(created)?.investigationId).toBe('inv-1');
  });
});

describe('InvestigationReadModel 检索', () => {
  let model: InvestigationReadModel;

  beforeEach(() => {
    model = new InvestigationReadModel();
    model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-a', userId: 'u1' }, '2026-01-01T00:00:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-b', userId: 'u2' }, '2026-01-02T00:00:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_CREATED, { investigationId: 'inv-c', userId: 'u1' }, '2026-01-02T00:00:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_STARTED, { investigationId: 'inv-a' }, '2026-01-03T00:00:00.000Z'));
    model.apply(at(EventType.INVESTIGATION_COMPLETED, { investigationId: 'inv-b' }, '2026-01-04T00:00:00.000Z'));
  });

  const ids = (result: { items: Array<{ investigationId: string }> }) => result.items.map(v => v.investigationId);

  it('按创建时间倒序，时间相同按 ID 升序', () => {
    expect(ids(model.search(criteria()))).toEqual(['inv-b', 'inv-c', 'inv-a']);
    expect(ids(model.search(criteria({ order: 'asc' })))).toEqual(['inv-a', 'inv-b', 'inv-c']);
  });

  it('按更新时间排序', () => {
    expect(ids(model.search(criteria({ sortBy: 'updatedAt' })))).toEqual(['inv-b', 'inv-a', 'inv-c']);
  });

  it('按状态和用户过滤', () => {
    expect(ids(model.search(criteria({ status: 'running' })))).toEqual(['inv-a']);
    expect(ids(model.search(criteria({ userId: 'u1' })))).toEqual(['inv-c', 'inv-a']);
  });

  it('分页返回总数', () => {
    const page = model.search(criteria({ limit: 1, offset: 1 }));
    expect(ids(page)).toEqual(['inv-c']);
    expect(page.total).toBe(3);
  });

  it('stats 按状态计数', () => {
    expect(model.stats()).toEqual({
      total: 3,
      byStatus: { pending: 1, running: 1, completed: 1, failed: 0, cancelled: 0 },
    });
  });

  it('stats 按用户与时间范围过滤', () => {
    expect(model.stats({ userId: 'u1' }).total).toBe(2);
    expect(model.stats({ from: new Date('2026-01-02T00:00:00.000Z') }).total).toBe(2);
    expect(model.stats({ to: new Date('2026-01-01T12:00:00.000Z') })).toEqual({
      total: 1,
      byStatus: { pending: 0, running: 1, completed: 0, failed: 0, cancelled: 0 },
    });
  });
});
