/**
 * 内置事件处理器
 *   - LoggingEventHandler      所有类型，debug 日志
 *   - InvestigationEventHandler 调查生命周期日志
 *   - InvestigationProjection   维护调查读模型并失效相关查询缓存
 */

import { createModuleLogger } from '../../core/logger';
import type { InvestigationReadModel } from '../cqrs/read-model';
import type { DomainEvent } from './event';
import type { EventHandler } from './event-bus';
import { ALL_EVENT_TYPES, EventType } from './event-types';

const log = createModuleLogger('event-handlers');

export class LoggingEventHandler implements EventHandler {
  readonly name = 'LoggingEventHandler';
  readonly eventTypes = ALL_EVENT_TYPES;

  async handle(event: DomainEvent): Promise<void> {
    log.debug({ eventId: event.id, type: event.type, retryCount: event.retryCount, data: event.data }, 'Event received');
  }
}

const INVESTIGATION_EVENTS = [
  EventType.INVESTIGATION_CREATED,
  EventType.INVESTIGATION_STARTED,
  EventType.INVESTIGATION_COMPLETED,
  EventType.INVESTIGATION_FAILED,
  EventType.INVESTIGATION_CANCELLED,
] as const;

export class InvestigationEventHandler implements EventHandler {
  readonly name = 'InvestigationEventHandler';
  readonly eventTypes = INVESTIGATION_EVENTS;

  async handle(event: DomainEvent): Promise<void> {
    const investigationId = event.data.investigationId;
    switch (event.type) {
      case EventType.INVESTIGATION_CREATED:
        log.info(`Investigation created: ${investigationId}`);
        break;
      case EventType.INVESTIGATION_STARTED:
        log.info(`Investigation started: ${investigationId}`);
        break;
      case EventType.INVESTIGATION_COMPLETED:
        log.info(`Investigation completed: ${investigationId}`);
        break;
      case EventType.INVESTIGATION_FAILED:
        log.warn(`Investigation failed: ${investigationId} (${String(event.data.error ?? 'unknown error')})`);
        break;
      case EventType.INVESTIGATION_CANCELLED:
        log.info(`Investigation cancelled: ${investigationId}`);
        break;
      default:
        break;
    }
  }

  async onError(event: DomainEvent, error: unknown): Promise<void> {
    log.error(`Error handling investigation event ${event.id}:`, error);
  }
}

/**
 * 读模型投影；应用事件后调用 onChange（用于失效查询缓存）
 */
export class InvestigationProjection implements EventHandler {
  readonly name = 'InvestigationProjection';
  readonly eventTypes = INVESTIGATION_EVENTS;

  constructor(
    private readonly readModel: InvestigationReadModel,
    private readonly onChange?: (investigationId: string) => Promise<void>,
  ) {}

  async handle(event: DomainEvent): Promise<void> {
    this.readModel.apply(event);
    // 重复投递时 apply 为空操作，但缓存失效仍需执行（上次可能失败于此）
    const investigationId = event.data.investigationId;
    if (this.onChange && typeof investigationId === 'string') {
      await this.onChange(investigationId);
    }
  }
}
