/**
 * 系统事件类型
 *
 * 事件类型是封闭的字面量联合；分类（决定写入哪个物理流）由
 * EVENT_CATEGORIES 表在编译期给出，新增类型而不登记分类会直接编译失败。
 */

export const EventType = {
  // 调查事件
  INVESTIGATION_CREATED: 'investigation.created',
  INVESTIGATION_STARTED: 'investigation.started',
  INVESTIGATION_COMPLETED: 'investigation.completed',
  INVESTIGATION_FAILED: 'investigation.failed',
  INVESTIGATION_CANCELLED: 'investigation.cancelled',

  // Agent 事件
  AGENT_TASK_STARTED: 'agent.task.started',
  AGENT_TASK_COMPLETED: 'agent.task.completed',
  AGENT_TASK_FAILED: 'agent.task.failed',

  // 异常事件
  ANOMALY_DETECTED: 'anomaly.detected',
  ANOMALY_CONFIRMED: 'anomaly.confirmed',
  ANOMALY_RESOLVED: 'anomaly.resolved',

  // 对话事件
  CHAT_MESSAGE_RECEIVED: 'chat.message.received',
  CHAT_RESPONSE_SENT: 'chat.response.sent',

  // 系统事件
  SYSTEM_HEALTH_CHECK: 'system.health.check',
  SYSTEM_METRIC_RECORDED: 'system.metric.recorded',
  CACHE_INVALIDATED: 'cache.invalidated',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export type EventCategory = 'investigation' | 'agent' | 'anomaly' | 'chat' | 'system' | 'cache';

const EVENT_CATEGORIES: { readonly [T in EventType]: EventCategory } = {
  'investigation.created': 'investigation',
  'investigation.started': 'investigation',
  'investigation.completed': 'investigation',
  'investigation.failed': 'investigation',
  'investigation.cancelled': 'investigation',
  'agent.task.started': 'agent',
  'agent.task.completed': 'agent',
  'agent.task.failed': 'agent',
  'anomaly.detected': 'anomaly',
  'anomaly.confirmed': 'anomaly',
  'anomaly.resolved': 'anomaly',
  'chat.message.received': 'chat',
  'chat.response.sent': 'chat',
  'system.health.check': 'system',
  'system.metric.recorded': 'system',
  'cache.invalidated': 'cache',
};

export const ALL_EVENT_TYPES: readonly EventType[] = Object.values(EventType);

export function eventCategory(type: EventType): EventCategory {
  return EVENT_CATEGORIES[type];
}

export function isEventType(value: string): value is EventType {
  return Object.prototype.hasOwnProperty.call(EVENT_CATEGORIES, value);
}
