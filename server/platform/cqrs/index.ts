// CQRS 层：统一导出
export * from './commands';
export { CommandBus } from './command-bus';
export type { CommandBusStats, CommandHandler, CommandMiddleware } from './command-bus';
export { LoggingMiddleware, MetricsMiddleware, ValidationMiddleware } from './command-middleware';
export {
  CancelInvestigationHandler,
  CreateInvestigationHandler,
  ExecuteAgentTaskHandler,
  SendChatMessageHandler,
  UpdateInvestigationHandler,
} from './command-handlers';
export type { AgentTask, AgentTaskExecutor } from './command-handlers';

export * from './queries';
export { QueryBus, buildCacheKey, canonicalJson } from './query-bus';
export type { QueryBusOptions, QueryBusStats, QueryHandler, QueryHandlerOutput, QueryMiddleware } from './query-bus';
export { PerformanceMiddleware } from './query-middleware';
export {
  DEFAULT_SEARCH_LIMIT,
  GetInvestigationHandler,
  InvestigationStatsHandler,
  SearchInvestigationsHandler,
} from './query-handlers';

export * from './read-model';
