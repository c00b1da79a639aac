// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  LogContext,
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  stakingOperationsTotal,
  stakingOperationDuration,
  stakingRollbacksTotal,
  stakingReconciliationFailuresTotal,
  stakingLockedParticipants,
  eventPublishFailuresTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';
