import { Registry, Counter, Gauge, Histogram, collectDefaultMetrics } from 'prom-client';

import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'stakeflow' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Staking Metrics
// ============================================

/**
 * Ledger operations by operation and outcome (success or error code name)
 */
export const stakingOperationsTotal = new Counter({
  name: 'staking_operations_total',
  help: 'Staking ledger operations by operation and outcome',
  labelNames: ['operation', 'outcome'] as const, // deposit, withdraw, claim
  registers: [registry],
});

export const stakingOperationDuration = new Histogram({
  name: 'staking_operation_duration_seconds',
  help: 'Staking ledger operation duration in seconds',
  labelNames: ['operation'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [registry],
});

/**
 * Rollbacks of a debit or deposit after an asset transfer or position write failed
 */
export const stakingRollbacksTotal = new Counter({
  name: 'staking_rollbacks_total',
  help: 'Position rollbacks after a failed transfer or credit',
  labelNames: ['operation', 'mode'] as const, // snapshot, compensation, refund
  registers: [registry],
});

/**
 * Position and custody left disagreeing because a rollback or refund failed
 */
export const stakingReconciliationFailuresTotal = new Counter({
  name: 'staking_reconciliation_failures_total',
  help: 'Rollbacks or deposit refunds that could not be completed',
  labelNames: ['operation'] as const,
  registers: [registry],
});

export const stakingLockedParticipants = new Gauge({
  name: 'staking_locked_participants',
  help: 'Participants with a staking operation running or queued',
  registers: [registry],
});

export const eventPublishFailuresTotal = new Counter({
  name: 'staking_event_publish_failures_total',
  help: 'Domain events that could not be published',
  labelNames: ['event_type'] as const,
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
