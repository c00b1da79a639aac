/**
 * Staking Module
 *
 * Single-asset staking ledger: principal accounting and
 * time-proportional reward accrual at a fixed annual rate.
 */

// Core
export { AccrualLedger, AccrualLedgerOptions } from './staking.ledger';
export {
  BPS_DENOMINATOR,
  accrue,
  createAccrualConfig,
  emptyPosition,
  pendingReward,
  settle,
} from './staking.accrual';
export { ParticipantLock } from './staking.lock';
export { InMemoryPositionStore, MongoPositionStore } from './staking.store';
export * from './staking.types';

// Controller
export { StakingController } from './staking.controller';

// Routes
export { createStakingRoutes } from './staking.routes';
