/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, STAKING_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/stakeflow'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/stakeflow-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/stakeflow';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction
  ? process.env.REDIS_PASSWORD || undefined
  : undefined;

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT secret used to verify caller tokens.
 * Production startup fails in validateProductionEnv() when it is missing.
 */
export const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production';

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  accessTokenExpiresIn: process.env.JWT_ACCESS_TOKEN_EXPIRES_IN || (isProduction ? '15m' : '1h'),
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: !isProduction && !isTest,
};

// =============================================================================
// STAKING CONFIGURATION
// =============================================================================

export type StorageDriver = 'mongo' | 'memory';

const parseStorageDriver = (value: string | undefined): StorageDriver => {
  if (value === 'mongo' || value === 'memory') {
    return value;
  }
  if (value !== undefined && value !== '') {
    throw new Error(`STAKING_STORAGE must be "mongo" or "memory", got "${value}"`);
  }
  return isTest ? 'memory' : 'mongo';
};

const parseIntegerEnv = (name: string, fallback: number, min: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value < min) {
    throw new Error(`${name} must be an integer of at least ${min}, got "${raw}"`);
  }
  return value;
};

/**
 * Parse STAKING_DEV_BALANCES ("alice=1000000,staking-custody=50000") into
 * opening balances for the in-memory asset ledger.
 */
export const parseDevBalances = (value: string | undefined): Array<[string, bigint]> => {
  if (value === undefined || value.trim() === '') {
    return [];
  }
  return value.split(',').map((entry): [string, bigint] => {
    const match = /^\s*([A-Za-z0-9_\-.:@]{1,128})=(\d{1,78})\s*$/.exec(entry);
    if (!match) {
      throw new Error(`STAKING_DEV_BALANCES entries must look like "account=amount", got "${entry}"`);
    }
    return [match[1], BigInt(match[2])];
  });
};

/**
 * Staking ledger configuration
 *
 * rateBps and secondsPerYear are read once here and frozen into the ledger
 * when it is constructed; changing the environment afterwards has no effect.
 */
export const STAKING_CONFIG = {
  rateBps: parseIntegerEnv('STAKING_RATE_BPS', 1000, 0),
  secondsPerYear: parseIntegerEnv('STAKING_SECONDS_PER_YEAR', 31_536_000, 1),
  storage: parseStorageDriver(process.env.STAKING_STORAGE),
  custodyAccountId: process.env.STAKING_CUSTODY_ACCOUNT || 'staking-custody',
  maxWriteRetries: parseIntegerEnv('STAKING_MAX_WRITE_RETRIES', 5, 1),
  // Opening balances when STAKING_STORAGE=memory, custody reserve included
  devBalances: parseDevBalances(process.env.STAKING_DEV_BALANCES),
  // Redis pub/sub for domain events; falls back to the in-process event log
  publishEventsToRedis: process.env.STAKING_EVENTS_REDIS
    ? process.env.STAKING_EVENTS_REDIS === 'true'
    : !isTest,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['JWT_SECRET', 'MONGODB_URI', 'REDIS_HOST'];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  storage: STAKING_CONFIG.storage,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
});
