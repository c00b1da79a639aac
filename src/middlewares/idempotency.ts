/**
 * Idempotency Middleware
 *
 * Prevents duplicate processing of requests by caching responses
 * based on idempotency keys provided in the X-Idempotency-Key header.
 * A retried deposit or withdrawal with the same key replays the first
 * response instead of moving assets twice.
 */

import { Request, Response, NextFunction } from 'express';

import { AuthRequest } from '../auth/auth.types';
import { config } from '../config';
import { getRedisClient, isRedisConnected } from '../config/redis';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

interface CachedResponse {
  statusCode: number;
  body: unknown;
  cachedAt: string;
}

/**
 * Idempotency key TTL (24 hours)
 */
const IDEMPOTENCY_TTL = 24 * 60 * 60;

const KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

const readIdempotencyKey = (req: Request): string | undefined => {
  const header = req.headers['x-idempotency-key'];
  return Array.isArray(header) ? header[0] : header;
};

const isCachedResponse = (value: unknown): value is CachedResponse =>
  typeof value === 'object' &&
  value !== null &&
  'statusCode' in value &&
  typeof value.statusCode === 'number' &&
  'body' in value;

/**
 * Idempotency middleware
 *
 * Usage:
 * - Client sends X-Idempotency-Key header with a unique key
 * - First request: processed normally, response cached
 * - Subsequent requests with same key: cached response returned
 *
 * Keys are scoped per participant to prevent cross-participant conflicts.
 * Only successful (2xx) responses are cached so a failed attempt can be retried.
 */
export const idempotencyMiddleware = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const idempotencyKey = readIdempotencyKey(req);

  if (!idempotencyKey) {
    next();
    return;
  }

  // Skip in test environment or if Redis is not connected
  if (config.isTest || !isRedisConnected()) {
    next();
    return;
  }

  const scope = req.participant?.participantId || req.ip || 'anonymous';
  const cacheKey = `idempotency:${scope}:${idempotencyKey}`;

  try {
    const redis = getRedisClient();
    const cached = await redis.get(cacheKey);

    if (cached) {
      const parsed: unknown = JSON.parse(cached);
      if (isCachedResponse(parsed)) {
        logger.info({ idempotencyKey, scope }, 'Returning cached idempotent response');
        res.setHeader('X-Idempotent-Replayed', 'true');
        res.status(parsed.statusCode).json(parsed.body);
        return;
      }
      logger.warn({ idempotencyKey, scope }, 'Discarding malformed idempotency cache entry');
    }

    const originalJson = res.json.bind(res);

    res.json = function (body: unknown) {
      if (res.statusCode >= 200 && res.statusCode < 300) {
        const responseToCache: CachedResponse = {
          statusCode: res.statusCode,
          body,
          cachedAt: new Date().toISOString(),
        };

        redis
          .setex(cacheKey, IDEMPOTENCY_TTL, JSON.stringify(responseToCache))
          .then(() => {
            logger.debug({ idempotencyKey, scope }, 'Cached idempotent response');
          })
          .catch((err: unknown) => {
            logger.error({ err, idempotencyKey }, 'Failed to cache idempotent response');
          });
      }

      return originalJson(body);
    };

    next();
  } catch (error) {
    // The cache is an optimisation; the request still runs without it
    logger.error({ err: error, idempotencyKey }, 'Idempotency middleware error');
    next();
  }
};

/**
 * Validate idempotency key format
 * Keys should be alphanumeric with dashes/underscores, max 64 chars
 */
export const validateIdempotencyKey = (req: Request, _res: Response, next: NextFunction): void => {
  const idempotencyKey = readIdempotencyKey(req);

  if (idempotencyKey === undefined) {
    next();
    return;
  }

  if (!KEY_PATTERN.test(idempotencyKey)) {
    next(
      new ApiError(
        ErrorCode.INVALID_INPUT,
        'Invalid X-Idempotency-Key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
      )
    );
    return;
  }

  next();
};
