/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';

import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * express.json() rejects malformed bodies with a SyntaxError carrying status 400
 */
const isBodyParseError = (err: AppError): boolean =>
  err instanceof SyntaxError && err.statusCode === 400;

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const errorCode =
    err.errorCode || (isBodyParseError(err) ? ErrorCode.VALIDATION_ERROR : ErrorCode.INTERNAL_ERROR);
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Request rejected: ${err.message}`);
  }

  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static validationError(message: string, validationErrors?: Record<string, string[]>): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'Amount must be greater than zero'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static insufficientPrincipal(message = 'Withdrawal exceeds staked principal'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_PRINCIPAL, message);
  }

  static noRewardAvailable(message = 'No reward available to claim'): ApiError {
    return new ApiError(ErrorCode.NO_REWARD_AVAILABLE, message);
  }

  static transferFailed(reason: string): ApiError {
    return new ApiError(ErrorCode.TRANSFER_FAILED, `Asset transfer failed: ${reason}`);
  }

  static concurrentModification(participantId: string): ApiError {
    return new ApiError(
      ErrorCode.CONCURRENT_MODIFICATION,
      `Position for ${participantId} was modified concurrently`
    );
  }

  /**
   * The clock moved behind a position's last settlement. Never tolerated:
   * the operation is rejected and the error is not operational.
   */
  static clockRegression(lastSettledAt: number, now: number): ApiError {
    return new ApiError(
      ErrorCode.CLOCK_REGRESSION,
      `Clock regression: now ${now} is before last settlement ${lastSettledAt}`,
      { isOperational: false }
    );
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }
}
