/**
 * Error Codes for the StakeFlow API
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Ledger business errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,

  // Ledger errors (3xxx)
  INSUFFICIENT_PRINCIPAL = 3001,
  NO_REWARD_AVAILABLE = 3002,
  TRANSFER_FAILED = 3003,
  CONCURRENT_MODIFICATION = 3004,
  RESOURCE_NOT_FOUND = 3010,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  CLOCK_REGRESSION = 5006,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,

  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,

  [ErrorCode.INSUFFICIENT_PRINCIPAL]: 400,
  [ErrorCode.NO_REWARD_AVAILABLE]: 400,
  [ErrorCode.TRANSFER_FAILED]: 422,
  [ErrorCode.CONCURRENT_MODIFICATION]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.CLOCK_REGRESSION]: 500,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}

export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
