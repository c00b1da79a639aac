import { body, param } from 'express-validator';

import { ApiError } from '../../middlewares/errorHandler';

const DIGITS = /^\d{1,78}$/;
const PARTICIPANT_ID = /^[A-Za-z0-9_.:@-]+$/;

/**
 * Amounts are whole asset units: a decimal string of digits, or a JSON
 * number that is a safe non-negative integer. Zero passes here so the
 * ledger can report it as INVALID_AMOUNT.
 */
export const isAmountInput = (value: unknown): value is string | number =>
  (typeof value === 'string' && DIGITS.test(value)) ||
  (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0);

export const toAmount = (value: unknown): bigint => {
  if (!isAmountInput(value)) {
    throw ApiError.validationError('Validation failed', {
      amount: ['Amount must be a non-negative integer'],
    });
  }
  return BigInt(value);
};

export const amountValidation = [
  body('amount')
    .notEmpty()
    .withMessage('Amount is required')
    .bail()
    .custom((value: unknown) => {
      if (!isAmountInput(value)) {
        throw new Error('Amount must be a non-negative integer (decimal string or safe integer)');
      }
      return true;
    }),
];

export const participantParamValidation = [
  param('participantId')
    .isString()
    .withMessage('Participant ID must be a string')
    .isLength({ min: 1, max: 128 })
    .withMessage('Participant ID must be between 1 and 128 characters')
    .matches(PARTICIPANT_ID)
    .withMessage('Participant ID contains invalid characters'),
];
