import { DomainError } from './domain.error';

/**
 * Sentinel failures of the Payment entity and its value objects.
 *
 * Compare against these with `matchesCode`, never by identity or message.
 */
export const PaymentErrors = Object.freeze({
  INVALID_ID: DomainError.create('PAYMENT.INVALID_ID', 'payment ID must be a valid UUID'),
  INVALID_ORDER_ID: DomainError.create(
    'PAYMENT.INVALID_ORDER_ID',
    'order ID cannot be null or whitespace',
  ),
  INVALID_AMOUNT: DomainError.create(
    'PAYMENT.INVALID_AMOUNT',
    'payment amount must be greater than zero',
  ),
  INVALID_METHOD: DomainError.create('PAYMENT.INVALID_METHOD', 'invalid payment method'),
  INVALID_STATUS: DomainError.create('PAYMENT.INVALID_STATUS', 'invalid payment status'),
  INVALID_TRANSACTION_CODE: DomainError.create(
    'PAYMENT.INVALID_TRANSACTION_CODE',
    'transaction code cannot be null or whitespace',
  ),
  TRANSACTION_CODE_ALREADY_DEFINED: DomainError.create(
    'PAYMENT.TRANSACTION_CODE_ALREADY_DEFINED',
    'transaction code has already been defined',
  ),
  TRANSACTION_CODE_AFTER_COMPLETION: DomainError.create(
    'PAYMENT.TRANSACTION_CODE_AFTER_COMPLETION',
    'transaction code cannot be defined after payment has been confirmed or refused',
  ),
  NOT_PENDING: DomainError.create('PAYMENT.NOT_PENDING', 'payment is not in pending status'),
  TRANSACTION_CODE_NOT_DEFINED: DomainError.create(
    'PAYMENT.TRANSACTION_CODE_NOT_DEFINED',
    'transaction code has not been defined yet',
  ),
});

