import { DomainFailure, ErrorCode, failureCodes } from '@domain/exceptions';

/**
 * Base class for all application-level errors.
 * These errors represent failures in use case execution; domain rule
 * violations reach callers wrapped in PaymentRuleViolationError.
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): { code: string; message: string; name: string } {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

// ============ Payment Errors ============

export class PaymentNotFoundError extends ApplicationError {
  readonly code = 'PAYMENT_NOT_FOUND';

  constructor(paymentId: string) {
    super(`Payment with ID '${paymentId}' not found`);
  }
}

export class PaymentRuleViolationError extends ApplicationError {
  readonly code = 'PAYMENT_RULE_VIOLATION';
  readonly violations: ErrorCode[];

  constructor(
    public readonly failure: DomainFailure,
    attemptedAction: string,
  ) {
    super(`Cannot ${attemptedAction}: ${failure.toString()}`);
    this.violations = failureCodes(failure);
  }

  toJSON(): { code: string; message: string; name: string; violations: ErrorCode[] } {
    return { ...super.toJSON(), violations: this.violations };
  }
}

// ============ Validation Errors ============

export class ValidationError extends ApplicationError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}

export type PaymentError =
  | PaymentNotFoundError
  | PaymentRuleViolationError
  | ValidationError
  | UnexpectedError;
