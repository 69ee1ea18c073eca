import { Either, left, right } from '../common';
import { DomainError, PaymentErrors } from '../exceptions';

export const PAYMENT_STATUSES = [
  'pending',
  'authorized',
  'refused',
  'refunded',
  'cancelled',
] as const;

export type PaymentStatusCode = (typeof PAYMENT_STATUSES)[number];

/**
 * Value Object representing the lifecycle state of a payment.
 * Payments follow: pending → authorized | refused.
 *
 * refunded and cancelled exist so stored payments can carry them, but no
 * Payment operation moves into either state.
 */
export class PaymentStatus {
  private constructor(public readonly value: PaymentStatusCode) {}

  // Factory methods for each status
  static pending(): PaymentStatus {
    return new PaymentStatus('pending');
  }

  static authorized(): PaymentStatus {
    return new PaymentStatus('authorized');
  }

  static refused(): PaymentStatus {
    return new PaymentStatus('refused');
  }

  static refunded(): PaymentStatus {
    return new PaymentStatus('refunded');
  }

  static cancelled(): PaymentStatus {
    return new PaymentStatus('cancelled');
  }

  static parse(raw: string): Either<DomainError, PaymentStatus> {
    const normalized = raw.toLowerCase().trim();
    const code = PAYMENT_STATUSES.find((status) => status === normalized);
    if (!code) {
      return left(
        PaymentErrors.INVALID_STATUS.wrap(
          `"${raw}" is not valid. Valid statuses: ${PAYMENT_STATUSES.join(', ')}`,
        ),
      );
    }
    return right(new PaymentStatus(code));
  }

  // Status checks
  isPending(): boolean {
    return this.value === 'pending';
  }

  isAuthorized(): boolean {
    return this.value === 'authorized';
  }

  isRefused(): boolean {
    return this.value === 'refused';
  }

  // Business rule: no transition leaves a non-pending status
  isTerminal(): boolean {
    return !this.isPending();
  }

  label(): string {
    switch (this.value) {
      case 'pending':
        return 'Pending';
      case 'authorized':
        return 'Authorized';
      case 'refused':
        return 'Refused';
      case 'refunded':
        return 'Refunded';
      case 'cancelled':
        return 'Cancelled';
      default: {
        const unreachable: never = this.value;
        return unreachable;
      }
    }
  }

  equals(other: PaymentStatus): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
