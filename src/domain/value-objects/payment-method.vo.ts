import { Either, left, right } from '../common';
import { DomainError, PaymentErrors } from '../exceptions';

export const PAYMENT_METHODS = [
  'credit_card',
  'debit_card',
  'cash',
  'pix',
  'bank_transfer',
  'bank_slip',
] as const;

export type PaymentMethodCode = (typeof PAYMENT_METHODS)[number];

/**
 * Value Object representing the channel a customer pays through.
 * The set is closed: there is no "unknown" method, parsing fails instead.
 */
export class PaymentMethod {
  private constructor(public readonly value: PaymentMethodCode) {}

  // Factory methods for each method
  static creditCard(): PaymentMethod {
    return new PaymentMethod('credit_card');
  }

  static debitCard(): PaymentMethod {
    return new PaymentMethod('debit_card');
  }

  static cash(): PaymentMethod {
    return new PaymentMethod('cash');
  }

  static pix(): PaymentMethod {
    return new PaymentMethod('pix');
  }

  static bankTransfer(): PaymentMethod {
    return new PaymentMethod('bank_transfer');
  }

  static bankSlip(): PaymentMethod {
    return new PaymentMethod('bank_slip');
  }

  static parse(raw: string): Either<DomainError, PaymentMethod> {
    const normalized = raw.toLowerCase().trim();
    const code = PAYMENT_METHODS.find((method) => method === normalized);
    if (!code) {
      return left(
        PaymentErrors.INVALID_METHOD.wrap(
          `"${raw}" is not valid. Valid methods: ${PAYMENT_METHODS.join(', ')}`,
        ),
      );
    }
    return right(new PaymentMethod(code));
  }

  label(): string {
    switch (this.value) {
      case 'credit_card':
        return 'Credit card';
      case 'debit_card':
        return 'Debit card';
      case 'cash':
        return 'Cash';
      case 'pix':
        return 'Pix';
      case 'bank_transfer':
        return 'Bank transfer';
      case 'bank_slip':
        return 'Bank slip';
      default: {
        const unreachable: never = this.value;
        return unreachable;
      }
    }
  }

  equals(other: PaymentMethod): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
