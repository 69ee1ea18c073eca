import { randomUUID } from 'crypto';
import { Either, left, right } from '../common';
import { DomainError, PaymentErrors } from '../exceptions';
import { matchesPattern } from '../guards';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Value Object representing a unique payment identifier.
 * Immutable - once created, cannot be changed.
 */
export class PaymentId {
  private constructor(public readonly value: string) {}

  // Factory method: generate new unique ID
  static generate(): PaymentId {
    return new PaymentId(randomUUID());
  }

  // Factory method: parse an existing ID (e.g., from a caller or storage)
  static parse(raw: string): Either<DomainError, PaymentId> {
    const failure = matchesPattern(raw.trim(), UUID_PATTERN, PaymentErrors.INVALID_ID);
    if (failure) {
      return left(failure);
    }
    return right(new PaymentId(raw.trim().toLowerCase()));
  }

  equals(other: PaymentId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
