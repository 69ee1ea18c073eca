/**
 * Value Object representing a payment amount.
 * Stores amounts in whole cents to avoid floating-point issues; fractions of
 * a cent are rounded away when converting from a decimal amount.
 *
 * Money never validates itself: rules such as "greater than zero" belong to
 * the entity that holds it and are checked with guards on `cents`.
 */
export class Money {
  private constructor(public readonly cents: number) {}

  static fromCents(cents: number): Money {
    return new Money(Math.round(cents));
  }

  static fromDecimal(amount: number): Money {
    return new Money(Math.round(amount * 100));
  }

  // Computed property using getter syntax
  get decimal(): number {
    return this.cents / 100;
  }

  equals(other: Money): boolean {
    return this.cents === other.cents;
  }

  format(): string {
    return this.decimal.toFixed(2);
  }

  toString(): string {
    return this.format();
  }
}
