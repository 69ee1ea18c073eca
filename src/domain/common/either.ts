/**
 * Either type for failures returned as values.
 *
 * Either<L, R> holds one of two cases:
 * - Left<L>: the failure (a DomainError, an ApplicationError, ...)
 * - Right<R>: the success value
 *
 * Factories and parsers in the domain return Either instead of throwing,
 * so callers see every rule violation in the type they receive.
 *
 * @example
 * ```typescript
 * const result = PaymentMethod.parse('pix');
 * if (result.isLeft()) {
 *   console.log(result.value.toString()); // [PAYMENT.INVALID_METHOD] ...
 * } else {
 *   console.log(result.value.label()); // Pix
 * }
 * ```
 */

// Left represents failure
export class Left<L> {
  constructor(public readonly value: L) {}

  isLeft(): this is Left<L> {
    return true;
  }

  isRight(): this is Right<never> {
    return false;
  }
}

// Right represents success
export class Right<R> {
  constructor(public readonly value: R) {}

  isLeft(): this is Left<never> {
    return false;
  }

  isRight(): this is Right<R> {
    return true;
  }
}

export type Either<L, R> = Left<L> | Right<R>;

export const left = <L, R = never>(value: L): Either<L, R> => new Left(value);
export const right = <L = never, R = unknown>(value: R): Either<L, R> => new Right(value);
