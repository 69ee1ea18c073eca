/**
 * Error code in the form "AGGREGATE.REASON", e.g. "PAYMENT.NOT_PENDING".
 */
export type ErrorCode = `${string}.${string}`;

/**
 * Coded domain failure.
 *
 * Instances are values: entities return them instead of throwing. Two
 * DomainErrors describe the same failure iff their codes match; the message
 * and any wrapped cause are informational only.
 *
 * Sentinels are created once at module load (see PaymentErrors) and never
 * mutated. `wrap()` returns a copy carrying a cause.
 */
export class DomainError extends Error {
  public override readonly cause: unknown;

  private constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'DomainError';
    this.cause = cause;
    Error.captureStackTrace(this, DomainError);
  }

  static create(code: ErrorCode, message: string): DomainError {
    return new DomainError(code, message);
  }

  static wrapping(code: ErrorCode, message: string, cause: unknown): DomainError {
    return new DomainError(code, message, cause);
  }

  wrap(cause: unknown): DomainError {
    return new DomainError(this.code, this.message, cause);
  }

  /**
   * True when `target` is, or wraps anywhere inside it, a DomainError with
   * this error's code. Groups are searched member by member.
   */
  matchesCode(target: unknown): boolean {
    return containsErrorCode(target, this.code);
  }

  equals(other: DomainError): boolean {
    return this.code === other.code;
  }

  // [CODE] message: cause
  toString(): string {
    const base = `[${this.code}] ${this.message}`;
    if (this.cause === undefined || this.cause === null) {
      return base;
    }
    return `${base}: ${renderCause(this.cause)}`;
  }
}

/**
 * Several failures raised by one operation, kept in evaluation order.
 */
export class DomainErrorGroup extends Error {
  public readonly errors: readonly DomainError[];

  constructor(errors: readonly DomainError[]) {
    super(errors.map((error) => error.toString()).join('\n'));
    this.name = 'DomainErrorGroup';
    this.errors = Object.freeze([...errors]);
    Error.captureStackTrace(this, DomainErrorGroup);
  }

  get codes(): ErrorCode[] {
    return this.errors.map((error) => error.code);
  }

  hasCode(code: string): boolean {
    return containsErrorCode(this, code);
  }

  includes(sentinel: DomainError): boolean {
    return sentinel.matchesCode(this);
  }

  toString(): string {
    return this.message;
  }
}

/**
 * What a domain operation returns when it fails.
 */
export type DomainFailure = DomainError | DomainErrorGroup;

/**
 * Walks `cause` chains and group members looking for a DomainError with `code`.
 */
export function containsErrorCode(error: unknown, code: string): boolean {
  const seen = new Set<unknown>();
  const visit = (current: unknown): boolean => {
    if (current === null || current === undefined || seen.has(current)) {
      return false;
    }
    seen.add(current);

    if (current instanceof DomainErrorGroup) {
      return current.errors.some(visit);
    }
    if (current instanceof DomainError && current.code === code) {
      return true;
    }
    if (current instanceof Error) {
      return visit(current.cause);
    }
    return false;
  };
  return visit(error);
}

function renderCause(cause: unknown): string {
  if (cause instanceof DomainError || cause instanceof DomainErrorGroup) {
    return cause.toString();
  }
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
