import { DomainError } from '../exceptions';

/**
 * A guard returns its failure when the check does not hold, null otherwise.
 * Guards never throw and have no side effects, so results from several
 * guards can be evaluated together and passed to `joinErrors`.
 */
export type GuardResult = DomainError | null;

export function notBlank(value: string, failure: DomainError): GuardResult {
  return value.trim().length > 0 ? null : failure;
}

// Zero, negatives, NaN and infinities fail
export function positive(value: number, failure: DomainError): GuardResult {
  return Number.isFinite(value) && value > 0 ? null : failure;
}

export function matchesPattern(value: string, pattern: RegExp, failure: DomainError): GuardResult {
  // a /g or /y pattern keeps lastIndex between calls
  pattern.lastIndex = 0;
  return pattern.test(value) ? null : failure;
}

export function notAbsent<T>(value: T | null | undefined, failure: DomainError): GuardResult {
  return value === null || value === undefined ? failure : null;
}

export function isAbsent<T>(value: T | null | undefined, failure: DomainError): GuardResult {
  return value === null || value === undefined ? null : failure;
}
