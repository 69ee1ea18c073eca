import { DomainError, DomainErrorGroup, DomainFailure, ErrorCode } from './domain.error';

/**
 * Combines guard results into one failure.
 *
 * Returns null when every result is null, the DomainError itself when exactly
 * one failed, and a DomainErrorGroup otherwise.
 */
export function joinErrors(...results: Array<DomainError | null>): DomainFailure | null {
  const failures = results.filter((result): result is DomainError => result !== null);

  if (failures.length === 0) {
    return null;
  }
  if (failures.length === 1) {
    return failures[0];
  }
  return new DomainErrorGroup(failures);
}

export function failureCodes(failure: DomainFailure): ErrorCode[] {
  return failure instanceof DomainErrorGroup ? failure.codes : [failure.code];
}

export function failureList(failure: DomainFailure): readonly DomainError[] {
  return failure instanceof DomainErrorGroup ? failure.errors : [failure];
}
