import { Either, Right } from './either';

/**
 * Unwraps a Right or throws the Left.
 *
 * Only for startup code and test fixtures, where a Left means a programming
 * error and the process should abort. Domain operations never call it.
 */
export function must<L, R>(result: Either<L, R>): R {
  if (result instanceof Right) {
    return result.value;
  }
  const failure = result.value;
  throw failure instanceof Error ? failure : new Error(`must: unexpected failure ${String(failure)}`);
}
