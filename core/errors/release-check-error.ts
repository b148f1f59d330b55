import type { ErrorKind } from '../../types/error-kind'

/** Base class for every failure raised while checking for a release. */
export abstract class ReleaseCheckError extends Error {
  /** Discriminant for mapping errors to messages and exit codes. */
  public abstract readonly kind: ErrorKind
}

/**
 * Narrow an unknown caught value to a checker error.
 *
 * @param value - Caught value.
 * @returns True when the value was raised by the checker.
 */
export function isReleaseCheckError(
  value: unknown,
): value is ReleaseCheckError {
  return value instanceof ReleaseCheckError
}
