import { UsageError } from './usage-error'

/**
 * Normalizes the timeout option.
 *
 * @param timeout - Raw option value, numeric strings arrive as numbers.
 * @returns Timeout in milliseconds, or undefined when not set.
 */
export function normalizeTimeout(
  timeout: undefined | string | number,
): number | undefined {
  if (timeout === undefined) {
    return undefined
  }

  let value = typeof timeout === 'number' ? timeout : Number(timeout.trim())
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new UsageError(
      `Invalid timeout "${timeout}". Expected a positive number of milliseconds.`,
    )
  }
  return value
}
