import { NetworkError } from '../core/errors/network-error'
import { ParseError } from '../core/errors/parse-error'

/**
 * Turn a failure into the line shown to the user.
 *
 * @param error - Caught value.
 * @returns Human readable message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof NetworkError) {
    return `Network error: ${error.message}`
  }

  if (error instanceof ParseError) {
    return `Invalid ${error.side ?? 'input'} version: ${error.input}`
  }

  return error instanceof Error ? error.message : String(error)
}
