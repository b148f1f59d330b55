import type { UpdateVerdict } from '../types/update-verdict'
import type { ErrorKind } from '../types/error-kind'

import { isReleaseCheckError } from '../core/errors/release-check-error'
import { formatErrorMessage } from './format-error-message'

/** Structured output printed with `--json`. */
type JsonReport =
  | {
      error: {
        kind: 'unknown' | ErrorKind
        message: string
      }
    }
  | UpdateVerdict

/**
 * Build the structured report for a verdict or a failure.
 *
 * @param result - Verdict, or the error the check failed with.
 * @returns Serialized JSON object.
 */
export function toJsonReport(
  result: { verdict: UpdateVerdict } | { error: unknown },
): string {
  let report: JsonReport

  if ('verdict' in result) {
    let { latestVersion, currentVersion, hasUpdate, level } = result.verdict
    report = { currentVersion, latestVersion, hasUpdate, level }
  } else {
    report = {
      error: {
        kind: isReleaseCheckError(result.error) ? result.error.kind : 'unknown',
        message: formatErrorMessage(result.error),
      },
    }
  }

  return JSON.stringify(report, null, 2)
}
