import { createSpinner } from 'nanospinner'
import pc from 'picocolors'

import type { FetchReleaseOptions } from '../types/release-fetcher'

import { evaluateUpdate } from '../core/evaluate-update'
import { formatErrorMessage } from './format-error-message'
import { formatVerdict } from './format-verdict'
import { toJsonReport } from './to-json-report'
import { ExitCode } from './exit-code'

/** Options of a single check run. */
interface RunCheckOptions extends FetchReleaseOptions {
  /** Print a JSON report instead of text. */
  json: boolean
}

/**
 * Check one repository and print the outcome.
 *
 * @param repository - GitHub repository URL or releases API URL.
 * @param localVersion - Version currently installed.
 * @param options - Output mode and transport options.
 * @returns Exit code describing the outcome.
 */
export async function runCheck(
  repository: string,
  localVersion: string,
  options: RunCheckOptions,
): Promise<ExitCode> {
  let { json, ...fetchOptions } = options
  let spinner = json
    ? null
    : createSpinner(`Checking ${pc.cyan(repository)} for releases...`).start()

  try {
    let verdict = await evaluateUpdate(repository, localVersion, fetchOptions)

    if (json) {
      console.info(toJsonReport({ verdict }))
    } else {
      spinner?.success(
        verdict.hasUpdate ? 'Update available' : 'Already up to date',
      )
      console.info(formatVerdict(verdict))
    }

    return verdict.hasUpdate ? ExitCode.UpdateAvailable : ExitCode.UpToDate
  } catch (error) {
    if (json) {
      console.info(toJsonReport({ error }))
    } else {
      spinner?.error('Failed')
      console.error(pc.redBright('\nError:'), formatErrorMessage(error))
    }

    return ExitCode.RuntimeError
  }
}
