import type { EvaluateOptions } from '../types/evaluate-options'
import type { UpdateVerdict } from '../types/update-verdict'

import { parseSemanticVersion } from './versions/parse-semantic-version'
import { isReleaseCheckError } from './errors/release-check-error'
import { isNewerVersion } from './versions/compare-semantic-versions'
import { toReleasesApiUrl } from './repository/to-releases-api-url'
import { readReleaseRecord } from './payload/read-release-record'
import { getUpdateLevel } from './versions/get-update-level'
import { NetworkError } from './errors/network-error'
import { fetchRelease } from './api/fetch-release'

/**
 * Check whether a repository has a release newer than the local version.
 *
 * Steps run in a fixed order and the first failure rejects the promise:
 * resolve the endpoint, fetch it, read the tag, parse the local version, parse
 * the remote version, compare. Any other rejection from a custom fetcher is
 * reported as a `NetworkError`. Nothing is cached between calls.
 *
 * @example
 *
 * ```ts
 * let verdict = await evaluateUpdate('https://github.com/o/r', '3.0.0')
 * // { hasUpdate: true, latestVersion: 'v3.11.2', level: 'minor', ... }
 * ```
 *
 * @param repository - GitHub repository URL or releases API URL.
 * @param localVersion - Version currently installed.
 * @param options - Transport override and its options.
 * @returns Update verdict with the tag name exactly as GitHub reports it.
 */
export async function evaluateUpdate(
  repository: string,
  localVersion: string,
  options: EvaluateOptions = {},
): Promise<UpdateVerdict> {
  let { fetchRelease: fetcher = fetchRelease, ...fetchOptions } = options

  let url = toReleasesApiUrl(repository)

  let body: string
  try {
    body = await fetcher(url, fetchOptions)
  } catch (error) {
    if (isReleaseCheckError(error)) {
      throw error
    }
    throw new NetworkError(
      error instanceof Error ? error.message : String(error),
      { cause: error },
    )
  }

  let { tag_name: latestVersion } = readReleaseRecord(body)

  let local = parseSemanticVersion(localVersion, 'local')
  let remote = parseSemanticVersion(latestVersion, 'remote')

  return {
    level: getUpdateLevel(local, remote),
    hasUpdate: isNewerVersion(remote, local),
    currentVersion: localVersion,
    latestVersion,
  }
}
