import type { SemanticVersion } from '../../types/semantic-version'
import type { VersionSide } from '../../types/version-side'

import { ParseError } from '../errors/parse-error'

/**
 * Parse the first `[v]major.minor[.patch]` found in a version string.
 *
 * The search is not anchored, so decorated tags such as `release-1.2.3-beta`
 * or `v1.2.3-rc1` are accepted and anything around the numbers is discarded.
 * A missing patch component becomes 0.
 *
 * @example
 *
 * ```ts
 * parseSemanticVersion('v3.11')
 * // { major: 3n, minor: 11n, patch: 0n }
 * ```
 *
 * @param text - Version string, usually a tag name or a local version.
 * @param side - Reported on the error when parsing fails.
 * @returns Parsed version.
 * @throws {ParseError} When no version is found.
 */
export function parseSemanticVersion(
  text: string,
  side?: VersionSide,
): SemanticVersion {
  let groups = text.match(
    /v?(?<major>\d+)\.(?<minor>\d+)(?:\.(?<patch>\d+))?/u,
  )?.groups

  if (!groups?.['major'] || !groups['minor']) {
    throw new ParseError(text, side)
  }

  return {
    patch: groups['patch'] ? BigInt(groups['patch']) : 0n,
    major: BigInt(groups['major']),
    minor: BigInt(groups['minor']),
  }
}
