import type { SemanticVersion } from '../../types/semantic-version'

/**
 * Render a version as `major.minor.patch`.
 *
 * @param version - Parsed version.
 * @returns Dotted version string without prefix.
 */
export function formatSemanticVersion(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`
}
