import type { SemanticVersion } from '../../types/semantic-version'

/**
 * Order two versions by major, then minor, then patch.
 *
 * @param left - First version.
 * @param right - Second version.
 * @returns Negative when left is older, positive when newer, 0 when equal.
 */
export function compareSemanticVersions(
  left: SemanticVersion,
  right: SemanticVersion,
): number {
  for (let key of ['major', 'minor', 'patch'] as const) {
    if (left[key] !== right[key]) {
      return left[key] < right[key] ? -1 : 1
    }
  }
  return 0
}

/**
 * Check whether a version is strictly newer than another.
 *
 * @param candidate - Version that may be newer.
 * @param reference - Version to compare against.
 * @returns True when candidate orders after reference.
 */
export function isNewerVersion(
  candidate: SemanticVersion,
  reference: SemanticVersion,
): boolean {
  return compareSemanticVersions(candidate, reference) > 0
}
