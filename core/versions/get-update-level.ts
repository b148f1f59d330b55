import type { SemanticVersion } from '../../types/semantic-version'
import type { UpdateLevel } from '../../types/update-level'

import { isNewerVersion } from './compare-semantic-versions'

/**
 * Determine the update level between the local and the latest version.
 *
 * @param currentVersion - Local version.
 * @param latestVersion - Latest released version.
 * @returns Highest component that changed, `none` unless the latest version is
 *   newer.
 */
export function getUpdateLevel(
  currentVersion: SemanticVersion,
  latestVersion: SemanticVersion,
): UpdateLevel {
  if (!isNewerVersion(latestVersion, currentVersion)) {
    return 'none'
  }

  if (latestVersion.major !== currentVersion.major) {
    return 'major'
  }

  if (latestVersion.minor !== currentVersion.minor) {
    return 'minor'
  }

  return 'patch'
}
