import pc from 'picocolors'

import type { UpdateVerdict } from '../types/update-verdict'

/**
 * Render a verdict as aligned plain-text lines.
 *
 * @param verdict - Result of the update check.
 * @returns Multi-line report.
 */
export function formatVerdict(verdict: UpdateVerdict): string {
  let update = verdict.hasUpdate
    ? `${pc.green('YES')} ${pc.gray(`(${verdict.level})`)}`
    : pc.gray('NO')

  return [
    `Local version:  ${verdict.currentVersion}`,
    `Remote version: ${pc.cyan(verdict.latestVersion)}`,
    `Update:         ${update}`,
  ].join('\n')
}
