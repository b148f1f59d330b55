/** Size of the jump from the local version to the latest release. */
export type UpdateLevel = 'major' | 'minor' | 'patch' | 'none'
