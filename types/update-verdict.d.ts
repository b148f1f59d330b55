import type { UpdateLevel } from './update-level'

/** Result of comparing a local version with the latest release. */
export interface UpdateVerdict {
  /**
   * Tag name exactly as reported by the API, never re-normalized (a leading
   * `v` is kept).
   */
  latestVersion: string

  /** Local version text as supplied by the caller. */
  currentVersion: string

  /** True when the latest release is strictly newer. */
  hasUpdate: boolean

  /** Size of the jump; `none` when there is no update. */
  level: UpdateLevel
}
