/** Process exit statuses reported to the invoking shell. */
export const ExitCode = {
  UpdateAvailable: 2,
  RuntimeError: 3,
  UsageError: 1,
  UpToDate: 0,
} as const

/** One of the values of `ExitCode`. */
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]
