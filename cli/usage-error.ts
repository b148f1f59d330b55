/** Invalid command-line input. */
export class UsageError extends Error {
  /**
   * Creates a new UsageError.
   *
   * @param message - What was wrong with the arguments.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}
