import { ReleaseCheckError } from './release-check-error'

/** Repository reference is not a GitHub repository URL. */
export class ValidationError extends ReleaseCheckError {
  public readonly kind = 'validation'

  /** Offending reference. */
  public readonly input: string

  /**
   * Creates a new ValidationError.
   *
   * @param input - Rejected repository reference.
   */
  public constructor(input: string) {
    super(`Invalid GitHub URL: ${input}`)
    this.name = 'ValidationError'
    this.input = input
  }
}
