import { ReleaseCheckError } from './release-check-error'

/** GitHub answered with its own `{ "message": ... }` error payload. */
export class ApiError extends ReleaseCheckError {
  public readonly kind = 'api'

  /** Message as sent by GitHub (e.g. "Not Found"). */
  public readonly apiMessage: string

  /**
   * Creates a new ApiError.
   *
   * @param apiMessage - The `message` field of the payload.
   */
  public constructor(apiMessage: string) {
    super(`GitHub API error: ${apiMessage}`)
    this.name = 'ApiError'
    this.apiMessage = apiMessage
  }
}
