import { ReleaseCheckError } from './release-check-error'

/** Transport failure while fetching the release endpoint. */
export class NetworkError extends ReleaseCheckError {
  public readonly kind = 'network'

  /** HTTP status, when the server answered at all. */
  public readonly status: number | undefined

  /**
   * Creates a new NetworkError.
   *
   * @param message - Message reported by the transport.
   * @param options - Status code and underlying cause.
   */
  public constructor(
    message: string,
    options: { cause?: unknown; status?: number } = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'NetworkError'
    this.status = options.status
  }
}
