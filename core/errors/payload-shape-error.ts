import { ReleaseCheckError } from './release-check-error'

/** Response body is not a release object. */
export class PayloadShapeError extends ReleaseCheckError {
  public readonly kind = 'payload-shape'

  /**
   * Creates a new PayloadShapeError.
   *
   * @param message - What was wrong with the payload.
   */
  public constructor(message: string) {
    super(message)
    this.name = 'PayloadShapeError'
  }
}
