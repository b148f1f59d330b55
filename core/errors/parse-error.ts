import type { VersionSide } from '../../types/version-side'

import { ReleaseCheckError } from './release-check-error'

/** A version string does not contain `major.minor[.patch]`. */
export class ParseError extends ReleaseCheckError {
  public readonly kind = 'parse'

  /** Side of the comparison the text came from. */
  public readonly side: VersionSide | undefined

  /** Text that failed to parse. */
  public readonly input: string

  /**
   * Creates a new ParseError.
   *
   * @param input - Rejected version text.
   * @param side - Local or remote, when known.
   */
  public constructor(input: string, side?: VersionSide) {
    super(`Invalid SemVer: ${input}`)
    this.name = 'ParseError'
    this.input = input
    this.side = side
  }
}
