/**
 * Parsed `major.minor.patch` triple, ordered lexicographically. Components are
 * unbounded, so date-stamped tags such as `1.0.20240101123456789` stay exact.
 */
export interface SemanticVersion {
  /** Major component. */
  readonly major: bigint

  /** Minor component. */
  readonly minor: bigint

  /** Patch component, 0 when the input had none. */
  readonly patch: bigint
}
