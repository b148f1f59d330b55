/** Discriminant shared by every error the checker raises. */
export type ErrorKind =
  | 'payload-shape'
  | 'validation'
  | 'network'
  | 'parse'
  | 'api'
