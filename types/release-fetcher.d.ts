/** Transport options passed through to the fetcher. */
export interface FetchReleaseOptions {
  /** Abort the request after this many milliseconds. No limit when unset. */
  timeout?: number

  /** Value of the identifying `User-Agent` header. */
  userAgent?: string
}

/**
 * Performs a single GET of the release endpoint and resolves with the raw
 * response body. Rejects with a `NetworkError` on any transport failure.
 */
export type ReleaseFetcher = (
  url: string,
  options: FetchReleaseOptions,
) => Promise<string>
