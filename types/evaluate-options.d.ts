import type { FetchReleaseOptions, ReleaseFetcher } from './release-fetcher'

/** Options accepted by `evaluateUpdate`. */
export interface EvaluateOptions extends FetchReleaseOptions {
  /** Transport override, defaults to the `fetch` based implementation. */
  fetchRelease?: ReleaseFetcher
}
