import type { FetchReleaseOptions } from '../../types/release-fetcher'

import { NetworkError } from '../errors/network-error'

/** Identifying client header sent with every request. */
export const DEFAULT_USER_AGENT = 'gh-release-check'

/**
 * Fetch the body of a release endpoint with a single GET request.
 *
 * There is no retry and no timeout unless one is passed. Error responses that
 * carry GitHub's JSON error payload are returned like a success so that the
 * caller can report GitHub's own message; every other non-2xx status rejects.
 *
 * @param url - Releases API endpoint.
 * @param options - User agent and optional timeout in milliseconds.
 * @returns Raw response body.
 * @throws {NetworkError} On connection, TLS, timeout or HTTP failure.
 */
export async function fetchRelease(
  url: string,
  options: FetchReleaseOptions = {},
): Promise<string> {
  let init: RequestInit = {
    headers: {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: 'application/vnd.github+json',
    },
  }

  if (options.timeout !== undefined) {
    init.signal = AbortSignal.timeout(options.timeout)
  }

  let response: Response
  try {
    response = await fetch(url, init)
  } catch (error) {
    throw new NetworkError(describeTransportError(error), { cause: error })
  }

  let isJson = response.headers.get('content-type')?.includes('json') ?? false

  if (!response.ok && !isJson) {
    await response.body?.cancel()
    throw new NetworkError(
      `GitHub API error: ${response.status} ${response.statusText}`,
      { status: response.status },
    )
  }

  try {
    return await response.text()
  } catch (error) {
    throw new NetworkError(describeTransportError(error), {
      status: response.status,
      cause: error,
    })
  }
}

/**
 * Build a message from a rejected `fetch`. Undici reports "fetch failed" and
 * keeps the socket-level reason in `cause`.
 *
 * @param error - Rejection value.
 * @returns Message including the underlying cause when present.
 */
function describeTransportError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error)
  }

  let { cause } = error
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`
  }
  return error.message
}
