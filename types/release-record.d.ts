import type { components } from '@octokit/openapi-types'

/** Part of the `releases/latest` payload the checker reads. */
export type ReleaseRecord = Pick<components['schemas']['release'], 'tag_name'>

/** GitHub's own error payload (e.g. `{ "message": "Not Found" }`). */
export type ApiErrorPayload = Pick<
  components['schemas']['basic-error'],
  'message'
>
