import type { ApiErrorPayload, ReleaseRecord } from '../../types/release-record'

import { PayloadShapeError } from '../errors/payload-shape-error'
import { ApiError } from '../errors/api-error'

/**
 * Read the release tag out of a `releases/latest` response body.
 *
 * @param body - Raw response body.
 * @returns Release record with the tag name.
 * @throws {PayloadShapeError} When the body is not a JSON object or carries
 *   neither `tag_name` nor `message`.
 * @throws {ApiError} When the body is GitHub's `{ "message": ... }` error.
 */
export function readReleaseRecord(body: string): ReleaseRecord {
  let payload = parseJsonObject(body)

  if (isReleaseRecord(payload)) {
    return { tag_name: payload.tag_name }
  }

  if (isApiErrorPayload(payload)) {
    throw new ApiError(payload.message)
  }

  throw new PayloadShapeError('GitHub API returned no valid tag_name')
}

/**
 * Parse a body that must be a JSON object (not an array or a primitive).
 *
 * @param body - Raw response body.
 * @returns Parsed object.
 */
function parseJsonObject(body: string): Record<string, unknown> {
  let value: unknown
  try {
    value = JSON.parse(body)
  } catch {
    throw new PayloadShapeError('GitHub API returned invalid JSON')
  }

  if (!isRecord(value)) {
    throw new PayloadShapeError('GitHub API returned non-object JSON')
  }

  return value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isReleaseRecord(
  payload: Record<string, unknown>,
): payload is Record<string, unknown> & ReleaseRecord {
  return typeof payload['tag_name'] === 'string'
}

function isApiErrorPayload(
  payload: Record<string, unknown>,
): payload is Record<string, unknown> & Required<ApiErrorPayload> {
  return typeof payload['message'] === 'string'
}
