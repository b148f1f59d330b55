export type {
  FetchReleaseOptions,
  ReleaseFetcher,
} from '../types/release-fetcher'
export type { ApiErrorPayload, ReleaseRecord } from '../types/release-record'
export type { SemanticVersion } from '../types/semantic-version'
export type { EvaluateOptions } from '../types/evaluate-options'
export type { UpdateVerdict } from '../types/update-verdict'
export type { UpdateLevel } from '../types/update-level'
export type { VersionSide } from '../types/version-side'
export type { ErrorKind } from '../types/error-kind'

export {
  compareSemanticVersions,
  isNewerVersion,
} from './versions/compare-semantic-versions'
export {
  isReleaseCheckError,
  ReleaseCheckError,
} from './errors/release-check-error'
export { formatSemanticVersion } from './versions/format-semantic-version'
export { DEFAULT_USER_AGENT, fetchRelease } from './api/fetch-release'
export { parseSemanticVersion } from './versions/parse-semantic-version'
export { toReleasesApiUrl } from './repository/to-releases-api-url'
export { readReleaseRecord } from './payload/read-release-record'
export { PayloadShapeError } from './errors/payload-shape-error'
export { getUpdateLevel } from './versions/get-update-level'
export { ValidationError } from './errors/validation-error'
export { NetworkError } from './errors/network-error'
export { evaluateUpdate } from './evaluate-update'
export { ParseError } from './errors/parse-error'
export { ApiError } from './errors/api-error'
