import { ValidationError } from '../errors/validation-error'

/**
 * Convert a GitHub repository reference into its latest-release API endpoint.
 *
 * References that already point at `api.github.com` are returned unchanged.
 * Otherwise the first `https://github.com/<owner>/<repo>` in the reference is
 * used; later path segments are ignored and one trailing `.git` is stripped.
 * Owner and repository are inserted verbatim.
 *
 * @example
 *
 * ```ts
 * toReleasesApiUrl('https://github.com/octocat/hello-world.git')
 * // 'https://api.github.com/repos/octocat/hello-world/releases/latest'
 * ```
 *
 * @param reference - Repository web URL or API URL.
 * @returns Releases-latest endpoint.
 * @throws {ValidationError} When the reference is not a GitHub repository URL.
 */
export function toReleasesApiUrl(reference: string): string {
  if (reference.includes('api.github.com')) {
    return reference
  }

  let groups = reference.match(
    /https:\/\/github\.com\/(?<owner>[^/]+)\/(?<repo>[^/]+)/u,
  )?.groups
  let owner = groups?.['owner']
  let repo = groups?.['repo']

  if (!owner || !repo) {
    throw new ValidationError(reference)
  }

  if (repo.endsWith('.git')) {
    repo = repo.slice(0, -4)
  }

  return `https://api.github.com/repos/${owner}/${repo}/releases/latest`
}
