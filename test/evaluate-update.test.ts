/* eslint-disable camelcase */

import { describe, expect, it, vi } from 'vitest'

import type { ReleaseFetcher } from '../types/release-fetcher'

import { PayloadShapeError } from '../core/errors/payload-shape-error'
import { ValidationError } from '../core/errors/validation-error'
import { NetworkError } from '../core/errors/network-error'
import { evaluateUpdate } from '../core/evaluate-update'
import { ParseError } from '../core/errors/parse-error'
import { ApiError } from '../core/errors/api-error'

function serve(payload: unknown): ReleaseFetcher {
  return vi.fn<ReleaseFetcher>(() => Promise.resolve(JSON.stringify(payload)))
}

describe('evaluateUpdate', () => {
  let repository = 'https://github.com/o/r'

  it('reports an update when the latest tag is newer', async () => {
    let verdict = await evaluateUpdate(repository, '3.0.0', {
      fetchRelease: serve({ tag_name: 'v3.11.2' }),
    })

    expect(verdict).toEqual({
      latestVersion: 'v3.11.2',
      currentVersion: '3.0.0',
      hasUpdate: true,
      level: 'minor',
    })
  })

  it('reports no update when versions are equal', async () => {
    let verdict = await evaluateUpdate(repository, '3.11.2', {
      fetchRelease: serve({ tag_name: '3.11.2' }),
    })

    expect(verdict).toEqual({
      latestVersion: '3.11.2',
      currentVersion: '3.11.2',
      hasUpdate: false,
      level: 'none',
    })
  })

  it('reports no update when the local version is ahead', async () => {
    let verdict = await evaluateUpdate(repository, 'v2.0.0', {
      fetchRelease: serve({ tag_name: 'v1.9.0' }),
    })

    expect(verdict.hasUpdate).toBeFalsy()
    expect(verdict.level).toBe('none')
  })

  it('returns the tag text exactly as reported', async () => {
    let verdict = await evaluateUpdate(repository, '1.0', {
      fetchRelease: serve({ tag_name: 'release-1.2.3-beta' }),
    })

    expect(verdict.latestVersion).toBe('release-1.2.3-beta')
    expect(verdict.level).toBe('minor')
  })

  it('treats tags differing only by qualifier as equal', async () => {
    let verdict = await evaluateUpdate(repository, 'v1.2.3', {
      fetchRelease: serve({ tag_name: 'v1.2.3-rc1' }),
    })

    expect(verdict.hasUpdate).toBeFalsy()
  })

  it('fetches the normalized endpoint and passes transport options', async () => {
    let fetcher = serve({ tag_name: 'v1.0.0' })

    await evaluateUpdate('https://github.com/o/r.git', '1.0.0', {
      fetchRelease: fetcher,
      userAgent: 'test-agent',
      timeout: 250,
    })

    expect(fetcher).toHaveBeenCalledOnce()
    expect(fetcher).toHaveBeenCalledWith(
      'https://api.github.com/repos/o/r/releases/latest',
      { userAgent: 'test-agent', timeout: 250 },
    )
  })

  it('uses fetch when no fetcher is injected', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('{"tag_name":"v2.0.0"}'))

    let verdict = await evaluateUpdate(repository, '1.0.0')

    expect(spy).toHaveBeenCalledOnce()
    expect(spy.mock.calls[0]?.[0]).toBe(
      'https://api.github.com/repos/o/r/releases/latest',
    )
    expect(verdict.level).toBe('major')
  })

  it('fails with ValidationError before fetching', async () => {
    let fetcher = serve({ tag_name: 'v1.0.0' })

    await expect(
      evaluateUpdate('https://example.com/o/r', '1.0.0', {
        fetchRelease: fetcher,
      }),
    ).rejects.toBeInstanceOf(ValidationError)
    expect(fetcher).not.toHaveBeenCalled()
  })

  it('propagates NetworkError from the fetcher', async () => {
    let failure = new NetworkError('fetch failed')

    await expect(
      evaluateUpdate(repository, '1.0.0', {
        fetchRelease: () => Promise.reject(failure),
      }),
    ).rejects.toBe(failure)
  })

  it('wraps other fetcher rejections in NetworkError', async () => {
    let failure = new TypeError('socket closed')
    let promise = evaluateUpdate(repository, '1.0.0', {
      fetchRelease: () => Promise.reject(failure),
    })

    await expect(promise).rejects.toBeInstanceOf(NetworkError)
    await expect(promise).rejects.toMatchObject({
      message: 'socket closed',
      kind: 'network',
      cause: failure,
    })
  })

  it('wraps non-error fetcher rejections in NetworkError', async () => {
    await expect(
      evaluateUpdate(repository, '1.0.0', {
        fetchRelease: () => Promise.reject('offline'),
      }),
    ).rejects.toMatchObject({ name: 'NetworkError', message: 'offline' })
  })

  it('compares date-stamped tags beyond the safe integer range', async () => {
    let verdict = await evaluateUpdate(repository, '1.0.0', {
      fetchRelease: serve({ tag_name: 'v1.0.20240101123456789' }),
    })

    expect(verdict).toEqual({
      latestVersion: 'v1.0.20240101123456789',
      currentVersion: '1.0.0',
      hasUpdate: true,
      level: 'patch',
    })
  })

  it('fails with ApiError for GitHub error payloads', async () => {
    let promise = evaluateUpdate(repository, '1.0.0', {
      fetchRelease: serve({ message: 'Not Found' }),
    })

    await expect(promise).rejects.toBeInstanceOf(ApiError)
    await expect(promise).rejects.toHaveProperty('apiMessage', 'Not Found')
  })

  it('fails with PayloadShapeError for unrelated objects', async () => {
    await expect(
      evaluateUpdate(repository, '1.0.0', {
        fetchRelease: serve({ foo: 'bar' }),
      }),
    ).rejects.toBeInstanceOf(PayloadShapeError)
  })

  it('checks the payload before the local version', async () => {
    await expect(
      evaluateUpdate(repository, 'abc', {
        fetchRelease: serve({ message: 'Not Found' }),
      }),
    ).rejects.toBeInstanceOf(ApiError)
  })

  it('reports the local side when the local version is invalid', async () => {
    for (let tag of ['v3.11.2', 'nightly']) {
      await expect(
        evaluateUpdate(repository, 'abc', {
          fetchRelease: serve({ tag_name: tag }),
        }),
      ).rejects.toMatchObject({ side: 'local', input: 'abc' })
    }
  })

  it('reports the remote side when the tag is invalid', async () => {
    let promise = evaluateUpdate(repository, '1.0.0', {
      fetchRelease: serve({ tag_name: 'nightly' }),
    })

    await expect(promise).rejects.toBeInstanceOf(ParseError)
    await expect(promise).rejects.toMatchObject({
      input: 'nightly',
      side: 'remote',
    })
  })
})
