import { describe, it, expect, afterEach, vi } from 'vitest'
import { HttpResourceClient } from '../../client/http-resource-client'
import { HTTPStatusError, NetworkError } from '../../errors'
import type { ClientConfig } from '../../config/schema'

const config: ClientConfig = {
  baseUrl: 'http://films.test/api/',
  rootPath: '/films/{id}/',
  childrenField: 'characters',
  requestTimeoutMs: 50,
}

const json = (body: unknown, init: { status?: number } = {}) =>
  new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'Content-Type': 'application/json' },
  })

describe('HttpResourceClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('builds the root URL from baseUrl and rootPath', () => {
    const client = new HttpResourceClient(config)

    expect(client.rootUrl('3')).toBe('http://films.test/api/films/3/')
    expect(client.rootUrl('a b')).toBe('http://films.test/api/films/a%20b/')
  })

  it('reads child references from the configured field', async () => {
    const fetchMock = vi.fn().mockResolvedValue(json({
      title: 'Test Film',
      characters: ['http://films.test/api/people/1/', 'http://films.test/api/people/2/'],
    }))
    vi.stubGlobal('fetch', fetchMock)

    const refs = await new HttpResourceClient(config).getChildren('3')

    expect(refs).toEqual(['http://films.test/api/people/1/', 'http://films.test/api/people/2/'])
    expect(fetchMock).toHaveBeenCalledWith('http://films.test/api/films/3/', expect.objectContaining({ method: 'GET' }))
  })

  it('returns the detail record with extra fields passed through', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(json({ name: 'Test Person', height: '172' })))

    const detail = await new HttpResourceClient(config).getDetail('http://films.test/api/people/1/')

    expect(detail).toEqual({ name: 'Test Person', height: '172' })
  })

  it('raises HTTPStatusError for a non-success status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(json({ detail: 'Not found' }, { status: 404 })))

    const failure = await new HttpResourceClient(config).getChildren('99').catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(HTTPStatusError)
    expect(failure).toMatchObject({ status: 404, url: 'http://films.test/api/films/99/', code: 'HTTP_STATUS' })
  })

  it('raises NetworkError when the transport fails', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')))

    await expect(new HttpResourceClient(config).getDetail('http://films.test/api/people/1/')).rejects.toMatchObject({
      name: 'NetworkError',
      message: 'Request to http://films.test/api/people/1/ failed: fetch failed',
    })
  })

  it('does not abort early when the timeout exceeds the timer range', async () => {
    vi.stubGlobal('fetch', vi.fn((_url: string, init: { signal: AbortSignal }) =>
      new Promise((resolve, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('This operation was aborted')))
        setTimeout(() => resolve(json({ name: 'Slow Person' })), 20)
      })
    ))

    const client = new HttpResourceClient({ ...config, requestTimeoutMs: 3_000_000_000 })

    await expect(client.getDetail('http://films.test/api/people/1/')).resolves.toEqual({ name: 'Slow Person' })
  })

  it('raises NetworkError when the request times out', async () => {
    vi.stubGlobal('fetch', vi.fn((_url: string, init: { signal: AbortSignal }) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('This operation was aborted')))
      })
    ))

    await expect(new HttpResourceClient(config).getChildren('3')).rejects.toMatchObject({
      name: 'NetworkError',
      message: 'Request to http://films.test/api/films/3/ timed out after 50ms',
    })
  })

  it('raises NetworkError when the children field is missing', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(json({ title: 'No cast' })))

    await expect(new HttpResourceClient(config).getChildren('3')).rejects.toBeInstanceOf(NetworkError)
  })

  it('raises NetworkError for a detail without a name', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(json({ height: '172' })))

    await expect(new HttpResourceClient(config).getDetail('http://films.test/api/people/1/')).rejects.toMatchObject({
      name: 'NetworkError',
      message: 'Response from http://films.test/api/people/1/ is not a detail record',
    })
  })

  it('raises NetworkError for a body that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('<html>', { status: 200 })))

    await expect(new HttpResourceClient(config).getDetail('http://films.test/api/people/1/')).rejects.toMatchObject({
      name: 'NetworkError',
      message: 'Invalid JSON response from http://films.test/api/people/1/',
    })
  })
})
