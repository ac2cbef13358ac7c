import { describe, expect, it, vi } from 'vitest'
import { SdamGiaClient, withSdamGiaClient } from '../src/scraper/client.js'
import { HttpStatusError, TransportError } from '../src/scraper/errors.js'
import { buildBaseUrl, buildUrl } from '../src/scraper/http.js'
import type { FetchLike } from '../src/scraper/session.js'
import { CookieJar } from '../src/utils/cookieJar.js'
import { createFakeSite, html } from './helpers/fakeSite.js'

const emptyListing = html('<p>Ничего не найдено</p>')

describe('buildUrl', () => {
  it('derives the base domain from subject and exam type', () => {
    expect(buildBaseUrl({ examType: 'oge', subject: 'inf' })).toBe('https://inf-oge.sdamgia.ru')
  })

  it('appends query parameters in order and keeps absolute URLs', () => {
    const scope = { examType: 'ege', subject: 'math' } as const
    expect(buildUrl(scope, '/problem?id=5', { page: 2 }).toString()).toBe(
      'https://math-ege.sdamgia.ru/problem?id=5&page=2',
    )
    expect(buildUrl(scope, 'https://example.org/a.svg').toString()).toBe('https://example.org/a.svg')
  })
})

describe('CookieJar', () => {
  it('keeps the latest value of each cookie and forgets expired ones', () => {
    const jar = new CookieJar()
    jar.ingest(new Headers([['set-cookie', 'session=abc; Path=/; HttpOnly']]))
    jar.ingest(new Headers([['set-cookie', 'theme=dark; Path=/']]))
    jar.ingest(new Headers([['set-cookie', 'session=def; Path=/']]))
    expect(jar.header()).toBe('session=def; theme=dark')

    jar.ingest(new Headers([['set-cookie', 'theme=; Max-Age=0; Path=/']]))
    expect(jar.header()).toBe('session=def')
  })
})

describe('session', () => {
  it('sends cookies set by earlier responses', async () => {
    const site = createFakeSite({
      'math-ege.sdamgia.ru/test?id=1': {
        body: emptyListing,
        headers: { 'set-cookie': 'session=abc; Path=/' },
      },
      'math-ege.sdamgia.ru/test?id=2': { body: emptyListing },
    })
    const client = new SdamGiaClient({ fetch: site.fetch })

    await client.getTest(1)
    await client.getTest(2)

    expect(site.requests[0]?.headers.get('cookie')).toBeNull()
    expect(site.requests[1]?.headers.get('cookie')).toBe('session=abc')
  })

  it('wraps network failures in TransportError', async () => {
    const cause = new TypeError('fetch failed')
    const fetch: FetchLike = async () => {
      throw cause
    }
    const client = new SdamGiaClient({ fetch })

    const error = await client.getTest(1).catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ url: 'https://math-ege.sdamgia.ru/test?id=1', cause })
  })

  it('raises HttpStatusError for non-success responses', async () => {
    const site = createFakeSite({})
    const client = new SdamGiaClient({ fetch: site.fetch })

    const error = await client.getCatalog().catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(HttpStatusError)
    expect(error).toMatchObject({ status: 404, url: 'https://math-ege.sdamgia.ru/prob_catalog' })
  })

  it('refuses requests once closed', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(emptyListing))
    const client = new SdamGiaClient({ fetch })

    client.close()
    client.close()

    expect(client.closed).toBe(true)
    await expect(client.getTest(1)).rejects.toBeInstanceOf(TransportError)
    expect(fetch).not.toHaveBeenCalled()
  })

  it('aborts a request that outlives the timeout', async () => {
    const fetch: FetchLike = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
      })
    const client = new SdamGiaClient({ fetch, timeoutMs: 10 })

    await expect(client.getTest(1)).rejects.toThrow('Request timed out after 10ms')
  })
})

const encoder = new TextEncoder()

// A body that sends one chunk and then stalls until the request is aborted.
const stallingFetch: FetchLike = async (_input, init) =>
  new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('<html><body>'))
        init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')))
      },
    }),
  )

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

describe('response bodies', () => {
  it('wraps a connection lost mid-body in TransportError', async () => {
    const cause = new TypeError('terminated')
    const fetch: FetchLike = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(encoder.encode('<html><body>'))
            controller.error(cause)
          },
        }),
      )
    const client = new SdamGiaClient({ fetch })

    const error = await client.getCatalog().catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({
      message: 'Reading the response failed (https://math-ege.sdamgia.ru/prob_catalog)',
      cause,
    })
  })

  it('aborts a body still streaming when the client closes', async () => {
    const client = new SdamGiaClient({ fetch: stallingFetch })

    const pending = client.getCatalog().catch((reason: unknown) => reason)
    await delay(10)
    client.close()
    const error = await pending

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({
      message: 'Session closed during request (https://math-ege.sdamgia.ru/prob_catalog)',
    })
  })

  it('applies the timeout to the body as well', async () => {
    const client = new SdamGiaClient({ fetch: stallingFetch, timeoutMs: 10 })

    await expect(client.getCatalog()).rejects.toThrow('Request timed out after 10ms')
  })

  it('releases the body of error and redirect responses', async () => {
    const cancelled: string[] = []
    const trackedBody = (name: string) =>
      new ReadableStream<Uint8Array>({
        cancel() {
          cancelled.push(name)
        },
      })
    const fetch: FetchLike = async (input) => {
      const url = new URL(input.toString())
      if (url.searchParams.get('a') === 'generate') {
        return new Response(trackedBody('redirect'), {
          status: 302,
          headers: { location: '/test?id=5&nt=True' },
        })
      }
      return new Response(trackedBody('error'), { status: 503 })
    }
    const client = new SdamGiaClient({ fetch })

    await expect(client.getTest(1)).rejects.toBeInstanceOf(HttpStatusError)
    await expect(client.generateTest({ topics: { 1: 1 } })).resolves.toBe(5)
    expect(cancelled).toEqual(['error', 'redirect'])
  })
})

describe('withSdamGiaClient', () => {
  it('closes the client when the callback succeeds', async () => {
    const site = createFakeSite({ 'math-ege.sdamgia.ru/test?id=3': { body: emptyListing } })
    let captured: SdamGiaClient | undefined

    const ids = await withSdamGiaClient({ fetch: site.fetch }, async (client) => {
      captured = client
      return client.getTest(3)
    })

    expect(ids).toEqual([])
    expect(captured?.closed).toBe(true)
  })

  it('closes the client when the callback throws', async () => {
    let captured: SdamGiaClient | undefined

    await expect(
      withSdamGiaClient({}, async (client) => {
        captured = client
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')
    expect(captured?.closed).toBe(true)
  })
})
