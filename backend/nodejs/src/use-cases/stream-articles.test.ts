import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ArticleRecord } from '@/models/article.js'
import { ArticleSearchProvider } from '@/providers/article-search/article-search-provider.js'
import { ArticleSearchQuery } from '@/providers/article-search/article-search-dto.js'
import {
  PublishOptions,
  PublishOutcome
} from '@/providers/stream/stream-publisher-dto.js'
import { StreamPublisher } from '@/providers/stream/stream-publisher.js'
import { AppConfig } from '@/shared/config/config.js'
import { CredentialUnavailableError } from '@/shared/errors/credential-unavailable-error.js'
import { PublishTotalFailureError } from '@/shared/errors/publish-total-failure-error.js'
import { UpstreamProtocolError } from '@/shared/errors/upstream-protocol-error.js'
import { UpstreamUnavailableError } from '@/shared/errors/upstream-unavailable-error.js'
import { StreamArticlesUseCase } from './stream-articles.js'

const API_KEY = 'test-api-key'

const config: AppConfig = {
  secretName: 'guardian-api-key',
  streamName: 'guardian-articles',
  searchApiUrl: 'https://content.guardianapis.com/search',
  publishRetry: { maxAttempts: 3, baseDelayMs: 0 },
  invocationTimeoutMs: 5_000,
  secretMaxAgeSeconds: 300
}

const item = (n: number) => ({
  webPublicationDate: `2024-03-${String(20 - n).padStart(2, '0')}T10:30:00Z`,
  webTitle: `Article ${n}`,
  webUrl: `https://www.theguardian.com/science/2024/mar/article-${n}`
})

class FakeSearchProvider implements ArticleSearchProvider {
  readonly queries: ArticleSearchQuery[] = []

  constructor(private readonly result: unknown[] | Error) {}

  async searchArticles(query: ArticleSearchQuery): Promise<unknown[]> {
    this.queries.push(query)
    if (this.result instanceof Error) {
      throw this.result
    }
    return this.result
  }
}

class FakePublisher implements StreamPublisher {
  readonly calls: { streamName: string; records: readonly ArticleRecord[] }[] = []
  rejectUrls = new Set<string>()
  failure?: Error

  async publish(
    streamName: string,
    records: readonly ArticleRecord[],
    _options?: PublishOptions
  ): Promise<PublishOutcome[]> {
    this.calls.push({ streamName, records })
    if (this.failure) {
      throw this.failure
    }
    return records.map((article, index): PublishOutcome =>
      this.rejectUrls.has(article.webUrl)
        ? { status: 'failed', article, reason: 'RetriesExhausted' }
        : {
            status: 'published',
            article,
            shardId: 'shardId-000000000000',
            sequenceNumber: String(index + 1)
          }
    )
  }
}

describe('StreamArticlesUseCase', () => {
  let fetchSecret: ReturnType<typeof vi.fn>
  let searchProvider: FakeSearchProvider
  let createSearchProvider: ReturnType<typeof vi.fn>
  let publisher: FakePublisher

  const makeUseCase = () =>
    new StreamArticlesUseCase(config, {
      fetchSecret: (name, options) => fetchSecret(name, options),
      createSearchProvider: (apiKey) => createSearchProvider(apiKey),
      publisher
    })

  const useSearchResults = (result: unknown[] | Error) => {
    searchProvider = new FakeSearchProvider(result)
    createSearchProvider.mockReturnValue(searchProvider)
  }

  beforeEach(() => {
    fetchSecret = vi.fn().mockResolvedValue(API_KEY)
    createSearchProvider = vi.fn()
    publisher = new FakePublisher()
    useSearchResults([])
  })

  it('publishes every well-formed article', async () => {
    const items = Array.from({ length: 10 }, (_, i) => item(i + 1))
    useSearchResults(items)

    const result = await makeUseCase().run({ search_term: 'climate change' })

    expect(result).toEqual({
      ok: true,
      summary: {
        articlesFound: 10,
        articlesDropped: 0,
        articlesPublished: 10,
        articlesFailed: 0
      }
    })
    expect(publisher.calls).toHaveLength(1)
    expect(publisher.calls[0].streamName).toBe('guardian-articles')
    expect(publisher.calls[0].records).toEqual(items)
  })

  it('resolves the credential and builds the search client from it', async () => {
    await makeUseCase().run({ search_term: 'ai', date_from: '2024-01-01' })

    expect(fetchSecret).toHaveBeenCalledWith('guardian-api-key', {
      signal: searchProvider.queries[0].signal
    })
    expect(createSearchProvider).toHaveBeenCalledWith(API_KEY)
    expect(searchProvider.queries).toHaveLength(1)
    expect(searchProvider.queries[0]).toMatchObject({
      query: 'ai',
      dateFrom: '2024-01-01'
    })
    expect(searchProvider.queries[0].signal).toBeInstanceOf(AbortSignal)
  })

  it('counts dropped items as found but never publishes them', async () => {
    useSearchResults([item(1), { webTitle: '', webUrl: 'https://x.test/a' }, item(2)])

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toEqual({
      ok: true,
      summary: {
        articlesFound: 3,
        articlesDropped: 1,
        articlesPublished: 2,
        articlesFailed: 0
      }
    })
    expect(publisher.calls[0].records).toEqual([item(1), item(2)])
  })

  it('skips publishing when the search finds nothing', async () => {
    const result = await makeUseCase().run({
      search_term: 'x',
      date_from: '2099-01-01'
    })

    expect(result).toEqual({
      ok: true,
      summary: {
        articlesFound: 0,
        articlesDropped: 0,
        articlesPublished: 0,
        articlesFailed: 0
      }
    })
    expect(publisher.calls).toHaveLength(0)
  })

  it('skips publishing when every item is malformed', async () => {
    useSearchResults([{ webTitle: 'no url' }])

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toMatchObject({
      ok: true,
      summary: { articlesFound: 1, articlesPublished: 0 }
    })
    expect(publisher.calls).toHaveLength(0)
  })

  it('treats a partial publish failure as success', async () => {
    const items = [item(1), item(2), item(3), item(4)]
    useSearchResults(items)
    publisher.rejectUrls.add(item(3).webUrl)

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toEqual({
      ok: true,
      summary: {
        articlesFound: 4,
        articlesDropped: 0,
        articlesPublished: 3,
        articlesFailed: 1
      }
    })
  })

  it('rejects an invalid request before any I/O', async () => {
    const result = await makeUseCase().run({ search_term: 42 })

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'InvalidRequest',
        statusCode: 400,
        message: 'search_term must be a string',
        stage: 'Idle'
      }
    })
    expect(fetchSecret).not.toHaveBeenCalled()
    expect(createSearchProvider).not.toHaveBeenCalled()
  })

  it('stops when the credential is unavailable', async () => {
    fetchSecret.mockRejectedValue(
      new CredentialUnavailableError('API credential is unavailable')
    )

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'CredentialUnavailable',
        statusCode: 500,
        message: 'API credential is unavailable',
        stage: 'FetchingSecret'
      }
    })
    expect(createSearchProvider).not.toHaveBeenCalled()
    expect(searchProvider.queries).toHaveLength(0)
  })

  it('stops when the search fails', async () => {
    useSearchResults(UpstreamUnavailableError.fromStatus('Guardian API', 503))

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'UpstreamUnavailable',
        statusCode: 502,
        message: 'Guardian API responded with status 503',
        stage: 'Searching'
      }
    })
    expect(publisher.calls).toHaveLength(0)
  })

  it('stops when the search response is malformed', async () => {
    useSearchResults(
      new UpstreamProtocolError('Guardian API returned an unexpected response shape')
    )

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'UpstreamProtocolError', statusCode: 502 }
    })
  })

  it('fails on a total publish outage', async () => {
    useSearchResults([item(1)])
    publisher.failure = new PublishTotalFailureError('Stream service is unavailable')

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'PublishTotalFailure',
        statusCode: 503,
        message: 'Stream service is unavailable',
        stage: 'Publishing'
      }
    })
  })

  it('fails with a timeout when the budget is gone before publishing', async () => {
    useSearchResults([item(1)])
    const controller = new AbortController()
    controller.abort()

    const result = await makeUseCase().run(
      { search_term: 'ai' },
      { signal: controller.signal }
    )

    expect(result).toMatchObject({
      ok: false,
      failure: { kind: 'UpstreamUnavailable', statusCode: 504, stage: 'Publishing' }
    })
    expect(publisher.calls).toHaveLength(0)
  })

  it('hides unexpected errors and redacts the credential', async () => {
    useSearchResults(new Error(`boom with ${API_KEY}`))

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'InternalError',
        statusCode: 500,
        message: 'Internal server error',
        stage: 'Searching'
      }
    })
  })

  it('redacts the credential from application error messages', async () => {
    useSearchResults(new UpstreamProtocolError(`unexpected ${API_KEY}`))

    const result = await makeUseCase().run({ search_term: 'ai' })

    expect(result).toMatchObject({
      ok: false,
      failure: { message: 'unexpected [REDACTED]' }
    })
  })
})
