import { CredentialUnavailableError } from '@/shared/errors/credential-unavailable-error.js'
import { describeError } from '@/shared/errors/sanitize.js'
import { UpstreamProtocolError } from '@/shared/errors/upstream-protocol-error.js'
import { UpstreamUnavailableError } from '@/shared/errors/upstream-unavailable-error.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import { ArticleSearchProvider } from './article-search-provider.js'
import {
  ArticleSearchQuery,
  GuardianSearchParams,
  guardianSearchResponseSchema,
  SEARCH_PAGE_SIZE
} from './article-search-dto.js'

const logger = getLogger()

const SERVICE = 'Guardian API'
export const GUARDIAN_SEARCH_URL = 'https://content.guardianapis.com/search'

export class GuardianProvider implements ArticleSearchProvider {
  private readonly baseUrl: string
  private readonly apiKey: string

  constructor(apiKey: string, baseUrl: string = GUARDIAN_SEARCH_URL) {
    this.baseUrl = baseUrl
    this.apiKey = apiKey.trim()
    if (!this.apiKey) {
      throw new CredentialUnavailableError('Guardian API key is not set', {
        service: 'guardian-api'
      })
    }
  }

  async searchArticles({
    query,
    dateFrom,
    signal
  }: ArticleSearchQuery): Promise<unknown[]> {
    const params: GuardianSearchParams = {
      q: query,
      'order-by': 'newest',
      'page-size': SEARCH_PAGE_SIZE,
      ...(dateFrom ? { 'from-date': dateFrom } : {})
    }

    const body = await this.makeRequest(params, signal)
    const parsed = guardianSearchResponseSchema.safeParse(body)

    if (!parsed.success) {
      logger.error('Unexpected response shape from Guardian API', {
        issues: parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.code}`)
          .join('; ')
      })
      throw new UpstreamProtocolError(
        'Guardian API returned an unexpected response shape',
        { service: 'guardian-api' }
      )
    }

    const { results, total } = parsed.data.response
    logger.info('Fetched search results from Guardian API', {
      resultCount: results.length,
      totalResults: total
    })

    return results.slice(0, SEARCH_PAGE_SIZE)
  }

  private async makeRequest(
    params: GuardianSearchParams,
    signal?: AbortSignal
  ): Promise<unknown> {
    const searchParams = new URLSearchParams()
    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined) {
        searchParams.append(key, String(value))
      }
    })
    searchParams.append('api-key', this.apiKey)

    let response: Response
    try {
      response = await fetch(`${this.baseUrl}?${searchParams.toString()}`, {
        headers: { Accept: 'application/json' },
        signal
      })
    } catch (error) {
      logger.error('Request to Guardian API failed', {
        ...describeError(error, [this.apiKey]),
        params
      })
      if (isAbortError(error) || signal?.aborted) {
        throw UpstreamUnavailableError.timeout(SERVICE)
      }
      throw UpstreamUnavailableError.network(SERVICE)
    }

    if (!response.ok) {
      // The error body is never read: it may echo request details back.
      logger.error('Guardian API responded with an error status', {
        status: response.status,
        params
      })
      throw UpstreamUnavailableError.fromStatus(SERVICE, response.status)
    }

    try {
      return await response.json()
    } catch (error) {
      if (isAbortError(error) || signal?.aborted) {
        throw UpstreamUnavailableError.timeout(SERVICE)
      }
      logger.error('Guardian API returned a body that is not JSON', {
        ...describeError(error, [this.apiKey])
      })
      throw new UpstreamProtocolError('Guardian API returned invalid JSON', {
        service: 'guardian-api'
      })
    }
  }
}

function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  )
}
