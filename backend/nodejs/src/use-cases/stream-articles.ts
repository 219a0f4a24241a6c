import { ArticleRecord, shapeArticles } from '@/models/article.js'
import { parseSearchRequest } from '@/models/search-request.js'
import { ArticleSearchProvider } from '@/providers/article-search/article-search-provider.js'
import { PublishOutcome } from '@/providers/stream/stream-publisher-dto.js'
import { StreamPublisher } from '@/providers/stream/stream-publisher.js'
import { AppConfig } from '@/shared/config/config.js'
import {
  describeError,
  sanitizeError,
  SanitizedError
} from '@/shared/errors/sanitize.js'
import { UpstreamUnavailableError } from '@/shared/errors/upstream-unavailable-error.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import { SecretFetcher } from '@/shared/secrets/fetch-secret.js'

const logger = getLogger()

export type PipelineStage =
  | 'Idle'
  | 'FetchingSecret'
  | 'Searching'
  | 'Shaping'
  | 'Publishing'
  | 'Done'

export interface StreamArticlesSummary {
  articlesFound: number
  articlesDropped: number
  articlesPublished: number
  articlesFailed: number
}

export interface StreamArticlesFailure extends SanitizedError {
  /** Stage the pipeline was in when it failed. */
  stage: PipelineStage
}

export type StreamArticlesResult =
  | { ok: true; summary: StreamArticlesSummary }
  | { ok: false; failure: StreamArticlesFailure }

export interface StreamArticlesDependencies {
  fetchSecret: SecretFetcher
  createSearchProvider: (apiKey: string) => ArticleSearchProvider
  publisher: StreamPublisher
}

export interface RunOptions {
  /** Overrides the budget derived from `invocationTimeoutMs`. */
  signal?: AbortSignal
}

export class StreamArticlesUseCase {
  constructor(
    private readonly config: AppConfig,
    private readonly dependencies: StreamArticlesDependencies
  ) {}

  async run(
    input: unknown,
    { signal }: RunOptions = {}
  ): Promise<StreamArticlesResult> {
    const budget = signal ?? AbortSignal.timeout(this.config.invocationTimeoutMs)
    const state: { stage: PipelineStage } = { stage: 'Idle' }
    const secrets: string[] = []
    const enter = (stage: PipelineStage) => {
      logger.debug('Pipeline stage changed', { from: state.stage, to: stage })
      state.stage = stage
    }

    try {
      const { searchTerm, dateFrom } = parseSearchRequest(input)

      enter('FetchingSecret')
      const apiKey = await this.dependencies.fetchSecret(
        this.config.secretName,
        { signal: budget }
      )
      secrets.push(apiKey)
      const searchProvider = this.dependencies.createSearchProvider(apiKey)

      enter('Searching')
      logger.info('Searching articles', { searchTerm, dateFrom })
      const rawItems = await searchProvider.searchArticles({
        query: searchTerm,
        dateFrom,
        signal: budget
      })

      enter('Shaping')
      const { articles, droppedCount } = shapeArticles(rawItems)
      if (droppedCount > 0) {
        logger.warn('Dropped malformed search results', {
          articlesFound: rawItems.length,
          droppedCount
        })
      }

      enter('Publishing')
      const outcomes = await this.publish(articles, budget)

      const articlesPublished = outcomes.filter(
        (outcome) => outcome.status === 'published'
      ).length
      const summary: StreamArticlesSummary = {
        articlesFound: rawItems.length,
        articlesDropped: droppedCount,
        articlesPublished,
        articlesFailed: outcomes.length - articlesPublished
      }

      if (summary.articlesFailed > 0) {
        logger.warn('Some articles were not published', {
          kind: 'PublishPartialFailure',
          streamName: this.config.streamName,
          articlesFailed: summary.articlesFailed,
          reasons: outcomes
            .flatMap((outcome) =>
              outcome.status === 'failed' ? [outcome.reason] : []
            )
            .join(', ')
        })
      }

      enter('Done')
      logger.info('Articles streamed', { ...summary })
      return { ok: true, summary }
    } catch (error) {
      const failure: StreamArticlesFailure = {
        ...sanitizeError(error, secrets),
        stage: state.stage
      }
      logger.error('Pipeline failed', {
        ...failure,
        ...describeError(error, secrets)
      })
      return { ok: false, failure }
    }
  }

  private async publish(
    articles: ArticleRecord[],
    signal: AbortSignal
  ): Promise<PublishOutcome[]> {
    if (articles.length === 0) {
      logger.info('No valid articles to publish')
      return []
    }
    if (signal.aborted) {
      throw new UpstreamUnavailableError(
        'Invocation time budget exhausted before publishing',
        'timeout'
      )
    }
    return this.dependencies.publisher.publish(
      this.config.streamName,
      articles,
      { signal }
    )
  }
}
