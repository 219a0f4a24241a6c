import { ArticleRecord } from '@/models/article.js'

export type PublishOutcome =
  | {
      status: 'published'
      article: ArticleRecord
      shardId: string
      sequenceNumber: string
    }
  | {
      status: 'failed'
      article: ArticleRecord
      reason: string
    }

export interface PublishOptions {
  /** Once aborted, pending retries are abandoned. */
  signal?: AbortSignal
}

export interface RetryPolicy {
  maxAttempts: number
  baseDelayMs: number
}
