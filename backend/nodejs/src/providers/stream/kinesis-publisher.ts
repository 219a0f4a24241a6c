import {
  KinesisClient,
  KinesisServiceException,
  PutRecordsCommand,
  PutRecordsRequestEntry,
  PutRecordsResultEntry
} from '@aws-sdk/client-kinesis'
import { createHash } from 'crypto'
import { setTimeout as sleep } from 'timers/promises'
import { ArticleRecord, serializeArticle } from '@/models/article.js'
import { kinesis } from '@/shared/clients/kinesis.js'
import { PublishTotalFailureError } from '@/shared/errors/publish-total-failure-error.js'
import { describeError } from '@/shared/errors/sanitize.js'
import { UpstreamUnavailableError } from '@/shared/errors/upstream-unavailable-error.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import { StreamPublisher } from './stream-publisher.js'
import {
  PublishOptions,
  PublishOutcome,
  RetryPolicy
} from './stream-publisher-dto.js'

const logger = getLogger()

export const MAX_RECORD_BYTES = 1024 * 1024
const MAX_PARTITION_KEY_LENGTH = 256

const RETRYABLE_RECORD_ERRORS = new Set([
  'ProvisionedThroughputExceededException',
  'InternalFailure'
])

const RETRYABLE_CALL_ERRORS = new Set([
  'ProvisionedThroughputExceededException',
  'LimitExceededException',
  'KMSThrottlingException',
  'ThrottlingException',
  'InternalFailure',
  'ServiceUnavailable'
])

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 100
}

export function partitionKeyFor(article: ArticleRecord): string {
  if (article.webUrl.length <= MAX_PARTITION_KEY_LENGTH) {
    return article.webUrl
  }
  return createHash('sha256').update(article.webUrl).digest('hex')
}

interface PendingRecord {
  index: number
  entry: PutRecordsRequestEntry
}

export class KinesisPublisher implements StreamPublisher {
  private readonly client: KinesisClient
  private readonly retryPolicy: RetryPolicy

  constructor(retryPolicy: RetryPolicy = DEFAULT_RETRY_POLICY) {
    this.client = kinesis()
    this.retryPolicy = retryPolicy
  }

  async publish(
    streamName: string,
    records: readonly ArticleRecord[],
    { signal }: PublishOptions = {}
  ): Promise<PublishOutcome[]> {
    const outcomes = new Array<PublishOutcome>(records.length)
    let pending: PendingRecord[] = []

    records.forEach((article, index) => {
      const data = Buffer.from(serializeArticle(article), 'utf-8')
      const partitionKey = partitionKeyFor(article)
      if (data.byteLength + Buffer.byteLength(partitionKey) > MAX_RECORD_BYTES) {
        logger.warn('Article exceeds the Kinesis record size limit', {
          webUrl: article.webUrl,
          sizeBytes: data.byteLength
        })
        outcomes[index] = { status: 'failed', article, reason: 'RecordTooLarge' }
        return
      }
      pending.push({
        index,
        entry: { Data: data, PartitionKey: partitionKey }
      })
    })

    let anyCallSucceeded = false
    let lastCallError: unknown
    let pendingReason = 'RetriesExhausted'

    for (
      let attempt = 1;
      attempt <= this.retryPolicy.maxAttempts && pending.length > 0;
      attempt++
    ) {
      if (attempt > 1) {
        await this.waitBeforeRetry(attempt - 1, signal)
      }
      if (signal?.aborted) {
        pendingReason = 'Aborted'
        logger.warn('Invocation budget exhausted, abandoning publish retries', {
          attempt,
          pendingCount: pending.length
        })
        break
      }

      try {
        const output = await this.client.send(
          new PutRecordsCommand({
            StreamName: streamName,
            Records: pending.map(({ entry }) => entry)
          }),
          { abortSignal: signal }
        )
        anyCallSucceeded = true
        lastCallError = undefined
        pending = this.collectResults(
          records,
          pending,
          output.Records ?? [],
          outcomes
        )

        logger.info('PutRecords attempt completed', {
          streamName,
          attempt,
          failedRecordCount: output.FailedRecordCount ?? 0,
          retryingCount: pending.length
        })
      } catch (error) {
        if (signal?.aborted) {
          pendingReason = 'Aborted'
          logger.warn('Invocation budget exhausted during PutRecords', {
            attempt,
            pendingCount: pending.length
          })
          break
        }
        lastCallError = error
        logger.error('PutRecords call failed', {
          streamName,
          attempt,
          pendingCount: pending.length,
          ...describeError(error)
        })
        if (!isRetryableCallError(error)) {
          break
        }
      }
    }

    if (!anyCallSucceeded && pending.length > 0) {
      if (pendingReason === 'Aborted') {
        throw UpstreamUnavailableError.timeout('Stream service')
      }
      if (lastCallError !== undefined) {
        throw new PublishTotalFailureError('Stream service is unavailable', {
          streamName,
          errorName: describeError(lastCallError).errorName
        })
      }
    }

    if (pendingReason !== 'Aborted' && lastCallError !== undefined) {
      pendingReason = describeError(lastCallError).errorName
    }
    for (const { index } of pending) {
      outcomes[index] = {
        status: 'failed',
        article: records[index],
        reason: pendingReason
      }
    }

    return outcomes
  }

  private collectResults(
    records: readonly ArticleRecord[],
    sent: PendingRecord[],
    results: PutRecordsResultEntry[],
    outcomes: PublishOutcome[]
  ): PendingRecord[] {
    const retry: PendingRecord[] = []

    sent.forEach((record, position) => {
      const article = records[record.index]
      const result = results[position]

      if (result?.SequenceNumber && result.ShardId && !result.ErrorCode) {
        outcomes[record.index] = {
          status: 'published',
          article,
          shardId: result.ShardId,
          sequenceNumber: result.SequenceNumber
        }
        return
      }

      const errorCode = result?.ErrorCode
      if (!errorCode || RETRYABLE_RECORD_ERRORS.has(errorCode)) {
        retry.push(record)
        return
      }

      logger.warn('Kinesis rejected record', {
        webUrl: article.webUrl,
        errorCode
      })
      outcomes[record.index] = { status: 'failed', article, reason: errorCode }
    })

    return retry
  }

  private async waitBeforeRetry(
    retry: number,
    signal?: AbortSignal
  ): Promise<void> {
    const delay = this.retryPolicy.baseDelayMs * 2 ** (retry - 1)
    try {
      await sleep(delay, undefined, { signal })
    } catch (error) {
      // An aborted wait is picked up by the signal check that follows.
      if (!signal?.aborted) {
        throw error
      }
    }
  }
}

function isRetryableCallError(error: unknown): boolean {
  if (error instanceof KinesisServiceException) {
    return error.$fault === 'server' || RETRYABLE_CALL_ERRORS.has(error.name)
  }
  // Anything below the service layer (socket resets, DNS, timeouts).
  return error instanceof Error
}
