import { ArticleRecord } from '@/models/article.js'
import { PublishOptions, PublishOutcome } from './stream-publisher-dto.js'

export interface StreamPublisher {
  /**
   * Appends every record to the named stream and reports one outcome per
   * record, in input order. Individual failures are reported, not thrown;
   * it rejects only when the stream could not be reached at all.
   */
  publish(
    streamName: string,
    records: readonly ArticleRecord[],
    options?: PublishOptions
  ): Promise<PublishOutcome[]>
}
