import { KinesisClient } from '@aws-sdk/client-kinesis'

let client: KinesisClient | null = null

export const kinesis = (): KinesisClient => {
  if (client) {
    return client
  }
  client = new KinesisClient({
    region: process.env.AWS_REGION,
    // KinesisPublisher owns retries and backoff; a second layer here would
    // multiply PUBLISH_MAX_ATTEMPTS.
    maxAttempts: 1
  })
  return client
}
