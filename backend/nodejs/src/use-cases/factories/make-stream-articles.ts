import { GuardianProvider } from '@/providers/article-search/guardian-provider.js'
import { KinesisPublisher } from '@/providers/stream/kinesis-publisher.js'
import { AppConfig } from '@/shared/config/config.js'
import { makeSecretFetcher } from '@/shared/secrets/fetch-secret.js'
import { StreamArticlesUseCase } from '../stream-articles.js'

export function makeStreamArticles(config: AppConfig) {
  const publisher = new KinesisPublisher(config.publishRetry)
  return new StreamArticlesUseCase(config, {
    fetchSecret: makeSecretFetcher({ maxAge: config.secretMaxAgeSeconds }),
    createSearchProvider: (apiKey) =>
      new GuardianProvider(apiKey, config.searchApiUrl),
    publisher
  })
}
