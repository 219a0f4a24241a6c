import { z } from 'zod'
import { ConfigurationError } from '../errors/configuration-error.js'

const DEFAULT_GUARDIAN_API_URL = 'https://content.guardianapis.com/search'

const requiredSetting = z
  .string({ required_error: 'is required' })
  .trim()
  .min(1, 'must not be empty')

const integerSetting = (defaultValue: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(defaultValue)

const envSchema = z.object({
  GUARDIAN_API_KEY_SECRET_NAME: requiredSetting,
  KINESIS_STREAM_NAME: requiredSetting,
  GUARDIAN_API_URL: z.string().trim().url().default(DEFAULT_GUARDIAN_API_URL),
  PUBLISH_MAX_ATTEMPTS: integerSetting(3, 1, 10),
  PUBLISH_BASE_DELAY_MS: integerSetting(100, 0, 10_000),
  INVOCATION_TIMEOUT_MS: integerSetting(25_000, 1_000, 900_000),
  SECRET_MAX_AGE_SECONDS: integerSetting(300, 0, 86_400)
})

export interface PublishRetryConfig {
  maxAttempts: number
  baseDelayMs: number
}

export interface AppConfig {
  readonly secretName: string
  readonly streamName: string
  readonly searchApiUrl: string
  readonly publishRetry: Readonly<PublishRetryConfig>
  readonly invocationTimeoutMs: number
  readonly secretMaxAgeSeconds: number
}

type Environment = Record<string, string | undefined>

// Blank optional settings fall back to their defaults instead of failing coercion.
function withoutBlankValues(env: Environment): Environment {
  return Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value === undefined || value.trim().length > 0
    )
  )
}

export function loadConfig(env: Environment = process.env): AppConfig {
  const required = {
    GUARDIAN_API_KEY_SECRET_NAME: env.GUARDIAN_API_KEY_SECRET_NAME,
    KINESIS_STREAM_NAME: env.KINESIS_STREAM_NAME
  }
  const parsed = envSchema.safeParse({
    ...withoutBlankValues(env),
    ...required
  })

  if (!parsed.success) {
    const settings = [
      ...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))
    ]
    throw new ConfigurationError(settings)
  }

  const settings = parsed.data
  return Object.freeze({
    secretName: settings.GUARDIAN_API_KEY_SECRET_NAME,
    streamName: settings.KINESIS_STREAM_NAME,
    searchApiUrl: settings.GUARDIAN_API_URL,
    publishRetry: Object.freeze({
      maxAttempts: settings.PUBLISH_MAX_ATTEMPTS,
      baseDelayMs: settings.PUBLISH_BASE_DELAY_MS
    }),
    invocationTimeoutMs: settings.INVOCATION_TIMEOUT_MS,
    secretMaxAgeSeconds: settings.SECRET_MAX_AGE_SECONDS
  })
}
