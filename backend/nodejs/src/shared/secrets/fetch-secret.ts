import { getSecret } from '@aws-lambda-powertools/parameters/secrets'
import { CredentialUnavailableError } from '../errors/credential-unavailable-error.js'
import { describeError } from '../errors/sanitize.js'
import { UpstreamUnavailableError } from '../errors/upstream-unavailable-error.js'
import { getLogger } from '../logger/get-logger.js'

const logger = getLogger()

export interface SecretRequestOptions {
  signal?: AbortSignal
}

export type SecretFetcher = (
  secretName: string,
  options?: SecretRequestOptions
) => Promise<string>

export interface FetchSecretOptions extends SecretRequestOptions {
  /** Seconds the Powertools cache keeps the value between invocations. */
  maxAge?: number
}

export function makeSecretFetcher(
  options: FetchSecretOptions = {}
): SecretFetcher {
  return (secretName, { signal } = {}) =>
    fetchSecret(secretName, { ...options, signal })
}

export async function fetchSecret(
  secretName: string,
  { maxAge = 300, signal }: FetchSecretOptions = {}
): Promise<string> {
  let secret: unknown
  try {
    signal?.throwIfAborted()
    secret = await untilAborted(getSecret(secretName, { maxAge }), signal)
  } catch (error) {
    if (signal?.aborted) {
      logger.error('Secrets Manager did not answer within the budget', {
        secretName
      })
      throw UpstreamUnavailableError.timeout('Secrets Manager')
    }
    logger.error('Failed to retrieve secret from Secrets Manager', {
      secretName,
      ...describeError(error)
    })
    throw new CredentialUnavailableError('API credential is unavailable', {
      secretName
    })
  }

  if (typeof secret !== 'string' || !secret.trim()) {
    logger.error('Secret not found or empty in Secrets Manager', {
      secretName
    })
    throw new CredentialUnavailableError('API credential is unavailable', {
      secretName
    })
  }

  return secret.trim()
}

// getSecret takes no abort signal, so the wait is raced against it instead.
async function untilAborted<T>(
  pending: Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (!signal) {
    return pending
  }

  let onAbort: (() => void) | undefined
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })
  })
  try {
    return await Promise.race([pending, aborted])
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort)
    }
  }
}
