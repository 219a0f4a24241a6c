export type ErrorKind =
  | 'ConfigurationError'
  | 'CredentialUnavailable'
  | 'InvalidRequest'
  | 'UpstreamUnavailable'
  | 'UpstreamProtocolError'
  | 'PublishPartialFailure'
  | 'PublishTotalFailure'
  | 'InternalError'

export type ErrorContext = Record<string, string | number | boolean | undefined>

/**
 * Base class for every failure the pipeline reports.
 *
 * `message` must only ever be built from values this service owns: setting
 * names, validation text, HTTP status codes. Credentials and upstream bodies
 * belong nowhere in it, and `context` is for logs only.
 */
export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind
  abstract readonly statusCode: number

  constructor(
    message: string,
    readonly context: ErrorContext = {}
  ) {
    super(message)
    this.name = new.target.name
  }
}
