import { AppError, ErrorKind } from './app-error.js'

export interface SanitizedError {
  kind: ErrorKind
  statusCode: number
  message: string
}

const REDACTED = '[REDACTED]'
const API_KEY_QUERY = /(api[-_]?key=)[^&\s"']+/gi
const INTERNAL_ERROR_MESSAGE = 'Internal server error'

export function redactSecrets(text: string, secrets: readonly string[] = []) {
  let redacted = text.replace(API_KEY_QUERY, `$1${REDACTED}`)
  for (const secret of secrets) {
    if (secret.length > 0) {
      redacted = redacted.split(secret).join(REDACTED)
    }
  }
  return redacted
}

/**
 * The only way an error becomes visible outside the pipeline. Known errors
 * keep their kind, status and message; anything else collapses to a generic
 * internal error.
 */
export function sanitizeError(
  error: unknown,
  secrets: readonly string[] = []
): SanitizedError {
  if (error instanceof AppError) {
    return {
      kind: error.kind,
      statusCode: error.statusCode,
      message: redactSecrets(error.message, secrets)
    }
  }
  return {
    kind: 'InternalError',
    statusCode: 500,
    message: INTERNAL_ERROR_MESSAGE
  }
}

/** Log-friendly description of any thrown value, with secrets removed. */
export function describeError(
  error: unknown,
  secrets: readonly string[] = []
): { errorName: string; errorMessage: string } {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: redactSecrets(error.message, secrets)
    }
  }
  return { errorName: typeof error, errorMessage: 'Unknown error' }
}
