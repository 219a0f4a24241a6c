import { AppError, ErrorContext } from './app-error.js'

export class ConfigurationError extends AppError {
  readonly kind = 'ConfigurationError'
  readonly statusCode = 500

  constructor(
    /** Names of the offending settings; values are never recorded. */
    readonly settings: string[],
    context: ErrorContext = {}
  ) {
    super('Service configuration error', {
      ...context,
      settings: settings.join(', ')
    })
  }
}
