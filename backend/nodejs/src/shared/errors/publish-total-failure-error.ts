import { AppError } from './app-error.js'

export class PublishTotalFailureError extends AppError {
  readonly kind = 'PublishTotalFailure'
  readonly statusCode = 503
}
