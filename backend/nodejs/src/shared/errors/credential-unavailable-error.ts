import { AppError } from './app-error.js'

export class CredentialUnavailableError extends AppError {
  readonly kind = 'CredentialUnavailable'
  readonly statusCode = 500
}
