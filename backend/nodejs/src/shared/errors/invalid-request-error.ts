import { AppError } from './app-error.js'

export class InvalidRequestError extends AppError {
  readonly kind = 'InvalidRequest'
  readonly statusCode = 400
}
