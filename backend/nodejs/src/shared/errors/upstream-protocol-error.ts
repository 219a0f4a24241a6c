import { AppError } from './app-error.js'

export class UpstreamProtocolError extends AppError {
  readonly kind = 'UpstreamProtocolError'
  readonly statusCode = 502
}
