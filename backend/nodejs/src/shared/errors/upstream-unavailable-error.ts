import { AppError, ErrorContext } from './app-error.js'

export type UpstreamFailureReason = 'status' | 'timeout' | 'network'

export class UpstreamUnavailableError extends AppError {
  readonly kind = 'UpstreamUnavailable'
  readonly statusCode: number

  constructor(
    message: string,
    readonly reason: UpstreamFailureReason,
    readonly upstreamStatus?: number,
    context: ErrorContext = {}
  ) {
    super(message, { ...context, reason, upstreamStatus })
    if (reason === 'timeout') {
      this.statusCode = 504
    } else if (upstreamStatus === 429) {
      this.statusCode = 429
    } else {
      this.statusCode = 502
    }
  }

  static fromStatus(service: string, status: number): UpstreamUnavailableError {
    const message =
      status === 429
        ? `${service} rate limit exceeded`
        : `${service} responded with status ${status}`
    return new UpstreamUnavailableError(message, 'status', status, { service })
  }

  static timeout(service: string): UpstreamUnavailableError {
    return new UpstreamUnavailableError(
      `${service} did not respond within the invocation time budget`,
      'timeout',
      undefined,
      { service }
    )
  }

  static network(service: string): UpstreamUnavailableError {
    return new UpstreamUnavailableError(
      `${service} is unreachable`,
      'network',
      undefined,
      { service }
    )
  }
}
