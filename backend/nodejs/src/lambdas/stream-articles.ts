import { loadConfig } from '@/shared/config/config.js'
import { AppError } from '@/shared/errors/app-error.js'
import { describeError, sanitizeError } from '@/shared/errors/sanitize.js'
import { getLogger } from '@/shared/logger/get-logger.js'
import { makeStreamArticles } from '@/use-cases/factories/make-stream-articles.js'
import { StreamArticlesUseCase } from '@/use-cases/stream-articles.js'
import { Context } from 'aws-lambda'
import { StreamArticlesResponse, toErrorResponse, toResponse } from './responses.js'

const logger = getLogger()

// Built once per container. A configuration problem is kept and reported on
// every invocation rather than crashing the runtime during init.
let useCase: StreamArticlesUseCase | undefined
let initError: unknown

try {
  useCase = makeStreamArticles(loadConfig(process.env))
} catch (error) {
  initError = error
  logger.error('Failed to initialise stream articles handler', {
    ...describeError(error),
    ...(error instanceof AppError ? error.context : {})
  })
}

export const streamArticlesHandler = async (
  event: unknown,
  context: Context
): Promise<StreamArticlesResponse> => {
  logger.addContext(context)
  logger.info('Stream articles event received', { event })

  if (!useCase) {
    return toErrorResponse(sanitizeError(initError))
  }

  const result = await useCase.run(event)
  return toResponse(result)
}
