import {
  StreamArticlesFailure,
  StreamArticlesResult
} from '@/use-cases/stream-articles.js'

export interface StreamArticlesResponse {
  statusCode: number
  body: string
}

export function toResponse(result: StreamArticlesResult): StreamArticlesResponse {
  if (result.ok) {
    return {
      statusCode: 200,
      body: JSON.stringify({
        articles_found: result.summary.articlesFound,
        articles_published: result.summary.articlesPublished
      })
    }
  }
  return toErrorResponse(result.failure)
}

export function toErrorResponse({
  kind,
  statusCode,
  message
}: Pick<StreamArticlesFailure, 'kind' | 'statusCode' | 'message'>): StreamArticlesResponse {
  return {
    statusCode,
    body: JSON.stringify({ error: kind, message })
  }
}
