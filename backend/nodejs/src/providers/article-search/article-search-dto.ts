import { z } from 'zod'

/** Maximum number of results requested from, and accepted back from, the API. */
export const SEARCH_PAGE_SIZE = 10

export interface ArticleSearchQuery {
  query: string
  /** `YYYY-MM-DD` lower bound on publication date */
  dateFrom?: string
  signal?: AbortSignal
}

// Query parameters understood by the Guardian content search endpoint
export interface GuardianSearchParams {
  q: string
  'from-date'?: string
  'order-by': 'newest' | 'oldest' | 'relevance'
  'page-size': number
}

// Only the envelope is checked here; each result item is validated later by
// the article shaper so that one bad item does not fail the whole search.
export const guardianSearchResponseSchema = z.object({
  response: z.object({
    status: z.string().optional(),
    total: z.number().optional(),
    results: z.array(z.unknown())
  })
})

export type GuardianSearchResponse = z.infer<
  typeof guardianSearchResponseSchema
>
