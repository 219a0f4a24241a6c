import { z } from 'zod'
import { InvalidRequestError } from '@/shared/errors/invalid-request-error.js'

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/

function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value)
  if (!match) {
    return false
  }
  const [, year, month, day] = match.map(Number)
  const date = new Date(Date.UTC(year, month - 1, day))
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  )
}

export const searchRequestSchema = z.object(
  {
    search_term: z
      .string({
        required_error: 'search_term is required',
        invalid_type_error: 'search_term must be a string'
      })
      .trim()
      .min(1, 'search_term must not be empty'),
    date_from: z
      .string({ invalid_type_error: 'date_from must be a string' })
      .refine(isCalendarDate, 'date_from must be a date in YYYY-MM-DD format')
      .nullish()
  },
  {
    required_error: 'request body is required',
    invalid_type_error: 'request must be a JSON object'
  }
)

export interface SearchRequest {
  readonly searchTerm: string
  /** Lower bound on publication date, `YYYY-MM-DD`. */
  readonly dateFrom?: string
}

export function parseSearchRequest(input: unknown): SearchRequest {
  const parsed = searchRequestSchema.safeParse(input)
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues[0].message)
  }

  const { search_term, date_from } = parsed.data
  return Object.freeze({
    searchTerm: search_term,
    ...(date_from ? { dateFrom: date_from } : {})
  })
}
