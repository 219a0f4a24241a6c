import { describe, expect, it } from 'vitest'
import { InvalidRequestError } from '@/shared/errors/invalid-request-error.js'
import { parseSearchRequest } from './search-request.js'

function invalidMessage(input: unknown): string {
  try {
    parseSearchRequest(input)
  } catch (error) {
    if (error instanceof InvalidRequestError) {
      return error.message
    }
    throw error
  }
  throw new Error('expected the request to be rejected')
}

describe('parseSearchRequest', () => {
  it('accepts a search term alone', () => {
    expect(parseSearchRequest({ search_term: 'climate change' })).toEqual({
      searchTerm: 'climate change'
    })
  })

  it('trims the search term', () => {
    expect(parseSearchRequest({ search_term: '  ai  ' })).toEqual({
      searchTerm: 'ai'
    })
  })

  it('accepts a valid date_from', () => {
    expect(
      parseSearchRequest({ search_term: 'ai', date_from: '2024-02-29' })
    ).toEqual({ searchTerm: 'ai', dateFrom: '2024-02-29' })
  })

  it('treats a null date_from as absent', () => {
    expect(
      parseSearchRequest({ search_term: 'ai', date_from: null })
    ).toEqual({ searchTerm: 'ai' })
  })

  it('ignores unknown fields', () => {
    expect(
      parseSearchRequest({ search_term: 'ai', page: 3 })
    ).toEqual({ searchTerm: 'ai' })
  })

  it.each([
    [{}, 'search_term is required'],
    [{ search_term: '' }, 'search_term must not be empty'],
    [{ search_term: '   ' }, 'search_term must not be empty'],
    [{ search_term: 42 }, 'search_term must be a string'],
    [{ search_term: ['a'] }, 'search_term must be a string'],
    [{ search_term: null }, 'search_term must be a string'],
    [null, 'request must be a JSON object'],
    ['climate', 'request must be a JSON object'],
    [undefined, 'request body is required']
  ])('rejects %j with "%s"', (input, message) => {
    expect(invalidMessage(input)).toBe(message)
  })

  it.each(['not-a-date', '2024-13-01', '2023-02-29', '2024-1-5', '2024-01-15T00:00:00Z'])(
    'rejects date_from %s',
    (dateFrom) => {
      expect(invalidMessage({ search_term: 'ai', date_from: dateFrom })).toBe(
        'date_from must be a date in YYYY-MM-DD format'
      )
    }
  )

  it('rejects a non-string date_from', () => {
    expect(invalidMessage({ search_term: 'ai', date_from: 20240101 })).toBe(
      'date_from must be a string'
    )
  })
})
