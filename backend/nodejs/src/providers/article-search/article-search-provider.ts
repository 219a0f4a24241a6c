import { ArticleSearchQuery } from './article-search-dto.js'

export interface ArticleSearchProvider {
  /**
   * Runs one search and returns the raw result items, newest first, never
   * more than `SEARCH_PAGE_SIZE` of them. Items are not validated.
   */
  searchArticles(query: ArticleSearchQuery): Promise<unknown[]>
}
