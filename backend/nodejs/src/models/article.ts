import { z } from 'zod'

const httpUrl = z
  .string()
  .url()
  .refine((value) => {
    try {
      const { protocol } = new URL(value)
      return protocol === 'http:' || protocol === 'https:'
    } catch {
      return false
    }
  }, 'must be an http(s) URL')

export const articleRecordSchema = z.object({
  webPublicationDate: z.string().datetime(),
  webTitle: z.string().refine((title) => title.trim().length > 0, {
    message: 'must not be empty'
  }),
  webUrl: httpUrl
})

/** One article as read from the search API and as written to the stream. */
export type ArticleRecord = Readonly<z.infer<typeof articleRecordSchema>>

export interface ShapedArticles {
  articles: ArticleRecord[]
  droppedCount: number
}

/**
 * Projects raw search results onto the three published fields. Items that
 * fail validation are counted and left out; input order is kept.
 */
export function shapeArticles(rawItems: readonly unknown[]): ShapedArticles {
  const articles: ArticleRecord[] = []
  let droppedCount = 0

  for (const item of rawItems) {
    const parsed = articleRecordSchema.safeParse(item)
    if (parsed.success) {
      articles.push(Object.freeze(parsed.data))
    } else {
      droppedCount++
    }
  }

  return { articles, droppedCount }
}

export function serializeArticle(article: ArticleRecord): string {
  return JSON.stringify({
    webPublicationDate: article.webPublicationDate,
    webTitle: article.webTitle,
    webUrl: article.webUrl
  })
}
