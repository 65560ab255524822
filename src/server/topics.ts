/**
 * Topic list parsing for SSE routes.
 *
 * Routes usually receive topics as a comma-separated query parameter:
 * `GET /sse?topics=orders,alerts`.
 */

import type { Topic } from './bus'

/**
 * Split comma-separated topic values into distinct, trimmed topic names.
 * Missing values yield an empty list.
 */
export function parseTopics(value: string | readonly string[] | null | undefined): Topic[] {
  if (value === null || value === undefined) return []

  const values = typeof value === 'string' ? [value] : value
  const topics = values
    .flatMap((entry) => entry.split(','))
    .map((topic) => topic.trim())
    .filter((topic) => topic.length > 0)

  return [...new Set(topics)]
}

/**
 * Read topics from a request URL. Repeated parameters are merged.
 */
export function topicsFromUrl(url: string | URL, param = 'topics'): Topic[] {
  const parsed = typeof url === 'string' ? new URL(url, 'http://localhost') : url
  return parseTopics(parsed.searchParams.getAll(param))
}
