/**
 * Topic Stream Client
 *
 * Subscribes to an SSE topic endpoint with fetch() and keeps the
 * subscription alive the way EventSource does: when the server ends the
 * stream the client reconnects, sending `Last-Event-ID` once the server has
 * assigned event ids and waiting for the server's `retry:` hint when one was
 * sent. Failed connection attempts back off exponentially.
 *
 * @example
 * ```typescript
 * const subscription = subscribeTopics({
 *   endpoint: '/sse',
 *   topics: ['orders', 'alerts'],
 *   onEvent: (event) => console.log(event.event, event.data),
 *   onReconnecting: (attempt, delayMs) => {
 *     console.log(`Reconnecting (${attempt}) in ${delayMs}ms`)
 *   },
 * })
 *
 * // Later
 * subscription.close()
 * ```
 */

import type { RetryConfig } from '../types/stream-config'
import { DEFAULT_RETRY_CONFIG, calculateBackoffDelay } from '../types/stream-config'
import type { SSEEvent } from './sse-parser'
import { SSEStreamError, parseSSEStream } from './sse-parser'

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export type TopicStreamStatus = 'connecting' | 'open' | 'reconnecting' | 'closed' | 'failed'

export interface TopicStreamOptions {
  /** SSE endpoint, absolute or relative */
  endpoint: string

  topics: readonly string[]

  /** Query parameter carrying the comma-separated topics */
  topicParam?: string

  headers?: Record<string, string>

  retry?: Partial<RetryConfig>

  /** Resume after this event id */
  lastEventId?: string

  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike

  onEvent: (event: SSEEvent) => void

  onStatusChange?: (status: TopicStreamStatus) => void

  /** Called before waiting to reconnect */
  onReconnecting?: (attempt: number, delayMs: number, error?: Error) => void

  /** Called once when the client gives up */
  onError?: (error: Error) => void
}

export interface TopicStreamHandle {
  /** Stop the subscription; no further reconnects */
  close(): void

  /** Resolves once the client has stopped, by `close()` or by giving up */
  readonly done: Promise<void>

  /** Last event id seen, sent as Last-Event-ID on reconnection */
  readonly lastEventId: string | undefined

  readonly status: TopicStreamStatus
}

/**
 * Build the subscription URL for a set of topics.
 */
export function buildTopicUrl(endpoint: string, topics: readonly string[], topicParam = 'topics'): string {
  if (topics.length === 0) return endpoint

  const separator = endpoint.includes('?') ? '&' : '?'
  return `${endpoint}${separator}${encodeURIComponent(topicParam)}=${topics.map(encodeURIComponent).join(',')}`
}

/**
 * Sleep for a duration, resolving early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }

    const onAbort = () => {
      clearTimeout(timeout)
      resolve()
    }
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)

    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Subscribe to topics on an SSE endpoint.
 */
export function subscribeTopics(options: TopicStreamOptions): TopicStreamHandle {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry }
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init))
  const url = buildTopicUrl(options.endpoint, options.topics, options.topicParam)
  const controller = new AbortController()
  const { signal } = controller

  let status: TopicStreamStatus = 'connecting'
  let lastEventId = options.lastEventId
  let serverRetryMs: number | null = null
  let failures = 0
  let attempt = 0

  const setStatus = (next: TopicStreamStatus) => {
    if (status === next) return
    status = next
    options.onStatusChange?.(next)
  }

  const connect = async (): Promise<void> => {
    const response = await fetchImpl(url, {
      method: 'GET',
      headers: {
        'Accept': 'text/event-stream',
        'Cache-Control': 'no-cache',
        ...(lastEventId !== undefined ? { 'Last-Event-ID': lastEventId } : {}),
        ...options.headers,
      },
      signal,
    })

    if (!response.ok) {
      throw new SSEStreamError(`HTTP ${response.status}`, response.status)
    }

    setStatus('open')
    failures = 0

    await parseSSEStream(
      response,
      (event) => {
        if (event.id !== undefined) {
          lastEventId = event.id
        }
        options.onEvent(event)
      },
      {
        signal,
        onRetry: (retryMs) => {
          serverRetryMs = retryMs
        },
      }
    )
  }

  const run = async (): Promise<void> => {
    options.onStatusChange?.(status)

    while (!signal.aborted) {
      let error: Error | undefined

      try {
        await connect()
      } catch (caught) {
        if (signal.aborted) break

        error = caught instanceof Error ? caught : new Error(String(caught))
        failures++

        const retryable = !(error instanceof SSEStreamError) || error.retryable
        if (!retryable || failures > config.maxRetries) {
          setStatus('failed')
          options.onError?.(error)
          return
        }
      }

      if (signal.aborted) break

      attempt++
      // The server's retry hint applies after a clean end of stream only
      const delayMs = error === undefined && serverRetryMs !== null
        ? serverRetryMs
        : calculateBackoffDelay(Math.max(failures - 1, 0), config)
      setStatus('reconnecting')
      options.onReconnecting?.(attempt, delayMs, error)
      await sleep(delayMs, signal)
    }

    setStatus('closed')
  }

  const done = run()

  return {
    close: () => controller.abort(),
    done,
    get lastEventId() {
      return lastEventId
    },
    get status() {
      return status
    },
  }
}
