/**
 * Response helpers for SSE routes.
 *
 * @example Route handler returning a `Response`
 * ```typescript
 * export async function GET(request: Request) {
 *   const topics = topicsFromUrl(request.url)
 *   const { response, done } = createTopicStreamResponse({ bus, topics }, {
 *     signal: request.signal,
 *   })
 *   done.catch((error) => console.error('SSE subscription failed', error))
 *   return response
 * }
 * ```
 *
 * @example Node http / Express
 * ```typescript
 * app.get('/sse', async (req, res) => {
 *   await serveTopicStream(res, { bus, topics: parseTopics(req.query.topics) })
 * })
 * ```
 */

import type { ServerResponse } from 'node:http'
import type { Chunk } from '../types/chunk'
import type { TransportConfig } from '../types/stream-config'
import type { TopicSubscription } from './bus'
import type { LoopResult, SubscriptionLoopConfig } from './subscription-loop'
import { stream } from './subscription-loop'
import { createNodeTransport, createStreamTransport } from './transport'

/**
 * Standard SSE response headers.
 */
export const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
  'X-Accel-Buffering': 'no', // Disable nginx buffering
}

export interface TopicStreamOptions extends Omit<SubscriptionLoopConfig, 'initialChunk'> {
  /** Written once, before any bus delivery */
  initialChunk?: Chunk

  /** Extra response headers */
  headers?: Record<string, string>

  /** Buffering of the response body stream */
  transport?: Partial<TransportConfig>
}

/**
 * Create Response object with proper SSE headers.
 */
export function createSSEResponse(
  body: ReadableStream<Uint8Array>,
  additionalHeaders?: Record<string, string>
): Response {
  const headers: Record<string, string> = {
    ...SSE_HEADERS,
    ...additionalHeaders,
  }

  return new Response(body, { headers })
}

/**
 * Start a subscription loop behind a streaming `Response`.
 * The response body ends once the loop closes.
 */
export function createTopicStreamResponse(
  subscription: TopicSubscription,
  options: TopicStreamOptions = {}
): { response: Response; done: Promise<LoopResult> } {
  const { initialChunk, headers, transport: transportConfig, ...loopConfig } = options
  const { stream: body, transport } = createStreamTransport(transportConfig)

  const done = stream(transport, subscription, initialChunk, loopConfig).finally(() => {
    transport.end()
  })

  return { response: createSSEResponse(body, headers), done }
}

/**
 * Serve a subscription loop on a Node response, ending the response
 * once the loop closes.
 */
export async function serveTopicStream(
  res: ServerResponse,
  subscription: TopicSubscription,
  options: Omit<TopicStreamOptions, 'transport'> = {}
): Promise<LoopResult> {
  const { initialChunk, headers, ...loopConfig } = options

  res.writeHead(200, { ...SSE_HEADERS, ...headers })
  res.flushHeaders()

  const transport = createNodeTransport(res)
  try {
    return await stream(transport, subscription, initialChunk, loopConfig)
  } finally {
    transport.end()
  }
}
