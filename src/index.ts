/**
 * topic-sse - Server-Sent Events over a publish/subscribe bus
 *
 * Publishers send chunks to named topics; every open SSE connection
 * subscribed to a topic receives them as SSE frames.
 *
 * @example Server-side
 * ```typescript
 * import { createMemoryBus, createTopicStreamResponse, publish, topicsFromUrl } from 'topic-sse/server'
 *
 * const bus = createMemoryBus()
 *
 * export async function GET(request: Request) {
 *   const { response, done } = createTopicStreamResponse(
 *     { bus, topics: topicsFromUrl(request.url) },
 *     { signal: request.signal }
 *   )
 *   done.catch((error) => console.error(error))
 *   return response
 * }
 *
 * await publish(bus, 'time', new Date().toISOString(), 'event', 'tick')
 * ```
 *
 * @example Client-side
 * ```typescript
 * import { useTopicStream } from 'topic-sse/client'
 *
 * function Clock() {
 *   const { events } = useTopicStream({ endpoint: '/sse', topics: ['time'] })
 *   return <p>{events.at(-1)?.data}</p>
 * }
 * ```
 */

// Types
export * from './types/chunk'
export * from './types/stream-config'

// Server
export * from './server'

// Client
export * from './client'
