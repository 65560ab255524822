/**
 * Publisher
 *
 * Fire-and-forget publishing onto a bus. No acknowledgment, no retry and no
 * local state: bus errors reach the caller unchanged.
 */

import type { Chunk, ChunkData, ChunkOptions } from '../types/chunk'
import type { Bus, Topic } from './bus'
import { buildChunk } from './chunk'

/**
 * Send a chunk to every current subscriber of a topic.
 */
export async function broadcast(bus: Bus, topic: Topic, chunk: Chunk): Promise<void> {
  await bus.publish(topic, chunk)
}

/**
 * Build a chunk and broadcast it.
 *
 * @example
 * ```typescript
 * await publish(bus, 'clock', '01:34:55')
 * await publish(bus, 'clock', ['01:34', '55'], 'event', 'time')
 * ```
 *
 * @throws InvalidChunkKindError when `kind` is unknown; nothing is published
 */
export async function publish(
  bus: Bus,
  topic: Topic,
  payload: ChunkData,
  kind = 'message',
  eventName?: string,
  options?: ChunkOptions
): Promise<void> {
  const chunk = buildChunk(payload, kind, eventName, options)
  await broadcast(bus, topic, chunk)
}
