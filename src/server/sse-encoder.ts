/**
 * SSE Encoder
 *
 * Pure translation of a chunk into its SSE wire frame.
 *
 * Frame layout:
 * ```
 * id: <id>            (only when the chunk has an id)
 * retry: <ms>         (only when the chunk has a retry hint)
 * event: <name>       (only for event chunks)
 * data: <line-1>
 * data: <line-n>      (one per data line, in order)
 *                     (terminating blank line)
 * ```
 *
 * Data elements containing line terminators are split into separate
 * `data:` lines, otherwise the client would see a truncated field.
 *
 * @see https://html.spec.whatwg.org/multipage/server-sent-events.html
 *
 * @example
 * ```typescript
 * formatChunk(buildChunk(['a', 'b'], 'event', 'tick'))
 * // 'event: tick\ndata: a\ndata: b\n\n'
 * ```
 */

import type { Chunk } from '../types/chunk'
import { InvalidChunkError, chunkLines, isChunk } from './chunk'

const encoder = new TextEncoder()

/**
 * Format a chunk as an SSE frame string.
 *
 * @throws InvalidChunkError when the chunk has no data or is malformed
 */
export function formatChunk(chunk: Chunk): string {
  if (chunk.data === null || chunk.data === undefined) {
    throw new InvalidChunkError('Chunk data must not be null')
  }
  if (!isChunk(chunk)) {
    throw new InvalidChunkError('Cannot encode a malformed chunk')
  }

  const lines: string[] = []

  if (chunk.id !== undefined) {
    lines.push(`id: ${chunk.id}`)
  }

  if (chunk.retry !== undefined) {
    lines.push(`retry: ${chunk.retry}`)
  }

  if (chunk.kind.type === 'event') {
    lines.push(`event: ${chunk.kind.name}`)
  }

  for (const line of chunkLines(chunk.data)) {
    lines.push(`data: ${line}`)
  }

  return lines.map((line) => `${line}\n`).join('') + '\n'
}

/**
 * Encode a chunk as UTF-8 frame bytes.
 */
export function encodeChunk(chunk: Chunk): Uint8Array {
  return encoder.encode(formatChunk(chunk))
}

/**
 * Format an SSE comment frame.
 * Comments start with ':' and keep idle connections alive.
 */
export function formatComment(message = 'heartbeat'): string {
  return `: [${message}]\n\n`
}

/**
 * Format a standalone retry field.
 * Clients will wait this long before reconnecting.
 */
export function formatRetry(retryMs: number): string {
  return `retry: ${retryMs}\n\n`
}

export function encodeText(frame: string): Uint8Array {
  return encoder.encode(frame)
}
