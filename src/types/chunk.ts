/**
 * Chunk Types
 *
 * A chunk is one SSE payload before wire encoding. Publishers build chunks,
 * the bus carries them, and every subscription loop encodes them for its
 * own connection.
 *
 * @see https://html.spec.whatwg.org/multipage/server-sent-events.html
 */

/**
 * Chunk payload: a single line, or an ordered list of lines.
 * Each line becomes one `data:` field of the same event.
 */
export type ChunkData = string | readonly string[]

/**
 * Chunk kind. An untyped chunk is dispatched as `message` by browsers.
 */
export type ChunkKind =
  | { type: 'message' }
  | { type: 'event'; name: string }

export interface Chunk {
  readonly data: ChunkData

  readonly kind: ChunkKind

  /** Event ID, echoed back by clients in Last-Event-ID on reconnection */
  readonly id?: string

  /** Reconnection time hint in milliseconds */
  readonly retry?: number
}

/**
 * Optional SSE fields for a chunk.
 */
export interface ChunkOptions {
  id?: string
  retry?: number
}
