/**
 * Chunk construction and validation.
 *
 * `buildChunk` is the only place a chunk kind is validated: after it returns,
 * the kind is a closed tagged variant and cannot be invalid.
 *
 * @example
 * ```typescript
 * buildChunk('01:34:55', 'message')
 * // { data: '01:34:55', kind: { type: 'message' } }
 *
 * buildChunk(['a', 'b'], 'event', 'tick', { id: '42' })
 * // { data: ['a', 'b'], kind: { type: 'event', name: 'tick' }, id: '42' }
 * ```
 */

import type { Chunk, ChunkData, ChunkKind, ChunkOptions } from '../types/chunk'

const LINE_BREAK = /[\r\n]/
const ID_FORBIDDEN = /[\r\n\0]/
const LINE_TERMINATOR = /\r\n|\r|\n/

/**
 * Error thrown when a chunk is built with an unknown kind.
 */
export class InvalidChunkKindError extends Error {
  public readonly kind: unknown

  constructor(kind: unknown) {
    super(`Unknown chunk kind: ${String(kind)}`)
    this.name = 'InvalidChunkKindError'
    this.kind = kind
  }
}

/**
 * Error thrown for a malformed chunk (missing data, bad field values).
 */
export class InvalidChunkError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidChunkError'
  }
}

export function isInvalidChunkKindError(error: unknown): error is InvalidChunkKindError {
  return error instanceof InvalidChunkKindError
}

export function isInvalidChunkError(error: unknown): error is InvalidChunkError {
  return error instanceof InvalidChunkError
}

/**
 * Build an immutable chunk from a payload and a kind name.
 *
 * @throws InvalidChunkKindError when `kind` is neither `message` nor `event`
 * @throws InvalidChunkError when the payload, event name, id or retry is malformed
 */
export function buildChunk(
  payload: ChunkData,
  kind: string,
  eventName?: string | null,
  options?: ChunkOptions
): Chunk {
  let chunkKind: ChunkKind
  switch (kind) {
    case 'message':
      chunkKind = { type: 'message' }
      break
    case 'event':
      chunkKind = { type: 'event', name: checkEventName(eventName) }
      break
    default:
      throw new InvalidChunkKindError(kind)
  }

  return freezeChunk(checkData(payload), chunkKind, options ?? {})
}

/**
 * Structural check for a chunk received from somewhere untyped.
 */
export function isChunk(value: unknown): value is Chunk {
  if (!isRecord(value)) return false
  if (!isChunkData(value.data) || !isChunkKind(value.kind)) return false
  if (value.id !== undefined && (typeof value.id !== 'string' || ID_FORBIDDEN.test(value.id))) {
    return false
  }
  if (value.retry !== undefined && !isRetry(value.retry)) return false
  return true
}

/**
 * Turn an opaque bus delivery into a chunk.
 *
 * @throws InvalidChunkError when the message is not a well-formed chunk
 */
export function decodeChunk(message: unknown): Chunk {
  if (isChunk(message)) return message

  if (isRecord(message) && (message.data === null || message.data === undefined)) {
    throw new InvalidChunkError('Chunk data must not be null')
  }
  throw new InvalidChunkError('Delivered message is not a chunk')
}

/**
 * Data lines of a chunk, with embedded line terminators split into
 * their own lines.
 */
export function chunkLines(data: ChunkData): string[] {
  const elements = typeof data === 'string' ? [data] : data
  return elements.flatMap((element) => element.split(LINE_TERMINATOR))
}

function checkData(payload: unknown): ChunkData {
  if (payload === null || payload === undefined) {
    throw new InvalidChunkError('Chunk data must not be null')
  }
  if (!isChunkData(payload)) {
    throw new InvalidChunkError('Chunk data must be a string or a list of strings')
  }
  return payload
}

function checkEventName(name: string | null | undefined): string {
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidChunkError('Event chunks require an event name')
  }
  if (LINE_BREAK.test(name)) {
    throw new InvalidChunkError('Event name must not contain line breaks')
  }
  return name
}

function freezeChunk(data: ChunkData, kind: ChunkKind, options: ChunkOptions): Chunk {
  if (options.id !== undefined && ID_FORBIDDEN.test(options.id)) {
    throw new InvalidChunkError('Event id must not contain line breaks or NUL')
  }
  if (options.retry !== undefined && !isRetry(options.retry)) {
    throw new InvalidChunkError(`Retry must be a non-negative integer, got ${options.retry}`)
  }

  return Object.freeze({
    data: typeof data === 'string' ? data : Object.freeze([...data]),
    kind: Object.freeze(kind),
    ...(options.id !== undefined && { id: options.id }),
    ...(options.retry !== undefined && { retry: options.retry }),
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isChunkData(value: unknown): value is ChunkData {
  if (typeof value === 'string') return true
  return Array.isArray(value) && value.every((line) => typeof line === 'string')
}

function isChunkKind(value: unknown): value is ChunkKind {
  if (!isRecord(value)) return false
  if (value.type === 'message') return true
  return (
    value.type === 'event' &&
    typeof value.name === 'string' &&
    value.name.length > 0 &&
    !LINE_BREAK.test(value.name)
  )
}

function isRetry(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
}
