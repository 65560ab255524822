import { describe, it, expect } from 'vitest'
import {
  buildChunk,
  decodeChunk,
  isChunk,
  chunkLines,
  InvalidChunkKindError,
  InvalidChunkError,
  isInvalidChunkKindError,
  isInvalidChunkError,
} from '../src/server/chunk'
import type { ChunkData } from '../src/types/chunk'

describe('buildChunk', () => {
  describe('message kind', () => {
    it('builds an untyped chunk from a single line', () => {
      const chunk = buildChunk('hello', 'message')

      expect(chunk).toEqual({ data: 'hello', kind: { type: 'message' } })
    })

    it('ignores the event name', () => {
      const chunk = buildChunk('hello', 'message', 'tick')

      expect(chunk.kind).toEqual({ type: 'message' })
    })

    it('never fails for valid payloads', () => {
      const payloads: ChunkData[] = ['', 'x', [], ['a'], ['a', 'b', 'c'], 'multi\nline']

      for (const payload of payloads) {
        const chunk = buildChunk(payload, 'message', 'ignored')
        expect(chunk.kind.type).toBe('message')
        expect(chunk.data).toEqual(payload)
      }
    })
  })

  describe('event kind', () => {
    it('uses the supplied event name', () => {
      const chunk = buildChunk(['a', 'b'], 'event', 'tick')

      expect(chunk).toEqual({ data: ['a', 'b'], kind: { type: 'event', name: 'tick' } })
    })

    it('keeps each caller supplied name', () => {
      for (const name of ['time', 'order.created', 'x']) {
        expect(buildChunk('data', 'event', name).kind).toEqual({ type: 'event', name })
      }
    })

    it('requires an event name', () => {
      expect(() => buildChunk('data', 'event')).toThrow(InvalidChunkError)
      expect(() => buildChunk('data', 'event', '')).toThrow('Event chunks require an event name')
      expect(() => buildChunk('data', 'event', null)).toThrow(InvalidChunkError)
    })

    it('rejects event names with line breaks', () => {
      expect(() => buildChunk('data', 'event', 'a\nb')).toThrow('Event name must not contain line breaks')
    })
  })

  describe('unknown kind', () => {
    it('throws InvalidChunkKindError carrying the kind', () => {
      let caught: unknown
      try {
        buildChunk('data', 'broadcast', 'x')
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(InvalidChunkKindError)
      expect(isInvalidChunkKindError(caught)).toBe(true)
      if (caught instanceof InvalidChunkKindError) {
        expect(caught.kind).toBe('broadcast')
        expect(caught.message).toBe('Unknown chunk kind: broadcast')
        expect(caught.name).toBe('InvalidChunkKindError')
      }
    })

    it('is case sensitive', () => {
      expect(() => buildChunk('data', 'Message')).toThrow(InvalidChunkKindError)
    })
  })

  describe('data validation', () => {
    it('rejects null data', () => {
      const payload: unknown = null
      expect(() => buildChunk(payload as ChunkData, 'message')).toThrow('Chunk data must not be null')
    })

    it('rejects non-string lines', () => {
      const payload: unknown = ['a', 1]
      expect(() => buildChunk(payload as ChunkData, 'message')).toThrow(
        'Chunk data must be a string or a list of strings'
      )
    })
  })

  describe('id and retry', () => {
    it('adds id and retry when given', () => {
      const chunk = buildChunk('x', 'message', undefined, { id: '7', retry: 3000 })

      expect(chunk.id).toBe('7')
      expect(chunk.retry).toBe(3000)
    })

    it('rejects ids with line breaks', () => {
      expect(() => buildChunk('x', 'message', undefined, { id: '1\n2' })).toThrow(InvalidChunkError)
    })

    it('rejects negative or fractional retry values', () => {
      expect(() => buildChunk('x', 'message', undefined, { retry: -1 })).toThrow(InvalidChunkError)
      expect(() => buildChunk('x', 'message', undefined, { retry: 1.5 })).toThrow(InvalidChunkError)
    })
  })

  it('returns a frozen chunk with a copied data list', () => {
    const lines = ['a', 'b']
    const chunk = buildChunk(lines, 'message')
    lines.push('c')

    expect(Object.isFrozen(chunk)).toBe(true)
    expect(Object.isFrozen(chunk.data)).toBe(true)
    expect(chunk.data).toEqual(['a', 'b'])
  })
})

describe('isChunk', () => {
  it('accepts built chunks', () => {
    expect(isChunk(buildChunk('x', 'event', 'e', { id: '1' }))).toBe(true)
  })

  it('rejects values that are not chunks', () => {
    expect(isChunk(null)).toBe(false)
    expect(isChunk('data: x')).toBe(false)
    expect(isChunk({ data: 'x' })).toBe(false)
    expect(isChunk({ data: 'x', kind: { type: 'event' } })).toBe(false)
    expect(isChunk({ data: 'x', kind: { type: 'other' } })).toBe(false)
    expect(isChunk({ data: ['x', 2], kind: { type: 'message' } })).toBe(false)
  })
})

describe('decodeChunk', () => {
  it('returns chunks unchanged', () => {
    const chunk = buildChunk('x', 'message')
    expect(decodeChunk(chunk)).toBe(chunk)
  })

  it('reports null data', () => {
    expect(() => decodeChunk({ data: null, kind: { type: 'message' } })).toThrow('Chunk data must not be null')
  })

  it('reports other messages as not a chunk', () => {
    expect(() => decodeChunk({ payload: 'x' })).toThrow('Chunk data must not be null')
    expect(() => decodeChunk(42)).toThrow('Delivered message is not a chunk')
  })

  it('throws InvalidChunkError', () => {
    let caught: unknown
    try {
      decodeChunk('text')
    } catch (error) {
      caught = error
    }
    expect(isInvalidChunkError(caught)).toBe(true)
  })
})

describe('chunkLines', () => {
  it('wraps a single line', () => {
    expect(chunkLines('hello')).toEqual(['hello'])
  })

  it('keeps line order', () => {
    expect(chunkLines(['a', 'b', 'c'])).toEqual(['a', 'b', 'c'])
  })

  it('splits embedded line terminators', () => {
    expect(chunkLines('a\nb')).toEqual(['a', 'b'])
    expect(chunkLines(['a\r\nb', 'c\rd'])).toEqual(['a', 'b', 'c', 'd'])
  })

  it('returns no lines for an empty list', () => {
    expect(chunkLines([])).toEqual([])
  })
})
