import { describe, it, expect, vi } from 'vitest'
import { MemoryBus, createMemoryBus } from '../src/server/memory-bus'
import { BusClosedError, isBusClosedError, type Subscriber } from '../src/server/bus'
import { buildChunk } from '../src/server/chunk'

function recorder(id: string): Subscriber & { received: Array<[string, unknown]>; close: ReturnType<typeof vi.fn> } {
  const received: Array<[string, unknown]> = []
  return {
    id,
    received,
    deliver: (topic, message) => {
      received.push([topic, message])
    },
    close: vi.fn(),
  }
}

describe('MemoryBus', () => {
  it('delivers to every subscriber of a topic', () => {
    const bus = createMemoryBus()
    const first = recorder('first')
    const second = recorder('second')
    const chunk = buildChunk('hello', 'message')

    bus.subscribe('news', first)
    bus.subscribe('news', second)
    bus.publish('news', chunk)

    expect(first.received).toEqual([['news', chunk]])
    expect(second.received).toEqual([['news', chunk]])
  })

  it('does not deliver other topics', () => {
    const bus = new MemoryBus()
    const subscriber = recorder('s')

    bus.subscribe('news', subscriber)
    bus.publish('sports', buildChunk('goal', 'message'))

    expect(subscriber.received).toEqual([])
  })

  it('publishing to a topic without subscribers is a no-op', () => {
    const bus = new MemoryBus()
    expect(() => bus.publish('nobody', buildChunk('x', 'message'))).not.toThrow()
  })

  it('stops delivering after unsubscribe', () => {
    const bus = new MemoryBus()
    const subscriber = recorder('s')

    bus.subscribe('news', subscriber)
    bus.unsubscribe('news', 's')
    bus.publish('news', buildChunk('late', 'message'))

    expect(subscriber.received).toEqual([])
    expect(bus.subscriberCount('news')).toBe(0)
    expect(bus.topics()).toEqual([])
  })

  it('ignores unsubscribe for unknown topics and subscribers', () => {
    const bus = new MemoryBus()
    bus.subscribe('news', recorder('s'))

    expect(() => bus.unsubscribe('other', 's')).not.toThrow()
    expect(() => bus.unsubscribe('news', 'missing')).not.toThrow()
    expect(bus.subscriberCount('news')).toBe(1)
  })

  it('counts subscribers per topic and overall', () => {
    const bus = new MemoryBus()
    bus.subscribe('a', recorder('1'))
    bus.subscribe('a', recorder('2'))
    bus.subscribe('b', recorder('1'))

    expect(bus.subscriberCount('a')).toBe(2)
    expect(bus.subscriberCount('b')).toBe(1)
    expect(bus.subscriberCount()).toBe(3)
    expect(bus.topics()).toEqual(['a', 'b'])
  })

  it('keeps delivering when one subscriber throws', () => {
    const logger = vi.fn()
    const bus = new MemoryBus({ logger })
    const failure = new Error('boom')
    const healthy = recorder('healthy')

    bus.subscribe('news', {
      id: 'broken',
      deliver: () => {
        throw failure
      },
    })
    bus.subscribe('news', healthy)
    bus.publish('news', buildChunk('x', 'message'))

    expect(healthy.received).toHaveLength(1)
    expect(logger).toHaveBeenCalledWith('[memory-bus] Delivery failed:', 'news', 'broken', failure)
  })

  it('lets a subscriber unsubscribe while being delivered to', () => {
    const bus = new MemoryBus()
    const later = recorder('later')

    bus.subscribe('news', {
      id: 'once',
      deliver: () => bus.unsubscribe('news', 'once'),
    })
    bus.subscribe('news', later)
    bus.publish('news', buildChunk('x', 'message'))

    expect(later.received).toHaveLength(1)
    expect(bus.subscriberCount('news')).toBe(1)
  })

  describe('close', () => {
    it('notifies each subscriber once', () => {
      const bus = new MemoryBus()
      const subscriber = recorder('s')
      bus.subscribe('a', subscriber)
      bus.subscribe('b', subscriber)

      bus.close()
      bus.close()

      expect(subscriber.close).toHaveBeenCalledTimes(1)
      expect(bus.closed).toBe(true)
      expect(bus.subscriberCount()).toBe(0)
    })

    it('rejects subscribe and publish afterwards', () => {
      const bus = new MemoryBus()
      bus.close()

      let caught: unknown
      try {
        bus.subscribe('news', recorder('s'))
      } catch (error) {
        caught = error
      }

      expect(isBusClosedError(caught)).toBe(true)
      if (caught instanceof BusClosedError) {
        expect(caught.topic).toBe('news')
        expect(caught.message).toBe('Bus is closed; cannot reach topic "news"')
      }
      expect(() => bus.publish('news', buildChunk('x', 'message'))).toThrow(BusClosedError)
    })

    it('still accepts unsubscribe', () => {
      const bus = new MemoryBus()
      bus.subscribe('news', recorder('s'))
      bus.close()

      expect(() => bus.unsubscribe('news', 's')).not.toThrow()
    })
  })
})
