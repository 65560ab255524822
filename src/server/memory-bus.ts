/**
 * In-memory bus for single-process deployments.
 * For multiple instances, implement `Bus` over a shared broker instead.
 *
 * @example
 * ```typescript
 * const bus = createMemoryBus()
 *
 * // In the SSE route
 * await stream(transport, { bus, topics: ['time'] })
 *
 * // Anywhere else
 * await publish(bus, 'time', '01:34:55.123567')
 * ```
 */

import type { Chunk } from '../types/chunk'
import type { Bus, Subscriber, Topic } from './bus'
import { BusClosedError } from './bus'

export interface MemoryBusConfig {
  /** Custom logger function */
  logger?: (message: string, ...args: unknown[]) => void
}

export class MemoryBus implements Bus {
  private readonly subscriptions = new Map<Topic, Map<string, Subscriber>>()
  private readonly logger: (message: string, ...args: unknown[]) => void
  private isClosed = false

  constructor(config?: MemoryBusConfig) {
    this.logger = config?.logger ?? console.log
  }

  subscribe(topic: Topic, subscriber: Subscriber): void {
    if (this.isClosed) {
      throw new BusClosedError(topic)
    }

    let subscribers = this.subscriptions.get(topic)
    if (!subscribers) {
      subscribers = new Map()
      this.subscriptions.set(topic, subscribers)
    }
    subscribers.set(subscriber.id, subscriber)
  }

  unsubscribe(topic: Topic, subscriberId: string): void {
    const subscribers = this.subscriptions.get(topic)
    if (!subscribers) return

    subscribers.delete(subscriberId)
    if (subscribers.size === 0) {
      this.subscriptions.delete(topic)
    }
  }

  /**
   * Deliver a chunk to the current subscribers of a topic, in
   * subscription order. A failing subscriber does not affect the others.
   */
  publish(topic: Topic, chunk: Chunk): void {
    if (this.isClosed) {
      throw new BusClosedError(topic)
    }

    const subscribers = this.subscriptions.get(topic)
    if (!subscribers) return

    for (const subscriber of [...subscribers.values()]) {
      try {
        subscriber.deliver(topic, chunk)
      } catch (error) {
        this.logger('[memory-bus] Delivery failed:', topic, subscriber.id, error)
      }
    }
  }

  /**
   * Tear the bus down. Every subscriber is notified once and further
   * subscribe or publish calls throw `BusClosedError`.
   */
  close(): void {
    if (this.isClosed) return
    this.isClosed = true

    const notified = new Set<string>()
    for (const subscribers of this.subscriptions.values()) {
      for (const subscriber of subscribers.values()) {
        if (notified.has(subscriber.id)) continue
        notified.add(subscriber.id)
        subscriber.close?.()
      }
    }
    this.subscriptions.clear()
  }

  get closed(): boolean {
    return this.isClosed
  }

  /**
   * Number of subscribers on a topic, or across all topics.
   */
  subscriberCount(topic?: Topic): number {
    if (topic !== undefined) {
      return this.subscriptions.get(topic)?.size ?? 0
    }
    let total = 0
    for (const subscribers of this.subscriptions.values()) {
      total += subscribers.size
    }
    return total
  }

  topics(): Topic[] {
    return [...this.subscriptions.keys()]
  }
}

export function createMemoryBus(config?: MemoryBusConfig): MemoryBus {
  return new MemoryBus(config)
}
