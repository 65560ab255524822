/**
 * Bus contract.
 *
 * The pub/sub bus owns topic registration and fan-out. Subscription loops and
 * publishers receive a bus instance explicitly; there is no global registry.
 * Implementations must tolerate concurrent subscribe, unsubscribe and publish
 * calls from any number of loops and publishers.
 */

import type { Chunk } from '../types/chunk'

/**
 * A topic name. Opaque to this library: matching is up to the bus.
 */
export type Topic = string

/**
 * Receiving end of a subscription.
 */
export interface Subscriber {
  /** Identity used to unsubscribe; unique per connection */
  readonly id: string

  /**
   * Called by the bus for every message published on a subscribed topic.
   * The message is opaque until decoded into a chunk.
   */
  deliver(topic: Topic, message: unknown): void

  /** Called once when the bus is torn down */
  close?(): void
}

export interface Bus {
  subscribe(topic: Topic, subscriber: Subscriber): void | Promise<void>

  /** Best-effort: failures are reported, never retried */
  unsubscribe(topic: Topic, subscriberId: string): void | Promise<void>

  publish(topic: Topic, chunk: Chunk): void | Promise<void>
}

/**
 * A bus paired with the topics one connection subscribes to.
 */
export interface TopicSubscription {
  bus: Bus
  topics: readonly Topic[]
}

/**
 * Error thrown when the bus can no longer be reached.
 */
export class BusClosedError extends Error {
  public readonly topic: Topic

  constructor(topic: Topic) {
    super(`Bus is closed; cannot reach topic "${topic}"`)
    this.name = 'BusClosedError'
    this.topic = topic
  }
}

export function isBusClosedError(error: unknown): error is BusClosedError {
  return error instanceof BusClosedError
}
