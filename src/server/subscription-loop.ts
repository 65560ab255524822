/**
 * Subscription Loop
 *
 * Owns one SSE connection from the moment its topics are known until it
 * closes, relaying every chunk published on any of its topics as SSE frames.
 *
 * States: idle -> subscribing -> streaming -> draining -> closed
 *
 * While streaming, the loop waits on a single inbox that merges bus
 * deliveries, heartbeat ticks, transport closure and shutdown signals, so
 * there is exactly one writer per connection and no polling. Chunks from one
 * topic keep their publish order; chunks from different topics are
 * interleaved in arrival order.
 *
 * Every exit path unsubscribes from the bus before `run()` settles.
 *
 * @example
 * ```typescript
 * const { stream: body, transport } = createStreamTransport()
 * const done = stream(transport, { bus, topics: ['orders', 'alerts'] }, undefined, {
 *   signal: request.signal,
 * })
 * ```
 */

import type { Chunk } from '../types/chunk'
import type { HeartbeatConfig } from '../types/stream-config'
import { DEFAULT_HEARTBEAT_CONFIG } from '../types/stream-config'
import type { Bus, Subscriber, Topic, TopicSubscription } from './bus'
import { InvalidChunkError, decodeChunk } from './chunk'
import type { CloseCause } from './inbox'
import { Inbox } from './inbox'
import { encodeChunk, encodeText, formatComment } from './sse-encoder'
import type { Transport } from './transport'

export type { CloseCause } from './inbox'

export type LoopState = 'idle' | 'subscribing' | 'streaming' | 'draining' | 'closed'

/**
 * Observability hooks for loop lifecycle events.
 */
export interface LoopObserver {
  onStateChange?: (from: LoopState, to: LoopState) => void

  /** Called once every topic is subscribed */
  onSubscribed?: (topics: readonly Topic[]) => void

  /** Called per chunk written; topic is null for the initial chunk */
  onChunkSent?: (topic: Topic | null, bytesSent: number) => void

  onHeartbeat?: () => void

  /** Called when unsubscribing fails during draining */
  onUnsubscribeError?: (topic: Topic, error: Error) => void

  /**
   * Called when the bus refuses a topic. The loop then drains and `run()`
   * rejects with the same error; `onClose` is not called.
   */
  onSubscribeError?: (topic: Topic, error: unknown) => void

  /** Called after the loop reaches `closed`, when `run()` resolves */
  onClose?: (cause: CloseCause, durationMs: number) => void
}

/**
 * Something that can tell many loops to shut down at once.
 */
export interface LoopSupervisor {
  readonly signal: AbortSignal
  register(loop: SubscriptionLoop): void
  unregister(loop: SubscriptionLoop): void
}

export interface SubscriptionLoopConfig {
  heartbeat?: Partial<HeartbeatConfig>

  /** Written once, before any bus delivery */
  initialChunk?: Chunk

  /** Subscriber identity on the bus (default: random UUID) */
  id?: string

  /** Custom logger function */
  logger?: (message: string, ...args: unknown[]) => void

  /** Observability hooks for metrics/tracing */
  observer?: LoopObserver

  /** Abort signal for shutdown (e.g. process-wide shutdown) */
  signal?: AbortSignal

  /** Registry draining all loops on shutdown */
  supervisor?: LoopSupervisor
}

export interface LoopResult {
  cause: CloseCause
  durationMs: number
  bytesSent: number
  chunksSent: number
}

interface ResolvedConfig {
  heartbeat: HeartbeatConfig
  initialChunk?: Chunk
  logger: (message: string, ...args: unknown[]) => void
  observer: LoopObserver
  signal?: AbortSignal
  supervisor?: LoopSupervisor
}

export class SubscriptionLoop {
  readonly id: string
  readonly topics: readonly Topic[]

  /** Resolves once the loop reaches `closed`, whatever the outcome */
  readonly finished: Promise<void>

  private readonly transport: Transport
  private readonly bus: Bus
  private readonly config: ResolvedConfig
  private readonly inbox = new Inbox()
  private readonly subscribed: Topic[] = []
  private readonly heartbeatFrame: Uint8Array
  private state: LoopState = 'idle'
  private startTime = 0
  private bytesSent = 0
  private chunksSent = 0
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null
  private detachers: Array<() => void> = []
  private resolveFinished: () => void = () => {}

  constructor(transport: Transport, subscription: TopicSubscription, config?: SubscriptionLoopConfig) {
    this.transport = transport
    this.bus = subscription.bus
    this.topics = [...new Set(subscription.topics)]
    this.id = config?.id ?? crypto.randomUUID()
    this.config = {
      heartbeat: { ...DEFAULT_HEARTBEAT_CONFIG, ...config?.heartbeat },
      initialChunk: config?.initialChunk,
      logger: config?.logger ?? console.log,
      observer: { ...config?.observer },
      signal: config?.signal,
      supervisor: config?.supervisor,
    }
    this.heartbeatFrame = encodeText(formatComment(this.config.heartbeat.message))
    this.finished = new Promise<void>((resolve) => {
      this.resolveFinished = resolve
    })
  }

  /**
   * Run the loop until the connection ends.
   *
   * Resolves with the cause that ended streaming. Rejects only when the bus
   * refuses a subscription; the bus error is passed through unchanged.
   */
  async run(): Promise<LoopResult> {
    if (this.state !== 'idle') {
      throw new Error('Subscription loop has already been started')
    }

    this.startTime = Date.now()
    this.config.supervisor?.register(this)
    this.attachInterrupts()

    let cause: CloseCause
    try {
      cause = await this.subscribeAndStream()
    } catch (error) {
      await this.drain()
      throw error
    }
    await this.drain()

    const durationMs = Date.now() - this.startTime
    this.config.observer.onClose?.(cause, durationMs)

    return {
      cause,
      durationMs,
      bytesSent: this.bytesSent,
      chunksSent: this.chunksSent,
    }
  }

  /**
   * Stop streaming from server-side code.
   */
  abort(reason: unknown = 'Subscription loop aborted'): void {
    this.inbox.interrupt({ type: 'shutdown_requested', reason })
  }

  get currentState(): LoopState {
    return this.state
  }

  getMetrics(): {
    state: LoopState
    durationMs: number
    bytesSent: number
    chunksSent: number
    queued: number
  } {
    return {
      state: this.state,
      durationMs: this.startTime === 0 ? 0 : Date.now() - this.startTime,
      bytesSent: this.bytesSent,
      chunksSent: this.chunksSent,
      queued: this.inbox.size,
    }
  }

  private attachInterrupts(): void {
    const onTransportClosed = () => this.inbox.interrupt({ type: 'client_disconnected' })
    if (this.transport.isClosed()) {
      onTransportClosed()
    } else {
      void this.transport.closed.then(onTransportClosed, onTransportClosed)
    }

    for (const signal of [this.config.signal, this.config.supervisor?.signal]) {
      if (!signal) continue

      const onAbort = () => this.inbox.interrupt({ type: 'shutdown_requested', reason: signal.reason })
      if (signal.aborted) {
        onAbort()
        continue
      }
      signal.addEventListener('abort', onAbort, { once: true })
      this.detachers.push(() => signal.removeEventListener('abort', onAbort))
    }
  }

  private async subscribeAndStream(): Promise<CloseCause> {
    this.transition('subscribing')

    const subscriber: Subscriber = {
      id: this.id,
      deliver: (topic, message) => this.inbox.push({ type: 'delivery', topic, message }),
      close: () => this.inbox.interrupt({ type: 'shutdown_requested', reason: 'Bus closed' }),
    }

    for (const topic of this.topics) {
      try {
        await this.bus.subscribe(topic, subscriber)
      } catch (error) {
        this.config.observer.onSubscribeError?.(topic, error)
        throw error
      }
      this.subscribed.push(topic)
    }
    this.config.observer.onSubscribed?.(this.topics)

    this.transition('streaming')
    this.startHeartbeat()

    return this.pump()
  }

  private async pump(): Promise<CloseCause> {
    if (this.config.initialChunk) {
      const failure = await this.relay(null, this.config.initialChunk)
      if (failure) return failure
    }

    while (true) {
      const item = await this.inbox.next()
      if (item.type === 'interrupt') return item.cause

      const failure = item.type === 'heartbeat'
        ? await this.writeHeartbeat()
        : await this.relay(item.topic, item.message)
      if (failure) return failure
    }
  }

  private async relay(topic: Topic | null, message: unknown): Promise<CloseCause | null> {
    let bytes: Uint8Array
    try {
      bytes = encodeChunk(decodeChunk(message))
    } catch (error) {
      if (!(error instanceof InvalidChunkError)) throw error
      this.config.logger('[subscription-loop] Invalid chunk, closing connection:', topic, error.message)
      return { type: 'invalid_chunk', error, topic: topic ?? '' }
    }

    const failure = await this.write(bytes)
    if (failure) return failure

    this.chunksSent++
    this.config.observer.onChunkSent?.(topic, bytes.length)
    return null
  }

  private async writeHeartbeat(): Promise<CloseCause | null> {
    const failure = await this.write(this.heartbeatFrame)
    if (!failure) {
      this.config.observer.onHeartbeat?.()
    }
    return failure
  }

  /**
   * Write bytes, giving up early if an interrupt arrives while the
   * transport is still waiting on the client.
   */
  private async write(bytes: Uint8Array): Promise<CloseCause | null> {
    if (this.transport.isClosed()) {
      return { type: 'client_disconnected' }
    }

    let pending: Promise<void>
    try {
      pending = this.transport.write(bytes)
    } catch (error) {
      return this.writeFailure(error)
    }

    const outcome = await new Promise<CloseCause | null>((resolve) => {
      const detach = this.inbox.onInterrupt(resolve)
      void pending.then(
        () => {
          detach()
          resolve(null)
        },
        (error: unknown) => {
          detach()
          resolve(this.writeFailure(error))
        }
      )
    })

    if (outcome === null) {
      this.bytesSent += bytes.length
    }
    return outcome
  }

  private writeFailure(error: unknown): CloseCause {
    if (this.transport.isClosed()) {
      return { type: 'client_disconnected' }
    }

    const cause = error instanceof Error ? error : new Error(String(error))
    this.config.logger('[subscription-loop] Write failed, closing connection:', cause.message)
    return { type: 'transport_write_failed', error: cause }
  }

  private startHeartbeat(): void {
    const { enabled, intervalMs } = this.config.heartbeat
    if (!enabled || this.heartbeatInterval) return

    this.heartbeatInterval = setInterval(() => {
      this.inbox.push({ type: 'heartbeat' })
    }, intervalMs)
  }

  private stopHeartbeat(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval)
      this.heartbeatInterval = null
    }
  }

  private async drain(): Promise<void> {
    this.transition('draining')
    this.stopHeartbeat()

    for (const detach of this.detachers) {
      detach()
    }
    this.detachers = []

    for (const topic of this.subscribed.splice(0)) {
      try {
        await this.bus.unsubscribe(topic, this.id)
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error))
        this.config.logger('[subscription-loop] Unsubscribe failed:', topic, cause.message)
        this.config.observer.onUnsubscribeError?.(topic, cause)
      }
    }

    this.transition('closed')
    this.config.supervisor?.unregister(this)
    this.resolveFinished()
  }

  private transition(to: LoopState): void {
    const from = this.state
    this.state = to
    this.config.observer.onStateChange?.(from, to)
  }
}

/**
 * Stream every chunk published on the given topics to one connection,
 * until the connection closes or shutdown is requested.
 */
export function stream(
  transport: Transport,
  subscription: TopicSubscription,
  initialChunk?: Chunk,
  config?: Omit<SubscriptionLoopConfig, 'initialChunk'>
): Promise<LoopResult> {
  return new SubscriptionLoop(transport, subscription, { ...config, initialChunk }).run()
}
