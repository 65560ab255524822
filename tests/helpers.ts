import { EventEmitter } from 'node:events'
import type { ServerResponse } from 'node:http'
import type { Chunk } from '../src/types/chunk'
import type { Bus, Subscriber } from '../src/server/bus'
import type { Transport } from '../src/server/transport'
import { TransportClosedError } from '../src/server/transport'

const decoder = new TextDecoder()

/**
 * In-memory transport recording every frame written to it.
 */
export class FakeTransport implements Transport {
  readonly frames: string[] = []
  readonly closed: Promise<void>

  /** When set, every write rejects with this error */
  failWith: Error | null = null

  private isClosedFlag = false
  private held: Array<{ resolve: () => void; reject: (error: Error) => void }> | null = null
  private resolveClosed: () => void = () => {}

  constructor() {
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve
    })
  }

  write(bytes: Uint8Array): Promise<void> {
    if (this.isClosedFlag) {
      return Promise.reject(new TransportClosedError())
    }
    if (this.failWith) {
      return Promise.reject(this.failWith)
    }

    this.frames.push(decoder.decode(bytes))

    const held = this.held
    if (held) {
      return new Promise<void>((resolve, reject) => {
        held.push({ resolve, reject })
      })
    }
    return Promise.resolve()
  }

  isClosed(): boolean {
    return this.isClosedFlag
  }

  /** Simulate the client going away */
  disconnect(): void {
    this.isClosedFlag = true
    this.resolveClosed()

    const pending = this.held ?? []
    this.held = this.held ? [] : null
    for (const write of pending) {
      write.reject(new TransportClosedError())
    }
  }

  /** Keep writes pending until released, like a client that stopped reading */
  holdWrites(): void {
    this.held = []
  }

  releaseNext(): void {
    this.held?.shift()?.resolve()
  }

  get heldCount(): number {
    return this.held?.length ?? 0
  }
}

/**
 * Bus stand-in for one subscriber per topic, recording every call.
 */
export class RecordingBus implements Bus {
  readonly calls: string[] = []
  readonly failSubscribe = new Map<string, Error>()
  readonly failUnsubscribe = new Map<string, Error>()
  private readonly subscribers = new Map<string, Subscriber>()

  async subscribe(topic: string, subscriber: Subscriber): Promise<void> {
    this.calls.push(`subscribe:${topic}`)
    const error = this.failSubscribe.get(topic)
    if (error) throw error
    this.subscribers.set(topic, subscriber)
  }

  async unsubscribe(topic: string, subscriberId: string): Promise<void> {
    this.calls.push(`unsubscribe:${topic}:${subscriberId}`)
    const error = this.failUnsubscribe.get(topic)
    if (error) throw error
    this.subscribers.delete(topic)
  }

  async publish(topic: string, chunk: Chunk): Promise<void> {
    this.deliver(topic, chunk)
  }

  /** Deliver anything, chunk or not */
  deliver(topic: string, message: unknown): void {
    this.subscribers.get(topic)?.deliver(topic, message)
  }

  closeSubscribers(): void {
    for (const subscriber of this.subscribers.values()) {
      subscriber.close?.()
    }
  }
}

/**
 * The parts of `http.ServerResponse` the Node transport touches.
 */
export class FakeResponse extends EventEmitter {
  readonly chunks: string[] = []
  writeResult = true
  destroyed = false
  writableEnded = false
  endCalls = 0
  statusCode = 0
  headers: Record<string, string> = {}
  headersFlushed = false

  writeHead(statusCode: number, headers: Record<string, string>): this {
    this.statusCode = statusCode
    this.headers = headers
    return this
  }

  flushHeaders(): void {
    this.headersFlushed = true
  }

  write(bytes: Uint8Array): boolean {
    this.chunks.push(text(bytes))
    return this.writeResult
  }

  end(): void {
    this.endCalls++
    this.writableEnded = true
  }
}

export function asResponse(res: FakeResponse): ServerResponse {
  return res as unknown as ServerResponse
}

/**
 * Let pending promise callbacks and zero-delay timers run (real timers only).
 */
export function settle(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Let pending promise callbacks run; safe under fake timers.
 */
export async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await Promise.resolve()
  }
}

export function text(bytes: Uint8Array | undefined): string {
  return bytes ? decoder.decode(bytes) : ''
}
