/**
 * Fan-in queue for one subscription loop.
 *
 * Bus deliveries from every subscribed topic and heartbeat ticks are queued
 * in arrival order. An interrupt (disconnect, shutdown) outranks anything
 * queued: once set, `next()` only ever yields the interrupt and later pushes
 * are dropped. The first interrupt wins.
 *
 * Code that waits on something other than the inbox (a transport write)
 * registers an interrupt listener for that wait only and detaches it after.
 */

export type CloseCause =
  | { type: 'client_disconnected' }
  | { type: 'shutdown_requested'; reason: unknown }
  | { type: 'transport_write_failed'; error: Error }
  | { type: 'invalid_chunk'; error: Error; topic: string }

export type InboxItem =
  | { type: 'delivery'; topic: string; message: unknown }
  | { type: 'heartbeat' }
  | { type: 'interrupt'; cause: CloseCause }

type QueuedItem = Exclude<InboxItem, { type: 'interrupt' }>

export class Inbox {
  private queue: QueuedItem[] = []
  private waiter: ((item: InboxItem) => void) | null = null
  private interruption: CloseCause | null = null
  private heartbeatQueued = false
  private readonly listeners = new Set<(cause: CloseCause) => void>()

  push(item: QueuedItem): void {
    if (this.interruption) return

    if (item.type === 'heartbeat') {
      // One pending heartbeat is enough
      if (this.heartbeatQueued) return
      this.heartbeatQueued = true
    }

    if (this.waiter) {
      const waiter = this.waiter
      this.waiter = null
      this.take(item)
      waiter(item)
      return
    }

    this.queue.push(item)
  }

  interrupt(cause: CloseCause): void {
    if (this.interruption) return

    this.interruption = cause
    this.queue = []

    const listeners = [...this.listeners]
    this.listeners.clear()
    for (const listener of listeners) {
      listener(cause)
    }

    if (this.waiter) {
      const waiter = this.waiter
      this.waiter = null
      waiter({ type: 'interrupt', cause })
    }
  }

  /**
   * Wait for the next item. Only one consumer may wait at a time.
   */
  next(): Promise<InboxItem> {
    if (this.interruption) {
      return Promise.resolve({ type: 'interrupt', cause: this.interruption })
    }

    const item = this.queue.shift()
    if (item) {
      this.take(item)
      return Promise.resolve(item)
    }

    return new Promise<InboxItem>((resolve) => {
      this.waiter = resolve
    })
  }

  /**
   * Call `listener` once with the interrupt cause, right away if already
   * interrupted. Returns a function that detaches the listener.
   */
  onInterrupt(listener: (cause: CloseCause) => void): () => void {
    if (this.interruption) {
      listener(this.interruption)
      return () => {}
    }

    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  get interruptCause(): CloseCause | null {
    return this.interruption
  }

  /** Interrupt listeners still attached */
  get listenerCount(): number {
    return this.listeners.size
  }

  /** Items waiting to be written */
  get size(): number {
    return this.queue.length
  }

  private take(item: QueuedItem): void {
    if (item.type === 'heartbeat') {
      this.heartbeatQueued = false
    }
  }
}
