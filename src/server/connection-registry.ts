/**
 * Connection Registry
 *
 * Tracks live subscription loops so a process can drain every SSE
 * connection on shutdown.
 *
 * @example
 * ```typescript
 * const registry = new ConnectionRegistry()
 *
 * // Per request
 * await stream(transport, { bus, topics }, undefined, { supervisor: registry })
 *
 * // On SIGTERM
 * await registry.shutdown('Server shutting down')
 * ```
 */

import type { LoopSupervisor, SubscriptionLoop } from './subscription-loop'

export class ConnectionRegistry implements LoopSupervisor {
  private readonly controller = new AbortController()
  private readonly loops = new Set<SubscriptionLoop>()

  /** Aborted by `shutdown`; registered loops close with `shutdown_requested` */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  register(loop: SubscriptionLoop): void {
    this.loops.add(loop)
  }

  unregister(loop: SubscriptionLoop): void {
    this.loops.delete(loop)
  }

  /**
   * Number of loops that have not closed yet.
   */
  get size(): number {
    return this.loops.size
  }

  get shuttingDown(): boolean {
    return this.controller.signal.aborted
  }

  /**
   * Tell every loop to drain, and wait until all of them have closed.
   */
  async shutdown(reason: unknown = 'Shutdown requested'): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason)
    }
    await Promise.all([...this.loops].map((loop) => loop.finished))
  }
}
