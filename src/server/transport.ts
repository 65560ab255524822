/**
 * Transports
 *
 * A transport is the byte sink of one SSE connection. The HTTP layer owns it;
 * a subscription loop only writes to it and watches for it to close.
 *
 * Two adapters are provided:
 * - `createStreamTransport` for runtimes that answer with a WHATWG
 *   `Response` (Next.js route handlers, Hono, Deno-style servers)
 * - `createNodeTransport` for `http.ServerResponse` (Node http, Express)
 *
 * Both make `write` wait while the client is not reading, so a slow client
 * only ever holds up its own loop.
 */

import type { ServerResponse } from 'node:http'
import type { TransportConfig } from '../types/stream-config'
import { DEFAULT_TRANSPORT_CONFIG } from '../types/stream-config'

export interface Transport {
  /**
   * Write bytes to the client. Resolves once the bytes are accepted, which
   * may wait on a slow client. Rejects when the transport is closed.
   */
  write(bytes: Uint8Array): Promise<void>

  /** Whether the client has gone away (or the server ended the response) */
  isClosed(): boolean

  /** Resolves when the transport closes */
  readonly closed: Promise<void>
}

/**
 * A transport the server side can end once streaming is over.
 */
export interface EndableTransport extends Transport {
  end(): void
}

/**
 * Error thrown when writing to a closed transport.
 */
export class TransportClosedError extends Error {
  constructor(message = 'Transport is closed') {
    super(message)
    this.name = 'TransportClosedError'
  }
}

export function isTransportClosedError(error: unknown): error is TransportClosedError {
  return error instanceof TransportClosedError
}

interface PendingWrite {
  resolve: () => void
  reject: (error: Error) => void
}

/**
 * Create a transport backed by a `ReadableStream`.
 * Cancelling the stream (client disconnect) closes the transport.
 *
 * @example
 * ```typescript
 * const { stream, transport } = createStreamTransport()
 * const done = stream(transport, { bus, topics })
 * return createSSEResponse(stream)
 * ```
 */
export function createStreamTransport(
  config?: Partial<TransportConfig>
): { stream: ReadableStream<Uint8Array>; transport: EndableTransport } {
  const { highWaterMark } = { ...DEFAULT_TRANSPORT_CONFIG, ...config }

  let controller: ReadableStreamDefaultController<Uint8Array> | null = null
  let isClosed = false
  let waiting: PendingWrite[] = []
  let resolveClosed: () => void = () => {}
  const closed = new Promise<void>((resolve) => {
    resolveClosed = resolve
  })

  const markClosed = () => {
    if (isClosed) return
    isClosed = true
    resolveClosed()

    const pending = waiting
    waiting = []
    for (const write of pending) {
      write.reject(new TransportClosedError())
    }
  }

  const release = () => {
    const pending = waiting
    waiting = []
    for (const write of pending) {
      write.resolve()
    }
  }

  const stream = new ReadableStream<Uint8Array>(
    {
      start(ctrl) {
        controller = ctrl
      },
      pull() {
        release()
      },
      cancel() {
        markClosed()
      },
    },
    { highWaterMark }
  )

  const transport: EndableTransport = {
    write(bytes) {
      if (isClosed || !controller) {
        return Promise.reject(new TransportClosedError())
      }

      try {
        controller.enqueue(bytes)
      } catch (error) {
        markClosed()
        return Promise.reject(error)
      }

      if ((controller.desiredSize ?? 0) > 0) {
        return Promise.resolve()
      }
      return new Promise<void>((resolve, reject) => {
        waiting.push({ resolve, reject })
      })
    },

    isClosed: () => isClosed,

    closed,

    end() {
      if (isClosed) return
      try {
        controller?.close()
      } catch {
        // Stream may already be cancelled
      }
      markClosed()
    },
  }

  return { stream, transport }
}

/**
 * Create a transport over a Node `http.ServerResponse`.
 * The response's `close` event is the disconnect signal.
 */
export function createNodeTransport(res: ServerResponse): EndableTransport {
  let isClosed = res.destroyed || res.writableEnded
  let resolveClosed: () => void = () => {}
  const closed = new Promise<void>((resolve) => {
    resolveClosed = resolve
  })

  const markClosed = () => {
    isClosed = true
    resolveClosed()
  }

  if (isClosed) {
    markClosed()
  } else {
    res.once('close', markClosed)
  }

  return {
    write(bytes) {
      if (isClosed) {
        return Promise.reject(new TransportClosedError())
      }

      return new Promise<void>((resolve, reject) => {
        const onDrain = () => {
          detach()
          resolve()
        }
        const onClose = () => {
          detach()
          reject(new TransportClosedError('Client disconnected during write'))
        }
        const onError = (error: Error) => {
          detach()
          reject(error)
        }
        const detach = () => {
          res.off('drain', onDrain)
          res.off('close', onClose)
          res.off('error', onError)
        }

        if (res.write(bytes)) {
          resolve()
          return
        }

        res.once('drain', onDrain)
        res.once('close', onClose)
        res.once('error', onError)
      })
    },

    isClosed: () => isClosed,

    closed,

    end() {
      if (!res.writableEnded) {
        res.end()
      }
    },
  }
}
