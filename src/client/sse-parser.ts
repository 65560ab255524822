/**
 * SSE Parser
 *
 * Incremental parser for `text/event-stream` bodies, following the
 * WHATWG event stream interpretation rules: CRLF, CR and LF line endings,
 * one optional space after the colon, multi-line data joined with `\n`,
 * and comments ignored.
 *
 * Manual parsing is required because native EventSource cannot send custom
 * headers; this parser works with any fetch() response.
 *
 * @see https://html.spec.whatwg.org/multipage/server-sent-events.html#event-stream-interpretation
 */

/**
 * A dispatched server-sent event.
 */
export interface SSEEvent {
  /** Event type; `message` when the frame had no event: field */
  event: string

  /** Data lines joined with `\n` */
  data: string

  /** Data lines as received */
  lines: string[]

  /** Last event ID in effect when this event was dispatched */
  id?: string
}

export interface SSEParserOptions {
  onEvent: (event: SSEEvent) => void

  /** Called for each valid retry: field */
  onRetry?: (retryMs: number) => void

  /** Called for each comment line (heartbeats use `: [heartbeat]`) */
  onComment?: (comment: string) => void
}

const RETRY_VALUE = /^\d+$/

/**
 * Creates a stateful SSE parser that handles chunked data.
 * Call the returned function with each decoded chunk from the stream.
 *
 * @example
 * ```typescript
 * const parse = createSSEParser({
 *   onEvent: (event) => console.log(event.event, event.data),
 * })
 *
 * const reader = response.body.getReader()
 * const decoder = new TextDecoder()
 *
 * while (true) {
 *   const { done, value } = await reader.read()
 *   if (done) break
 *   parse(decoder.decode(value, { stream: true }))
 * }
 * ```
 */
export function createSSEParser(options: SSEParserOptions) {
  const { onEvent, onRetry, onComment } = options
  let buffer = ''
  let eventType = ''
  let dataLines: string[] = []
  let lastEventId = ''

  const dispatch = () => {
    if (dataLines.length === 0) {
      eventType = ''
      return
    }

    const lines = dataLines
    const event: SSEEvent = {
      event: eventType || 'message',
      data: lines.join('\n'),
      lines,
      ...(lastEventId !== '' ? { id: lastEventId } : {}),
    }
    dataLines = []
    eventType = ''
    onEvent(event)
  }

  const processLine = (line: string) => {
    if (line === '') {
      dispatch()
      return
    }

    if (line.startsWith(':')) {
      onComment?.(line.slice(1).replace(/^ /, ''))
      return
    }

    const colon = line.indexOf(':')
    const field = colon === -1 ? line : line.slice(0, colon)
    const value = colon === -1 ? '' : line.slice(colon + 1).replace(/^ /, '')

    switch (field) {
      case 'event':
        eventType = value
        break
      case 'data':
        dataLines.push(value)
        break
      case 'id':
        if (!value.includes('\0')) {
          lastEventId = value
        }
        break
      case 'retry':
        if (RETRY_VALUE.test(value)) {
          onRetry?.(Number(value))
        }
        break
      default:
        // Unknown fields are ignored
        break
    }
  }

  return function parse(chunk: string): void {
    buffer += chunk
    let start = 0

    for (let i = 0; i < buffer.length; i++) {
      const char = buffer[i]
      if (char !== '\n' && char !== '\r') continue

      // A trailing CR may be the first half of CRLF
      if (char === '\r' && i === buffer.length - 1) break

      processLine(buffer.slice(start, i))
      if (char === '\r' && buffer[i + 1] === '\n') {
        i++
      }
      start = i + 1
    }

    buffer = buffer.slice(start)
  }
}

/**
 * Read an SSE response body to the end, dispatching every event.
 * Resolves when the server ends the stream or the signal aborts.
 *
 * @throws SSEStreamError when the response is not a readable SSE stream
 */
export async function parseSSEStream(
  response: Response,
  onEvent: (event: SSEEvent) => void,
  options?: { signal?: AbortSignal; onRetry?: (retryMs: number) => void }
): Promise<void> {
  if (!response.ok) {
    throw new SSEStreamError(`HTTP ${response.status}`, response.status)
  }
  if (!response.body) {
    throw new SSEStreamError('No response body', response.status)
  }

  const reader = response.body.getReader()
  const decoder = new TextDecoder()
  const parse = createSSEParser({ onEvent, onRetry: options?.onRetry })

  const signal = options?.signal
  const onAbort = () => {
    reader.cancel().catch(() => {
      // Reader may already be released
    })
  }
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    while (!signal?.aborted) {
      const { done, value } = await reader.read()
      if (done) break
      parse(decoder.decode(value, { stream: true }))
    }
  } finally {
    signal?.removeEventListener('abort', onAbort)
    reader.releaseLock()
  }
}

/**
 * Error thrown when a response cannot be read as an SSE stream.
 */
export class SSEStreamError extends Error {
  public readonly status: number

  /** Whether reconnecting may succeed (server errors and rate limits) */
  public readonly retryable: boolean

  constructor(message: string, status: number) {
    super(message)
    this.name = 'SSEStreamError'
    this.status = status
    this.retryable = status >= 500 || status === 408 || status === 429
  }
}
