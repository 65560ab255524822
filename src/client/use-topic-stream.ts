/**
 * useTopicStream - React Hook for SSE Topic Subscriptions
 *
 * Subscribes while mounted (and while `enabled`), resubscribing when the
 * endpoint or topic list changes. Keeps the most recent events in state.
 *
 * @example
 * ```typescript
 * function OrderFeed() {
 *   const { status, events, close } = useTopicStream({
 *     endpoint: '/sse',
 *     topics: ['orders'],
 *     maxEvents: 50,
 *   })
 *
 *   return (
 *     <div>
 *       <p>Status: {status}</p>
 *       <button onClick={close}>Stop</button>
 *       <ul>{events.map((e, i) => <li key={e.id ?? i}>{e.data}</li>)}</ul>
 *     </div>
 *   )
 * }
 * ```
 */

import { useCallback, useEffect, useReducer, useRef } from 'react'
import type { SSEEvent } from './sse-parser'
import type { TopicStreamHandle, TopicStreamOptions, TopicStreamStatus } from './topic-stream'
import { subscribeTopics } from './topic-stream'

export interface TopicStreamState {
  status: TopicStreamStatus | 'idle'
  events: SSEEvent[]
  lastEventId: string | null
  error: string | null
  reconnectAttempt: number
}

export interface UseTopicStreamOptions
  extends Omit<TopicStreamOptions, 'onEvent' | 'onStatusChange' | 'onError'> {
  /** Subscribe only while true (default: true) */
  enabled?: boolean

  /** Number of most recent events kept in state (default: 100) */
  maxEvents?: number

  onEvent?: (event: SSEEvent) => void
  onError?: (error: Error) => void
}

type TopicStreamAction =
  | { type: 'STATUS'; payload: { status: TopicStreamStatus } }
  | { type: 'EVENT'; payload: { event: SSEEvent; maxEvents: number } }
  | { type: 'RECONNECTING'; payload: { attempt: number } }
  | { type: 'ERROR'; payload: { error: string } }
  | { type: 'RESET' }

const initialState: TopicStreamState = {
  status: 'idle',
  events: [],
  lastEventId: null,
  error: null,
  reconnectAttempt: 0,
}

function reducer(state: TopicStreamState, action: TopicStreamAction): TopicStreamState {
  switch (action.type) {
    case 'STATUS':
      return {
        ...state,
        status: action.payload.status,
        reconnectAttempt: action.payload.status === 'open' ? 0 : state.reconnectAttempt,
      }
    case 'EVENT': {
      const { event, maxEvents } = action.payload
      const events = [...state.events, event]
      return {
        ...state,
        events: events.length > maxEvents ? events.slice(events.length - maxEvents) : events,
        lastEventId: event.id ?? state.lastEventId,
      }
    }
    case 'RECONNECTING':
      return { ...state, reconnectAttempt: action.payload.attempt }
    case 'ERROR':
      return { ...state, error: action.payload.error }
    case 'RESET':
      return initialState
    default:
      return state
  }
}

export function useTopicStream(options: UseTopicStreamOptions) {
  const { endpoint, topics, enabled = true } = options
  const [state, dispatch] = useReducer(reducer, initialState)

  // Latest options without resubscribing on every render
  const optionsRef = useRef(options)
  optionsRef.current = options

  const handleRef = useRef<TopicStreamHandle | null>(null)
  // Resubscribe when the topic list changes by value, not by identity
  const topicsKey = JSON.stringify(topics)

  useEffect(() => {
    if (!enabled) return

    dispatch({ type: 'RESET' })
    const current = optionsRef.current
    const handle = subscribeTopics({
      ...current,
      endpoint,
      onEvent: (event) => {
        dispatch({ type: 'EVENT', payload: { event, maxEvents: optionsRef.current.maxEvents ?? 100 } })
        optionsRef.current.onEvent?.(event)
      },
      onStatusChange: (status) => {
        dispatch({ type: 'STATUS', payload: { status } })
      },
      onReconnecting: (attempt, delayMs, error) => {
        dispatch({ type: 'RECONNECTING', payload: { attempt } })
        optionsRef.current.onReconnecting?.(attempt, delayMs, error)
      },
      onError: (error) => {
        dispatch({ type: 'ERROR', payload: { error: error.message } })
        optionsRef.current.onError?.(error)
      },
    })
    handleRef.current = handle

    return () => {
      handle.close()
      if (handleRef.current === handle) {
        handleRef.current = null
      }
    }
  }, [endpoint, topicsKey, enabled])

  const close = useCallback(() => {
    handleRef.current?.close()
    handleRef.current = null
  }, [])

  return {
    ...state,
    close,
  }
}
