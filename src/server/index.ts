/**
 * Server-side exports
 *
 * Import from 'topic-sse/server' to leave the client out of server bundles.
 */

export {
  buildChunk,
  decodeChunk,
  isChunk,
  chunkLines,
  InvalidChunkKindError,
  InvalidChunkError,
  isInvalidChunkKindError,
  isInvalidChunkError,
} from './chunk'

export {
  formatChunk,
  encodeChunk,
  formatComment,
  formatRetry,
  encodeText,
} from './sse-encoder'

export {
  BusClosedError,
  isBusClosedError,
  type Bus,
  type Subscriber,
  type Topic,
  type TopicSubscription,
} from './bus'

export {
  MemoryBus,
  createMemoryBus,
  type MemoryBusConfig,
} from './memory-bus'

export { broadcast, publish } from './publisher'

export {
  createStreamTransport,
  createNodeTransport,
  TransportClosedError,
  isTransportClosedError,
  type Transport,
  type EndableTransport,
} from './transport'

export {
  SubscriptionLoop,
  stream,
  type CloseCause,
  type LoopState,
  type LoopObserver,
  type LoopResult,
  type LoopSupervisor,
  type SubscriptionLoopConfig,
} from './subscription-loop'

export { ConnectionRegistry } from './connection-registry'

export {
  SSE_HEADERS,
  createSSEResponse,
  createTopicStreamResponse,
  serveTopicStream,
  type TopicStreamOptions as ServerTopicStreamOptions,
} from './responses'

export { parseTopics, topicsFromUrl } from './topics'
