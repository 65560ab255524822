/**
 * Client-side exports
 *
 * Import from 'topic-sse/client' for tree-shaking optimization.
 */

export {
  createSSEParser,
  parseSSEStream,
  SSEStreamError,
  type SSEEvent,
  type SSEParserOptions,
} from './sse-parser'

export {
  subscribeTopics,
  buildTopicUrl,
  sleep,
  type FetchLike,
  type TopicStreamHandle,
  type TopicStreamOptions,
  type TopicStreamStatus,
} from './topic-stream'

export {
  useTopicStream,
  type TopicStreamState,
  type UseTopicStreamOptions,
} from './use-topic-stream'
