/**
 * Stream Configuration Types
 *
 * Configuration for subscription loops (heartbeat), transports
 * (buffering) and topic-stream clients (reconnection backoff).
 */

/**
 * Retry strategy configuration with exponential backoff.
 */
export interface RetryConfig {
  /** Maximum number of consecutive failed attempts before giving up */
  maxRetries: number

  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number

  /** Maximum delay between retries (caps exponential growth) */
  maxDelayMs: number

  /** Multiplier for exponential backoff (typically 2) */
  backoffMultiplier: number

  /** Whether to add jitter to prevent thundering herd */
  jitter: boolean

  /** Maximum jitter as percentage of delay (0.0 - 1.0) */
  jitterFactor: number
}

/**
 * Heartbeat configuration for keeping connections alive.
 */
export interface HeartbeatConfig {
  /** Interval between heartbeat comments in milliseconds */
  intervalMs: number

  /** Whether heartbeat is enabled */
  enabled: boolean

  /** Custom heartbeat message (comment format) */
  message?: string
}

/**
 * Buffering configuration for stream transports.
 */
export interface TransportConfig {
  /** Frames buffered before a write waits for the client to read */
  highWaterMark: number
}

/**
 * Heartbeats are off by default: a connection with nothing to relay
 * writes nothing until it closes.
 */
export const DEFAULT_HEARTBEAT_CONFIG: HeartbeatConfig = {
  intervalMs: 15000,
  enabled: false,
  message: 'heartbeat',
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  jitterFactor: 0.3,
}

export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = {
  highWaterMark: 16,
}

/**
 * Calculate delay with exponential backoff and optional jitter.
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig
): number {
  const exponentialDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt)
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs)

  if (config.jitter) {
    const jitterAmount = cappedDelay * config.jitterFactor * Math.random()
    return Math.floor(cappedDelay + jitterAmount)
  }

  return cappedDelay
}
