/**
 * Default values shared by the server and the delivery core.
 *
 * @module shared/constants
 */

export const DEFAULT_PORT = 8000;

/** Messages kept before the oldest are pruned. */
export const DEFAULT_MESSAGE_HISTORY_LIMIT = 100;

export const LIVENESS = {
  PROBE_INTERVAL_MS: 30_000,
  STALE_AFTER_MS: 90_000,
  /** Probe acknowledgement wait. Not consulted by staleness detection. */
  ACK_WAIT_MS: 10_000,
} as const;

export const PUSH_SEND_TIMEOUT_MS = 5_000;

export const WEBHOOK = {
  TIMEOUT_MS: 10_000,
  MAX_RETRIES: 3,
  BACKOFF_BASE_MS: 1_000,
} as const;

export const PAGINATION = {
  DEFAULT_LIMIT: 50,
  MAX_LIMIT: 500,
} as const;

/** Close codes sent to WebSocket clients. */
export const CLOSE_CODES = {
  GOING_AWAY: 1001,
  POLICY_VIOLATION: 1008,
  CONNECTION_TIMED_OUT: 4000,
  SEND_FAILED: 4001,
} as const;

export const PUBSUB_CHANNELS = {
  ROOM: 'room:main',
  USER_PREFIX: 'user:',
} as const;
