/**
 * @switchboard/delivery: message distribution core.
 *
 * Tracks live connections and their liveness, and fans persisted messages out
 * to live sockets, webhooks and an optional pub/sub mirror.
 *
 * @module delivery
 */

// Main entry points
export { ConnectionRegistry } from './connection-registry.js';
export type { ConnectionRegistryOptions } from './connection-registry.js';
export { LivenessMonitor, DEFAULT_LIVENESS_OPTIONS } from './liveness-monitor.js';
export type { LivenessOptions, ExpiryHandler } from './liveness-monitor.js';
export { WebhookDispatcher } from './webhook-dispatcher.js';
export type { WebhookDispatcherOptions } from './webhook-dispatcher.js';
export { DeliveryRouter } from './delivery-router.js';
export type { DeliveryRouterDeps } from './delivery-router.js';

// Adapters
export { CentrifugoMirror } from './adapters/centrifugo-mirror.js';
export type { CentrifugoMirrorConfig } from './adapters/centrifugo-mirror.js';

// Pure functions
export { toMessageResponse } from './message-payload.js';
export { withTimeout } from './timeout.js';

// Types
export type {
  Logger,
  Connection,
  ConnectionTransport,
  ConnectionStats,
  EvictionReason,
  PushResult,
  WebhookDeliveryResult,
  WebhookBroadcastResult,
  WebhookSenderLike,
  PubSubMirror,
  IdentityDirectoryLike,
  WebhookPolicy,
  DeliveryReport,
} from './types.js';
