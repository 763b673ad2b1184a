/**
 * Internal type definitions for the @switchboard/delivery package.
 *
 * All types used across delivery modules are defined here to avoid
 * circular imports and provide a single source of truth.
 *
 * @module delivery/types
 */
import type { Identity, MessageResponse } from '@switchboard/shared/chat-schemas';
import type { OutboundFrame } from '@switchboard/shared/frame-schemas';

/** Minimal logger contract. The server passes its consola instance. */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/** A live, bidirectional client connection (a WebSocket in production). */
export interface ConnectionTransport {
  send(frame: OutboundFrame): Promise<void>;
  close(code: number, reason: string): void;
}

/** A registered connection. Never persisted. */
export interface Connection {
  id: string;
  username: string;
  transport: ConnectionTransport;
  connectedAt: string;
}

export type EvictionReason = 'stale' | 'probe_failed' | 'send_failed';

export interface ConnectionStats {
  username: string;
  connectionId: string;
  connectedAt: string;
  lastActivityAt: string;
  lastProbeAckAt: string;
  secondsSinceActivity: number;
  secondsSinceProbeAck: number;
  healthy: boolean;
}

/** Outcome of pushing one frame to every connection of one or more identities. */
export interface PushResult {
  /** Connections the frame was written to. */
  sent: number;
  /** Connections that failed or timed out and were evicted. */
  failed: number;
}

export interface WebhookDeliveryResult {
  success: boolean;
  attempts: number;
  status?: number;
  error?: string;
  durationMs: number;
}

export interface WebhookBroadcastResult {
  attempted: number;
  delivered: number;
  failed: number;
}

/** The part of WebhookDispatcher the router depends on. */
export interface WebhookSenderLike {
  deliver(identity: Identity, message: MessageResponse): Promise<WebhookDeliveryResult>;
  broadcast(
    message: MessageResponse,
    identities: readonly Identity[],
    excludeUsername?: string,
  ): Promise<WebhookBroadcastResult>;
}

/**
 * Optional external pub/sub service mirroring every delivery.
 *
 * Room messages go to one shared channel, direct messages to the
 * recipient's private channel.
 */
export interface PubSubMirror {
  publishRoomMessage(message: MessageResponse, sender: Identity): Promise<void>;
  publishDirectMessage(message: MessageResponse, sender: Identity, recipient: Identity): Promise<void>;
}

/** Read-only view of the identity directory the router resolves recipients from. */
export interface IdentityDirectoryLike {
  getByUsername(username: string): Identity | null;
  list(): Identity[];
}

/**
 * When the router calls webhooks.
 *
 * - `always`: every eligible identity, whether or not it is connected
 * - `offline_only`: only identities with no live connection
 */
export type WebhookPolicy = 'always' | 'offline_only';

export interface DeliveryReport {
  messageId: string;
  live: PushResult;
  webhooks: WebhookBroadcastResult;
  /** null when no mirror is configured */
  mirrored: boolean | null;
}
