/**
 * One authenticated WebSocket connection's receive loop.
 *
 * Frames are handled strictly in arrival order: each waits for the previous
 * one to finish, including the write of its reply. Every frame counts as
 * liveness activity before it is parsed. Failures become `error` frames and
 * the connection stays open. Replies go out under the registry's push
 * timeout, and a reply that cannot be written evicts the connection.
 *
 * @module services/realtime/chat-session
 */
import type {
  ConnectionRegistry,
  ConnectionTransport,
  LivenessMonitor,
  Logger,
} from '@switchboard/delivery';
import type { Identity } from '@switchboard/shared/chat-schemas';
import {
  parseInboundFrame,
  type InboundFrame,
  type OutboundFrame,
  type ResponseFrame,
} from '@switchboard/shared/frame-schemas';
import { ChatError } from '../../lib/errors.js';
import type { IdentityStore } from '../chat/identity-store.js';
import type { MessageService } from '../chat/message-service.js';

export interface ChatSessionDeps {
  service: MessageService;
  identities: IdentityStore;
  monitor: LivenessMonitor;
  registry: ConnectionRegistry;
  logger: Logger;
}

export class ChatSession {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private identity: Identity,
    private readonly transport: ConnectionTransport,
    private readonly deps: ChatSessionDeps,
  ) {}

  get username(): string {
    return this.identity.username;
  }

  /** Queue one raw text frame behind any still being handled. */
  receive(raw: string): void {
    this.queue = this.queue.then(() => this.handle(raw));
  }

  /** Resolves once every received frame has been handled. */
  idle(): Promise<void> {
    return this.queue;
  }

  private async handle(raw: string): Promise<void> {
    this.deps.monitor.recordActivity(this.username, this.transport);

    let reply: OutboundFrame | null;
    try {
      reply = this.respond(raw);
    } catch (err) {
      reply = { type: 'error', error: this.describe(err) };
    }
    if (!reply) return;

    const { registry, logger } = this.deps;
    const delivered = await registry.sendToConnection(this.username, this.transport, reply);
    if (!delivered) {
      logger.warn(`[Gateway] Dropped ${reply.type} reply to ${this.username}`);
    }
  }

  private respond(raw: string): OutboundFrame | null {
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      return { type: 'error', error: 'Invalid JSON' };
    }

    const parsed = parseInboundFrame(decoded);
    if (!parsed.ok) return { type: 'error', error: parsed.error };

    // Pick up role or webhook changes made since the connection opened.
    this.identity = this.deps.identities.getByUsername(this.username) ?? this.identity;
    return this.dispatch(parsed.frame);
  }

  private dispatch(frame: InboundFrame): ResponseFrame | null {
    const { service } = this.deps;
    const me = this.identity;

    switch (frame.type) {
      case 'message':
        return {
          type: 'message_sent',
          status: 'sent',
          message: service.send(me, { content: frame.content, toUsername: frame.to_username }),
        };
      case 'mark_read':
        return {
          type: 'marked_read',
          message_id: frame.message_id,
          status: service.markRead(me, frame.message_id),
        };
      case 'mark_all_read':
        return { type: 'marked_all_read', marked_as_read: service.markAllRead(me), status: 'success' };
      case 'mark_room_read':
        return { type: 'marked_room_read', count: service.markRoomRead(me), status: 'success' };
      case 'mark_direct_read':
        return {
          type: 'marked_direct_read',
          from_username: frame.from_username,
          count: service.markDirectRead(me, frame.from_username),
          status: 'success',
        };
      case 'get_unread_count':
        return { type: 'unread_count', ...service.unreadCount(me) };
      case 'get_messages':
        return { type: 'messages', ...service.history(me, frame) };
      case 'get_direct_messages':
        return { type: 'direct_messages', ...service.directHistory(me, frame) };
      case 'get_unread_messages':
        return { type: 'unread_messages', messages: service.unreadRoom(me, frame) };
      case 'get_unread_direct_messages':
        return { type: 'unread_direct_messages', messages: service.unreadDirect(me, frame) };
      case 'get_users':
        return { type: 'users', users: service.listUsers(me) };
      case 'get_online_users':
        return { type: 'online_users', users: service.onlineUsers(me) };
      case 'get_user_profile':
        return { type: 'user_profile', user: service.profile(me, frame.username) };
      case 'pong':
        this.deps.monitor.recordProbeAck(this.username, this.transport);
        return null;
    }
  }

  private describe(err: unknown): string {
    if (err instanceof ChatError) return err.message;
    this.deps.logger.error(
      `[Gateway] Frame from ${this.username} failed:`,
      err instanceof Error ? err.message : String(err),
    );
    return 'Internal server error';
  }
}
