/**
 * Chat command layer shared by the REST routes and the WebSocket gateway.
 *
 * Every send runs authorize → validate → persist → dispatch. Nothing is
 * persisted when a check fails, and nothing is delivered until the message is
 * stored. Delivery runs in the background on the DeliveryRouter; its outcome
 * never reaches the sender.
 *
 * @module services/chat/message-service
 */
import type { ConnectionRegistry, DeliveryRouter } from '@switchboard/delivery';
import { toMessageResponse } from '@switchboard/delivery';
import type {
  Identity,
  Message,
  MessageResponse,
  OwnProfile,
  PaginatedMessages,
  UnreadCountResponse,
  UserProfile,
} from '@switchboard/shared/chat-schemas';
import { hasPermission } from '@switchboard/shared/permissions';
import { NotFoundError, ValidationError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import { authorize, readerScope } from './authorize.js';
import type { IdentityStore } from './identity-store.js';
import type { HistoryOptions, MessageStore, PageOptions } from './message-store.js';
import { toOwnProfile, toPagination, toUserProfile } from './presenters.js';

export interface MessageServiceDeps {
  messages: MessageStore;
  identities: IdentityStore;
  router: DeliveryRouter;
  registry: ConnectionRegistry;
}

export interface SendInput {
  content: string;
  /** null or absent for a room message */
  toUsername?: string | null;
}

export type MarkReadStatus = 'success' | 'already_read';

export class MessageService {
  constructor(private readonly deps: MessageServiceDeps) {}

  /**
   * Persist a message and hand it to the router.
   *
   * @returns the stored message in wire form, before any delivery completes
   */
  send(sender: Identity, input: SendInput): MessageResponse {
    const content = input.content;
    if (!content) throw new ValidationError('Missing content field');

    const toUsername = input.toUsername ?? null;
    if (toUsername === null) {
      authorize(sender, 'send_room_message');
    } else {
      authorize(sender, 'send_direct_message');
      const recipient = this.deps.identities.getByUsername(toUsername);
      if (!recipient) {
        throw new ValidationError(`Recipient '${toUsername}' not found`, 404);
      }
      if (!hasPermission(recipient.role, 'receive_direct_message')) {
        throw new ValidationError(`Cannot send direct messages to ${recipient.role} users`);
      }
    }

    const message = this.deps.messages.append({ fromUsername: sender.username, toUsername, content });
    logger.debug(
      `[Chat] ${sender.username} sent ${message.id}${toUsername ? ` to ${toUsername}` : ' to the room'}`,
    );
    this.deps.router.dispatch(message, sender);
    return toMessageResponse(message, sender);
  }

  // === History ===

  history(reader: Identity, options: HistoryOptions): PaginatedMessages {
    authorize(reader, 'read_messages');
    const page = this.deps.messages.listRoom(options);
    const total = this.deps.messages.countRoom(options.since);
    return {
      messages: this.present(page),
      pagination: toPagination(total, options.offset, options.limit, page.length),
    };
  }

  directHistory(reader: Identity, options: HistoryOptions): PaginatedMessages {
    authorize(reader, 'read_messages');
    const scope = readerScope(reader);
    const page = this.deps.messages.listDirect(scope, options);
    const total = this.deps.messages.countDirect(scope, options.since);
    return {
      messages: this.present(page),
      pagination: toPagination(total, options.offset, options.limit, page.length),
    };
  }

  // === Unread ===

  unreadRoom(reader: Identity, options: PageOptions): MessageResponse[] {
    authorize(reader, 'read_messages');
    return this.present(this.deps.messages.listUnreadRoom(reader.username, options));
  }

  unreadDirect(reader: Identity, options: PageOptions): MessageResponse[] {
    authorize(reader, 'read_messages');
    return this.present(this.deps.messages.listUnreadDirect(readerScope(reader), options));
  }

  unreadCount(reader: Identity): UnreadCountResponse {
    authorize(reader, 'read_messages');
    const counts = this.deps.messages.unreadCount(readerScope(reader));
    return {
      unread_room_messages: counts.unreadRoom,
      unread_direct_messages: counts.unreadDirect,
      total_unread: counts.total,
    };
  }

  // === Read receipts ===

  /**
   * Mark one message read. The author's live connections get a
   * `read_receipt` frame the first time someone else reads it.
   */
  markRead(reader: Identity, messageId: string): MarkReadStatus {
    authorize(reader, 'read_messages');
    const readAt = new Date().toISOString();
    const created = this.deps.messages.markRead(messageId, reader.username, readAt);
    if (!created) return 'already_read';

    const message = this.deps.messages.getById(messageId);
    if (message && message.fromUsername !== reader.username) {
      this.notifyAuthor(message, reader.username, readAt);
    }
    return 'success';
  }

  markAllRead(reader: Identity): number {
    authorize(reader, 'read_messages');
    return this.deps.messages.markAllRead(readerScope(reader));
  }

  markRoomRead(reader: Identity): number {
    authorize(reader, 'read_messages');
    return this.deps.messages.markRoomRead(reader.username);
  }

  markDirectRead(reader: Identity, fromUsername: string): number {
    authorize(reader, 'read_messages');
    return this.deps.messages.markDirectRead(readerScope(reader), fromUsername);
  }

  // === Directory ===

  listUsers(reader: Identity): UserProfile[] {
    authorize(reader, 'read_users');
    return this.deps.identities.list().map(toUserProfile);
  }

  onlineUsers(reader: Identity): string[] {
    authorize(reader, 'read_users');
    return this.deps.registry.listOnlineIdentities();
  }

  /** The owner sees their own webhook URL; anyone else sees the public profile. */
  profile(reader: Identity, username: string): UserProfile | OwnProfile {
    if (username === reader.username) return toOwnProfile(reader);
    authorize(reader, 'read_users');
    const identity = this.deps.identities.getByUsername(username);
    if (!identity) throw new NotFoundError(`User '${username}' not found`);
    return toUserProfile(identity);
  }

  // === Moderation ===

  editMessage(moderator: Identity, messageId: string, content: string): MessageResponse {
    authorize(moderator, 'moderate_messages');
    const message = this.deps.messages.updateContent(messageId, content);
    logger.info(`[Chat] ${moderator.username} edited ${messageId}`);
    return toMessageResponse(message, this.deps.identities.getByUsername(message.fromUsername));
  }

  deleteMessage(moderator: Identity, messageId: string): void {
    authorize(moderator, 'moderate_messages');
    this.deps.messages.delete(messageId);
    logger.info(`[Chat] ${moderator.username} deleted ${messageId}`);
  }

  /** Serialize messages with their senders' display metadata. */
  private present(messages: Message[]): MessageResponse[] {
    const senders = new Map<string, Identity | null>();
    return messages.map((message) => {
      let sender = senders.get(message.fromUsername);
      if (sender === undefined) {
        sender = this.deps.identities.getByUsername(message.fromUsername);
        senders.set(message.fromUsername, sender);
      }
      return toMessageResponse(message, sender);
    });
  }

  private notifyAuthor(message: Message, readBy: string, readAt: string): void {
    this.deps.registry
      .push(message.fromUsername, {
        type: 'read_receipt',
        message_id: message.id,
        read_by: readBy,
        read_at: readAt,
      })
      .catch((err: unknown) => {
        logger.warn('[Chat] Read receipt push failed:', err instanceof Error ? err.message : String(err));
      });
  }
}
