/**
 * Drizzle-backed message log and read receipts.
 *
 * Messages are append-only apart from moderation edits and deletes, ordered by
 * `(timestamp, id)`, and capped at a retention limit: each append prunes the
 * oldest messages beyond it in the same transaction, and their receipts
 * cascade away. Read receipts are insert-if-absent, so marking is idempotent.
 *
 * better-sqlite3 runs every statement synchronously, so each method below
 * completes without interleaving with another request handler.
 *
 * @module services/chat/message-store
 */
import {
  and,
  asc,
  count,
  eq,
  gt,
  inArray,
  isNotNull,
  isNull,
  messages,
  ne,
  notExists,
  or,
  readReceipts,
  sql,
  type Db,
} from '@switchboard/db';
import { monotonicFactory } from 'ulidx';
import type { Message, MessageType } from '@switchboard/shared/chat-schemas';
import { DEFAULT_MESSAGE_HISTORY_LIMIT } from '@switchboard/shared/constants';
import { NotFoundError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';

/** Whose direct messages a query may see. */
export interface ReaderScope {
  username: string;
  /** Elevated visibility: every direct message, not only the reader's own. */
  seesAllDirect: boolean;
}

export interface PageOptions {
  limit: number;
  offset: number;
}

export interface HistoryOptions extends PageOptions {
  /** ISO 8601; only messages strictly after it. */
  since?: string;
}

export interface NewMessage {
  fromUsername: string;
  /** null for a room message */
  toUsername: string | null;
  content: string;
  /** Defaults to `direct` when addressed, `room` otherwise. */
  type?: MessageType;
}

export interface UnreadCounts {
  unreadRoom: number;
  unreadDirect: number;
  total: number;
}

type MessageRow = typeof messages.$inferSelect;
type Condition = ReturnType<typeof and>;

/** Receipts per INSERT; three bound parameters each. */
const RECEIPT_BATCH_SIZE = 300;

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    fromUsername: row.fromUsername,
    toUsername: row.toUsername,
    content: row.content,
    type: row.messageType,
    timestamp: row.timestamp,
  };
}

function sinceFilter(since: string | undefined): Condition {
  return since ? gt(messages.timestamp, new Date(since).toISOString()) : undefined;
}

export class MessageStore {
  private readonly nextId = monotonicFactory();

  constructor(
    private readonly db: Db,
    private readonly historyLimit: number = DEFAULT_MESSAGE_HISTORY_LIMIT,
  ) {
    logger.debug(`[DB] MessageStore initialized (history limit ${historyLimit})`);
  }

  /** Persist a message and prune beyond the retention limit, atomically. */
  append(input: NewMessage): Message {
    const message: Message = {
      id: this.nextId(),
      fromUsername: input.fromUsername,
      toUsername: input.toUsername,
      content: input.content,
      type: input.type ?? (input.toUsername === null ? 'room' : 'direct'),
      timestamp: new Date().toISOString(),
    };

    const pruned = this.db.transaction((tx) => {
      tx.insert(messages)
        .values({
          id: message.id,
          fromUsername: message.fromUsername,
          toUsername: message.toUsername,
          content: message.content,
          messageType: message.type,
          timestamp: message.timestamp,
        })
        .run();

      const total = tx.select({ total: count() }).from(messages).get()?.total ?? 0;
      if (total <= this.historyLimit) return 0;

      const stale = tx
        .select({ id: messages.id })
        .from(messages)
        .orderBy(asc(messages.timestamp), asc(messages.id))
        .limit(total - this.historyLimit)
        .all();
      tx.delete(messages)
        .where(inArray(messages.id, stale.map((row) => row.id)))
        .run();
      return stale.length;
    });

    if (pruned > 0) logger.debug(`[DB] Pruned ${pruned} message(s) beyond history limit`);
    return message;
  }

  getById(id: string): Message | null {
    const row = this.db.select().from(messages).where(eq(messages.id, id)).get();
    return row ? toMessage(row) : null;
  }

  // === History ===

  listRoom(options: HistoryOptions): Message[] {
    return this.page(this.roomCondition(options.since), options);
  }

  countRoom(since?: string): number {
    return this.count(this.roomCondition(since));
  }

  listDirect(scope: ReaderScope, options: HistoryOptions): Message[] {
    return this.page(this.directCondition(scope, options.since), options);
  }

  countDirect(scope: ReaderScope, since?: string): number {
    return this.count(this.directCondition(scope, since));
  }

  // === Unread ===

  listUnreadRoom(username: string, options: PageOptions): Message[] {
    return this.page(this.unreadRoomCondition(username), options);
  }

  listUnreadDirect(scope: ReaderScope, options: PageOptions): Message[] {
    return this.page(this.unreadDirectCondition(scope), options);
  }

  unreadCount(scope: ReaderScope): UnreadCounts {
    const unreadRoom = this.count(this.unreadRoomCondition(scope.username));
    const unreadDirect = this.count(this.unreadDirectCondition(scope));
    return { unreadRoom, unreadDirect, total: unreadRoom + unreadDirect };
  }

  // === Read receipts ===

  /**
   * Record that `username` read the message.
   *
   * @returns true when a new receipt was created, false when already read
   * @throws NotFoundError when the message does not exist
   */
  markRead(messageId: string, username: string, readAt = new Date().toISOString()): boolean {
    if (!this.getById(messageId)) {
      throw new NotFoundError(`Message ${messageId} not found`);
    }
    const result = this.db
      .insert(readReceipts)
      .values({ messageId, username, readAt })
      .onConflictDoNothing()
      .run();
    return result.changes > 0;
  }

  /** Mark every unread room and direct message for the reader. */
  markAllRead(scope: ReaderScope): number {
    return this.markMatching(
      scope.username,
      or(this.unreadRoomCondition(scope.username), this.unreadDirectCondition(scope)),
    );
  }

  markRoomRead(username: string): number {
    return this.markMatching(username, this.unreadRoomCondition(username));
  }

  /** Mark unread direct messages from one sender. */
  markDirectRead(scope: ReaderScope, fromUsername: string): number {
    return this.markMatching(
      scope.username,
      and(this.unreadDirectCondition(scope), eq(messages.fromUsername, fromUsername)),
    );
  }

  /** Usernames that have read the message, oldest receipt first. */
  readers(messageId: string): string[] {
    return this.db
      .select({ username: readReceipts.username })
      .from(readReceipts)
      .where(eq(readReceipts.messageId, messageId))
      .orderBy(asc(readReceipts.readAt), asc(readReceipts.username))
      .all()
      .map((row) => row.username);
  }

  // === Moderation ===

  updateContent(id: string, content: string): Message {
    const result = this.db.update(messages).set({ content }).where(eq(messages.id, id)).run();
    const updated = result.changes > 0 ? this.getById(id) : null;
    if (!updated) throw new NotFoundError(`Message ${id} not found`);
    return updated;
  }

  delete(id: string): void {
    const result = this.db.delete(messages).where(eq(messages.id, id)).run();
    if (result.changes === 0) throw new NotFoundError(`Message ${id} not found`);
  }

  // === Internals ===

  private page(where: Condition, { limit, offset }: PageOptions): Message[] {
    return this.db
      .select()
      .from(messages)
      .where(where)
      .orderBy(asc(messages.timestamp), asc(messages.id))
      .limit(limit)
      .offset(offset)
      .all()
      .map(toMessage);
  }

  private count(where: Condition): number {
    return this.db.select({ total: count() }).from(messages).where(where).get()?.total ?? 0;
  }

  private markMatching(username: string, where: Condition): number {
    const readAt = new Date().toISOString();
    return this.db.transaction((tx) => {
      const ids = tx
        .select({ id: messages.id })
        .from(messages)
        .where(where)
        .all()
        .map((row) => row.id);

      let created = 0;
      for (let i = 0; i < ids.length; i += RECEIPT_BATCH_SIZE) {
        const batch = ids.slice(i, i + RECEIPT_BATCH_SIZE);
        created += tx
          .insert(readReceipts)
          .values(batch.map((messageId) => ({ messageId, username, readAt })))
          .onConflictDoNothing()
          .run().changes;
      }
      return created;
    });
  }

  private roomCondition(since?: string): Condition {
    return and(isNull(messages.toUsername), sinceFilter(since));
  }

  private directCondition(scope: ReaderScope, since?: string): Condition {
    return and(
      isNotNull(messages.toUsername),
      scope.seesAllDirect
        ? undefined
        : or(eq(messages.toUsername, scope.username), eq(messages.fromUsername, scope.username)),
      sinceFilter(since),
    );
  }

  private notReadBy(username: string) {
    return notExists(
      this.db
        .select({ one: sql`1` })
        .from(readReceipts)
        .where(and(eq(readReceipts.messageId, messages.id), eq(readReceipts.username, username))),
    );
  }

  private unreadRoomCondition(username: string): Condition {
    return and(isNull(messages.toUsername), ne(messages.fromUsername, username), this.notReadBy(username));
  }

  private unreadDirectCondition(scope: ReaderScope): Condition {
    return and(
      isNotNull(messages.toUsername),
      ne(messages.fromUsername, scope.username),
      scope.seesAllDirect ? undefined : eq(messages.toUsername, scope.username),
      this.notReadBy(scope.username),
    );
  }
}
