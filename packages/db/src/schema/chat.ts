import { index, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core';

/** Registered identities. The role column is the only source of role flags. */
export const users = sqliteTable('users', {
  id: text('id').primaryKey(), // ULID
  username: text('username').notNull().unique(),
  apiKey: text('api_key').notNull().unique(),
  role: text('role', { enum: ['admin', 'member', 'viewer', 'bot'] })
    .notNull()
    .default('member'),
  webhookUrl: text('webhook_url'),
  logo: text('logo'),
  emoji: text('emoji'),
  createdBy: text('created_by'), // username of the creator, bots only
  createdAt: text('created_at').notNull(),
});

/** Append-only message log. `to_username` is null for room messages. */
export const messages = sqliteTable(
  'messages',
  {
    id: text('id').primaryKey(), // ULID
    fromUsername: text('from_username').notNull(),
    toUsername: text('to_username'),
    content: text('content').notNull(),
    messageType: text('message_type', { enum: ['room', 'direct', 'system'] })
      .notNull()
      .default('room'),
    timestamp: text('timestamp').notNull(), // ISO 8601
  },
  (table) => [
    index('idx_messages_timestamp').on(table.timestamp),
    index('idx_messages_to_username').on(table.toUsername),
    index('idx_messages_from_username').on(table.fromUsername),
  ],
);

/** One row per (message, reader); inserted at most once. */
export const readReceipts = sqliteTable(
  'read_receipts',
  {
    messageId: text('message_id')
      .notNull()
      .references(() => messages.id, { onDelete: 'cascade' }),
    username: text('username').notNull(),
    readAt: text('read_at').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.messageId, table.username] }),
    index('idx_read_receipts_username').on(table.username),
  ],
);
