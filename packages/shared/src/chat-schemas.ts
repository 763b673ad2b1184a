/**
 * Zod schemas for identities, messages and read state.
 *
 * Internal records (`Identity`, `Message`) use camelCase. Everything that
 * crosses the wire (REST bodies, WebSocket frames, webhook payloads) uses the
 * snake_case field names clients already depend on. All wire schemas carry
 * `.openapi()` metadata for document generation.
 *
 * @module shared/chat-schemas
 */
import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';
import { PAGINATION } from './constants.js';

extendZodWithOpenApi(z);

// === Enums ===

export const RoleSchema = z.enum(['admin', 'member', 'viewer', 'bot']).openapi('Role');

export type Role = z.infer<typeof RoleSchema>;

export const MessageTypeSchema = z.enum(['room', 'direct', 'system']).openapi('MessageType');

export type MessageType = z.infer<typeof MessageTypeSchema>;

// === Field rules ===

export const UsernameSchema = z
  .string()
  .min(1)
  .max(50)
  .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, ".", "_" and "-"');

export const MessageContentSchema = z
  .string({ required_error: 'Missing content field', invalid_type_error: 'Content must be a string' })
  .min(1, 'Missing content field')
  .max(10_000, 'Content must be at most 10000 characters');

export const SinceSchema = z
  .string()
  .datetime({ offset: true, message: 'Invalid timestamp format. Use ISO 8601 format.' });

// === Identity ===

export const IdentitySchema = z.object({
  id: z.string(),
  username: UsernameSchema,
  role: RoleSchema,
  webhookUrl: z.string().url().nullable(),
  logo: z.string().nullable(),
  emoji: z.string().nullable(),
  createdBy: z.string().nullable(),
  createdAt: z.string().datetime(),
});

export type Identity = z.infer<typeof IdentitySchema>;

export const UserProfileSchema = z
  .object({
    username: z.string(),
    role: RoleSchema,
    logo: z.string().nullable(),
    emoji: z.string().nullable(),
    is_admin: z.boolean(),
    is_viewer: z.boolean(),
    is_bot: z.boolean(),
    created_by: z.string().nullable(),
    created_at: z.string().datetime(),
  })
  .openapi('UserProfile');

export type UserProfile = z.infer<typeof UserProfileSchema>;

export const OwnProfileSchema = UserProfileSchema.extend({
  webhook_url: z.string().nullable(),
}).openapi('OwnProfile');

export type OwnProfile = z.infer<typeof OwnProfileSchema>;

// === Message ===

export const MessageSchema = z.object({
  id: z.string().describe('ULID message ID'),
  fromUsername: z.string(),
  toUsername: z.string().nullable(),
  content: z.string(),
  type: MessageTypeSchema,
  timestamp: z.string().datetime(),
});

export type Message = z.infer<typeof MessageSchema>;

export const MessageResponseSchema = z
  .object({
    id: z.string(),
    from_username: z.string(),
    from_user_logo: z.string().nullable(),
    from_user_emoji: z.string().nullable(),
    from_user_bot: z.boolean(),
    to_username: z.string().nullable(),
    content: z.string(),
    message_type: MessageTypeSchema,
    timestamp: z.string().datetime(),
  })
  .openapi('MessageResponse');

export type MessageResponse = z.infer<typeof MessageResponseSchema>;

// === Pagination ===

export const PaginationSchema = z
  .object({
    total: z.number().int().min(0),
    offset: z.number().int().min(0),
    limit: z.number().int().min(1),
    has_more: z.boolean(),
  })
  .openapi('Pagination');

export type Pagination = z.infer<typeof PaginationSchema>;

export const PaginatedMessagesSchema = z
  .object({
    messages: z.array(MessageResponseSchema),
    pagination: PaginationSchema,
  })
  .openapi('PaginatedMessages');

export type PaginatedMessages = z.infer<typeof PaginatedMessagesSchema>;

/** Shape shared by REST query strings and WebSocket query frames. */
export const PageQueryShape = {
  limit: z.coerce.number().int().min(1).max(PAGINATION.MAX_LIMIT).default(PAGINATION.DEFAULT_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
};

export const HistoryQuerySchema = z
  .object({
    ...PageQueryShape,
    since: SinceSchema.optional(),
  })
  .openapi('HistoryQuery');

export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;

export const PageQuerySchema = z.object(PageQueryShape).openapi('PageQuery');

export type PageQuery = z.infer<typeof PageQuerySchema>;

// === Read state ===

export const UnreadCountResponseSchema = z
  .object({
    unread_room_messages: z.number().int().min(0),
    unread_direct_messages: z.number().int().min(0),
    total_unread: z.number().int().min(0),
  })
  .openapi('UnreadCountResponse');

export type UnreadCountResponse = z.infer<typeof UnreadCountResponseSchema>;

export const MarkAllReadResponseSchema = z
  .object({
    marked_as_read: z.number().int().min(0),
  })
  .openapi('MarkAllReadResponse');

// === Requests ===

export const SendMessageRequestSchema = z
  .object({
    content: MessageContentSchema,
    to_username: UsernameSchema.nullish(),
  })
  .openapi('SendMessageRequest');

export type SendMessageRequest = z.infer<typeof SendMessageRequestSchema>;

export const RegisterRequestSchema = z
  .object({
    username: UsernameSchema,
    role: z.enum(['member', 'viewer']).default('member'),
    webhook_url: z.string().url().nullish(),
    logo: z.string().max(500).nullish(),
    emoji: z.string().max(16).nullish(),
  })
  .openapi('RegisterRequest');

export const CreateBotRequestSchema = z
  .object({
    username: UsernameSchema,
    webhook_url: z.string().url().nullish(),
    logo: z.string().max(500).nullish(),
    emoji: z.string().max(16).nullish(),
  })
  .openapi('CreateBotRequest');

export const CredentialsResponseSchema = z
  .object({
    username: z.string(),
    role: RoleSchema,
    api_key: z.string(),
  })
  .openapi('CredentialsResponse');

export type CredentialsResponse = z.infer<typeof CredentialsResponseSchema>;

export const UpdateWebhookRequestSchema = z
  .object({
    webhook_url: z.string().url().nullable(),
  })
  .openapi('UpdateWebhookRequest');

export const AssignRoleRequestSchema = z
  .object({
    role: RoleSchema,
  })
  .openapi('AssignRoleRequest');

export const UpdateMessageRequestSchema = z
  .object({
    content: MessageContentSchema,
  })
  .openapi('UpdateMessageRequest');

// === Connections ===

export const ConnectionStatsSchema = z
  .object({
    username: z.string(),
    connection_id: z.string(),
    connected_at: z.string().datetime(),
    last_activity: z.string().datetime(),
    last_pong: z.string().datetime(),
    seconds_since_activity: z.number(),
    seconds_since_pong: z.number(),
    is_healthy: z.boolean(),
  })
  .openapi('ConnectionStats');

export type ConnectionStatsResponse = z.infer<typeof ConnectionStatsSchema>;

export const ConnectionsResponseSchema = z
  .object({
    online_users: z.array(z.string()),
    total_connections: z.number().int().min(0),
    connections: z.array(ConnectionStatsSchema),
  })
  .openapi('ConnectionsResponse');
