/**
 * OpenAPI 3.1.0 spec auto-generated from Zod schemas.
 *
 * Registers all API endpoints with descriptions, request/response schemas.
 * Powers `/api/docs` (Scalar UI) and `/api/openapi.json`.
 *
 * @module services/core/openapi-registry
 */
import { OpenAPIRegistry, OpenApiGeneratorV31, type RouteConfig } from '@asteasolutions/zod-to-openapi';
import { DEFAULT_PORT } from '@switchboard/shared/constants';
import {
  AssignRoleRequestSchema,
  ConnectionsResponseSchema,
  CreateBotRequestSchema,
  CredentialsResponseSchema,
  HistoryQuerySchema,
  MarkAllReadResponseSchema,
  MessageResponseSchema,
  OwnProfileSchema,
  PageQuerySchema,
  PaginatedMessagesSchema,
  RegisterRequestSchema,
  SendMessageRequestSchema,
  UnreadCountResponseSchema,
  UpdateMessageRequestSchema,
  UpdateWebhookRequestSchema,
  UserProfileSchema,
} from '@switchboard/shared/chat-schemas';
import { ErrorResponseSchema, HealthResponseSchema } from '@switchboard/shared/schemas';
import { z } from 'zod';

const registry = new OpenAPIRegistry();

const apiKeyAuth = registry.registerComponent('securitySchemes', 'ApiKeyAuth', {
  type: 'apiKey',
  in: 'header',
  name: 'X-API-Key',
});

const security = [{ [apiKeyAuth.name]: [] }];

function json<T extends z.ZodTypeAny>(description: string, schema: T) {
  return { description, content: { 'application/json': { schema } } };
}

const errorResponses = {
  400: json('Validation error', ErrorResponseSchema),
  401: json('Missing or invalid API key', ErrorResponseSchema),
  403: json('Role lacks the required permission', ErrorResponseSchema),
};

/** Register an authenticated endpoint with the shared error responses. */
function registerAuthed(route: RouteConfig): void {
  registry.registerPath({ ...route, security, responses: { ...errorResponses, ...route.responses } });
}

const MessageIdParams = z.object({ id: z.string().openapi({ description: 'ULID message ID' }) });
const UsernameParams = z.object({ username: z.string() });
const MessageListSchema = z.object({ messages: z.array(MessageResponseSchema) });

// --- Health ---

registry.registerPath({
  method: 'get',
  path: '/api/health',
  tags: ['Health'],
  summary: 'Health check',
  responses: {
    200: json('Server is healthy', HealthResponseSchema),
  },
});

// --- Registration ---

registry.registerPath({
  method: 'post',
  path: '/api/register',
  tags: ['Users'],
  summary: 'Register a member or viewer and receive an API key',
  request: { body: { content: { 'application/json': { schema: RegisterRequestSchema } } } },
  responses: {
    201: json('Issued credentials', CredentialsResponseSchema),
    400: json('Validation error', ErrorResponseSchema),
    409: json('Username already taken', ErrorResponseSchema),
  },
});

// --- Messages ---

registerAuthed({
  method: 'post',
  path: '/api/messages',
  tags: ['Messages'],
  summary: 'Send a room message, or a direct message when to_username is set',
  description:
    'The message is persisted before any delivery. Live push, webhooks and the pub/sub mirror ' +
    'run in the background and never affect the response.',
  request: { body: { content: { 'application/json': { schema: SendMessageRequestSchema } } } },
  responses: {
    201: json('Stored message', MessageResponseSchema),
    404: json('Recipient not found', ErrorResponseSchema),
  },
});

registerAuthed({
  method: 'get',
  path: '/api/messages',
  tags: ['Messages'],
  summary: 'Room message history',
  request: { query: HistoryQuerySchema },
  responses: { 200: json('Page of room messages', PaginatedMessagesSchema) },
});

registerAuthed({
  method: 'get',
  path: '/api/messages/direct',
  tags: ['Messages'],
  summary: 'Direct message history visible to the caller',
  description: 'Viewers see every direct message; other roles see their own conversations.',
  request: { query: HistoryQuerySchema },
  responses: { 200: json('Page of direct messages', PaginatedMessagesSchema) },
});

registerAuthed({
  method: 'get',
  path: '/api/messages/unread',
  tags: ['Read receipts'],
  summary: 'Unread room messages',
  request: { query: PageQuerySchema },
  responses: { 200: json('Unread room messages', MessageListSchema) },
});

registerAuthed({
  method: 'get',
  path: '/api/messages/direct/unread',
  tags: ['Read receipts'],
  summary: 'Unread direct messages',
  request: { query: PageQuerySchema },
  responses: { 200: json('Unread direct messages', MessageListSchema) },
});

registerAuthed({
  method: 'get',
  path: '/api/messages/unread/count',
  tags: ['Read receipts'],
  summary: 'Unread counts',
  responses: { 200: json('Unread counts', UnreadCountResponseSchema) },
});

registerAuthed({
  method: 'post',
  path: '/api/messages/{id}/read',
  tags: ['Read receipts'],
  summary: 'Mark one message read',
  request: { params: MessageIdParams },
  responses: {
    200: json(
      'Receipt status',
      z.object({ message_id: z.string(), status: z.enum(['success', 'already_read']) }),
    ),
    404: json('Message not found', ErrorResponseSchema),
  },
});

registerAuthed({
  method: 'post',
  path: '/api/messages/mark-all-read',
  tags: ['Read receipts'],
  summary: 'Mark every unread message read',
  responses: { 200: json('Number of receipts created', MarkAllReadResponseSchema) },
});

// --- Users ---

registerAuthed({
  method: 'get',
  path: '/api/users',
  tags: ['Users'],
  summary: 'List users',
  responses: { 200: json('All users', z.object({ users: z.array(UserProfileSchema) })) },
});

registerAuthed({
  method: 'get',
  path: '/api/users/online',
  tags: ['Users'],
  summary: 'Usernames with at least one live connection',
  responses: { 200: json('Online usernames', z.object({ users: z.array(z.string()) })) },
});

registerAuthed({
  method: 'get',
  path: '/api/users/me',
  tags: ['Users'],
  summary: 'Profile of the caller, including the webhook URL',
  responses: { 200: json('Own profile', OwnProfileSchema) },
});

registerAuthed({
  method: 'patch',
  path: '/api/users/me/webhook',
  tags: ['Users'],
  summary: 'Set or clear the webhook URL of the caller',
  request: { body: { content: { 'application/json': { schema: UpdateWebhookRequestSchema } } } },
  responses: { 200: json('Updated profile', OwnProfileSchema) },
});

registerAuthed({
  method: 'get',
  path: '/api/users/{username}',
  tags: ['Users'],
  summary: 'Public profile of a user',
  request: { params: UsernameParams },
  responses: {
    200: json('Profile', UserProfileSchema),
    404: json('User not found', ErrorResponseSchema),
  },
});

registerAuthed({
  method: 'post',
  path: '/api/bots',
  tags: ['Users'],
  summary: 'Create a bot owned by the caller',
  request: { body: { content: { 'application/json': { schema: CreateBotRequestSchema } } } },
  responses: {
    201: json('Issued bot credentials', CredentialsResponseSchema),
    409: json('Username already taken', ErrorResponseSchema),
  },
});

// --- Admin ---

registerAuthed({
  method: 'get',
  path: '/api/admin/connections',
  tags: ['Admin'],
  summary: 'Live connections and their liveness',
  responses: { 200: json('Connection stats', ConnectionsResponseSchema) },
});

registerAuthed({
  method: 'patch',
  path: '/api/admin/users/{username}/role',
  tags: ['Admin'],
  summary: 'Assign a role',
  request: {
    params: UsernameParams,
    body: { content: { 'application/json': { schema: AssignRoleRequestSchema } } },
  },
  responses: {
    200: json('Updated profile', UserProfileSchema),
    404: json('User not found', ErrorResponseSchema),
  },
});

registerAuthed({
  method: 'patch',
  path: '/api/admin/messages/{id}',
  tags: ['Admin'],
  summary: 'Edit message content',
  request: {
    params: MessageIdParams,
    body: { content: { 'application/json': { schema: UpdateMessageRequestSchema } } },
  },
  responses: {
    200: json('Updated message', MessageResponseSchema),
    404: json('Message not found', ErrorResponseSchema),
  },
});

registerAuthed({
  method: 'delete',
  path: '/api/admin/messages/{id}',
  tags: ['Admin'],
  summary: 'Delete a message and its read receipts',
  request: { params: MessageIdParams },
  responses: {
    204: { description: 'Deleted' },
    404: json('Message not found', ErrorResponseSchema),
  },
});

// --- Generator ---

/** Generate the full OpenAPI 3.1.0 document from registered paths and schemas. */
export function generateOpenAPISpec() {
  const generator = new OpenApiGeneratorV31(registry.definitions);
  return generator.generateDocument({
    openapi: '3.1.0',
    info: {
      title: 'Switchboard API',
      version: '0.1.0',
      description:
        'REST API for the Switchboard chat server. Real-time delivery runs over the WebSocket ' +
        'endpoint at /ws.',
    },
    servers: [{ url: `http://localhost:${process.env.SWITCHBOARD_PORT || DEFAULT_PORT}` }],
  });
}
