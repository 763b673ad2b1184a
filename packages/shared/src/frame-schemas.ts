/**
 * WebSocket frame schemas.
 *
 * Inbound frames are JSON objects discriminated by `type`; a frame without a
 * `type` is treated as `message`. Outbound frames are described as plain
 * types since the server is their only producer.
 *
 * @module shared/frame-schemas
 */
import { z } from 'zod';
import {
  MessageContentSchema,
  PageQueryShape,
  SinceSchema,
  type MessageResponse,
  type OwnProfile,
  type Pagination,
  type UserProfile,
} from './chat-schemas.js';

// === Inbound ===

export const InboundFrameTypeSchema = z.enum([
  'message',
  'mark_read',
  'mark_all_read',
  'mark_room_read',
  'mark_direct_read',
  'get_unread_count',
  'get_messages',
  'get_direct_messages',
  'get_unread_messages',
  'get_unread_direct_messages',
  'get_users',
  'get_online_users',
  'get_user_profile',
  'pong',
]);

export type InboundFrameType = z.infer<typeof InboundFrameTypeSchema>;

function requiredField(name: string) {
  return z
    .string({ required_error: `Missing ${name} field`, invalid_type_error: `${name} must be a string` })
    .min(1, `Missing ${name} field`);
}

const HistoryFrameShape = { ...PageQueryShape, since: SinceSchema.optional() };

export const InboundFrameSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('message'),
    content: MessageContentSchema,
    to_username: z.string().min(1).nullish(),
  }),
  z.object({ type: z.literal('mark_read'), message_id: requiredField('message_id') }),
  z.object({ type: z.literal('mark_all_read') }),
  z.object({ type: z.literal('mark_room_read') }),
  z.object({ type: z.literal('mark_direct_read'), from_username: requiredField('from_username') }),
  z.object({ type: z.literal('get_unread_count') }),
  z.object({ type: z.literal('get_messages'), ...HistoryFrameShape }),
  z.object({ type: z.literal('get_direct_messages'), ...HistoryFrameShape }),
  z.object({ type: z.literal('get_unread_messages'), ...PageQueryShape }),
  z.object({ type: z.literal('get_unread_direct_messages'), ...PageQueryShape }),
  z.object({ type: z.literal('get_users') }),
  z.object({ type: z.literal('get_online_users') }),
  z.object({ type: z.literal('get_user_profile'), username: requiredField('username') }),
  z.object({ type: z.literal('pong'), timestamp: z.string().optional() }),
]);

export type InboundFrame = z.infer<typeof InboundFrameSchema>;

const FrameObjectSchema = z.record(z.unknown());

export type ParseFrameResult = { ok: true; frame: InboundFrame } | { ok: false; error: string };

/**
 * Validate a decoded JSON value as an inbound frame.
 *
 * Unknown `type` values are reported as `Unknown message type: <type>`;
 * field errors report the first Zod issue message.
 */
export function parseInboundFrame(raw: unknown): ParseFrameResult {
  const record = FrameObjectSchema.safeParse(raw);
  if (!record.success) {
    return { ok: false, error: 'Frame must be a JSON object' };
  }

  const type = record.data.type ?? 'message';
  const knownType = InboundFrameTypeSchema.safeParse(type);
  if (!knownType.success) {
    return { ok: false, error: `Unknown message type: ${String(type)}` };
  }

  const parsed = InboundFrameSchema.safeParse({ ...record.data, type: knownType.data });
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? 'Invalid frame' };
  }
  return { ok: true, frame: parsed.data };
}

// === Outbound ===

export interface PingFrame {
  type: 'ping';
  timestamp: string;
}

export type PushedMessageFrame = MessageResponse & { type: 'message' };

export interface ReadReceiptFrame {
  type: 'read_receipt';
  message_id: string;
  read_by: string;
  read_at: string;
}

export interface ErrorFrame {
  type: 'error';
  error: string;
}

export type ResponseFrame =
  | { type: 'message_sent'; status: 'sent'; message: MessageResponse }
  | { type: 'marked_read'; message_id: string; status: 'success' | 'already_read' }
  | { type: 'marked_all_read'; marked_as_read: number; status: 'success' }
  | { type: 'marked_room_read'; count: number; status: 'success' }
  | { type: 'marked_direct_read'; from_username: string; count: number; status: 'success' }
  | {
      type: 'unread_count';
      unread_room_messages: number;
      unread_direct_messages: number;
      total_unread: number;
    }
  | { type: 'messages'; messages: MessageResponse[]; pagination: Pagination }
  | { type: 'direct_messages'; messages: MessageResponse[]; pagination: Pagination }
  | { type: 'unread_messages'; messages: MessageResponse[] }
  | { type: 'unread_direct_messages'; messages: MessageResponse[] }
  | { type: 'users'; users: UserProfile[] }
  | { type: 'online_users'; users: string[] }
  | { type: 'user_profile'; user: UserProfile | OwnProfile };

/** Every frame the server may write to a client socket. */
export type OutboundFrame = PingFrame | PushedMessageFrame | ReadReceiptFrame | ErrorFrame | ResponseFrame;
