import type { Identity, Message, MessageResponse } from '@switchboard/shared/chat-schemas';
import { isBot } from '@switchboard/shared/permissions';

/**
 * Serialize a stored message for the wire, attaching the sender's display
 * metadata. `sender` is null when the author no longer exists.
 */
export function toMessageResponse(message: Message, sender: Identity | null): MessageResponse {
  return {
    id: message.id,
    from_username: message.fromUsername,
    from_user_logo: sender?.logo ?? null,
    from_user_emoji: sender?.emoji ?? null,
    from_user_bot: sender ? isBot(sender) : false,
    to_username: message.toUsername,
    content: message.content,
    message_type: message.type,
    timestamp: message.timestamp,
  };
}
