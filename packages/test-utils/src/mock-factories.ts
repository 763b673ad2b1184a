import type { Identity, Message } from '@switchboard/shared/chat-schemas';

export function createMockIdentity(overrides: Partial<Identity> = {}): Identity {
  const username = overrides.username ?? 'alice';
  return {
    id: `id-${username}`,
    username,
    role: 'member',
    webhookUrl: null,
    logo: null,
    emoji: null,
    createdBy: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function createMockMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: '01JAAAAAAAAAAAAAAAAAAAAAAA',
    fromUsername: 'alice',
    toUsername: null,
    content: 'hello',
    type: 'room',
    timestamp: '2026-01-01T12:00:00.000Z',
    ...overrides,
  };
}
