import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ConnectionRegistry,
  DeliveryRouter,
  LivenessMonitor,
  type WebhookBroadcastResult,
  type WebhookDeliveryResult,
  type WebhookSenderLike,
} from '@switchboard/delivery';
import type { Identity, MessageResponse } from '@switchboard/shared/chat-schemas';
import { createTestDb } from '@switchboard/test-utils/db';
import { createFakeTransport, framesOfType } from '@switchboard/test-utils/fake-transport';
import { AuthorizationError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { IdentityStore } from '../identity-store.js';
import { MessageService } from '../message-service.js';
import { MessageStore } from '../message-store.js';

vi.mock('../../../lib/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const silent = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

function createWebhookMock() {
  return {
    deliver: vi.fn(
      async (_identity: Identity, _message: MessageResponse): Promise<WebhookDeliveryResult> => ({
        success: true,
        attempts: 1,
        status: 200,
        durationMs: 1,
      }),
    ),
    broadcast: vi.fn(
      async (
        _message: MessageResponse,
        identities: readonly Identity[],
        excludeUsername?: string,
      ): Promise<WebhookBroadcastResult> => {
        const attempted = identities.filter((i) => i.webhookUrl && i.username !== excludeUsername).length;
        return { attempted, delivered: attempted, failed: 0 };
      },
    ),
  } satisfies WebhookSenderLike;
}

describe('MessageService', () => {
  let identities: IdentityStore;
  let messages: MessageStore;
  let monitor: LivenessMonitor;
  let registry: ConnectionRegistry;
  let router: DeliveryRouter;
  let webhooks: ReturnType<typeof createWebhookMock>;
  let service: MessageService;
  let alice: Identity;
  let bob: Identity;
  let carol: Identity;

  beforeEach(() => {
    const db = createTestDb();
    identities = new IdentityStore(db);
    messages = new MessageStore(db, 100);
    monitor = new LivenessMonitor({}, silent);
    registry = new ConnectionRegistry(monitor, { logger: silent });
    webhooks = createWebhookMock();
    router = new DeliveryRouter({ registry, webhooks, directory: identities, logger: silent });
    service = new MessageService({ messages, identities, router, registry });

    alice = identities.create({ username: 'alice', role: 'member' }).identity;
    bob = identities.create({ username: 'bob', role: 'member' }).identity;
    carol = identities.create({
      username: 'carol',
      role: 'member',
      webhookUrl: 'http://hooks.local/carol',
    }).identity;
  });

  afterEach(() => {
    monitor.stop();
  });

  function identity(username: string, role: Identity['role']): Identity {
    return identities.create({ username, role }).identity;
  }

  describe('send()', () => {
    it('pushes a room message to online members and webhooks offline ones', async () => {
      const aliceSocket = createFakeTransport();
      const bobSocket = createFakeTransport();
      registry.connect('alice', aliceSocket);
      registry.connect('bob', bobSocket);

      const sent = service.send(alice, { content: 'hello' });
      await router.idle();

      expect(sent).toMatchObject({ from_username: 'alice', to_username: null, content: 'hello', message_type: 'room' });
      expect(framesOfType(bobSocket, 'message')).toEqual([{ ...sent, type: 'message' }]);
      expect(aliceSocket.sent).toEqual([]);

      const [payload, targets, exclude] = webhooks.broadcast.mock.calls[0] ?? [];
      expect(payload?.id).toBe(sent.id);
      expect(targets?.map((i) => i.username)).toEqual(['bob', 'carol']);
      expect(exclude).toBe('alice');
    });

    it('persists before delivery and returns without waiting for it', () => {
      const hanging = createFakeTransport('hang');
      registry.connect('bob', hanging);

      const sent = service.send(alice, { content: 'hello' });

      expect(messages.getById(sent.id)?.content).toBe('hello');
      expect(router.pending).toBe(1);
    });

    it('delivers a direct message to the recipient only', async () => {
      const bobSocket = createFakeTransport();
      const carolSocket = createFakeTransport();
      registry.connect('bob', bobSocket);
      registry.connect('carol', carolSocket);

      const sent = service.send(alice, { content: 'psst', toUsername: 'carol' });
      await router.idle();

      expect(sent.message_type).toBe('direct');
      expect(framesOfType(carolSocket, 'message').map((f) => f.id)).toEqual([sent.id]);
      expect(bobSocket.sent).toEqual([]);
      expect(webhooks.deliver).toHaveBeenCalledWith(carol, expect.objectContaining({ id: sent.id }));
    });

    it('rejects a direct send from a viewer before persisting anything', async () => {
      const vera = identity('vera', 'viewer');

      expect(() => service.send(vera, { content: 'hi', toUsername: 'bob' })).toThrow(AuthorizationError);
      await router.idle();

      expect(messages.countDirect({ username: 'vera', seesAllDirect: true })).toBe(0);
      expect(webhooks.deliver).not.toHaveBeenCalled();
    });

    it('names the missing capability when a bot sends a direct message', () => {
      const helper = identity('helper', 'bot');

      expect(() => service.send(helper, { content: 'hi', toUsername: 'bob' })).toThrow(
        "Your role 'bot' does not have permission to send direct messages",
      );
    });

    it('lets a bot post to the room', async () => {
      const helper = identity('helper', 'bot');
      const bobSocket = createFakeTransport();
      registry.connect('bob', bobSocket);

      const sent = service.send(helper, { content: 'beep' });
      await router.idle();

      expect(sent.from_user_bot).toBe(true);
      expect(framesOfType(bobSocket, 'message')).toHaveLength(1);
    });

    it('rejects direct messages to identities that cannot receive them', () => {
      identity('vera', 'viewer');

      expect(() => service.send(alice, { content: 'hi', toUsername: 'vera' })).toThrow(
        'Cannot send direct messages to viewer users',
      );
      expect(messages.countDirect({ username: 'alice', seesAllDirect: true })).toBe(0);
    });

    it('reports an unknown recipient as 404', () => {
      let caught: unknown;
      try {
        service.send(alice, { content: 'hi', toUsername: 'nobody' });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({ status: 404, message: "Recipient 'nobody' not found" });
    });

    it('rejects empty content', () => {
      expect(() => service.send(alice, { content: '' })).toThrow('Missing content field');
    });
  });

  describe('history', () => {
    it('paginates room history', () => {
      for (const content of ['a', 'b', 'c']) service.send(alice, { content });

      const result = service.history(bob, { limit: 2, offset: 0 });

      expect(result.messages.map((m) => m.content)).toEqual(['a', 'b']);
      expect(result.pagination).toEqual({ total: 3, offset: 0, limit: 2, has_more: true });
    });

    it('shows a viewer every direct message', () => {
      service.send(alice, { content: 'to bob', toUsername: 'bob' });
      const vera = identity('vera', 'viewer');

      expect(service.directHistory(vera, { limit: 50, offset: 0 }).pagination.total).toBe(1);
      expect(service.directHistory(carol, { limit: 50, offset: 0 }).pagination.total).toBe(0);
    });
  });

  describe('read receipts', () => {
    it('notifies the author once when someone else reads their message', async () => {
      const aliceSocket = createFakeTransport();
      registry.connect('alice', aliceSocket);
      const sent = service.send(alice, { content: 'read me' });
      await router.idle();

      expect(service.markRead(bob, sent.id)).toBe('success');
      expect(service.markRead(bob, sent.id)).toBe('already_read');
      await vi.waitFor(() => expect(framesOfType(aliceSocket, 'read_receipt')).toHaveLength(1));

      expect(framesOfType(aliceSocket, 'read_receipt')[0]).toMatchObject({
        message_id: sent.id,
        read_by: 'bob',
      });
    });

    it('does not notify the author about their own read', async () => {
      const aliceSocket = createFakeTransport();
      registry.connect('alice', aliceSocket);
      const sent = service.send(alice, { content: 'mine' });
      await router.idle();

      service.markRead(alice, sent.id);
      await Promise.resolve();

      expect(framesOfType(aliceSocket, 'read_receipt')).toEqual([]);
    });

    it('throws NotFoundError for an unknown message', () => {
      expect(() => service.markRead(bob, 'missing')).toThrow(NotFoundError);
    });

    it('keeps the unread total consistent and clears it on markAllRead', () => {
      service.send(alice, { content: 'room' });
      service.send(alice, { content: 'dm', toUsername: 'bob' });
      service.send(bob, { content: 'own' });

      expect(service.unreadCount(bob)).toEqual({
        unread_room_messages: 1,
        unread_direct_messages: 1,
        total_unread: 2,
      });
      expect(service.markAllRead(bob)).toBe(2);
      expect(service.unreadCount(bob).total_unread).toBe(0);
    });

    it('marks the direct messages of one sender', () => {
      service.send(alice, { content: 'from alice', toUsername: 'bob' });
      service.send(carol, { content: 'from carol', toUsername: 'bob' });

      expect(service.markDirectRead(bob, 'alice')).toBe(1);
      expect(service.unreadDirect(bob, { limit: 50, offset: 0 }).map((m) => m.content)).toEqual(['from carol']);
    });
  });

  describe('directory', () => {
    it('shows the webhook URL only to its owner', () => {
      expect(service.profile(carol, 'carol')).toMatchObject({ webhook_url: 'http://hooks.local/carol' });
      expect(service.profile(alice, 'carol')).not.toHaveProperty('webhook_url');
    });

    it('lists online users from the registry', () => {
      registry.connect('bob', createFakeTransport());

      expect(service.onlineUsers(alice)).toEqual(['bob']);
    });
  });

  describe('moderation', () => {
    it('lets an admin edit and delete messages', () => {
      const admin = identity('root', 'admin');
      const sent = service.send(alice, { content: 'oops' });

      expect(service.editMessage(admin, sent.id, 'fixed').content).toBe('fixed');
      service.deleteMessage(admin, sent.id);
      expect(messages.getById(sent.id)).toBeNull();
    });

    it('refuses moderation to members', () => {
      const sent = service.send(alice, { content: 'mine' });

      expect(() => service.deleteMessage(bob, sent.id)).toThrow(AuthorizationError);
    });
  });
});
