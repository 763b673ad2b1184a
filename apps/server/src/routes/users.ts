/**
 * User directory and self-service profile routes.
 *
 * @module routes/users
 */
import { Router } from 'express';
import { CreateBotRequestSchema, UpdateWebhookRequestSchema, type CredentialsResponse } from '@switchboard/shared/chat-schemas';
import { currentIdentity } from '../middleware/auth.js';
import { authorize } from '../services/chat/authorize.js';
import type { IdentityStore } from '../services/chat/identity-store.js';
import type { MessageService } from '../services/chat/message-service.js';
import { toOwnProfile } from '../services/chat/presenters.js';

export function createUsersRouter(service: MessageService, identities: IdentityStore): Router {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({ users: service.listUsers(currentIdentity(req)) });
  });

  router.get('/online', (req, res) => {
    res.json({ users: service.onlineUsers(currentIdentity(req)) });
  });

  router.get('/me', (req, res) => {
    res.json(toOwnProfile(currentIdentity(req)));
  });

  // PATCH /me/webhook — Set or clear (null) the caller's webhook URL
  router.patch('/me/webhook', (req, res) => {
    const me = currentIdentity(req);
    authorize(me, 'update_own_profile');
    const result = UpdateWebhookRequestSchema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    return res.json(toOwnProfile(identities.updateWebhook(me.username, result.data.webhook_url)));
  });

  router.get('/:username', (req, res) => {
    res.json(service.profile(currentIdentity(req), req.params.username));
  });

  return router;
}

/** POST / — Create a bot owned by the caller and return its credentials. */
export function createBotsRouter(identities: IdentityStore): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const me = currentIdentity(req);
    authorize(me, 'create_bot');
    const result = CreateBotRequestSchema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    const { identity, apiKey } = identities.create({
      username: result.data.username,
      role: 'bot',
      webhookUrl: result.data.webhook_url,
      logo: result.data.logo,
      emoji: result.data.emoji,
      createdBy: me.username,
    });
    const response: CredentialsResponse = { username: identity.username, role: identity.role, api_key: apiKey };
    return res.status(201).json(response);
  });

  return router;
}
