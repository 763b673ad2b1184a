import { Router } from 'express';
import { RegisterRequestSchema, type CredentialsResponse } from '@switchboard/shared/chat-schemas';
import type { IdentityStore } from '../services/chat/identity-store.js';

/** Open self-registration. Only the member and viewer roles can be chosen. */
export function createRegisterRouter(identities: IdentityStore): Router {
  const router = Router();

  router.post('/', (req, res) => {
    const result = RegisterRequestSchema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    const { username, role, webhook_url, logo, emoji } = result.data;
    const { identity, apiKey } = identities.create({
      username,
      role,
      webhookUrl: webhook_url,
      logo,
      emoji,
    });
    const response: CredentialsResponse = { username: identity.username, role: identity.role, api_key: apiKey };
    return res.status(201).json(response);
  });

  return router;
}
