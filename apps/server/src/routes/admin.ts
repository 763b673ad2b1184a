/**
 * Administration routes: live connection stats, role assignment and
 * message moderation.
 *
 * @module routes/admin
 */
import { Router } from 'express';
import type { ConnectionRegistry, LivenessMonitor } from '@switchboard/delivery';
import { AssignRoleRequestSchema, UpdateMessageRequestSchema } from '@switchboard/shared/chat-schemas';
import { currentIdentity } from '../middleware/auth.js';
import { authorize } from '../services/chat/authorize.js';
import type { IdentityStore } from '../services/chat/identity-store.js';
import type { MessageService } from '../services/chat/message-service.js';
import { toConnectionStats, toUserProfile } from '../services/chat/presenters.js';

export interface AdminRouterDeps {
  service: MessageService;
  identities: IdentityStore;
  registry: ConnectionRegistry;
  monitor: LivenessMonitor;
}

export function createAdminRouter({ service, identities, registry, monitor }: AdminRouterDeps): Router {
  const router = Router();

  // GET /connections — One record per live connection
  router.get('/connections', (req, res) => {
    authorize(currentIdentity(req), 'view_connections');
    const online = registry.listOnlineIdentities();
    res.json({
      online_users: online,
      total_connections: registry.connectionCount,
      connections: online.flatMap((username) => monitor.connectionStats(username)).map(toConnectionStats),
    });
  });

  router.patch('/users/:username/role', (req, res) => {
    authorize(currentIdentity(req), 'manage_users');
    const result = AssignRoleRequestSchema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    return res.json(toUserProfile(identities.assignRole(req.params.username, result.data.role)));
  });

  router.patch('/messages/:id', (req, res) => {
    const me = currentIdentity(req);
    authorize(me, 'moderate_messages');
    const result = UpdateMessageRequestSchema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    return res.json(service.editMessage(me, req.params.id, result.data.content));
  });

  router.delete('/messages/:id', (req, res) => {
    service.deleteMessage(currentIdentity(req), req.params.id);
    res.status(204).end();
  });

  return router;
}
