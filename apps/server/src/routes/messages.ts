/**
 * Message routes: send, history, unread state and read receipts.
 *
 * @module routes/messages
 */
import { Router } from 'express';
import {
  HistoryQuerySchema,
  PageQuerySchema,
  SendMessageRequestSchema,
} from '@switchboard/shared/chat-schemas';
import { currentIdentity } from '../middleware/auth.js';
import type { MessageService } from '../services/chat/message-service.js';

export function createMessagesRouter(service: MessageService): Router {
  const router = Router();

  // POST / — Send a room message, or a direct message when to_username is set
  router.post('/', (req, res) => {
    const result = SendMessageRequestSchema.safeParse(req.body);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    const message = service.send(currentIdentity(req), {
      content: result.data.content,
      toUsername: result.data.to_username,
    });
    return res.status(201).json(message);
  });

  // GET / — Room history
  router.get('/', (req, res) => {
    const result = HistoryQuerySchema.safeParse(req.query);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    return res.json(service.history(currentIdentity(req), result.data));
  });

  // GET /direct — Direct message history visible to the caller
  router.get('/direct', (req, res) => {
    const result = HistoryQuerySchema.safeParse(req.query);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    return res.json(service.directHistory(currentIdentity(req), result.data));
  });

  router.get('/unread', (req, res) => {
    const result = PageQuerySchema.safeParse(req.query);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    return res.json({ messages: service.unreadRoom(currentIdentity(req), result.data) });
  });

  router.get('/direct/unread', (req, res) => {
    const result = PageQuerySchema.safeParse(req.query);
    if (!result.success) {
      return res.status(400).json({ error: 'Validation failed', details: result.error.flatten() });
    }
    return res.json({ messages: service.unreadDirect(currentIdentity(req), result.data) });
  });

  router.get('/unread/count', (req, res) => {
    res.json(service.unreadCount(currentIdentity(req)));
  });

  router.post('/mark-all-read', (req, res) => {
    res.json({ marked_as_read: service.markAllRead(currentIdentity(req)) });
  });

  // POST /:id/read — Idempotent; a repeat reports already_read
  router.post('/:id/read', (req, res) => {
    const status = service.markRead(currentIdentity(req), req.params.id);
    res.json({ message_id: req.params.id, status });
  });

  return router;
}
