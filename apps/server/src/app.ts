import express from 'express';
import cors from 'cors';
import { apiReference } from '@scalar/express-api-reference';
import type { ConnectionRegistry, LivenessMonitor } from '@switchboard/delivery';
import { createHealthRouter } from './routes/health.js';
import { createRegisterRouter } from './routes/register.js';
import { createMessagesRouter } from './routes/messages.js';
import { createBotsRouter, createUsersRouter } from './routes/users.js';
import { createAdminRouter } from './routes/admin.js';
import { generateOpenAPISpec } from './services/core/openapi-registry.js';
import type { IdentityStore } from './services/chat/identity-store.js';
import type { MessageService } from './services/chat/message-service.js';
import { authenticate } from './middleware/auth.js';
import { errorHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';

export interface AppDeps {
  identities: IdentityStore;
  service: MessageService;
  registry: ConnectionRegistry;
  monitor: LivenessMonitor;
}

export function createApp({ identities, service, registry, monitor }: AppDeps) {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // Public routes
  app.use('/api/health', createHealthRouter(registry));
  app.use('/api/register', createRegisterRouter(identities));

  // Authenticated routes
  const requireKey = authenticate(identities);
  app.use('/api/messages', requireKey, createMessagesRouter(service));
  app.use('/api/users', requireKey, createUsersRouter(service, identities));
  app.use('/api/bots', requireKey, createBotsRouter(identities));
  app.use('/api/admin', requireKey, createAdminRouter({ service, identities, registry, monitor }));

  // OpenAPI spec + interactive docs
  const spec = generateOpenAPISpec();
  app.get('/api/openapi.json', (_req, res) => res.json(spec));
  app.use('/api/docs', apiReference({ spec: { content: spec } }));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
