import { Router } from 'express';
import { createRequire } from 'module';
import { z } from 'zod';
import type { ConnectionRegistry } from '@switchboard/delivery';
import type { HealthResponse } from '@switchboard/shared/schemas';

const req = createRequire(import.meta.url);
const { version: SERVER_VERSION } = z
  .object({ version: z.string() })
  .parse(req('../../package.json'));

export function createHealthRouter(registry: ConnectionRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const response: HealthResponse = {
      status: 'ok',
      version: SERVER_VERSION,
      uptime: process.uptime(),
      connections: registry.connectionCount,
    };
    res.json(response);
  });

  return router;
}
