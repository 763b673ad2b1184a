import 'dotenv/config';
import fs from 'fs';
import http from 'http';
import path from 'path';
import { createDb, runMigrations, type Db } from '@switchboard/db';
import {
  CentrifugoMirror,
  ConnectionRegistry,
  DeliveryRouter,
  LivenessMonitor,
  WebhookDispatcher,
} from '@switchboard/delivery';
import { createApp } from './app.js';
import { initLogger, logger } from './lib/logger.js';
import { IdentityStore } from './services/chat/identity-store.js';
import { MessageService } from './services/chat/message-service.js';
import { MessageStore } from './services/chat/message-store.js';
import { WsGateway, WS_PATH } from './services/realtime/ws-gateway.js';
import { env } from './env.js';

const PORT = env.SWITCHBOARD_PORT;

// Global references for graceful shutdown
let db: Db | undefined;
let server: http.Server | undefined;
let gateway: WsGateway | undefined;
let monitor: LivenessMonitor | undefined;
let dispatcher: WebhookDispatcher | undefined;
let router: DeliveryRouter | undefined;

/** Create the bootstrap admin on first start and print its key once. */
function seedAdmin(identities: IdentityStore, username: string): void {
  if (identities.getByUsername(username)) return;
  const { apiKey } = identities.create({ username, role: 'admin' });
  logger.info(`[Auth] Created admin '${username}'. API key (shown once): ${apiKey}`);
}

async function start() {
  initLogger({ level: env.SWITCHBOARD_LOG_LEVEL, logDir: env.SWITCHBOARD_LOG_DIR });

  const dbPath = path.resolve(env.SWITCHBOARD_DB_PATH);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  db = createDb(dbPath);
  runMigrations(db);
  logger.info(`[DB] Database ready at ${dbPath}`);

  const identities = new IdentityStore(db);
  const messages = new MessageStore(db, env.SWITCHBOARD_MESSAGE_HISTORY_LIMIT);

  monitor = new LivenessMonitor(
    {
      probeIntervalMs: env.SWITCHBOARD_PROBE_INTERVAL_MS,
      staleAfterMs: env.SWITCHBOARD_STALE_AFTER_MS,
      probeSendTimeoutMs: env.SWITCHBOARD_PUSH_TIMEOUT_MS,
    },
    logger,
  );
  const registry = new ConnectionRegistry(monitor, {
    sendTimeoutMs: env.SWITCHBOARD_PUSH_TIMEOUT_MS,
    logger,
  });
  dispatcher = new WebhookDispatcher({
    timeoutMs: env.SWITCHBOARD_WEBHOOK_TIMEOUT_MS,
    maxRetries: env.SWITCHBOARD_WEBHOOK_MAX_RETRIES,
    logger,
  });
  dispatcher.start();

  let mirror: CentrifugoMirror | undefined;
  if (env.CENTRIFUGO_ENABLED && env.CENTRIFUGO_API_URL && env.CENTRIFUGO_API_KEY) {
    mirror = new CentrifugoMirror({ apiUrl: env.CENTRIFUGO_API_URL, apiKey: env.CENTRIFUGO_API_KEY });
    logger.info(`[Mirror] Publishing to Centrifugo at ${env.CENTRIFUGO_API_URL}`);
  }

  router = new DeliveryRouter({
    registry,
    webhooks: dispatcher,
    directory: identities,
    mirror,
    webhookPolicy: env.SWITCHBOARD_WEBHOOK_POLICY,
    logger,
  });
  const service = new MessageService({ messages, identities, router, registry });

  if (env.SWITCHBOARD_ADMIN_USERNAME) {
    seedAdmin(identities, env.SWITCHBOARD_ADMIN_USERNAME);
  }

  const app = createApp({ identities, service, registry, monitor });
  const httpServer = http.createServer(app);
  server = httpServer;
  gateway = new WsGateway({ identities, service, registry, monitor, logger });
  gateway.attach(httpServer);

  const host = env.SWITCHBOARD_HOST;
  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(PORT, host, resolve);
  });
  logger.info(`Switchboard server running on http://${host}:${PORT} (WebSocket at ${WS_PATH})`);
}

// Graceful shutdown
async function shutdown() {
  logger.info('Shutting down...');
  // Close sockets first so nothing new is dispatched while deliveries drain
  if (gateway) {
    await gateway.close();
  }
  monitor?.stop();
  // Aborts webhook retries so the remaining deliveries settle quickly
  dispatcher?.stop();
  if (router) {
    await router.idle();
  }
  if (server) {
    const closing = server;
    await new Promise<void>((resolve) => closing.close(() => resolve()));
  }
  db?.$client.close();
  process.exit(0);
}

function onSignal() {
  shutdown().catch((err: unknown) => {
    logger.error('Shutdown failed:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

start().catch((err: unknown) => {
  logger.error('Failed to start:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
