/**
 * WebSocket endpoint at `/ws`.
 *
 * Runs a `ws` server in `noServer` mode on the HTTP server's upgrade event.
 * A connection authenticates with its API key (`api_key` query parameter or
 * `x-api-key` header); one that fails is closed with 1008. Authenticated
 * sockets are registered with the ConnectionRegistry and get a ChatSession.
 *
 * @module services/realtime/ws-gateway
 */
import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import type { ConnectionRegistry, LivenessMonitor, Logger } from '@switchboard/delivery';
import { CLOSE_CODES } from '@switchboard/shared/constants';
import type { IdentityStore } from '../chat/identity-store.js';
import type { MessageService } from '../chat/message-service.js';
import { ChatSession } from './chat-session.js';
import { createWsTransport } from './ws-transport.js';

export const WS_PATH = '/ws';

const AUTH_FAILED_REASON = 'Invalid or missing authentication credentials';

export interface WsGatewayDeps {
  identities: IdentityStore;
  service: MessageService;
  registry: ConnectionRegistry;
  monitor: LivenessMonitor;
  logger: Logger;
}

function toText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Null when the request target is not a parseable URL, e.g. `http://[/ws`. */
function parseRequestUrl(target: string | undefined): URL | null {
  try {
    return new URL(target ?? '/', 'http://localhost');
  } catch {
    return null;
  }
}

export class WsGateway {
  private readonly wss = new WebSocketServer({ noServer: true });
  private server: Server | null = null;
  private closing: Promise<void> | null = null;

  constructor(private readonly deps: WsGatewayDeps) {}

  /** Start accepting upgrades on `server`. */
  attach(server: Server): void {
    if (this.server) return;
    this.server = server;
    server.on('upgrade', this.onUpgrade);
  }

  /** Close every connection with 1001 and stop accepting upgrades. Idempotent. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.server?.off('upgrade', this.onUpgrade);
    this.server = null;
    this.deps.registry.closeAll(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
    for (const client of this.wss.clients) client.close(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
    this.deps.logger.info('[Gateway] Closed');
  }

  private readonly onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const url = parseRequestUrl(req.url);
    if (!url || url.pathname !== WS_PATH) {
      socket.destroy();
      return;
    }
    this.wss.handleUpgrade(req, socket, head, (ws) => this.onConnection(ws, req, url));
  };

  private onConnection(ws: WebSocket, req: IncomingMessage, url: URL): void {
    const { identities, registry, logger } = this.deps;
    const remote = req.socket.remoteAddress ?? 'unknown';
    // Before auth: a rejected socket still parses frames until its close handshake ends.
    ws.on('error', (err) => {
      logger.warn(`[Gateway] Socket error from ${remote}:`, err.message);
    });
    const apiKey = url.searchParams.get('api_key') ?? headerValue(req.headers['x-api-key']);
    const identity = apiKey ? identities.getByApiKey(apiKey) : null;
    if (!identity) {
      logger.warn(`[Gateway] Rejected connection from ${remote}`);
      ws.close(CLOSE_CODES.POLICY_VIOLATION, AUTH_FAILED_REASON);
      return;
    }

    const transport = createWsTransport(ws);
    registry.connect(identity.username, transport);
    const session = new ChatSession(identity, transport, this.deps);

    ws.on('message', (data) => session.receive(toText(data)));
    ws.on('close', () => {
      registry.disconnect(identity.username, transport);
    });
  }
}
