/**
 * In-memory registry of live connections, keyed by username.
 *
 * An identity may hold any number of simultaneous connections. Each list is
 * replaced rather than mutated, so a push that is iterating a snapshot never
 * observes a concurrent connect or disconnect. Connections whose send fails or
 * times out are evicted and closed individually; siblings are untouched.
 *
 * @module delivery/connection-registry
 */
import { ulid } from 'ulidx';
import { CLOSE_CODES, PUSH_SEND_TIMEOUT_MS } from '@switchboard/shared/constants';
import type { OutboundFrame } from '@switchboard/shared/frame-schemas';
import type { LivenessMonitor } from './liveness-monitor.js';
import { withTimeout } from './timeout.js';
import type { Connection, ConnectionTransport, EvictionReason, Logger, PushResult } from './types.js';

export interface ConnectionRegistryOptions {
  /** Upper bound on a single live push. Default: 5000 */
  sendTimeoutMs?: number;
  logger?: Logger;
}

const CLOSE_REASONS: Record<EvictionReason, { code: number; reason: string }> = {
  stale: { code: CLOSE_CODES.CONNECTION_TIMED_OUT, reason: 'Connection timed out' },
  probe_failed: { code: CLOSE_CODES.CONNECTION_TIMED_OUT, reason: 'Connection timed out' },
  send_failed: { code: CLOSE_CODES.SEND_FAILED, reason: 'Send failed' },
};

export class ConnectionRegistry {
  private readonly connections = new Map<string, readonly Connection[]>();
  private readonly sendTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly monitor: LivenessMonitor,
    options: ConnectionRegistryOptions = {},
  ) {
    this.sendTimeoutMs = options.sendTimeoutMs ?? PUSH_SEND_TIMEOUT_MS;
    this.logger = options.logger ?? console;
    monitor.setExpiryHandler((connection, reason) => this.evict(connection, reason));
  }

  /** Register a connection alongside any the identity already has, and start tracking it. */
  connect(username: string, transport: ConnectionTransport): Connection {
    const connection: Connection = {
      id: ulid(),
      username,
      transport,
      connectedAt: new Date().toISOString(),
    };
    const existing = this.connections.get(username) ?? [];
    this.connections.set(username, [...existing, connection]);
    this.monitor.trackConnection(connection);

    this.logger.info(
      `[Registry] ${username} connected (${connection.id}), ${existing.length + 1} connection(s)`,
    );
    return connection;
  }

  /**
   * Remove exactly this connection. The identity goes offline when its last
   * connection is removed.
   *
   * @returns false when the pair was not registered
   */
  disconnect(username: string, transport: ConnectionTransport): boolean {
    const existing = this.connections.get(username);
    if (!existing) return false;

    const remaining = existing.filter((c) => c.transport !== transport);
    if (remaining.length === existing.length) return false;

    if (remaining.length === 0) {
      this.connections.delete(username);
    } else {
      this.connections.set(username, remaining);
    }
    this.monitor.untrackConnection(username, transport);

    this.logger.info(`[Registry] ${username} disconnected, ${remaining.length} connection(s) left`);
    return true;
  }

  getConnections(username: string): readonly Connection[] {
    return this.connections.get(username) ?? [];
  }

  listOnlineIdentities(): string[] {
    return [...this.connections.keys()];
  }

  isOnline(username: string): boolean {
    return this.connections.has(username);
  }

  /** True when at least one of the identity's connections is healthy. */
  isHealthy(username: string): boolean {
    return this.getConnections(username).some((c) => this.monitor.isHealthy(username, c.transport));
  }

  get connectionCount(): number {
    let total = 0;
    for (const list of this.connections.values()) total += list.length;
    return total;
  }

  /** Send a frame to every connection of one identity. */
  async push(username: string, frame: OutboundFrame): Promise<PushResult> {
    return this.pushTo(this.getConnections(username), frame);
  }

  /**
   * Send a frame to one registered connection under the push timeout,
   * evicting it if the send fails.
   *
   * @returns false when the send failed or the connection is no longer registered
   */
  async sendToConnection(
    username: string,
    transport: ConnectionTransport,
    frame: OutboundFrame,
  ): Promise<boolean> {
    const connection = this.getConnections(username).find((c) => c.transport === transport);
    if (!connection) return false;
    return this.sendTo(connection, frame);
  }

  /** Send a frame to every connection of every identity except `excludeUsername`. */
  async broadcast(frame: OutboundFrame, excludeUsername?: string): Promise<PushResult> {
    const targets: Connection[] = [];
    for (const [username, list] of this.connections) {
      if (username !== excludeUsername) targets.push(...list);
    }
    return this.pushTo(targets, frame);
  }

  /** Close and forget every connection. Used at shutdown. */
  closeAll(code: number, reason: string): void {
    for (const list of [...this.connections.values()]) {
      for (const connection of list) {
        this.disconnect(connection.username, connection.transport);
        this.closeTransport(connection, code, reason);
      }
    }
  }

  private async pushTo(targets: readonly Connection[], frame: OutboundFrame): Promise<PushResult> {
    const outcomes = await Promise.all(targets.map((c) => this.sendTo(c, frame)));
    const sent = outcomes.filter(Boolean).length;
    return { sent, failed: outcomes.length - sent };
  }

  private async sendTo(connection: Connection, frame: OutboundFrame): Promise<boolean> {
    try {
      await withTimeout(connection.transport.send(frame), this.sendTimeoutMs, 'push send');
      return true;
    } catch (err) {
      this.logger.warn(
        `[Registry] Push to ${connection.username} (${connection.id}) failed:`,
        err instanceof Error ? err.message : String(err),
      );
      this.evict(connection, 'send_failed');
      return false;
    }
  }

  private evict(connection: Connection, reason: EvictionReason): void {
    if (!this.disconnect(connection.username, connection.transport)) return;
    const { code, reason: text } = CLOSE_REASONS[reason];
    this.closeTransport(connection, code, text);
  }

  private closeTransport(connection: Connection, code: number, reason: string): void {
    try {
      connection.transport.close(code, reason);
    } catch (err) {
      this.logger.debug(
        `[Registry] Closing ${connection.id} failed:`,
        err instanceof Error ? err.message : String(err),
      );
    }
  }
}
