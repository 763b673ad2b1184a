/**
 * Per-connection liveness tracking.
 *
 * Every tracked connection owns one timer chain. Each tick either expires the
 * connection (no inbound activity for longer than the staleness threshold) or
 * sends it a `ping` frame and schedules the next tick once the send settles,
 * so ticks for one connection never overlap and a slow socket only delays its
 * own chain.
 *
 * @module delivery/liveness-monitor
 */
import { LIVENESS, PUSH_SEND_TIMEOUT_MS } from '@switchboard/shared/constants';
import { withTimeout } from './timeout.js';
import type { Connection, ConnectionStats, ConnectionTransport, EvictionReason, Logger } from './types.js';

export interface LivenessOptions {
  probeIntervalMs: number;
  staleAfterMs: number;
  /** Upper bound on a single probe write. */
  probeSendTimeoutMs: number;
}

export type ExpiryHandler = (connection: Connection, reason: Extract<EvictionReason, 'stale' | 'probe_failed'>) => void;

interface TrackedConnection {
  connection: Connection;
  lastActivityAt: number;
  lastProbeAckAt: number;
  timer: NodeJS.Timeout | null;
}

export const DEFAULT_LIVENESS_OPTIONS: LivenessOptions = {
  probeIntervalMs: LIVENESS.PROBE_INTERVAL_MS,
  staleAfterMs: LIVENESS.STALE_AFTER_MS,
  probeSendTimeoutMs: PUSH_SEND_TIMEOUT_MS,
};

export class LivenessMonitor {
  private readonly tracked = new Map<ConnectionTransport, TrackedConnection>();
  private readonly options: LivenessOptions;
  private onExpire: ExpiryHandler | null = null;

  constructor(
    options: Partial<LivenessOptions> = {},
    private readonly logger: Logger = console,
  ) {
    this.options = { ...DEFAULT_LIVENESS_OPTIONS, ...options };
  }

  /** Called with each connection the monitor gives up on. Set by the registry. */
  setExpiryHandler(handler: ExpiryHandler): void {
    this.onExpire = handler;
  }

  trackConnection(connection: Connection): void {
    if (this.tracked.has(connection.transport)) return;

    const now = Date.now();
    const entry: TrackedConnection = {
      connection,
      lastActivityAt: now,
      lastProbeAckAt: now,
      timer: null,
    };
    this.tracked.set(connection.transport, entry);
    this.schedule(entry);
  }

  /** Cancel the connection's timer chain. Unknown pairs are ignored. */
  untrackConnection(username: string, transport: ConnectionTransport): boolean {
    const entry = this.find(username, transport);
    if (!entry) return false;
    this.release(entry);
    return true;
  }

  recordActivity(username: string, transport: ConnectionTransport): void {
    const entry = this.find(username, transport);
    if (entry) entry.lastActivityAt = Date.now();
  }

  recordProbeAck(username: string, transport: ConnectionTransport): void {
    const entry = this.find(username, transport);
    if (!entry) return;
    const now = Date.now();
    entry.lastProbeAckAt = now;
    entry.lastActivityAt = now;
  }

  /**
   * Write a `ping` frame to one connection.
   *
   * A failed or timed-out write expires the connection exactly as staleness
   * would.
   *
   * @returns true when the probe was written
   */
  async sendProbe(username: string, transport: ConnectionTransport): Promise<boolean> {
    const entry = this.find(username, transport);
    if (!entry) return false;

    try {
      await withTimeout(
        transport.send({ type: 'ping', timestamp: new Date().toISOString() }),
        this.options.probeSendTimeoutMs,
        'probe send',
      );
      return true;
    } catch (err) {
      this.logger.warn(
        `[Liveness] Probe to ${username} (${entry.connection.id}) failed:`,
        err instanceof Error ? err.message : String(err),
      );
      this.expire(entry, 'probe_failed');
      return false;
    }
  }

  isHealthy(username: string, transport: ConnectionTransport): boolean {
    const entry = this.find(username, transport);
    if (!entry) return false;
    return Date.now() - entry.lastActivityAt < this.options.staleAfterMs;
  }

  /** One record per tracked connection of the identity. */
  connectionStats(username: string): ConnectionStats[] {
    const now = Date.now();
    const stats: ConnectionStats[] = [];
    for (const entry of this.tracked.values()) {
      if (entry.connection.username !== username) continue;
      stats.push({
        username,
        connectionId: entry.connection.id,
        connectedAt: entry.connection.connectedAt,
        lastActivityAt: new Date(entry.lastActivityAt).toISOString(),
        lastProbeAckAt: new Date(entry.lastProbeAckAt).toISOString(),
        secondsSinceActivity: (now - entry.lastActivityAt) / 1000,
        secondsSinceProbeAck: (now - entry.lastProbeAckAt) / 1000,
        healthy: now - entry.lastActivityAt < this.options.staleAfterMs,
      });
    }
    return stats;
  }

  /** Number of connections currently tracked. */
  get size(): number {
    return this.tracked.size;
  }

  /** Cancel every timer chain. Used at shutdown. */
  stop(): void {
    for (const entry of [...this.tracked.values()]) {
      this.release(entry);
    }
  }

  private find(username: string, transport: ConnectionTransport): TrackedConnection | undefined {
    const entry = this.tracked.get(transport);
    return entry && entry.connection.username === username ? entry : undefined;
  }

  private isCurrent(entry: TrackedConnection): boolean {
    return this.tracked.get(entry.connection.transport) === entry;
  }

  private schedule(entry: TrackedConnection): void {
    entry.timer = setTimeout(() => {
      entry.timer = null;
      this.tick(entry).catch((err: unknown) => {
        this.logger.error('[Liveness] Tick failed:', err instanceof Error ? err.message : String(err));
      });
    }, this.options.probeIntervalMs);
  }

  private async tick(entry: TrackedConnection): Promise<void> {
    if (!this.isCurrent(entry)) return;

    const { username, transport, id } = entry.connection;
    const idleMs = Date.now() - entry.lastActivityAt;
    if (idleMs > this.options.staleAfterMs) {
      this.logger.info(`[Liveness] ${username} (${id}) idle for ${Math.round(idleMs / 1000)}s, disconnecting`);
      this.expire(entry, 'stale');
      return;
    }

    const sent = await this.sendProbe(username, transport);
    if (sent && this.isCurrent(entry)) this.schedule(entry);
  }

  private release(entry: TrackedConnection): void {
    if (entry.timer) clearTimeout(entry.timer);
    entry.timer = null;
    this.tracked.delete(entry.connection.transport);
  }

  private expire(entry: TrackedConnection, reason: 'stale' | 'probe_failed'): void {
    if (!this.isCurrent(entry)) return;
    this.release(entry);
    try {
      this.onExpire?.(entry.connection, reason);
    } catch (err) {
      this.logger.error('[Liveness] Expiry handler failed:', err instanceof Error ? err.message : String(err));
    }
  }
}
