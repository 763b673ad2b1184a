import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createFakeTransport } from '@switchboard/test-utils/fake-transport';
import { LivenessMonitor } from '../liveness-monitor.js';
import type { Connection, ConnectionTransport, Logger } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function connectionFor(
  username: string,
  transport: ConnectionTransport,
  id = `conn-${username}`,
): Connection {
  return { id, username, transport, connectedAt: new Date().toISOString() };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('LivenessMonitor', () => {
  let monitor: LivenessMonitor;
  let onExpire: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
    monitor = new LivenessMonitor({}, createMockLogger());
    onExpire = vi.fn();
    monitor.setExpiryHandler(onExpire);
  });

  afterEach(() => {
    monitor.stop();
    vi.useRealTimers();
  });

  it('sends a ping every probe interval', async () => {
    const transport = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', transport));

    await vi.advanceTimersByTimeAsync(29_999);
    expect(transport.sent).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(1);
    expect(transport.sent).toEqual([{ type: 'ping', timestamp: '2026-03-01T10:00:30.000Z' }]);

    await vi.advanceTimersByTimeAsync(30_000);
    expect(transport.sent).toHaveLength(2);
  });

  it('expires a connection silent for more than 90 seconds', async () => {
    const transport = createFakeTransport();
    const connection = connectionFor('alice', transport);
    monitor.trackConnection(connection);

    // Ticks at 30s, 60s and 90s probe; 90s of silence is not yet stale.
    await vi.advanceTimersByTimeAsync(90_000);
    expect(onExpire).not.toHaveBeenCalled();
    expect(transport.sent).toHaveLength(3);

    await vi.advanceTimersByTimeAsync(30_000);
    expect(onExpire).toHaveBeenCalledWith(connection, 'stale');
    expect(monitor.size).toBe(0);
  });

  it('keeps a connection alive while it sends frames', async () => {
    const transport = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', transport));

    for (let i = 0; i < 10; i++) {
      await vi.advanceTimersByTimeAsync(20_000);
      monitor.recordActivity('alice', transport);
    }

    expect(onExpire).not.toHaveBeenCalled();
    expect(monitor.isHealthy('alice', transport)).toBe(true);
  });

  it('treats a probe acknowledgement as activity', async () => {
    const transport = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', transport));

    for (let i = 0; i < 5; i++) {
      await vi.advanceTimersByTimeAsync(30_000);
      monitor.recordProbeAck('alice', transport);
    }

    expect(onExpire).not.toHaveBeenCalled();
    const [stats] = monitor.connectionStats('alice');
    expect(stats?.lastProbeAckAt).toBe('2026-03-01T10:02:30.000Z');
    expect(stats?.lastActivityAt).toBe('2026-03-01T10:02:30.000Z');
  });

  it('expires only the silent connection of an identity with two connections', async () => {
    const silent = createFakeTransport();
    const active = createFakeTransport();
    const silentConnection = connectionFor('alice', silent, 'conn-1');
    monitor.trackConnection(silentConnection);
    monitor.trackConnection(connectionFor('alice', active, 'conn-2'));

    for (let i = 0; i < 6; i++) {
      await vi.advanceTimersByTimeAsync(20_000);
      monitor.recordActivity('alice', active);
    }

    expect(onExpire).toHaveBeenCalledTimes(1);
    expect(onExpire).toHaveBeenCalledWith(silentConnection, 'stale');
    expect(monitor.connectionStats('alice').map((s) => s.connectionId)).toEqual(['conn-2']);
  });

  it('expires a connection whose probe cannot be sent', async () => {
    const transport = createFakeTransport('fail');
    const connection = connectionFor('alice', transport);
    monitor.trackConnection(connection);

    await vi.advanceTimersByTimeAsync(30_000);

    expect(onExpire).toHaveBeenCalledWith(connection, 'probe_failed');
    expect(monitor.size).toBe(0);
  });

  it('expires a connection whose probe write hangs past the send timeout', async () => {
    const transport = createFakeTransport('hang');
    const connection = connectionFor('alice', transport);
    monitor.trackConnection(connection);

    await vi.advanceTimersByTimeAsync(30_000);
    expect(onExpire).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(5_000);
    expect(onExpire).toHaveBeenCalledWith(connection, 'probe_failed');
  });

  it('does not let a hanging connection delay probes to another', async () => {
    const hanging = createFakeTransport('hang');
    const healthy = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', hanging));
    monitor.trackConnection(connectionFor('bob', healthy));

    await vi.advanceTimersByTimeAsync(60_000);

    expect(healthy.sent).toHaveLength(2);
  });

  it('stops probing after untrackConnection', async () => {
    const transport = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', transport));

    expect(monitor.untrackConnection('alice', transport)).toBe(true);
    await vi.advanceTimersByTimeAsync(120_000);

    expect(transport.sent).toHaveLength(0);
    expect(onExpire).not.toHaveBeenCalled();
  });

  it('ignores untracking an unknown pair', () => {
    const transport = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', transport));

    expect(monitor.untrackConnection('bob', transport)).toBe(false);
    expect(monitor.untrackConnection('alice', createFakeTransport())).toBe(false);
    expect(monitor.size).toBe(1);
  });

  it('reports health from time since last activity', () => {
    const transport = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', transport));

    vi.setSystemTime(new Date('2026-03-01T10:01:29.999Z'));
    expect(monitor.isHealthy('alice', transport)).toBe(true);

    vi.setSystemTime(new Date('2026-03-01T10:01:30.000Z'));
    expect(monitor.isHealthy('alice', transport)).toBe(false);
  });

  it('returns one stats record per connection', async () => {
    const first = createFakeTransport();
    const second = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', first, 'conn-1'));
    await vi.advanceTimersByTimeAsync(10_000);
    monitor.trackConnection(connectionFor('alice', second, 'conn-2'));
    monitor.trackConnection(connectionFor('bob', createFakeTransport(), 'conn-3'));

    const stats = monitor.connectionStats('alice');

    expect(stats).toHaveLength(2);
    expect(stats[0]).toMatchObject({
      connectionId: 'conn-1',
      secondsSinceActivity: 10,
      secondsSinceProbeAck: 10,
      healthy: true,
    });
    expect(stats[1]).toMatchObject({ connectionId: 'conn-2', secondsSinceActivity: 0 });
  });

  it('cancels every timer on stop', async () => {
    const alice = createFakeTransport();
    const bob = createFakeTransport();
    monitor.trackConnection(connectionFor('alice', alice));
    monitor.trackConnection(connectionFor('bob', bob));

    monitor.stop();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(monitor.size).toBe(0);
    expect(alice.sent).toHaveLength(0);
    expect(bob.sent).toHaveLength(0);
  });
});
