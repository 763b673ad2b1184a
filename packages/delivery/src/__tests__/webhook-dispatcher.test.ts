import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createMockIdentity, createMockMessage } from '@switchboard/test-utils/mock-factories';
import { WebhookDispatcher } from '../webhook-dispatcher.js';
import { toMessageResponse } from '../message-payload.js';
import type { Logger } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const HOOK_URL = 'https://hooks.example.com/carol';

const sender = createMockIdentity({ username: 'alice', emoji: '🦊' });
const payload = toMessageResponse(createMockMessage({ id: 'msg-1', content: 'hello' }), sender);
const carol = createMockIdentity({ username: 'carol', webhookUrl: HOOK_URL });

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** fetch stand-in that never settles until its request is aborted. */
function hangingFetch() {
  return vi.fn(
    (_url: string, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
      }),
  );
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('WebhookDispatcher', () => {
  let logger: Logger;
  let dispatcher: WebhookDispatcher;

  beforeEach(() => {
    vi.useFakeTimers();
    logger = createMockLogger();
    dispatcher = new WebhookDispatcher({ logger });
    dispatcher.start();
  });

  afterEach(() => {
    dispatcher.stop();
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  describe('deliver', () => {
    it('POSTs the serialized message as JSON', async () => {
      const fetchMock = vi.fn().mockResolvedValue({ ok: true, status: 200 });
      vi.stubGlobal('fetch', fetchMock);

      const result = await dispatcher.deliver(carol, payload);

      expect(result).toMatchObject({ success: true, attempts: 1, status: 200 });
      expect(fetchMock).toHaveBeenCalledOnce();
      const [url, options] = fetchMock.mock.calls[0] as [string, RequestInit];
      expect(url).toBe(HOOK_URL);
      expect(options.method).toBe('POST');
      expect(options.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(JSON.parse(String(options.body))).toEqual(payload);
    });

    it('fails without a request when the identity has no webhook', async () => {
      const fetchMock = vi.fn();
      vi.stubGlobal('fetch', fetchMock);

      const result = await dispatcher.deliver(createMockIdentity({ username: 'bob' }), payload);

      expect(result).toEqual({
        success: false,
        attempts: 0,
        error: 'No webhook URL configured',
        durationMs: 0,
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('retries with 1s then 2s backoff and gives up after maxRetries', async () => {
      const fetchMock = vi.fn().mockResolvedValue({ ok: false, status: 503 });
      vi.stubGlobal('fetch', fetchMock);

      const pending = dispatcher.deliver(carol, payload);

      await vi.advanceTimersByTimeAsync(0);
      expect(fetchMock).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(999);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(fetchMock).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1_999);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(fetchMock).toHaveBeenCalledTimes(3);

      const result = await pending;
      expect(result).toMatchObject({ success: false, attempts: 3, status: 503, error: 'HTTP 503' });
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(logger.error).toHaveBeenCalledOnce();
    });

    it('honours a custom maxRetries with doubling delays', async () => {
      const fetchMock = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));
      vi.stubGlobal('fetch', fetchMock);
      const patient = new WebhookDispatcher({ logger, maxRetries: 4 });
      patient.start();

      const pending = patient.deliver(carol, payload);
      await vi.advanceTimersByTimeAsync(1_000 + 2_000 + 4_000);

      const result = await pending;
      expect(result).toMatchObject({ success: false, attempts: 4, error: 'ECONNREFUSED' });
      expect(fetchMock).toHaveBeenCalledTimes(4);
      patient.stop();
    });

    it('stops retrying on the first success', async () => {
      const fetchMock = vi
        .fn()
        .mockResolvedValueOnce({ ok: false, status: 500 })
        .mockResolvedValueOnce({ ok: true, status: 204 });
      vi.stubGlobal('fetch', fetchMock);

      const pending = dispatcher.deliver(carol, payload);
      await vi.advanceTimersByTimeAsync(1_000);

      expect(await pending).toMatchObject({ success: true, attempts: 2, status: 204 });
      await vi.advanceTimersByTimeAsync(10_000);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('retries after a request timeout', async () => {
      const fetchMock = hangingFetch();
      vi.stubGlobal('fetch', fetchMock);
      const quick = new WebhookDispatcher({ logger, timeoutMs: 500, maxRetries: 2 });
      quick.start();

      const pending = quick.deliver(carol, payload);
      await vi.advanceTimersByTimeAsync(500);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1_000 + 500);

      expect(await pending).toMatchObject({
        success: false,
        attempts: 2,
        error: 'webhook timeout (500ms)',
      });
      quick.stop();
    });

    it('fails fast while stopped', async () => {
      const fetchMock = vi.fn();
      vi.stubGlobal('fetch', fetchMock);
      dispatcher.stop();

      const result = await dispatcher.deliver(carol, payload);

      expect(result).toMatchObject({
        success: false,
        attempts: 0,
        error: 'Webhook dispatcher is not running',
      });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('abandons an in-flight delivery when stopped', async () => {
      vi.stubGlobal('fetch', hangingFetch());

      const pending = dispatcher.deliver(carol, payload);
      await vi.advanceTimersByTimeAsync(0);
      dispatcher.stop();

      expect(await pending).toMatchObject({
        success: false,
        attempts: 1,
        error: 'Webhook dispatcher is not running',
      });
    });

    it('abandons a pending backoff when stopped', async () => {
      const fetchMock = vi.fn().mockResolvedValue({ ok: false, status: 502 });
      vi.stubGlobal('fetch', fetchMock);

      const pending = dispatcher.deliver(carol, payload);
      await vi.advanceTimersByTimeAsync(500);
      dispatcher.stop();

      expect(await pending).toMatchObject({ success: false, attempts: 1 });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('start / stop', () => {
    it('is idempotent', () => {
      dispatcher.start();
      expect(dispatcher.running).toBe(true);
      dispatcher.stop();
      dispatcher.stop();
      expect(dispatcher.running).toBe(false);
    });
  });

  describe('broadcast', () => {
    it('delivers to every identity with a webhook except the excluded one', async () => {
      const fetchMock = vi.fn().mockResolvedValue({ ok: true, status: 200 });
      vi.stubGlobal('fetch', fetchMock);
      const identities = [
        createMockIdentity({ username: 'alice', webhookUrl: 'https://hooks.example.com/alice' }),
        createMockIdentity({ username: 'bob' }),
        carol,
        createMockIdentity({ username: 'dave', webhookUrl: 'https://hooks.example.com/dave' }),
      ];

      const result = await dispatcher.broadcast(payload, identities, 'alice');

      expect(result).toEqual({ attempted: 2, delivered: 2, failed: 0 });
      const urls = fetchMock.mock.calls.map((call) => call[0]);
      expect(urls.sort()).toEqual([HOOK_URL, 'https://hooks.example.com/dave']);
    });

    it('isolates one target exhausting its retries from the others', async () => {
      const fetchMock = vi.fn((url: string) =>
        Promise.resolve(url === HOOK_URL ? { ok: false, status: 500 } : { ok: true, status: 200 }),
      );
      vi.stubGlobal('fetch', fetchMock);
      const dave = createMockIdentity({ username: 'dave', webhookUrl: 'https://hooks.example.com/dave' });

      const pending = dispatcher.broadcast(payload, [carol, dave]);
      await vi.advanceTimersByTimeAsync(3_000);

      expect(await pending).toEqual({ attempted: 2, delivered: 1, failed: 1 });
      expect(fetchMock.mock.calls.filter((call) => call[0] === HOOK_URL)).toHaveLength(3);
    });
  });
});
