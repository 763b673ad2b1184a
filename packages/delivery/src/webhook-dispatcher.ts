/**
 * Outbound webhook delivery with timeout and exponential backoff.
 *
 * Requests run inside a scope opened by `start()` and aborted by `stop()`:
 * stopping cancels in-flight requests and pending backoff sleeps, and calls
 * made while stopped fail immediately. Failures are returned as results and
 * logged, never thrown.
 *
 * @module delivery/webhook-dispatcher
 */
import type { Identity, MessageResponse } from '@switchboard/shared/chat-schemas';
import { WEBHOOK } from '@switchboard/shared/constants';
import type { Logger, WebhookBroadcastResult, WebhookDeliveryResult } from './types.js';

export interface WebhookDispatcherOptions {
  /** Per-request timeout. Default: 10000 */
  timeoutMs?: number;
  /** Total attempts per delivery. Default: 3 */
  maxRetries?: number;
  /** Backoff before retry n (0-based) is `backoffBaseMs * 2^n`. Default: 1000 */
  backoffBaseMs?: number;
  logger?: Logger;
}

const STOPPED_ERROR = 'Webhook dispatcher is not running';

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class WebhookDispatcher {
  private scope: AbortController | null = null;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly logger: Logger;

  constructor(options: WebhookDispatcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? WEBHOOK.TIMEOUT_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? WEBHOOK.MAX_RETRIES);
    this.backoffBaseMs = options.backoffBaseMs ?? WEBHOOK.BACKOFF_BASE_MS;
    this.logger = options.logger ?? console;
  }

  start(): void {
    if (this.scope) return;
    this.scope = new AbortController();
    this.logger.debug('[Webhook] Dispatcher started');
  }

  /** Abort in-flight requests and backoff sleeps. Idempotent. */
  stop(): void {
    if (!this.scope) return;
    this.scope.abort(new Error('Webhook dispatcher stopped'));
    this.scope = null;
    this.logger.debug('[Webhook] Dispatcher stopped');
  }

  get running(): boolean {
    return this.scope !== null;
  }

  /**
   * POST the message to the identity's webhook URL, retrying on any failure.
   *
   * Any 2xx status is success. Non-2xx statuses, timeouts, network errors and
   * unexpected exceptions are all retried until `maxRetries` attempts are used.
   */
  async deliver(identity: Identity, message: MessageResponse): Promise<WebhookDeliveryResult> {
    const startTime = Date.now();
    const url = identity.webhookUrl;
    if (!url) {
      return { success: false, attempts: 0, error: 'No webhook URL configured', durationMs: 0 };
    }
    const scope = this.scope;
    if (!scope) {
      return { success: false, attempts: 0, error: STOPPED_ERROR, durationMs: 0 };
    }

    const body = JSON.stringify(message);
    let attempts = 0;
    let lastStatus: number | undefined;
    let lastError = '';

    while (attempts < this.maxRetries) {
      attempts++;
      try {
        const response = await this.post(url, body, scope.signal);
        if (response.ok) {
          this.logger.debug(
            `[Webhook] Delivered ${message.id} to ${identity.username} (attempt ${attempts})`,
          );
          return {
            success: true,
            attempts,
            status: response.status,
            durationMs: Date.now() - startTime,
          };
        }
        lastStatus = response.status;
        lastError = `HTTP ${response.status}`;
      } catch (err) {
        lastError = err instanceof Error ? err.message : String(err);
      }

      if (scope.signal.aborted) {
        lastError = STOPPED_ERROR;
        break;
      }
      this.logger.warn(
        `[Webhook] Delivery of ${message.id} to ${identity.username} failed (attempt ${attempts}/${this.maxRetries}): ${lastError}`,
      );
      if (attempts < this.maxRetries) {
        const delayMs = this.backoffBaseMs * 2 ** (attempts - 1);
        if (!(await sleep(delayMs, scope.signal))) {
          lastError = STOPPED_ERROR;
          break;
        }
      }
    }

    this.logger.error(
      `[Webhook] Giving up on ${message.id} for ${identity.username} after ${attempts} attempt(s): ${lastError}`,
    );
    return {
      success: false,
      attempts,
      status: lastStatus,
      error: lastError,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Deliver to every identity with a webhook URL except `excludeUsername`,
   * concurrently. One target's failure never affects another.
   */
  async broadcast(
    message: MessageResponse,
    identities: readonly Identity[],
    excludeUsername?: string,
  ): Promise<WebhookBroadcastResult> {
    const targets = identities.filter((i) => i.webhookUrl && i.username !== excludeUsername);
    const results = await Promise.allSettled(targets.map((i) => this.deliver(i, message)));

    let delivered = 0;
    for (const result of results) {
      if (result.status === 'fulfilled') {
        if (result.value.success) delivered++;
      } else {
        this.logger.error(
          '[Webhook] Unexpected broadcast failure:',
          result.reason instanceof Error ? result.reason.message : String(result.reason),
        );
      }
    }
    return { attempted: targets.length, delivered, failed: targets.length - delivered };
  }

  private async post(url: string, body: string, scope: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const onScopeAbort = () => controller.abort(scope.reason);
    scope.addEventListener('abort', onScopeAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new Error(`webhook timeout (${this.timeoutMs}ms)`)),
      this.timeoutMs,
    );
    try {
      return await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timer);
      scope.removeEventListener('abort', onScopeAbort);
    }
  }
}
