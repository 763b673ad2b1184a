/**
 * Fans a persisted message out to live connections, webhooks and the optional
 * pub/sub mirror.
 *
 * The three channels run concurrently and each is isolated: a failure in one
 * is logged and reported in the `DeliveryReport` without affecting the
 * others. Nothing here throws back into the send path.
 *
 * @module delivery/delivery-router
 */
import type { Identity, Message, MessageResponse } from '@switchboard/shared/chat-schemas';
import type { ConnectionRegistry } from './connection-registry.js';
import { toMessageResponse } from './message-payload.js';
import type {
  DeliveryReport,
  IdentityDirectoryLike,
  Logger,
  PubSubMirror,
  PushResult,
  WebhookBroadcastResult,
  WebhookPolicy,
  WebhookSenderLike,
} from './types.js';

/** Dependencies injected into the DeliveryRouter. */
export interface DeliveryRouterDeps {
  registry: ConnectionRegistry;
  webhooks: WebhookSenderLike;
  directory: IdentityDirectoryLike;
  mirror?: PubSubMirror;
  /** Default: 'always' */
  webhookPolicy?: WebhookPolicy;
  logger?: Logger;
}

const NO_PUSH: PushResult = { sent: 0, failed: 0 };
const NO_WEBHOOKS: WebhookBroadcastResult = { attempted: 0, delivered: 0, failed: 0 };

export class DeliveryRouter {
  private readonly inFlight = new Set<Promise<DeliveryReport | null>>();
  private readonly logger: Logger;
  private readonly webhookPolicy: WebhookPolicy;

  constructor(private readonly deps: DeliveryRouterDeps) {
    this.logger = deps.logger ?? console;
    this.webhookPolicy = deps.webhookPolicy ?? 'always';
  }

  /**
   * Route a message in the background. The caller does not wait for any
   * channel; use `idle()` to wait for outstanding deliveries.
   */
  dispatch(message: Message, sender: Identity): void {
    const task: Promise<DeliveryReport | null> = this.route(message, sender)
      .catch((err: unknown) => {
        this.logger.error(
          `[Delivery] Routing ${message.id} failed:`,
          err instanceof Error ? err.message : String(err),
        );
        return null;
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /** Resolves once every dispatched delivery has settled. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Deliver a message on every applicable channel and report the outcome. */
  async route(message: Message, sender: Identity): Promise<DeliveryReport> {
    const payload = toMessageResponse(message, sender);
    const report =
      message.toUsername === null
        ? await this.routeRoom(payload, sender)
        : await this.routeDirect(payload, sender, message.toUsername);

    this.logger.debug(
      `[Delivery] ${message.id}: live ${report.live.sent} sent/${report.live.failed} failed, ` +
        `webhooks ${report.webhooks.delivered}/${report.webhooks.attempted}, mirrored ${String(report.mirrored)}`,
    );
    return report;
  }

  private async routeRoom(payload: MessageResponse, sender: Identity): Promise<DeliveryReport> {
    const { registry, webhooks, directory, mirror } = this.deps;
    const webhookTargets = directory
      .list()
      .filter((identity) => identity.username !== sender.username && this.wantsWebhook(identity));

    const [live, hooks, mirrored] = await Promise.all([
      this.isolate('live push', NO_PUSH, () =>
        registry.broadcast({ ...payload, type: 'message' }, sender.username),
      ),
      this.isolate('webhook', NO_WEBHOOKS, () =>
        webhooks.broadcast(payload, webhookTargets, sender.username),
      ),
      mirror ? this.publish(() => mirror.publishRoomMessage(payload, sender)) : null,
    ]);
    return { messageId: payload.id, live, webhooks: hooks, mirrored };
  }

  private async routeDirect(
    payload: MessageResponse,
    sender: Identity,
    toUsername: string,
  ): Promise<DeliveryReport> {
    const { registry, webhooks, directory, mirror } = this.deps;
    const recipient = directory.getByUsername(toUsername);
    if (!recipient) {
      this.logger.warn(`[Delivery] Recipient ${toUsername} of ${payload.id} no longer exists`);
      return { messageId: payload.id, live: NO_PUSH, webhooks: NO_WEBHOOKS, mirrored: null };
    }

    const sendWebhook = recipient.webhookUrl !== null && this.wantsWebhook(recipient);
    const [live, hooks, mirrored] = await Promise.all([
      this.isolate('live push', NO_PUSH, () =>
        registry.push(recipient.username, { ...payload, type: 'message' }),
      ),
      sendWebhook
        ? this.isolate('webhook', NO_WEBHOOKS, async () => {
            const result = await webhooks.deliver(recipient, payload);
            return { attempted: 1, delivered: result.success ? 1 : 0, failed: result.success ? 0 : 1 };
          })
        : NO_WEBHOOKS,
      mirror ? this.publish(() => mirror.publishDirectMessage(payload, sender, recipient)) : null,
    ]);
    return { messageId: payload.id, live, webhooks: hooks, mirrored };
  }

  private wantsWebhook(identity: Identity): boolean {
    return this.webhookPolicy === 'always' || !this.deps.registry.isOnline(identity.username);
  }

  private async publish(run: () => Promise<void>): Promise<boolean> {
    return this.isolate('pub/sub mirror', false, async () => {
      await run();
      return true;
    });
  }

  private async isolate<T>(channel: string, fallback: T, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      this.logger.error(
        `[Delivery] ${channel} failed:`,
        err instanceof Error ? err.message : String(err),
      );
      return fallback;
    }
  }
}
