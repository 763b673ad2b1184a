/**
 * Pub/sub mirror backed by the Centrifugo server HTTP API.
 *
 * Room messages are published to `room:main`, direct messages to
 * `user:<recipient>`. Client connection tokens for those channels are issued
 * elsewhere.
 *
 * @module delivery/adapters/centrifugo-mirror
 */
import { z } from 'zod';
import type { Identity, MessageResponse } from '@switchboard/shared/chat-schemas';
import { PUBSUB_CHANNELS } from '@switchboard/shared/constants';
import type { PubSubMirror } from '../types.js';

export interface CentrifugoMirrorConfig {
  /** Base URL of the server API, e.g. `http://localhost:8000/api` */
  apiUrl: string;
  apiKey: string;
  /** Default: 5000 */
  timeoutMs?: number;
}

const PublishReplySchema = z.object({
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});

export class CentrifugoMirror implements PubSubMirror {
  private readonly publishUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: CentrifugoMirrorConfig) {
    this.publishUrl = `${config.apiUrl.replace(/\/+$/, '')}/publish`;
    this.timeoutMs = config.timeoutMs ?? 5_000;
  }

  async publishRoomMessage(message: MessageResponse, _sender: Identity): Promise<void> {
    await this.publish(PUBSUB_CHANNELS.ROOM, message);
  }

  async publishDirectMessage(
    message: MessageResponse,
    _sender: Identity,
    recipient: Identity,
  ): Promise<void> {
    await this.publish(`${PUBSUB_CHANNELS.USER_PREFIX}${recipient.username}`, message);
  }

  /**
   * The timeout aborts the request and covers reading the reply body.
   *
   * @throws Error on a non-2xx status, a Centrifugo error reply or the timeout
   */
  private async publish(channel: string, data: MessageResponse): Promise<void> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`centrifugo publish timeout (${this.timeoutMs}ms)`)),
      this.timeoutMs,
    );
    try {
      const response = await fetch(this.publishUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-API-Key': this.config.apiKey,
        },
        body: JSON.stringify({ channel, data }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Centrifugo publish to ${channel} failed: HTTP ${response.status}`);
      }

      const reply = PublishReplySchema.safeParse(await response.json());
      if (reply.success && reply.data.error) {
        throw new Error(
          `Centrifugo publish to ${channel} failed: ${reply.data.error.message} (code ${reply.data.error.code})`,
        );
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
