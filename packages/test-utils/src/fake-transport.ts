import { vi } from 'vitest';
import type { ConnectionTransport } from '@switchboard/delivery';
import type { OutboundFrame } from '@switchboard/shared/frame-schemas';

/**
 * In-process stand-in for a client socket.
 *
 * - `ok`: frames are recorded in `sent`
 * - `fail`: every send rejects
 * - `hang`: every send stays pending forever
 */
export interface FakeTransport extends ConnectionTransport {
  mode: 'ok' | 'fail' | 'hang';
  sent: OutboundFrame[];
  closeCalls: Array<{ code: number; reason: string }>;
}

export function createFakeTransport(mode: FakeTransport['mode'] = 'ok'): FakeTransport {
  const transport: FakeTransport = {
    mode,
    sent: [],
    closeCalls: [],
    send: vi.fn(async (frame: OutboundFrame): Promise<void> => {
      if (transport.mode === 'fail') throw new Error('socket closed');
      if (transport.mode === 'hang') return new Promise<void>(() => undefined);
      transport.sent.push(frame);
    }),
    close: vi.fn((code: number, reason: string) => {
      transport.closeCalls.push({ code, reason });
    }),
  };
  return transport;
}

/** Frames of one type, narrowed. */
export function framesOfType<T extends OutboundFrame['type']>(
  transport: FakeTransport,
  type: T,
): Array<Extract<OutboundFrame, { type: T }>> {
  return transport.sent.filter((f): f is Extract<OutboundFrame, { type: T }> => f.type === type);
}
