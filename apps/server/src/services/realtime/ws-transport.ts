import { WebSocket } from 'ws';
import type { ConnectionTransport } from '@switchboard/delivery';
import type { OutboundFrame } from '@switchboard/shared/frame-schemas';

/** Adapt a `ws` socket to the delivery core's transport contract. */
export function createWsTransport(socket: WebSocket): ConnectionTransport {
  return {
    send(frame: OutboundFrame): Promise<void> {
      return new Promise((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error('Socket is not open'));
          return;
        }
        socket.send(JSON.stringify(frame), (err) => (err ? reject(err) : resolve()));
      });
    },
    close(code: number, reason: string): void {
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
        socket.close(code, reason);
      }
    },
  };
}
