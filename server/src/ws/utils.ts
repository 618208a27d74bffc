import type WebSocket from 'ws';
import type { ServerMessage, SignalingChannel } from '../types.js';

export function send(
  socket: WebSocket,
  message: ServerMessage | Record<string, unknown>,
): void {
  if (socket.readyState !== socket.OPEN) return;
  socket.send(JSON.stringify(message));
}

export function socketChannel(socket: WebSocket): SignalingChannel {
  return {
    send: (message) => send(socket, message),
    close: (code, reason) => {
      if (socket.readyState === socket.CLOSED || socket.readyState === socket.CLOSING) return;
      socket.close(code, reason);
    },
  };
}
