import type { Server } from 'node:http';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import type { FrameSourceAdapter } from '../broadcast/frameSource.js';
import type { Logger } from '../lib/logger.js';
import { attachIngestSocket } from './ingest.js';
import type { SignalingEndpoint } from './signaling.js';
import { socketChannel } from './utils.js';

export interface WebSocketServerOptions {
  endpoint: SignalingEndpoint;
  frameSource: FrameSourceAdapter;
  logger: Logger;
  heartbeatMs: number;
}

export interface WebSocketServers {
  close(): Promise<void>;
}

const CLOSE_PRODUCER_CONFLICT = 4009;

export function registerWebSocketServer(
  httpServer: Server,
  { endpoint, frameSource, logger, heartbeatMs }: WebSocketServerOptions,
): WebSocketServers {
  const signalingWss = new WebSocketServer({ noServer: true });
  const ingestWss = new WebSocketServer({ noServer: true });
  const alive = new WeakMap<WebSocket, boolean>();
  let producer: WebSocket | undefined;

  httpServer.on('upgrade', (request, socket, head) => {
    const pathname = request.url?.split('?')[0];
    const target =
      pathname === '/ws' ? signalingWss : pathname === '/ingest' ? ingestWss : undefined;
    if (!target || (target === signalingWss && !endpoint.isAccepting)) {
      socket.destroy();
      return;
    }
    target.handleUpgrade(request, socket, head, (client) => {
      target.emit('connection', client, request);
    });
  });

  const trackLiveness = (socket: WebSocket) => {
    alive.set(socket, true);
    socket.on('pong', () => alive.set(socket, true));
  };

  signalingWss.on('connection', (socket, request) => {
    trackLiveness(socket);
    const session = endpoint.connect(socketChannel(socket));
    if (!session) return;

    logger.info({ sessionId: session.id, ip: request.socket.remoteAddress }, 'ws_connected');

    socket.on('message', (raw) => {
      endpoint.handleMessage(session, raw.toString()).catch((error: unknown) => {
        logger.error({ err: error, sessionId: session.id }, 'ws_message_failed');
      });
    });

    socket.on('close', () => {
      endpoint.disconnect(session, 'signaling_closed');
      logger.info({ sessionId: session.id, ip: request.socket.remoteAddress }, 'ws_disconnected');
    });

    socket.on('error', (err) => {
      logger.error({ err, sessionId: session.id }, 'ws_error');
      socket.close();
    });
  });

  ingestWss.on('connection', (socket, request) => {
    if (producer) {
      logger.warn({ ip: request.socket.remoteAddress }, 'ingest_producer_rejected');
      socket.close(CLOSE_PRODUCER_CONFLICT, 'Producer already connected');
      return;
    }
    producer = socket;
    trackLiveness(socket);
    const detach = attachIngestSocket(socket, frameSource, logger);
    logger.info({ ip: request.socket.remoteAddress }, 'ingest_connected');

    socket.on('close', () => {
      detach();
      if (producer === socket) producer = undefined;
      logger.info({ ip: request.socket.remoteAddress }, 'ingest_disconnected');
    });

    socket.on('error', (err) => {
      logger.error({ err }, 'ingest_error');
      socket.close();
    });
  });

  const heartbeatInterval = setInterval(() => {
    for (const wss of [signalingWss, ingestWss]) {
      wss.clients.forEach((client) => {
        if (alive.get(client) === false) {
          client.terminate();
          return;
        }
        alive.set(client, false);
        client.ping();
      });
    }
  }, heartbeatMs);

  return {
    async close() {
      clearInterval(heartbeatInterval);
      await Promise.all(
        [signalingWss, ingestWss].map(
          (wss) =>
            new Promise<void>((resolve) => {
              wss.clients.forEach((client) => client.close(1001, 'Shutting down'));
              wss.close(() => resolve());
            }),
        ),
      );
    },
  };
}
