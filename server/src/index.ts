import http from 'node:http';
import { config } from './config.js';
import { createApp } from './app.js';
import { BroadcastEngine } from './broadcast/engine.js';
import { FrameSourceAdapter } from './broadcast/frameSource.js';
import { logger } from './lib/logger.js';
import { SessionRegistry } from './lib/sessionRegistry.js';
import { weriftTransportFactory } from './transport/weriftTransport.js';
import { registerWebSocketServer } from './ws/server.js';
import { SignalingEndpoint } from './ws/signaling.js';

const registry = new SessionRegistry();

const engine = new BroadcastEngine({
  registry,
  logger,
  mtu: config.rtpMtu,
  payloadType: config.rtpPayloadType,
  maxPendingFrames: config.maxPendingFrames,
  maxConsecutiveDrops: config.maxConsecutiveDrops,
  keyframeRequestIntervalMs: config.keyframeRequestIntervalMs,
});

const frameSource = new FrameSourceAdapter(engine, logger);

const endpoint = new SignalingEndpoint({
  registry,
  engine,
  logger,
  createTransport: weriftTransportFactory({
    stunServer: config.stunServer,
    payloadType: config.rtpPayloadType,
  }),
  signalingTimeoutMs: config.signalingTimeoutMs,
  connectTimeoutMs: config.connectTimeoutMs,
  maxSessions: config.maxSessions,
});

const app = createApp({
  registry,
  corsOrigins: config.corsOrigins,
  staticDir: config.staticDir,
});

const server = http.createServer(app);
const sockets = registerWebSocketServer(server, {
  endpoint,
  frameSource,
  logger,
  heartbeatMs: config.heartbeatMs,
});

server.listen(config.port, config.bindAddress, () => {
  logger.info({ port: config.port, bindAddress: config.bindAddress }, 'server_started');
});

server.on('error', (err) => {
  logger.fatal({ err }, 'server_error');
  process.exit(1);
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal, sessions: registry.size }, 'shutting_down');
  await endpoint.shutdown();
  await sockets.close();
  server.close(() => process.exit(0));
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'shutdown_failed');
      process.exit(1);
    });
  });
}
