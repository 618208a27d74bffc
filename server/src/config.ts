import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  BIND_ADDRESS: z.string().default('0.0.0.0'),
  STUN_SERVER: z.string().default('stun:stun.l.google.com:19302'),
  SIGNALING_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(15_000),
  MAX_SESSIONS: z.coerce.number().int().positive().default(64),
  MAX_PENDING_FRAMES: z.coerce.number().int().min(1).default(8),
  MAX_CONSECUTIVE_DROPS: z.coerce.number().int().min(1).default(150),
  RTP_MTU: z.coerce.number().int().min(64).max(9000).default(1200),
  RTP_PAYLOAD_TYPE: z.coerce.number().int().min(96).max(127).default(96),
  KEYFRAME_REQUEST_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:8080,http://127.0.0.1:8080'),
  LOG_LEVEL: z.string().default('info'),
  STATIC_DIR: z.string().optional(),
});

const parsed = envSchema.parse(process.env);

export const config = {
  port: parsed.PORT,
  bindAddress: parsed.BIND_ADDRESS,
  stunServer: parsed.STUN_SERVER,
  signalingTimeoutMs: parsed.SIGNALING_TIMEOUT_MS,
  connectTimeoutMs: parsed.CONNECT_TIMEOUT_MS,
  heartbeatMs: parsed.WS_HEARTBEAT_MS,
  maxSessions: parsed.MAX_SESSIONS,
  maxPendingFrames: parsed.MAX_PENDING_FRAMES,
  maxConsecutiveDrops: parsed.MAX_CONSECUTIVE_DROPS,
  rtpMtu: parsed.RTP_MTU,
  rtpPayloadType: parsed.RTP_PAYLOAD_TYPE,
  keyframeRequestIntervalMs: parsed.KEYFRAME_REQUEST_INTERVAL_MS,
  corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
  logLevel: parsed.LOG_LEVEL,
  staticDir: parsed.STATIC_DIR
    ? path.resolve(process.cwd(), parsed.STATIC_DIR)
    : fileURLToPath(new URL('../public/', import.meta.url)),
};

