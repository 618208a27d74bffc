import type WebSocket from 'ws';
import type { FrameSourceAdapter } from '../broadcast/frameSource.js';
import type { Logger } from '../lib/logger.js';
import { send } from './utils.js';

export const INGEST_HEADER_SIZE = 8;

export interface IngestFrame {
  captureTimestamp: number;
  payload: Buffer;
}

/** `[float64 BE capture timestamp, ms][Annex-B access unit]` */
export function decodeIngestFrame(data: Buffer): IngestFrame | undefined {
  if (data.length <= INGEST_HEADER_SIZE) return undefined;
  return {
    captureTimestamp: data.readDoubleBE(0),
    payload: data.subarray(INGEST_HEADER_SIZE),
  };
}

/** Producer-side framing: what an upstream pipeline writes to `/ingest`. */
export function encodeIngestFrame(frame: IngestFrame): Buffer {
  const header = Buffer.alloc(INGEST_HEADER_SIZE);
  header.writeDoubleBE(frame.captureTimestamp, 0);
  return Buffer.concat([header, frame.payload]);
}

function toBuffer(raw: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(raw)) return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw);
  return Buffer.from(raw);
}

/**
 * Wires one upstream producer socket into the frame source. Keyframe requests
 * travel back on the same socket.
 */
export function attachIngestSocket(
  socket: WebSocket,
  frameSource: FrameSourceAdapter,
  logger: Logger,
): () => void {
  const unsubscribe = frameSource.onKeyframeRequest((reason) => {
    send(socket, { type: 'keyframe_request', reason });
  });

  socket.on('message', (raw, isBinary) => {
    if (!isBinary) {
      logger.debug('ingest_text_ignored');
      return;
    }
    const frame = decodeIngestFrame(toBuffer(raw));
    if (!frame) {
      logger.warn('ingest_frame_too_short');
      return;
    }
    frameSource.ingest(frame.payload, frame.captureTimestamp);
  });

  return unsubscribe;
}
