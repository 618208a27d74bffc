import { describe, expect, it } from 'vitest';
import { INGEST_HEADER_SIZE, decodeIngestFrame, encodeIngestFrame } from '../src/ws/ingest.js';
import { keyframePayload } from './helpers.js';

describe('ingest framing', () => {
  it('reads the capture timestamp from an 8-byte big-endian header', () => {
    const data = Buffer.concat([
      Buffer.from([0x40, 0x59, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00]),
      Buffer.from([0x00, 0x00, 0x00, 0x01, 0x41, 0x9a]),
    ]);

    const frame = decodeIngestFrame(data);

    expect(frame?.captureTimestamp).toBe(100);
    expect(frame?.payload).toEqual(Buffer.from([0x00, 0x00, 0x00, 0x01, 0x41, 0x9a]));
  });

  it('ignores frames with no payload after the header', () => {
    expect(decodeIngestFrame(Buffer.alloc(INGEST_HEADER_SIZE))).toBeUndefined();
    expect(decodeIngestFrame(Buffer.alloc(3))).toBeUndefined();
  });

  it('encodes what it decodes', () => {
    const payload = keyframePayload();
    const encoded = encodeIngestFrame({ captureTimestamp: 1_717_000_000_123.5, payload });

    expect(encoded).toHaveLength(INGEST_HEADER_SIZE + payload.length);
    expect(decodeIngestFrame(encoded)).toEqual({ captureTimestamp: 1_717_000_000_123.5, payload });
  });
});
