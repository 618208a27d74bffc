import type { H264AccessUnit, RtpStreamState } from '../types.js';
import { NalUnitType } from './h264.js';

export const RTP_HEADER_SIZE = 12;
export const H264_CLOCK_RATE = 90_000;

const SEQUENCE_MODULO = 0x1_0000;
const TIMESTAMP_MODULO = 0x1_0000_0000;

export interface RtpPacketizerOptions {
  mtu: number;
  payloadType: number;
  clockRate?: number;
}

/**
 * RFC 6184 packetization (non-interleaved mode). Small consecutive NAL units are
 * aggregated into STAP-A, oversized ones are split into FU-A fragments, and the
 * marker bit closes the access unit. The only state touched is the stream
 * state passed in, so one instance serves every session.
 */
export class RtpPacketizer {
  readonly maxPayloadSize: number;
  private readonly payloadType: number;
  private readonly clockRate: number;

  constructor(options: RtpPacketizerOptions) {
    this.maxPayloadSize = options.mtu - RTP_HEADER_SIZE;
    if (this.maxPayloadSize < 3) {
      throw new RangeError(`MTU ${options.mtu} leaves no room for an FU-A fragment`);
    }
    this.payloadType = options.payloadType & 0x7f;
    this.clockRate = options.clockRate ?? H264_CLOCK_RATE;
  }

  packetize(unit: H264AccessUnit, stream: RtpStreamState): Buffer[] {
    const payloads = this.payloadsFor(unit.nalUnits);
    if (stream.captureOrigin === undefined) {
      stream.captureOrigin = unit.captureTimestamp;
    }
    const timestamp = this.rtpTimestamp(unit.captureTimestamp, stream);

    return payloads.map((payload, index) => {
      const packet = this.writePacket(payload, {
        marker: index === payloads.length - 1,
        sequenceNumber: stream.sequenceNumber,
        timestamp,
        ssrc: stream.ssrc,
      });
      stream.sequenceNumber = (stream.sequenceNumber + 1) % SEQUENCE_MODULO;
      return packet;
    });
  }

  rtpTimestamp(captureTimestamp: number, stream: RtpStreamState): number {
    const origin = stream.captureOrigin ?? captureTimestamp;
    const elapsed = Math.max(0, Math.round(((captureTimestamp - origin) * this.clockRate) / 1000));
    return (stream.timestampOffset + elapsed) % TIMESTAMP_MODULO;
  }

  private payloadsFor(nals: readonly Buffer[]): Buffer[] {
    const payloads: Buffer[] = [];
    let group: Buffer[] = [];
    let groupSize = 1;

    const flush = () => {
      if (group.length === 1) {
        payloads.push(group[0]);
      } else if (group.length > 1) {
        payloads.push(buildStapA(group));
      }
      group = [];
      groupSize = 1;
    };

    for (const nal of nals) {
      if (nal.length === 0) continue;
      if (nal.length > this.maxPayloadSize) {
        flush();
        payloads.push(...this.fragment(nal));
        continue;
      }
      if (groupSize + 2 + nal.length > this.maxPayloadSize) {
        flush();
      }
      group.push(nal);
      groupSize += 2 + nal.length;
    }
    flush();
    return payloads;
  }

  private fragment(nal: Buffer): Buffer[] {
    const indicator = (nal[0] & 0xe0) | NalUnitType.FuA;
    const type = nal[0] & 0x1f;
    const body = nal.subarray(1);
    const chunkSize = this.maxPayloadSize - 2;
    const fragments: Buffer[] = [];

    for (let offset = 0; offset < body.length; offset += chunkSize) {
      const chunk = body.subarray(offset, offset + chunkSize);
      const start = offset === 0 ? 0x80 : 0;
      const end = offset + chunkSize >= body.length ? 0x40 : 0;
      fragments.push(Buffer.concat([Buffer.from([indicator, start | end | type]), chunk]));
    }
    return fragments;
  }

  private writePacket(
    payload: Buffer,
    header: { marker: boolean; sequenceNumber: number; timestamp: number; ssrc: number },
  ): Buffer {
    const packet = Buffer.alloc(RTP_HEADER_SIZE + payload.length);
    packet[0] = 0x80;
    packet[1] = (header.marker ? 0x80 : 0) | this.payloadType;
    packet.writeUInt16BE(header.sequenceNumber, 2);
    packet.writeUInt32BE(header.timestamp, 4);
    packet.writeUInt32BE(header.ssrc >>> 0, 8);
    payload.copy(packet, RTP_HEADER_SIZE);
    return packet;
  }
}

function buildStapA(nals: readonly Buffer[]): Buffer {
  let forbidden = 0;
  let nri = 0;
  for (const nal of nals) {
    forbidden |= nal[0] & 0x80;
    nri = Math.max(nri, nal[0] & 0x60);
  }
  const parts: Buffer[] = [Buffer.from([forbidden | nri | NalUnitType.StapA])];
  for (const nal of nals) {
    const size = Buffer.alloc(2);
    size.writeUInt16BE(nal.length, 0);
    parts.push(size, nal);
  }
  return Buffer.concat(parts);
}
