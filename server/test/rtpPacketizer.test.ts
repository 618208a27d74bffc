import { describe, expect, it } from 'vitest';
import { RtpPacketizer } from '../src/media/rtpPacketizer.js';
import type { H264AccessUnit, RtpStreamState } from '../src/types.js';
import { PPS, SPS, idrSlice, nal, nonIdrSlice, parseRtp } from './helpers.js';

function unit(nalUnits: Buffer[], captureTimestamp = 0, isKeyframe = false): H264AccessUnit {
  return { payload: Buffer.concat(nalUnits), nalUnits, captureTimestamp, isKeyframe };
}

function stream(overrides: Partial<RtpStreamState> = {}): RtpStreamState {
  return { sequenceNumber: 10, timestampOffset: 1000, ssrc: 0xdeadbeef, ...overrides };
}

describe('RtpPacketizer', () => {
  it('sends a small NAL unit as a single packet with a full RTP header', () => {
    const packetizer = new RtpPacketizer({ mtu: 1200, payloadType: 96 });
    const state = stream();
    const slice = nonIdrSlice(20);

    const packets = packetizer.packetize(unit([slice], 500), state);

    expect(packets).toHaveLength(1);
    expect(packets[0]).toHaveLength(32);
    expect(packets[0][0]).toBe(0x80);
    expect(parseRtp(packets[0])).toEqual({
      marker: true,
      payloadType: 96,
      sequenceNumber: 10,
      timestamp: 1000,
      ssrc: 0xdeadbeef,
      payload: slice,
    });
    expect(state.sequenceNumber).toBe(11);
    expect(state.captureOrigin).toBe(500);
  });

  it('aggregates parameter sets and a small slice into one STAP-A packet', () => {
    const packetizer = new RtpPacketizer({ mtu: 1200, payloadType: 96 });
    const idr = idrSlice(20);

    const [packet, ...rest] = packetizer.packetize(unit([SPS, PPS, idr], 0, true), stream());

    expect(rest).toHaveLength(0);
    const { payload, marker } = parseRtp(packet);
    expect(marker).toBe(true);
    expect(payload[0]).toBe(0x78);
    expect(payload).toEqual(
      Buffer.concat([
        Buffer.from([0x78, 0x00, 0x05]),
        SPS,
        Buffer.from([0x00, 0x04]),
        PPS,
        Buffer.from([0x00, 0x14]),
        idr,
      ]),
    );
  });

  it('fragments an oversized NAL unit into FU-A packets', () => {
    const packetizer = new RtpPacketizer({ mtu: 112, payloadType: 96 });
    const idr = idrSlice(250);

    const packets = packetizer.packetize(unit([idr], 0, true), stream());
    const parsed = packets.map(parseRtp);

    expect(packets.map((packet) => packet.length)).toEqual([112, 112, 67]);
    expect(parsed.map((packet) => packet.payload[0])).toEqual([0x7c, 0x7c, 0x7c]);
    expect(parsed.map((packet) => packet.payload[1])).toEqual([0x85, 0x05, 0x45]);
    expect(parsed.map((packet) => packet.marker)).toEqual([false, false, true]);
    expect(parsed.map((packet) => packet.sequenceNumber)).toEqual([10, 11, 12]);
    expect(Buffer.concat(parsed.map((packet) => packet.payload.subarray(2)))).toEqual(
      idr.subarray(1),
    );
  });

  it('flushes pending aggregates before fragmenting and marks only the last packet', () => {
    const packetizer = new RtpPacketizer({ mtu: 112, payloadType: 96 });

    const parsed = packetizer
      .packetize(unit([SPS, PPS, idrSlice(250)], 0, true), stream())
      .map(parseRtp);

    expect(parsed).toHaveLength(4);
    expect(parsed[0].payload[0] & 0x1f).toBe(24);
    expect(parsed.slice(1).map((packet) => packet.payload[0] & 0x1f)).toEqual([28, 28, 28]);
    expect(parsed.map((packet) => packet.marker)).toEqual([false, false, false, true]);
    expect(new Set(parsed.map((packet) => packet.timestamp))).toEqual(new Set([1000]));
  });

  it('keeps NAL units that do not fit together in separate packets', () => {
    const packetizer = new RtpPacketizer({ mtu: 112, payloadType: 96 });
    const first = nal(0x41, 60, 0x01);
    const second = nal(0x41, 60, 0x02);

    const parsed = packetizer.packetize(unit([first, second]), stream()).map(parseRtp);

    expect(parsed.map((packet) => packet.payload)).toEqual([first, second]);
  });

  it('wraps the sequence number at 16 bits', () => {
    const packetizer = new RtpPacketizer({ mtu: 112, payloadType: 96 });
    const state = stream({ sequenceNumber: 0xffff });

    const parsed = packetizer
      .packetize(unit([nal(0x41, 60), nal(0x41, 60)]), state)
      .map(parseRtp);

    expect(parsed.map((packet) => packet.sequenceNumber)).toEqual([0xffff, 0]);
    expect(state.sequenceNumber).toBe(1);
  });

  it('derives 90 kHz timestamps from capture time and wraps at 32 bits', () => {
    const packetizer = new RtpPacketizer({ mtu: 1200, payloadType: 96 });
    const state = stream({ timestampOffset: 0xffffff00 });

    const first = parseRtp(packetizer.packetize(unit([nonIdrSlice()], 1000), state)[0]);
    const second = parseRtp(packetizer.packetize(unit([nonIdrSlice()], 1040), state)[0]);

    expect(first.timestamp).toBe(0xffffff00);
    expect(second.timestamp).toBe(3344);
  });

  it('rejects an MTU with no room for a fragment', () => {
    expect(() => new RtpPacketizer({ mtu: 14, payloadType: 96 })).toThrow(RangeError);
  });
});
