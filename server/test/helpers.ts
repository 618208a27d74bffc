import { pino } from 'pino';
import { BroadcastEngine } from '../src/broadcast/engine.js';
import { FrameSourceAdapter } from '../src/broadcast/frameSource.js';
import type { ClientSession } from '../src/lib/clientSession.js';
import { SessionRegistry } from '../src/lib/sessionRegistry.js';
import { joinAnnexB } from '../src/media/h264.js';
import type {
  PeerTransport,
  PeerTransportEvents,
  PeerTransportFactory,
  TransportConnectionState,
} from '../src/transport/peerTransport.js';
import type { IceCandidate, ServerMessage, SignalingChannel } from '../src/types.js';
import { SignalingEndpoint } from '../src/ws/signaling.js';

export const silentLogger = pino({ level: 'silent' });

export const SPS = Buffer.from([0x67, 0x42, 0xe0, 0x1f, 0x8d]);
export const PPS = Buffer.from([0x68, 0xce, 0x3c, 0x80]);

export function nal(header: number, size: number, fill = 0xaa): Buffer {
  const buffer = Buffer.alloc(size, fill);
  buffer[0] = header;
  return buffer;
}

export const idrSlice = (size = 20) => nal(0x65, size);
export const nonIdrSlice = (size = 20) => nal(0x41, size);

export const keyframePayload = () => joinAnnexB([SPS, PPS, idrSlice()]);
export const deltaPayload = () => joinAnnexB([nonIdrSlice()]);

export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface ParsedRtp {
  marker: boolean;
  payloadType: number;
  sequenceNumber: number;
  timestamp: number;
  ssrc: number;
  payload: Buffer;
}

export function parseRtp(packet: Buffer): ParsedRtp {
  return {
    marker: (packet[1] & 0x80) !== 0,
    payloadType: packet[1] & 0x7f,
    sequenceNumber: packet.readUInt16BE(2),
    timestamp: packet.readUInt32BE(4),
    ssrc: packet.readUInt32BE(8),
    payload: packet.subarray(12),
  };
}

export class FakeTransport implements PeerTransport {
  readonly sent: Buffer[] = [];
  readonly remoteCandidates: IceCandidate[] = [];
  answer?: string;
  closeCount = 0;
  rejectAnswer = false;
  offerCandidates: IceCandidate[] = [];
  sendImpl?: (packet: Buffer) => void | Promise<void>;

  constructor(
    readonly sessionId: string,
    readonly events: PeerTransportEvents,
  ) {}

  async createOffer(): Promise<string> {
    this.offerCandidates.forEach((candidate) => this.events.onLocalCandidate(candidate));
    return `v=0 offer ${this.sessionId}`;
  }

  async applyAnswer(sdp: string): Promise<void> {
    if (this.rejectAnswer) {
      throw new Error('unsupported codec');
    }
    this.answer = sdp;
  }

  async addRemoteCandidate(candidate: IceCandidate): Promise<void> {
    this.remoteCandidates.push(candidate);
  }

  sendPacket(packet: Buffer): void | Promise<void> {
    if (this.sendImpl) {
      return this.sendImpl(packet);
    }
    this.sent.push(packet);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
  }

  emitState(state: TransportConnectionState): void {
    this.events.onConnectionStateChange(state);
  }
}

export class FakeChannel implements SignalingChannel {
  readonly messages: ServerMessage[] = [];
  closed?: { code?: number; reason?: string };

  send(message: ServerMessage): void {
    this.messages.push(message);
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }
}

export function fakeTransportFactory() {
  const transports = new Map<string, FakeTransport>();
  const factory: PeerTransportFactory = (sessionId, events) => {
    const transport = new FakeTransport(sessionId, events);
    transports.set(sessionId, transport);
    return transport;
  };
  const transportFor = (session: ClientSession): FakeTransport => {
    const transport = transports.get(session.id);
    if (!transport) {
      throw new Error(`No transport for ${session.id}`);
    }
    return transport;
  };
  return { factory, transports, transportFor };
}

export interface HarnessOptions {
  maxPendingFrames?: number;
  maxConsecutiveDrops?: number;
  maxSessions?: number;
  keyframeRequestIntervalMs?: number;
  signalingTimeoutMs?: number;
  mtu?: number;
}

export function createHarness(options: HarnessOptions = {}) {
  const registry = new SessionRegistry();
  const engine = new BroadcastEngine({
    registry,
    logger: silentLogger,
    mtu: options.mtu ?? 1200,
    payloadType: 96,
    maxPendingFrames: options.maxPendingFrames ?? 8,
    maxConsecutiveDrops: options.maxConsecutiveDrops ?? 150,
    keyframeRequestIntervalMs: options.keyframeRequestIntervalMs ?? 0,
  });
  const frameSource = new FrameSourceAdapter(engine, silentLogger);
  const transports = fakeTransportFactory();
  const endpoint = new SignalingEndpoint({
    registry,
    engine,
    logger: silentLogger,
    createTransport: transports.factory,
    signalingTimeoutMs: options.signalingTimeoutMs ?? 10_000,
    connectTimeoutMs: 30_000,
    maxSessions: options.maxSessions ?? 16,
    rtp: () => ({ sequenceNumber: 1000, timestampOffset: 0, ssrc: 0x1234 }),
  });
  return { registry, engine, frameSource, endpoint, transportFor: transports.transportFor };
}

export type Harness = ReturnType<typeof createHarness>;

export function hostCandidate(index: number): IceCandidate {
  return {
    candidate: `candidate:${index} 1 udp 2122260223 192.0.2.${index + 1} ${50000 + index} typ host`,
    sdpMid: '0',
    sdpMLineIndex: 0,
  };
}

/** Drives a new viewer through offer, answer, two ICE candidates and connectivity. */
export async function connectViewer(harness: Harness) {
  const channel = new FakeChannel();
  const session = harness.endpoint.connect(channel);
  if (!session) {
    throw new Error('session refused');
  }
  await session.whenIdle();
  const transport = harness.transportFor(session);

  await harness.endpoint.handleMessage(
    session,
    JSON.stringify({ type: 'answer', sessionId: session.id, sdp: 'v=0 answer' }),
  );
  for (const index of [0, 1]) {
    await harness.endpoint.handleMessage(
      session,
      JSON.stringify({ type: 'ice-candidate', sessionId: session.id, candidate: hostCandidate(index) }),
    );
  }
  transport.emitState('checking');
  transport.emitState('connected');
  await session.whenIdle();
  return { session, channel, transport };
}
