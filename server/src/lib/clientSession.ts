import { randomInt } from 'node:crypto';
import { v4 as uuid } from 'uuid';
import type { Logger } from './logger.js';
import {
  NegotiationFailedError,
  NegotiationTimeoutError,
  RelayError,
  SignalingProtocolError,
  TransportClosedError,
  describeError,
} from './errors.js';
import type { PeerTransport, PeerTransportFactory, TransportConnectionState } from '../transport/peerTransport.js';
import {
  TERMINAL_STATES,
  type IceCandidate,
  type RtpStreamState,
  type SessionState,
  type SessionStats,
  type SignalingChannel,
} from '../types.js';

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  new: ['offer-sent', 'closed', 'failed'],
  'offer-sent': ['answer-received', 'closed', 'failed'],
  'answer-received': ['negotiating', 'closed', 'failed'],
  negotiating: ['connected', 'closed', 'failed'],
  connected: ['closed', 'failed'],
  closed: [],
  failed: [],
};

export interface ClientSessionOptions {
  id?: string;
  channel: SignalingChannel;
  createTransport: PeerTransportFactory;
  logger: Logger;
  signalingTimeoutMs: number;
  connectTimeoutMs: number;
  /** Fixed initial RTP counters; random per session when omitted. */
  rtp?: Partial<RtpStreamState>;
  now?: () => number;
}

export type StateChangeListener = (state: SessionState, previous: SessionState) => void;

/**
 * One viewer: its negotiation state machine, its peer transport, its RTP
 * counters and its outbound queue. Signaling work runs one task at a time on
 * a per-session promise chain; `close` and `fail` bypass the chain and may be
 * called from anywhere.
 */
export class ClientSession {
  readonly id: string;
  readonly rtp: RtpStreamState;
  readonly stats: SessionStats;
  needsKeyframe = true;
  terminalReason?: string;

  private current: SessionState = 'new';
  private readonly channel: SignalingChannel;
  private readonly transport: PeerTransport;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly signalingTimeoutMs: number;
  private readonly connectTimeoutMs: number;

  private tail: Promise<void> = Promise.resolve();
  private timer?: NodeJS.Timeout;
  private remoteDescriptionSet = false;
  private pendingRemoteCandidates: IceCandidate[] = [];
  private pendingLocalCandidates: Array<IceCandidate | null> = [];

  private outbound: Buffer[][] = [];
  private inFlight = false;
  private drainActive = false;
  private draining?: Promise<void>;
  private released?: Promise<void>;

  private readonly stateListeners = new Set<StateChangeListener>();
  private readonly keyframeListeners = new Set<() => void>();

  constructor(options: ClientSessionOptions) {
    this.id = options.id ?? uuid();
    this.channel = options.channel;
    this.logger = options.logger.child({ sessionId: this.id });
    this.now = options.now ?? Date.now;
    this.signalingTimeoutMs = options.signalingTimeoutMs;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.rtp = {
      sequenceNumber: options.rtp?.sequenceNumber ?? randomInt(0, 0x1_0000),
      timestampOffset: options.rtp?.timestampOffset ?? randomInt(0, 0x1_0000_0000),
      ssrc: options.rtp?.ssrc ?? randomInt(1, 0x1_0000_0000),
      captureOrigin: options.rtp?.captureOrigin,
    };
    const createdAt = this.now();
    this.stats = {
      createdAt,
      lastActivity: createdAt,
      framesSent: 0,
      framesSkipped: 0,
      framesDropped: 0,
      consecutiveDrops: 0,
      packetsSent: 0,
      bytesSent: 0,
      writeErrors: 0,
    };

    this.transport = options.createTransport(this.id, {
      onLocalCandidate: (candidate) => this.sendLocalCandidate(candidate),
      onConnectionStateChange: (state) => {
        this.run(() => this.handleTransportState(state)).catch((error: unknown) => {
          this.logger.error({ err: error }, 'session_transport_event_failed');
        });
      },
      onKeyframeRequest: () => this.keyframeListeners.forEach((listener) => listener()),
    });
  }

  get state(): SessionState {
    return this.current;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.current);
  }

  /** Frames queued or being written. */
  get pendingFrames(): number {
    return this.outbound.length + (this.inFlight ? 1 : 0);
  }

  onStateChange(listener: StateChangeListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  onKeyframeRequest(listener: () => void): () => void {
    this.keyframeListeners.add(listener);
    return () => this.keyframeListeners.delete(listener);
  }

  start(): Promise<void> {
    return this.run(async () => {
      const sdp = await this.transport.createOffer();
      if (!this.transition('offer-sent')) return;
      this.armTimer('answer', this.signalingTimeoutMs);
      this.channel.send({ type: 'offer', sessionId: this.id, sdp });
      const backlog = this.pendingLocalCandidates;
      this.pendingLocalCandidates = [];
      backlog.forEach((candidate) => this.sendLocalCandidate(candidate));
    });
  }

  handleAnswer(sdp: string): Promise<void> {
    return this.run(async () => {
      if (this.current !== 'offer-sent') {
        throw new SignalingProtocolError(
          `Answer not expected in state ${this.current}`,
          'unexpected_message',
        );
      }
      try {
        await this.transport.applyAnswer(sdp);
      } catch (error) {
        throw new NegotiationFailedError(`Remote answer rejected: ${describeError(error)}`, error);
      }
      this.remoteDescriptionSet = true;
      if (!this.transition('answer-received')) return;
      this.armTimer('connectivity', this.connectTimeoutMs);

      const backlog = this.pendingRemoteCandidates;
      this.pendingRemoteCandidates = [];
      for (const candidate of backlog) {
        await this.applyRemoteCandidate(candidate);
      }
    });
  }

  /** `null` marks end-of-candidates and is accepted without effect. */
  handleRemoteCandidate(candidate: IceCandidate | null): Promise<void> {
    return this.run(async () => {
      if (!candidate) return;
      if (!this.remoteDescriptionSet) {
        this.pendingRemoteCandidates.push(candidate);
        return;
      }
      await this.applyRemoteCandidate(candidate);
    });
  }

  reportProtocolError(error: SignalingProtocolError): void {
    if (this.isTerminal) return;
    this.logger.warn({ code: error.code, reason: error.message }, 'signaling_protocol_error');
    this.channel.send({ type: 'error', sessionId: this.id, code: error.code, message: error.message });
  }

  close(reason = 'closed'): void {
    this.terminate('closed', reason);
  }

  fail(error: RelayError): void {
    if (this.isTerminal) return;
    this.channel.send({ type: 'error', sessionId: this.id, code: error.code, message: error.message });
    this.terminate('failed', error.message, error);
  }

  /** Resolves once the transport handle has been released. */
  whenReleased(): Promise<void> {
    return this.released ?? Promise.resolve();
  }

  /** Resolves once queued signaling work and outbound writes have settled. */
  async whenIdle(): Promise<void> {
    await this.tail;
    await this.draining;
  }

  recordSkip(): void {
    this.stats.framesSkipped += 1;
  }

  /** Returns the length of the current drop streak. */
  recordDrop(): number {
    this.stats.framesDropped += 1;
    this.stats.consecutiveDrops += 1;
    this.needsKeyframe = true;
    return this.stats.consecutiveDrops;
  }

  /** Discards frames that are queued but not yet being written. */
  discardQueued(): number {
    const discarded = this.outbound.length;
    this.outbound = [];
    this.stats.framesDropped += discarded;
    return discarded;
  }

  enqueue(packets: Buffer[], isKeyframe: boolean): void {
    if (this.isTerminal || packets.length === 0) return;
    this.outbound.push(packets);
    if (isKeyframe) {
      this.needsKeyframe = false;
    }
    if (!this.drainActive) {
      this.drainActive = true;
      this.draining = this.drain();
    }
  }

  private async drain(): Promise<void> {
    try {
      let frame = this.outbound.shift();
      while (frame && !this.isTerminal) {
        this.inFlight = true;
        for (const packet of frame) {
          await this.transport.sendPacket(packet);
          this.stats.packetsSent += 1;
          this.stats.bytesSent += packet.length;
        }
        this.inFlight = false;
        this.stats.framesSent += 1;
        this.stats.consecutiveDrops = 0;
        this.stats.lastActivity = this.now();
        frame = this.outbound.shift();
      }
    } catch (error) {
      this.stats.writeErrors += 1;
      const closed = new TransportClosedError('write_failed', error);
      this.logger.info({ reason: describeError(error) }, 'session_write_failed');
      this.terminate('closed', closed.message);
    } finally {
      this.inFlight = false;
      this.drainActive = false;
    }
  }

  private run(task: () => Promise<void> | void): Promise<void> {
    const next = this.tail.then(async () => {
      if (this.isTerminal) return;
      await task();
    });
    this.tail = next.catch((error: unknown) => this.handleTaskError(error));
    return this.tail;
  }

  private handleTaskError(error: unknown): void {
    if (error instanceof SignalingProtocolError) {
      this.reportProtocolError(error);
      return;
    }
    if (error instanceof RelayError) {
      this.fail(error);
      return;
    }
    this.fail(new NegotiationFailedError(describeError(error), error));
  }

  private async applyRemoteCandidate(candidate: IceCandidate): Promise<void> {
    try {
      await this.transport.addRemoteCandidate(candidate);
    } catch (error) {
      this.reportProtocolError(
        new SignalingProtocolError(`ICE candidate rejected: ${describeError(error)}`),
      );
    }
  }

  private handleTransportState(state: TransportConnectionState): void {
    switch (state) {
      case 'checking':
        if (this.current === 'answer-received') {
          this.transition('negotiating');
        }
        return;
      case 'connected':
        if (this.current === 'answer-received') {
          this.transition('negotiating');
        }
        if (this.current === 'negotiating' && this.transition('connected')) {
          this.clearTimer();
          this.stats.lastActivity = this.now();
        }
        return;
      case 'failed':
        this.fail(new NegotiationFailedError('ICE connectivity failed'));
        return;
      case 'closed':
        this.close('transport_closed');
        return;
      case 'disconnected':
        this.logger.debug('session_transport_disconnected');
    }
  }

  private sendLocalCandidate(candidate: IceCandidate | null): void {
    if (this.isTerminal) return;
    if (this.current === 'new') {
      this.pendingLocalCandidates.push(candidate);
      return;
    }
    this.channel.send({ type: 'ice-candidate', sessionId: this.id, candidate });
  }

  private transition(next: SessionState): boolean {
    const previous = this.current;
    if (!TRANSITIONS[previous].includes(next)) {
      this.logger.warn({ from: previous, to: next }, 'session_illegal_transition');
      return false;
    }
    this.current = next;
    this.logger.debug({ from: previous, to: next }, 'session_state');
    this.stateListeners.forEach((listener) => listener(next, previous));
    return true;
  }

  private terminate(state: 'closed' | 'failed', reason: string, error?: RelayError): void {
    if (this.isTerminal) return;
    this.clearTimer();
    this.terminalReason = reason;
    this.outbound = [];
    this.pendingRemoteCandidates = [];
    this.pendingLocalCandidates = [];

    if (error) {
      this.logger.warn({ code: error.code, reason }, 'session_failed');
    } else {
      this.logger.info({ reason }, 'session_closed');
    }

    this.released = this.transport.close().catch((closeError: unknown) => {
      this.logger.warn({ err: closeError }, 'session_transport_close_failed');
    });
    this.transition(state);
  }

  private armTimer(stage: string, timeoutMs: number): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.fail(new NegotiationTimeoutError(stage, timeoutMs));
    }, timeoutMs);
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
