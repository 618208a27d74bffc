import type { BroadcastEngine } from '../broadcast/engine.js';
import { ClientSession } from '../lib/clientSession.js';
import { CapacityError, SignalingProtocolError, describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { SessionRegistry } from '../lib/sessionRegistry.js';
import type { PeerTransportFactory } from '../transport/peerTransport.js';
import type { RtpStreamState, SignalingChannel } from '../types.js';
import { answerMessageSchema, envelopeSchema, iceCandidateMessageSchema } from './schemas.js';

export interface SignalingEndpointOptions {
  registry: SessionRegistry;
  engine: BroadcastEngine;
  createTransport: PeerTransportFactory;
  logger: Logger;
  signalingTimeoutMs: number;
  connectTimeoutMs: number;
  maxSessions: number;
  /** Initial RTP counters for new sessions; random when omitted. */
  rtp?: () => Partial<RtpStreamState>;
  now?: () => number;
}

const CLOSE_NORMAL = 1000;
const CLOSE_GOING_AWAY = 1001;
const CLOSE_INTERNAL_ERROR = 1011;
const CLOSE_TRY_AGAIN_LATER = 1013;
const CLOSE_SESSION_FAILED = 4001;

/**
 * Offer/answer/ICE exchange. Every signaling channel owns exactly one session,
 * created on connect; messages naming any other session id are discarded.
 */
export class SignalingEndpoint {
  private accepting = true;

  constructor(private readonly options: SignalingEndpointOptions) {}

  get isAccepting(): boolean {
    return this.accepting;
  }

  connect(channel: SignalingChannel): ClientSession | undefined {
    const { registry, engine, logger } = this.options;

    if (!this.accepting) {
      channel.close(CLOSE_GOING_AWAY, 'Shutting down');
      return undefined;
    }

    if (registry.size >= this.options.maxSessions) {
      const error = new CapacityError(this.options.maxSessions);
      logger.warn({ sessions: registry.size }, 'session_rejected_capacity');
      channel.send({ type: 'error', code: error.code, message: error.message });
      channel.close(CLOSE_TRY_AGAIN_LATER, error.message);
      return undefined;
    }

    let session: ClientSession;
    try {
      session = new ClientSession({
        channel,
        createTransport: this.options.createTransport,
        logger,
        signalingTimeoutMs: this.options.signalingTimeoutMs,
        connectTimeoutMs: this.options.connectTimeoutMs,
        rtp: this.options.rtp?.(),
        now: this.options.now,
      });
    } catch (error) {
      logger.fatal({ err: error }, 'transport_unavailable');
      channel.send({ type: 'error', code: 'transport_unavailable', message: describeError(error) });
      channel.close(CLOSE_INTERNAL_ERROR, 'Transport unavailable');
      return undefined;
    }

    registry.add(session);
    session.onStateChange((state) => {
      if (state === 'connected') {
        logger.info({ sessionId: session.id, viewers: registry.size }, 'session_connected');
        engine.requestKeyframe(`joined:${session.id}`);
      } else if (state === 'closed' || state === 'failed') {
        registry.remove(session.id);
        channel.close(
          state === 'failed' ? CLOSE_SESSION_FAILED : CLOSE_NORMAL,
          session.terminalReason?.slice(0, 120),
        );
      }
    });
    session.onKeyframeRequest(() => engine.requestKeyframe(`viewer:${session.id}`));

    logger.info({ sessionId: session.id }, 'session_created');
    session.start().catch((error: unknown) => {
      logger.error({ err: error, sessionId: session.id }, 'session_start_failed');
    });
    return session;
  }

  async handleMessage(owner: ClientSession, raw: string): Promise<void> {
    const { logger } = this.options;

    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      owner.reportProtocolError(new SignalingProtocolError('Message is not valid JSON'));
      return;
    }

    const envelope = envelopeSchema.safeParse(message);
    if (!envelope.success) {
      owner.reportProtocolError(new SignalingProtocolError('Message envelope is invalid'));
      return;
    }

    const { type, sessionId } = envelope.data;
    if (sessionId !== undefined && sessionId !== owner.id) {
      logger.warn(
        { sessionId, owner: owner.id, type, known: this.options.registry.has(sessionId) },
        'signaling_unknown_session',
      );
      return;
    }
    if (owner.isTerminal) {
      logger.warn({ sessionId: owner.id, type, state: owner.state }, 'signaling_terminal_session');
      return;
    }

    switch (type) {
      case 'answer': {
        const data = answerMessageSchema.safeParse(message);
        if (!data.success) {
          owner.reportProtocolError(new SignalingProtocolError('Invalid answer payload'));
          return;
        }
        await owner.handleAnswer(data.data.sdp);
        return;
      }
      case 'ice-candidate': {
        const data = iceCandidateMessageSchema.safeParse(message);
        if (!data.success) {
          owner.reportProtocolError(new SignalingProtocolError('Invalid ICE candidate payload'));
          return;
        }
        await owner.handleRemoteCandidate(data.data.candidate);
        return;
      }
      case 'offer':
        owner.reportProtocolError(
          new SignalingProtocolError('The server sends the offer', 'unexpected_message'),
        );
        return;
      default:
        owner.reportProtocolError(new SignalingProtocolError(`Unknown message type ${type}`));
    }
  }

  disconnect(session: ClientSession, reason: string): void {
    session.close(reason);
  }

  /** Refuses new sessions and closes every existing one. */
  async shutdown(): Promise<void> {
    this.accepting = false;
    await this.options.registry.closeAll('shutdown');
  }
}
