import type { Logger } from '../lib/logger.js';
import { IngestOverloadError, describeError } from '../lib/errors.js';
import type { ClientSession } from '../lib/clientSession.js';
import type { SessionRegistry } from '../lib/sessionRegistry.js';
import { RtpPacketizer } from '../media/rtpPacketizer.js';
import type { H264AccessUnit } from '../types.js';

export interface BroadcastEngineOptions {
  registry: SessionRegistry;
  logger: Logger;
  mtu: number;
  payloadType: number;
  maxPendingFrames: number;
  maxConsecutiveDrops: number;
  keyframeRequestIntervalMs: number;
  now?: () => number;
}

export interface BroadcastResult {
  delivered: number;
  skipped: number;
  dropped: number;
}

type Outcome = keyof BroadcastResult | 'ignored';

export class BroadcastEngine {
  readonly packetizer: RtpPacketizer;
  private readonly registry: SessionRegistry;
  private readonly logger: Logger;
  private readonly maxPendingFrames: number;
  private readonly maxConsecutiveDrops: number;
  private readonly keyframeRequestIntervalMs: number;
  private readonly now: () => number;
  private readonly keyframeListeners = new Set<(reason: string) => void>();
  private lastKeyframeRequest = Number.NEGATIVE_INFINITY;

  constructor(options: BroadcastEngineOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.maxPendingFrames = options.maxPendingFrames;
    this.maxConsecutiveDrops = options.maxConsecutiveDrops;
    this.keyframeRequestIntervalMs = options.keyframeRequestIntervalMs;
    this.now = options.now ?? Date.now;
    this.packetizer = new RtpPacketizer({ mtu: options.mtu, payloadType: options.payloadType });
  }

  /**
   * Packetizes the unit once per connected session and queues it. Never waits
   * on a session's writes; a session that cannot keep up loses the frame.
   */
  broadcast(unit: H264AccessUnit): BroadcastResult {
    const result: BroadcastResult = { delivered: 0, skipped: 0, dropped: 0 };

    for (const session of this.registry.snapshot()) {
      let outcome: Outcome;
      try {
        outcome = this.deliver(session, unit);
      } catch (error) {
        this.logger.error({ err: error, sessionId: session.id }, 'broadcast_session_error');
        session.close(`broadcast_error: ${describeError(error)}`);
        outcome = 'dropped';
      }
      if (outcome !== 'ignored') {
        result[outcome] += 1;
      }
    }
    return result;
  }

  onKeyframeRequest(listener: (reason: string) => void): () => void {
    this.keyframeListeners.add(listener);
    return () => this.keyframeListeners.delete(listener);
  }

  /** Asks upstream for a keyframe, at most once per interval. */
  requestKeyframe(reason: string): boolean {
    const now = this.now();
    if (now - this.lastKeyframeRequest < this.keyframeRequestIntervalMs) {
      return false;
    }
    this.lastKeyframeRequest = now;
    this.logger.debug({ reason }, 'keyframe_requested');
    this.keyframeListeners.forEach((listener) => listener(reason));
    return true;
  }

  private deliver(session: ClientSession, unit: H264AccessUnit): Outcome {
    if (session.state !== 'connected') {
      return 'ignored';
    }

    // Saturation is checked first so a stuck session keeps accumulating drops.
    if (session.pendingFrames >= this.maxPendingFrames) {
      if (!unit.isKeyframe) {
        this.recordOverload(session);
        return 'dropped';
      }
      session.discardQueued();
    }

    if (session.needsKeyframe && !unit.isKeyframe) {
      session.recordSkip();
      this.requestKeyframe(`awaiting_keyframe:${session.id}`);
      return 'skipped';
    }

    session.enqueue(this.packetizer.packetize(unit, session.rtp), unit.isKeyframe);
    return 'delivered';
  }

  private recordOverload(session: ClientSession): void {
    const pending = session.pendingFrames;
    const streak = session.recordDrop();
    if (streak === 1) {
      this.logger.warn(
        { sessionId: session.id, err: new IngestOverloadError(session.id, pending) },
        'ingest_overload',
      );
    }
    if (streak >= this.maxConsecutiveDrops) {
      session.close('stalled');
      return;
    }
    this.requestKeyframe(`overload:${session.id}`);
  }
}
