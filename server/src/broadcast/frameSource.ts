import type { Logger } from '../lib/logger.js';
import { NalUnitType, containsIdr, joinAnnexB, nalUnitType, splitAnnexB } from '../media/h264.js';
import type { BroadcastEngine, BroadcastResult } from './engine.js';

export interface IngestResult extends BroadcastResult {
  accepted: boolean;
  isKeyframe: boolean;
}

const REJECTED: IngestResult = { accepted: false, isKeyframe: false, delivered: 0, skipped: 0, dropped: 0 };

/**
 * Boundary for the upstream encoder. Each call hands over one access unit; the
 * call returns once the unit has been queued for every session, without
 * waiting on any transport.
 */
export class FrameSourceAdapter {
  private lastTimestamp?: number;
  private sps?: Buffer;
  private pps?: Buffer;

  constructor(
    private readonly engine: BroadcastEngine,
    private readonly logger: Logger,
  ) {}

  ingest(payload: Buffer, captureTimestamp: number, isKeyframe?: boolean): IngestResult {
    if (payload.length === 0) {
      this.logger.warn('ingest_empty_unit');
      return REJECTED;
    }
    if (!Number.isFinite(captureTimestamp)) {
      this.logger.warn({ captureTimestamp }, 'ingest_invalid_timestamp');
      return REJECTED;
    }
    if (this.lastTimestamp !== undefined && captureTimestamp < this.lastTimestamp) {
      this.logger.warn(
        { captureTimestamp, lastTimestamp: this.lastTimestamp },
        'ingest_timestamp_regression',
      );
      return REJECTED;
    }

    let nalUnits = splitAnnexB(payload);
    this.cacheParameterSets(nalUnits);
    const keyframe = isKeyframe ?? containsIdr(nalUnits);
    let unitPayload = payload;
    if (keyframe) {
      const completed = this.withParameterSets(nalUnits);
      if (completed !== nalUnits) {
        nalUnits = completed;
        unitPayload = joinAnnexB(completed);
      }
    }
    this.lastTimestamp = captureTimestamp;

    const result = this.engine.broadcast({
      payload: unitPayload,
      nalUnits,
      captureTimestamp,
      isKeyframe: keyframe,
    });
    return { accepted: true, isKeyframe: keyframe, ...result };
  }

  onKeyframeRequest(listener: (reason: string) => void): () => void {
    return this.engine.onKeyframeRequest(listener);
  }

  private cacheParameterSets(nals: readonly Buffer[]): void {
    for (const nal of nals) {
      const type = nalUnitType(nal);
      if (type === NalUnitType.Sps) {
        this.sps = Buffer.from(nal);
      } else if (type === NalUnitType.Pps) {
        this.pps = Buffer.from(nal);
      }
    }
  }

  // Keyframes that arrive without SPS/PPS get the last seen ones prepended.
  private withParameterSets(nals: Buffer[]): Buffer[] {
    const types = new Set(nals.map(nalUnitType));
    const missing: Buffer[] = [];
    if (!types.has(NalUnitType.Sps) && this.sps) missing.push(this.sps);
    if (!types.has(NalUnitType.Pps) && this.pps) missing.push(this.pps);
    return missing.length > 0 ? [...missing, ...nals] : nals;
  }
}
