export type SessionState =
  | 'new'
  | 'offer-sent'
  | 'answer-received'
  | 'negotiating'
  | 'connected'
  | 'closed'
  | 'failed';

export const TERMINAL_STATES: ReadonlySet<SessionState> = new Set(['closed', 'failed']);

/**
 * One coded video frame. `payload` is the Annex-B byte stream for the frame and
 * `nalUnits` the same bytes split at start codes. Capture time is in milliseconds.
 */
export interface H264AccessUnit {
  readonly payload: Buffer;
  readonly nalUnits: readonly Buffer[];
  readonly captureTimestamp: number;
  readonly isKeyframe: boolean;
}

export interface IceCandidate {
  candidate: string;
  sdpMid?: string | null;
  sdpMLineIndex?: number | null;
  usernameFragment?: string | null;
}

/** Per-session RTP counters. Mutated only by the packetizer on behalf of its session. */
export interface RtpStreamState {
  sequenceNumber: number;
  timestampOffset: number;
  ssrc: number;
  captureOrigin?: number;
}

export interface SessionStats {
  createdAt: number;
  lastActivity: number;
  framesSent: number;
  framesSkipped: number;
  framesDropped: number;
  consecutiveDrops: number;
  packetsSent: number;
  bytesSent: number;
  writeErrors: number;
}

export type ServerMessage =
  | { type: 'offer'; sessionId: string; sdp: string }
  | { type: 'ice-candidate'; sessionId: string; candidate: IceCandidate | null }
  | { type: 'error'; sessionId?: string; code: string; message: string };

export interface SignalingChannel {
  send(message: ServerMessage): void;
  close(code?: number, reason?: string): void;
}
