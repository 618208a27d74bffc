import type { IceCandidate } from '../types.js';

export type TransportConnectionState = 'checking' | 'connected' | 'disconnected' | 'failed' | 'closed';

export interface PeerTransportEvents {
  onLocalCandidate(candidate: IceCandidate | null): void;
  onConnectionStateChange(state: TransportConnectionState): void;
  /** The viewer asked for a fresh keyframe (RTCP PLI or FIR). */
  onKeyframeRequest(): void;
}

/**
 * What a client session needs from a peer connection: negotiate, send one RTP
 * packet, close. One implementation per transport variant, picked when the
 * session is created.
 */
export interface PeerTransport {
  createOffer(): Promise<string>;
  applyAnswer(sdp: string): Promise<void>;
  addRemoteCandidate(candidate: IceCandidate): Promise<void>;
  sendPacket(packet: Buffer): void | Promise<void>;
  close(): Promise<void>;
}

export type PeerTransportFactory = (sessionId: string, events: PeerTransportEvents) => PeerTransport;
