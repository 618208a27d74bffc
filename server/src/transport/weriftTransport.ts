import {
  MediaStreamTrack,
  PictureLossIndication,
  RTCIceCandidate,
  RTCPeerConnection,
  RTCRtpCodecParameters,
  RtcpPayloadSpecificFeedback,
} from 'werift';
import type { IceCandidate } from '../types.js';
import type {
  PeerTransport,
  PeerTransportEvents,
  PeerTransportFactory,
  TransportConnectionState,
} from './peerTransport.js';

export interface WeriftTransportOptions {
  stunServer?: string;
  payloadType: number;
}

const H264_FMTP = 'profile-level-id=42e01f;packetization-mode=1;level-asymmetry-allowed=1';

// FMT of a Full Intra Request (RFC 5104); a PLI is FMT 1.
const FIR_FMT = 4;

/** Peer connection state, reported once DTLS is up. */
function toTransportState(state: string): TransportConnectionState | undefined {
  switch (state) {
    case 'connected':
      return 'connected';
    case 'disconnected':
      return 'disconnected';
    case 'failed':
      return 'failed';
    case 'closed':
      return 'closed';
    default:
      return undefined;
  }
}

/** Sendonly H264 peer connection backed by werift. */
export class WeriftTransport implements PeerTransport {
  private readonly pc: RTCPeerConnection;
  private readonly track = new MediaStreamTrack({ kind: 'video' });

  constructor(events: PeerTransportEvents, options: WeriftTransportOptions) {
    this.pc = new RTCPeerConnection({
      iceServers: options.stunServer ? [{ urls: options.stunServer }] : [],
      codecs: {
        audio: [],
        video: [
          new RTCRtpCodecParameters({
            mimeType: 'video/H264',
            clockRate: 90_000,
            payloadType: options.payloadType,
            rtcpFeedback: [
              { type: 'nack' },
              { type: 'nack', parameter: 'pli' },
              { type: 'ccm', parameter: 'fir' },
            ],
            parameters: H264_FMTP,
          }),
        ],
      },
    });

    const transceiver = this.pc.addTransceiver(this.track, { direction: 'sendonly' });

    transceiver.sender.onRtcp.subscribe((rtcp) => {
      if (
        rtcp instanceof RtcpPayloadSpecificFeedback &&
        (rtcp.feedback.count === PictureLossIndication.count || rtcp.feedback.count === FIR_FMT)
      ) {
        events.onKeyframeRequest();
      }
    });

    this.pc.onIceCandidate.subscribe((candidate) => {
      events.onLocalCandidate(
        candidate
          ? {
              candidate: candidate.candidate,
              sdpMid: candidate.sdpMid ?? null,
              sdpMLineIndex: candidate.sdpMLineIndex ?? null,
            }
          : null,
      );
    });

    // ICE reports `connected` before DTLS has started; media only flows once
    // the peer connection itself is connected.
    this.pc.iceConnectionStateChange.subscribe((state) => {
      if (state === 'checking') {
        events.onConnectionStateChange('checking');
      }
    });

    this.pc.connectionStateChange.subscribe((state) => {
      const mapped = toTransportState(state);
      if (mapped) {
        events.onConnectionStateChange(mapped);
      }
    });
  }

  async createOffer(): Promise<string> {
    const offer = await this.pc.createOffer();
    await this.pc.setLocalDescription(offer);
    const local = this.pc.localDescription;
    if (!local) {
      throw new Error('Local description was not set');
    }
    return local.sdp;
  }

  async applyAnswer(sdp: string): Promise<void> {
    await this.pc.setRemoteDescription({ type: 'answer', sdp });
  }

  async addRemoteCandidate(candidate: IceCandidate): Promise<void> {
    await this.pc.addIceCandidate(
      new RTCIceCandidate({
        candidate: candidate.candidate,
        sdpMid: candidate.sdpMid ?? undefined,
        sdpMLineIndex: candidate.sdpMLineIndex ?? undefined,
      }),
    );
  }

  sendPacket(packet: Buffer): void {
    this.track.writeRtp(packet);
  }

  async close(): Promise<void> {
    await this.pc.close();
  }
}

export function weriftTransportFactory(options: WeriftTransportOptions): PeerTransportFactory {
  return (_sessionId, events) => new WeriftTransport(events, options);
}
