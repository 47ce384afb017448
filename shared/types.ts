/**
 * Shared TypeScript definitions for the SIP Session Explorer
 * Wire shapes returned by the backend and consumed by UI clients
 */

// Report stream a leg was reconstructed from
export enum MediaSource {
  RTP = 'rtp',
  RTCP = 'rtcp'
}

// Direction of a sub-session relative to the leg's first index report
export type MediaDirection = 'in' | 'out';

export interface MinMaxAvg {
  min: number;
  max: number;
  avg: number;
}

export interface PacketCounters {
  expected: number;
  received: number;
  lost: number;
  rejected: number;
}

// One fixed-width time slice of a leg
export interface MediaStatistic {
  packets: PacketCounters;
  jitter: MinMaxAvg;
  rFactor: MinMaxAvg;
  mos: MinMaxAvg;
}

export interface MediaSession {
  createdAt: number;
  terminatedAt: number;
  duration: number;
  srcPort: number;
  dstPort: number;
  codecs: string[];

  // Summary over every report of this direction
  statistic: MediaStatistic;
  blocks: MediaStatistic[];
}

export interface LegSession {
  legId: string;
  callId: string;

  srcAddr: string;
  srcPort: number;
  dstAddr: string;
  dstPort: number;

  createdAt: number;
  terminatedAt: number;
  duration: number;
  blockCount: number;

  out: MediaSession;
  in: MediaSession;
}

// One entry of the media session details response
export interface MediaSessionDetails {
  rtp: LegSession | null;
  rtcp: LegSession | null;
}

export interface SessionRequest {
  created_at: number;
  terminated_at: number;
  call_id: string[];
}

export interface Host {
  name: string;
  sip: string[];
  media: string[];
}
