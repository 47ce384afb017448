/**
 * Report and leg builders for tests
 */

import { LegSession, MediaSession } from '../../../shared/types';
import { createMediaStatistic } from '../../src/services/media/MediaStatisticUtil';
import { IReportDocument } from '../../src/services/media/ReportDocument';

/**
 * A report from 10.0.0.1:10000 to 10.0.0.2:20000 carrying one expected and
 * received packet per millisecond unless overridden.
 */
export function report(overrides: Partial<IReportDocument> = {}): IReportDocument {
    const duration = overrides.duration ?? 100;

    return {
        call_id: 'call-1',
        dst_addr: '10.0.0.2',
        dst_port: 20000,
        duration,
        jitter: { avg: 1, max: 1, min: 1 },
        mos: 4.4,
        packets: { expected: duration, lost: 0, received: duration, rejected: 0 },
        r_factor: 90,
        src_addr: '10.0.0.1',
        src_port: 10000,
        started_at: 0,
        ...overrides
    };
}

export function mediaSession(overrides: Partial<MediaSession> = {}): MediaSession {
    return {
        blocks: [],
        codecs: [],
        createdAt: 0,
        dstPort: 20000,
        duration: 0,
        srcPort: 10000,
        statistic: createMediaStatistic(),
        terminatedAt: 0,
        ...overrides
    };
}

/**
 * A leg from t=0 lasting 400 ms whose `out` sub-session spans the whole leg
 * and whose `in` sub-session is empty.
 */
export function legSession(overrides: Partial<LegSession> = {}): LegSession {
    return {
        blockCount: 4,
        callId: 'call-1',
        createdAt: 0,
        dstAddr: '10.0.0.2',
        dstPort: 20000,
        duration: 400,
        in: mediaSession({ dstPort: 10000, srcPort: 20000 }),
        legId: 'call-1:10.0.0.1:10000:10.0.0.2:20000',
        out: mediaSession({ duration: 400, terminatedAt: 400 }),
        srcAddr: '10.0.0.1',
        srcPort: 10000,
        terminatedAt: 400,
        ...overrides
    };
}
