/**
 * Leg and party identification for RTP/RTCP reports
 */

import { LegSession, MediaSession } from '../../../../shared/types';

import { createMediaStatistic, updateMediaStatistic } from './MediaStatisticUtil';
import { IReportDocument, terminatedAt } from './ReportDocument';

// RTCP runs on the port right above its RTP stream
function rtpPort(port: number): number {
    return port - (port % 2);
}

/**
 * Both directions of a leg, and its RTP and RTCP streams, share one id: the
 * call id followed by the two endpoints in lexical order.
 */
export function generateLegId(report: IReportDocument): string {
    const src = `${report.src_addr}:${rtpPort(report.src_port)}`;
    const dst = `${report.dst_addr}:${rtpPort(report.dst_port)}`;

    return src < dst
        ? `${report.call_id}:${src}:${dst}`
        : `${report.call_id}:${dst}:${src}`;
}

export function generatePartyId(report: IReportDocument): string {
    return `${report.src_addr}:${report.src_port}>${report.dst_addr}:${report.dst_port}`;
}

export function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
    const groups = new Map<string, T[]>();

    for (const item of items) {
        const key = keyOf(item);
        const group = groups.get(key);

        if (group) {
            group.push(item);
        } else {
            groups.set(key, [ item ]);
        }
    }

    return groups;
}

function createMediaSession(reports: IReportDocument[], srcPort: number, dstPort: number): MediaSession {
    if (reports.length === 0) {
        return {
            createdAt: 0,
            terminatedAt: 0,
            duration: 0,
            srcPort,
            dstPort,
            codecs: [],
            statistic: createMediaStatistic(),
            blocks: []
        };
    }

    const createdAt = Math.min(...reports.map(report => report.started_at));
    const terminated = Math.max(...reports.map(terminatedAt));
    const codecs = new Set<string>();
    let statistic = createMediaStatistic();

    for (const report of reports) {
        statistic = updateMediaStatistic(statistic, report);
        if (report.codec) {
            codecs.add(report.codec);
        }
    }

    return {
        createdAt,
        terminatedAt: terminated,
        duration: Math.max(0, terminated - createdAt),
        srcPort: reports[0].src_port,
        dstPort: reports[0].dst_port,
        codecs: [ ...codecs ],
        statistic,
        blocks: []
    };
}

/**
 * Builds a leg from its index reports. The first report fixes the leg's
 * endpoints; reports sent from its source endpoint form the `out`
 * sub-session, all others the `in` sub-session.
 */
export function createLegSession(reports: IReportDocument[], blockCount: number): LegSession {
    if (reports.length === 0) {
        throw new RangeError('Cannot create a leg session without reports');
    }

    const first = reports[0];
    const isOut = (report: IReportDocument) =>
        report.src_addr === first.src_addr && report.src_port === first.src_port;

    const outSession = createMediaSession(reports.filter(isOut), first.src_port, first.dst_port);
    const inSession = createMediaSession(reports.filter(report => !isOut(report)), first.dst_port, first.src_port);

    const createdAt = Math.min(...reports.map(report => report.started_at));
    const terminated = Math.max(...reports.map(terminatedAt));

    return {
        legId: generateLegId(first),
        callId: first.call_id,
        srcAddr: first.src_addr,
        srcPort: first.src_port,
        dstAddr: first.dst_addr,
        dstPort: first.dst_port,
        createdAt,
        terminatedAt: terminated,
        duration: Math.max(0, terminated - createdAt),
        blockCount,
        out: outSession,
        in: inSession
    };
}
