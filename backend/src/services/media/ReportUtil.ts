/**
 * Report splitting along block boundaries
 */

import { IReportDocument } from './ReportDocument';

type PacketKey = keyof IReportDocument['packets'];

const PACKET_KEYS: PacketKey[] = [ 'expected', 'received', 'lost', 'rejected' ];

/**
 * Chunk durations for a report that overruns the current block:
 * `remaining`, then whole `blockWidth`s, then the rest (0 < rest <= blockWidth).
 */
export function chunkDurations(duration: number, remaining: number, blockWidth: number): number[] {
    if (duration <= remaining) {
        throw new RangeError(`Report duration ${duration} does not exceed remaining ${remaining}`);
    }
    if (blockWidth <= 0) {
        throw new RangeError(`Block width must be positive, got ${blockWidth}`);
    }

    const durations = [ remaining ];
    let rest = duration - remaining;

    while (rest > blockWidth) {
        durations.push(blockWidth);
        rest -= blockWidth;
    }
    durations.push(rest);

    return durations;
}

/**
 * Splits a report into chunks aligned to block boundaries.
 *
 * Packet counters are shared out in proportion to each chunk's duration, the
 * rounding remainder going to the last chunk, so totals are conserved. Jitter,
 * R-factor and MOS describe quality rather than volume and are copied as is.
 */
export function splitReport(report: IReportDocument, remaining: number, blockWidth: number): IReportDocument[] {
    const durations = chunkDurations(report.duration, remaining, blockWidth);
    const assigned: Record<PacketKey, number> = { expected: 0, received: 0, lost: 0, rejected: 0 };

    let offset = 0;

    return durations.map((duration, index) => {
        const isLast = index === durations.length - 1;
        const packets: Record<PacketKey, number> = { expected: 0, received: 0, lost: 0, rejected: 0 };

        for (const key of PACKET_KEYS) {
            const total = report.packets[key];

            packets[key] = isLast
                ? total - assigned[key]
                : Math.floor(total * duration / report.duration);
            assigned[key] += packets[key];
        }

        const chunk: IReportDocument = {
            ...report,
            started_at: report.started_at + offset,
            duration,
            packets,
            jitter: { ...report.jitter }
        };

        if (report.terminated_at !== undefined) {
            chunk.terminated_at = chunk.started_at + duration;
        }

        offset += duration;

        return chunk;
    });
}
