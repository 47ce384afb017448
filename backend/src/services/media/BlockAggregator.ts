/**
 * Block Aggregator
 * Folds the raw reports of one party into a fixed number of equal-width
 * statistic blocks spanning the whole leg.
 */

import { LegSession, MediaDirection, MediaStatistic } from '../../../../shared/types';

import { createMediaStatistic, updateMediaStatistic } from './MediaStatisticUtil';
import { IReportDocument } from './ReportDocument';
import { splitReport } from './ReportUtil';

export interface IAggregationResult {
    blocks: MediaStatistic[];
    direction: MediaDirection;
}

function isAdjacentPort(diff: number): boolean {
    return diff === 0 || diff === 1;
}

/**
 * Picks the sub-session a party's reports belong to. Reports whose ports are
 * equal to the leg's ports, or one above them (RTCP), are `out`; anything
 * else is `in`. This is a nearest-port heuristic, not an exact match.
 */
export function selectDirection(legSession: LegSession, report: IReportDocument): MediaDirection {
    return isAdjacentPort(report.src_port - legSession.srcPort) && isAdjacentPort(report.dst_port - legSession.dstPort)
        ? 'out'
        : 'in';
}

/**
 * Width of one block. Legs shorter than `blockCount` milliseconds get 1 ms
 * blocks; the final block absorbs the division remainder.
 */
export function blockWidthOf(legSession: LegSession, blockCount: number): number {
    return Math.max(1, Math.floor(legSession.duration / blockCount));
}

/**
 * Aggregates one party's reports into exactly `blockCount` blocks.
 *
 * Returns `null` when there is nothing to aggregate: no reports, or a
 * selected sub-session of zero duration. Inputs are not modified; appending
 * the blocks to the leg is left to the caller.
 *
 * Reports are folded in `started_at` order (stable for equal start times).
 * Blocks past the leg's end are dropped.
 */
export function aggregateBlocks(
        legSession: LegSession,
        reports: IReportDocument[],
        blockCount: number
): IAggregationResult | null {
    if (reports.length === 0) {
        return null;
    }

    const ordered = [ ...reports ].sort((a, b) => a.started_at - b.started_at);
    const direction = selectDirection(legSession, ordered[0]);
    const mediaSession = legSession[direction];

    if (mediaSession.duration === 0) {
        return null;
    }

    const blockWidth = blockWidthOf(legSession, blockCount);
    const blocks: MediaStatistic[] = [];

    // A sub-session opening before its leg is treated as starting with it
    const gap = Math.max(0, mediaSession.createdAt - legSession.createdAt);
    let remaining = blockWidth;

    if (gap > 0) {
        for (let i = 0; i < Math.floor(gap / blockWidth); i++) {
            blocks.push(createMediaStatistic());
        }
        remaining = blockWidth - (gap % blockWidth);
    }

    let current = createMediaStatistic();

    for (const report of ordered) {
        if (report.duration < remaining) {
            current = updateMediaStatistic(current, report);
            remaining -= report.duration;
        } else if (report.duration > remaining) {
            const chunks = splitReport(report, remaining, blockWidth);

            current = updateMediaStatistic(current, chunks[0]);
            for (const chunk of chunks.slice(1)) {
                blocks.push(current);
                current = createMediaStatistic(chunk);
            }

            remaining = blockWidth - chunks[chunks.length - 1].duration;
        } else {
            current = updateMediaStatistic(current, report);
            blocks.push(current);
            current = createMediaStatistic();
            remaining = blockWidth;
        }
    }

    if (current.packets.expected !== 0 && blocks.length < blockCount) {
        blocks.push(current);
    }

    while (blocks.length < blockCount) {
        blocks.push(createMediaStatistic());
    }

    return {
        blocks: blocks.slice(0, blockCount),
        direction
    };
}

/**
 * Returns a copy of the leg with the aggregated blocks appended to the
 * selected sub-session.
 */
export function appendBlocks(legSession: LegSession, result: IAggregationResult): LegSession {
    const mediaSession = legSession[result.direction];
    const updated = {
        ...mediaSession,
        blocks: [ ...mediaSession.blocks, ...result.blocks ]
    };

    return result.direction === 'out'
        ? { ...legSession, out: updated }
        : { ...legSession, in: updated };
}
