/**
 * BlockAggregator Test Suite
 * Partitioning of party reports into fixed-width statistic blocks
 */

import { legSession, mediaSession, report } from '../../../test/support/reports';
import {
    aggregateBlocks,
    appendBlocks,
    blockWidthOf,
    selectDirection
} from '../media/BlockAggregator';

const expectedPackets = (blocks: { packets: { expected: number } }[]) => blocks.map(block => block.packets.expected);

describe('BlockAggregator', () => {
    describe('selectDirection', () => {
        it('should select out when ports match the leg', () => {
            expect(selectDirection(legSession(), report())).toBe('out');
        });

        it('should select out when ports are one above the leg ports', () => {
            expect(selectDirection(legSession(), report({ dst_port: 20001, src_port: 10001 }))).toBe('out');
        });

        it('should select in for the reverse direction', () => {
            expect(selectDirection(legSession(), report({ dst_port: 10000, src_port: 20000 }))).toBe('in');
        });

        it('should select in when a port is two above the leg port', () => {
            expect(selectDirection(legSession(), report({ src_port: 10002 }))).toBe('in');
        });

        it('should select in when a port is below the leg port', () => {
            expect(selectDirection(legSession(), report({ dst_port: 19999 }))).toBe('in');
        });
    });

    describe('blockWidthOf', () => {
        it('should truncate the division remainder', () => {
            expect(blockWidthOf(legSession({ duration: 410 }), 4)).toBe(102);
        });

        it('should never be narrower than 1 ms', () => {
            expect(blockWidthOf(legSession({ duration: 3 }), 4)).toBe(1);
        });
    });

    describe('aggregateBlocks', () => {
        it('should split reports across block boundaries', () => {
            const first = report({ duration: 250, jitter: { avg: 2, max: 2, min: 2 }, started_at: 0 });
            const second = report({
                duration: 150,
                jitter: { avg: 5, max: 5, min: 5 },
                packets: { expected: 150, lost: 30, received: 120, rejected: 0 },
                started_at: 250
            });

            const result = aggregateBlocks(legSession(), [ first, second ], 4);

            expect(result?.direction).toBe('out');
            expect(result?.blocks).toHaveLength(4);
            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 100, 100, 100, 100 ]);
            expect(result?.blocks.map(block => block.packets.lost)).toEqual([ 0, 0, 10, 20 ]);
            expect(result?.blocks[1].jitter).toEqual({ min: 2, max: 2, avg: 2 });
            expect(result?.blocks[2].jitter).toEqual({ min: 2, max: 5, avg: 3.5 });
            expect(result?.blocks[3].jitter).toEqual({ min: 5, max: 5, avg: 5 });
        });

        it('should close the current block when the remaining budget is met exactly', () => {
            const result = aggregateBlocks(legSession(), [
                report({ duration: 100, started_at: 0 }),
                report({ duration: 100, packets: { expected: 40, lost: 0, received: 40, rejected: 0 }, started_at: 100 })
            ], 4);

            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 100, 40, 0, 0 ]);
        });

        it('should keep a partial trailing block and pad the rest when reports end early', () => {
            const result = aggregateBlocks(legSession(), [ report({ duration: 250, started_at: 0 }) ], 4);

            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 100, 100, 50, 0 ]);
        });

        it('should accumulate short reports into one block', () => {
            const result = aggregateBlocks(legSession(), [
                report({ duration: 30, started_at: 0 }),
                report({ duration: 30, started_at: 30 })
            ], 4);

            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 60, 0, 0, 0 ]);
        });

        it('should emit empty blocks for the leading gap of a late sub-session', () => {
            const leg = legSession({
                createdAt: 1000,
                out: mediaSession({ createdAt: 1150, duration: 250, terminatedAt: 1400 }),
                terminatedAt: 1400
            });

            const result = aggregateBlocks(leg, [ report({ duration: 250, started_at: 1150 }) ], 4);

            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 0, 50, 100, 100 ]);
        });

        it('should treat a sub-session starting before its leg as starting with it', () => {
            const leg = legSession({
                createdAt: 1000,
                out: mediaSession({ createdAt: 900, duration: 400, terminatedAt: 1300 }),
                terminatedAt: 1400
            });

            const result = aggregateBlocks(leg, [ report({ duration: 100, started_at: 900 }) ], 4);

            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 100, 0, 0, 0 ]);
        });

        it('should return exactly blockCount blocks when reports overrun the leg', () => {
            const result = aggregateBlocks(legSession(), [ report({ duration: 600, started_at: 0 }) ], 4);

            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 100, 100, 100, 100 ]);
        });

        it('should fold reports in start time order', () => {
            const first = report({ duration: 250, started_at: 0 });
            const second = report({
                duration: 150,
                packets: { expected: 150, lost: 30, received: 120, rejected: 0 },
                started_at: 250
            });

            const result = aggregateBlocks(legSession(), [ second, first ], 4);

            expect(result?.blocks.map(block => block.packets.lost)).toEqual([ 0, 0, 10, 20 ]);
        });

        it('should use 1 ms blocks for legs shorter than the block count', () => {
            const leg = legSession({
                duration: 3,
                out: mediaSession({ duration: 3, terminatedAt: 3 }),
                terminatedAt: 3
            });

            const result = aggregateBlocks(leg, [ report({ duration: 3, started_at: 0 }) ], 4);

            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 1, 1, 1, 0 ]);
        });

        it('should select the in sub-session for reverse reports', () => {
            const leg = legSession({
                in: mediaSession({ duration: 400, dstPort: 10000, srcPort: 20000, terminatedAt: 400 })
            });

            const result = aggregateBlocks(leg, [ report({ dst_port: 10000, duration: 400, src_port: 20000 }) ], 4);

            expect(result?.direction).toBe('in');
            expect(expectedPackets(result?.blocks ?? [])).toEqual([ 100, 100, 100, 100 ]);
        });

        it('should skip a sub-session with zero duration', () => {
            const leg = legSession();

            // Reverse reports select the empty `in` sub-session
            const result = aggregateBlocks(leg, [ report({ dst_port: 10000, src_port: 20000 }) ], 4);

            expect(result).toBeNull();
            expect(leg.in.blocks).toEqual([]);
        });

        it('should return null without reports', () => {
            expect(aggregateBlocks(legSession(), [], 4)).toBeNull();
        });

        it('should not modify the leg or the reports', () => {
            const leg = legSession();
            const reports = [ report({ duration: 250, started_at: 0 }) ];

            aggregateBlocks(leg, reports, 4);

            expect(leg.out.blocks).toEqual([]);
            expect(reports[0].duration).toBe(250);
            expect(reports[0].packets.expected).toBe(250);
        });
    });

    describe('appendBlocks', () => {
        it('should return a copy with blocks on the selected sub-session', () => {
            const leg = legSession();
            const result = aggregateBlocks(leg, [ report({ duration: 400 }) ], 4);

            expect(result).not.toBeNull();
            if (!result) {
                return;
            }

            const updated = appendBlocks(leg, result);

            expect(updated.out.blocks).toHaveLength(4);
            expect(updated.in.blocks).toHaveLength(0);
            expect(leg.out.blocks).toHaveLength(0);
        });

        it('should append again when called twice for the same sub-session', () => {
            const leg = legSession();
            const result = aggregateBlocks(leg, [ report({ duration: 400 }) ], 4);

            expect(result).not.toBeNull();
            if (!result) {
                return;
            }

            expect(appendBlocks(appendBlocks(leg, result), result).out.blocks).toHaveLength(8);
        });
    });
});
