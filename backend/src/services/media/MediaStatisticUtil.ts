/**
 * Media statistic accumulators
 */

import { MediaStatistic, MinMaxAvg } from '../../../../shared/types';

import { IReportDocument } from './ReportDocument';

function emptyMinMaxAvg(): MinMaxAvg {
    return { min: 0, max: 0, avg: 0 };
}

/**
 * Folds `value` into `acc`. Averages are weighted by the number of expected
 * packets behind each side; an unweighted side contributes nothing.
 */
function foldMinMaxAvg(acc: MinMaxAvg, accWeight: number, value: MinMaxAvg, weight: number): MinMaxAvg {
    if (accWeight === 0) {
        return { ...value };
    }
    if (weight === 0) {
        return { ...acc };
    }

    return {
        min: Math.min(acc.min, value.min),
        max: Math.max(acc.max, value.max),
        avg: ((acc.avg * accWeight) + (value.avg * weight)) / (accWeight + weight)
    };
}

function single(value: number): MinMaxAvg {
    return { min: value, max: value, avg: value };
}

/**
 * Creates a block. Without a report every counter is zero; with one the block
 * holds exactly that report's metrics.
 */
export function createMediaStatistic(report?: IReportDocument): MediaStatistic {
    const statistic: MediaStatistic = {
        packets: { expected: 0, received: 0, lost: 0, rejected: 0 },
        jitter: emptyMinMaxAvg(),
        rFactor: emptyMinMaxAvg(),
        mos: emptyMinMaxAvg()
    };

    return report ? updateMediaStatistic(statistic, report) : statistic;
}

/**
 * Returns a new statistic with the report folded in. Packet counters add up.
 */
export function updateMediaStatistic(statistic: MediaStatistic, report: IReportDocument): MediaStatistic {
    const accWeight = statistic.packets.expected;
    const weight = report.packets.expected;

    return {
        packets: {
            expected: statistic.packets.expected + report.packets.expected,
            received: statistic.packets.received + report.packets.received,
            lost: statistic.packets.lost + report.packets.lost,
            rejected: statistic.packets.rejected + report.packets.rejected
        },
        jitter: foldMinMaxAvg(statistic.jitter, accWeight, report.jitter, weight),
        rFactor: foldMinMaxAvg(statistic.rFactor, accWeight, single(report.r_factor), weight),
        mos: foldMinMaxAvg(statistic.mos, accWeight, single(report.mos), weight)
    };
}
