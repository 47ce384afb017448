/**
 * MongoDB Report Store
 * Queries collections partitioned by a UTC time suffix, e.g. `rtpr_rtp_raw_20240115`
 */

import { getLogger } from '@jitsi/logger';
import { Connection } from 'mongoose';

import { CollectionSuffix } from '../config/app';

import { IReportFilter, IReportStore, ISortOrder, ITimeRange, StoreDocument } from './ReportStore';

const logger = getLogger('backend/src/services/MongoReportStore');

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

// Upper bound on partitions touched by a single query
const MAX_PARTITIONS = 1000;

function pad(value: number): string {
    return value.toString().padStart(2, '0');
}

export function formatSuffix(timestamp: number, suffix: CollectionSuffix): string {
    const date = new Date(timestamp);
    const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;

    return suffix === 'yyyyMMddHH' ? `${day}${pad(date.getUTCHours())}` : day;
}

/**
 * Names of the partitions covering `timeRange`, oldest first.
 */
export function collectionNames(prefix: string, timeRange: ITimeRange, suffix: CollectionSuffix): string[] {
    const step = suffix === 'yyyyMMddHH' ? HOUR : DAY;
    const names: string[] = [];

    if (timeRange.to < timeRange.from) {
        return names;
    }

    for (let time = timeRange.from - (timeRange.from % step); time <= timeRange.to; time += step) {
        if (names.length === MAX_PARTITIONS) {
            logger.warn(`Query on ${prefix} truncated to ${MAX_PARTITIONS} partitions`, timeRange);
            break;
        }
        names.push(`${prefix}_${formatSuffix(time, suffix)}`);
    }

    return names;
}

export class MongoReportStore implements IReportStore {
    private connection: Connection;
    private suffix: CollectionSuffix;

    /**
     * @param connection - Open mongoose connection to the report database
     * @param suffix - Partition suffix format
     */
    constructor(connection: Connection, suffix: CollectionSuffix) {
        this.connection = connection;
        this.suffix = suffix;
    }

    public async find(
            prefix: string,
            timeRange: ITimeRange,
            filter: IReportFilter,
            sort?: ISortOrder
    ): Promise<StoreDocument[]> {
        const query = {
            [filter.timeField]: { $gte: filter.from, $lte: filter.to },
            call_id: { $in: filter.callIds }
        };
        const documents: StoreDocument[] = [];

        for (const name of collectionNames(prefix, timeRange, this.suffix)) {
            let cursor = this.connection.collection(name).find(query);

            if (sort) {
                cursor = cursor.sort({ [sort.field]: sort.direction });
            }

            const partition = await cursor.toArray();

            logger.debug(`Found ${partition.length} documents in ${name}`);
            documents.push(...partition);
        }

        return documents;
    }
}
