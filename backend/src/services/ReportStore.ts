/**
 * Report Store
 * Time-partitioned document queries shared by the session services
 */

export interface ITimeRange {
    from: number;
    to: number;
}

/**
 * Range filter on a time field combined with set membership on `call_id`.
 */
export interface IReportFilter {
    callIds: string[];
    from: number;
    timeField: string;
    to: number;
}

export interface ISortOrder {
    direction: 'asc' | 'desc';
    field: string;
}

export type StoreDocument = Record<string, unknown>;

export interface IReportStore {

    /**
     * Finds documents in every `<prefix>_*` partition overlapping `timeRange`.
     * Results are concatenated partition by partition, each sorted by `sort`.
     */
    find(prefix: string, timeRange: ITimeRange, filter: IReportFilter, sort?: ISortOrder): Promise<StoreDocument[]>;
}
