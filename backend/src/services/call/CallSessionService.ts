/**
 * Call Session Service
 * Raw SIP call documents for a set of call ids
 */

import { getLogger } from '@jitsi/logger';

import { IReportStore, StoreDocument } from '../ReportStore';
import { IPartialSessionRequest, requireSessionRequest } from '../SessionRequest';

const logger = getLogger('backend/src/services/call/CallSessionService');

export const CALL_RAW_PREFIX = 'sip_call_raw';

export interface ICallSessionConfig {
    terminationTimeout: number; // milliseconds
}

export class CallSessionService {
    private config: ICallSessionConfig;
    private store: IReportStore;

    constructor(store: IReportStore, config: ICallSessionConfig) {
        this.store = store;
        this.config = config;
    }

    /**
     * Finds raw call documents created within the termination timeout around
     * the request window. Partitions are chosen by the window itself.
     *
     * @throws {MissingFieldError} when `created_at`, `terminated_at` or `call_id` is absent
     */
    public async findInRaw(req: IPartialSessionRequest): Promise<StoreDocument[]> {
        const { created_at: createdAt, terminated_at: terminatedAt, call_id: callIds } = requireSessionRequest(req);
        const { terminationTimeout } = this.config;

        const documents = await this.store.find(
            CALL_RAW_PREFIX,
            { from: createdAt, to: terminatedAt },
            {
                callIds,
                from: createdAt - terminationTimeout,
                timeField: 'created_at',
                to: terminatedAt + terminationTimeout
            }
        );

        logger.debug(`Found ${documents.length} raw call documents`, { callIds });

        return documents;
    }
}
