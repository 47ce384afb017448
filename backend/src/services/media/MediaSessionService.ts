/**
 * Media Session Service
 * Reconstructs RTP and RTCP legs with per-block statistics for a set of calls
 */

import { getLogger } from '@jitsi/logger';

import { LegSession, MediaDirection, MediaSessionDetails, MediaSource } from '../../../../shared/types';
import { IReportStore } from '../ReportStore';
import { IPartialSessionRequest, requireSessionRequest } from '../SessionRequest';

import { aggregateBlocks, appendBlocks } from './BlockAggregator';
import { createLegSession, generateLegId, generatePartyId, groupBy } from './LegSessionUtil';
import { IReportDocument, parseReportDocuments } from './ReportDocument';

const logger = getLogger('backend/src/services/media/MediaSessionService');

export interface IMediaSessionConfig {
    blockCount: number;
    terminationTimeout: number; // milliseconds
}

export class MediaSessionService {
    private config: IMediaSessionConfig;
    private store: IReportStore;

    /**
     * @param store - Report store holding the `rtpr_*` partitions
     * @param config - Block count and termination timeout
     */
    constructor(store: IReportStore, config: IMediaSessionConfig) {
        this.store = store;
        this.config = config;
    }

    /**
     * Returns one `{ rtp, rtcp }` entry per leg found in either stream, RTP
     * legs first. A side missing from a stream is `null`.
     *
     * @throws {MissingFieldError} when `created_at`, `terminated_at` or `call_id` is absent
     */
    public async details(req: IPartialSessionRequest): Promise<MediaSessionDetails[]> {
        const { created_at: createdAt, terminated_at: terminatedAt, call_id: callIds } = requireSessionRequest(req);

        const rtp = await this.findLegSessions(MediaSource.RTP, createdAt, terminatedAt, callIds);
        const rtcp = await this.findLegSessions(MediaSource.RTCP, createdAt, terminatedAt, callIds);

        const legIds = new Set([ ...rtp.keys(), ...rtcp.keys() ]);

        logger.debug('Media session details', {
            callIds,
            legs: legIds.size,
            rtcp: rtcp.size,
            rtp: rtp.size
        });

        return [ ...legIds ].map(legId => ({
            rtp: rtp.get(legId) ?? null,
            rtcp: rtcp.get(legId) ?? null
        }));
    }

    /**
     * Builds the legs of one stream from its index partitions, then folds the
     * raw reports of each party into blocks.
     */
    private async findLegSessions(
            source: MediaSource,
            createdAt: number,
            terminatedAt: number,
            callIds: string[]
    ): Promise<Map<string, LegSession>> {
        const sessions = new Map<string, LegSession>();
        const index = await this.find(`rtpr_${source}_index`, createdAt, terminatedAt, callIds);

        for (const [ legId, documents ] of groupBy(index, generateLegId)) {
            sessions.set(legId, createLegSession(documents, this.config.blockCount));
        }

        // Raw reports of a call are shared by its legs; a leg with nothing
        // loaded yet queries its own window. A leg's reports come from a
        // single query, so legs already loaded are not appended again.
        const reports: IReportDocument[] = [];

        for (const [ legId, legSession ] of sessions) {
            let legReports = reports.filter(report => generateLegId(report) === legId);

            if (legReports.length === 0) {
                const loaded = new Set(reports.map(generateLegId));
                const fetched = await this.find(
                    `rtpr_${source}_raw`, legSession.createdAt, legSession.terminatedAt, [ legSession.callId ]);

                reports.push(...fetched.filter(report => !loaded.has(generateLegId(report))));
                legReports = reports.filter(report => generateLegId(report) === legId);
            }

            sessions.set(legId, this.addBlocks(legSession, legReports));
        }

        return sessions;
    }

    /**
     * Aggregates every party of a leg. Each sub-session receives blocks from
     * one party only; later parties resolving to the same sub-session are
     * skipped so its block list never exceeds the block count.
     */
    private addBlocks(legSession: LegSession, reports: IReportDocument[]): LegSession {
        const aggregated = new Set<MediaDirection>();
        let session = legSession;

        for (const [ partyId, partyReports ] of groupBy(reports, generatePartyId)) {
            const result = aggregateBlocks(session, partyReports, this.config.blockCount);

            if (!result) {
                continue;
            }

            if (aggregated.has(result.direction)) {
                logger.debug(`Party ${partyId} resolves to an aggregated '${result.direction}' sub-session`, {
                    legId: legSession.legId
                });
                continue;
            }

            aggregated.add(result.direction);
            session = appendBlocks(session, result);
        }

        return session;
    }

    private async find(
            prefix: string,
            createdAt: number,
            terminatedAt: number,
            callIds: string[]
    ): Promise<IReportDocument[]> {
        const to = terminatedAt + this.config.terminationTimeout;
        const documents = await this.store.find(
            prefix,
            { from: createdAt, to },
            { callIds, from: createdAt, timeField: 'started_at', to },
            { direction: 'asc', field: 'started_at' }
        );

        return parseReportDocuments(documents, prefix);
    }
}
