/**
 * RTP/RTCP report documents as stored by the capture pipeline
 */

import { getLogger } from '@jitsi/logger';
import { z } from 'zod';

const logger = getLogger('backend/src/services/media/ReportDocument');

// Timestamps are stored either as epoch millis or as BSON dates
const TimestampSchema = z.union([
    z.number(),
    z.date().transform(date => date.getTime())
]);

const MinMaxAvgSchema = z.object({
    avg: z.number().default(0),
    max: z.number().default(0),
    min: z.number().default(0)
});

const PacketsSchema = z.object({
    expected: z.number().int().nonnegative().default(0),
    lost: z.number().int().default(0),
    received: z.number().int().nonnegative().default(0),
    rejected: z.number().int().nonnegative().default(0)
});

export const ReportDocumentSchema = z.object({
    call_id: z.string(),
    codec: z.string().optional(),
    dst_addr: z.string(),
    dst_port: z.number().int(),
    duration: z.number().int().nonnegative(),
    jitter: MinMaxAvgSchema.default({ avg: 0, max: 0, min: 0 }),
    mos: z.number().default(0),
    packets: PacketsSchema.default({ expected: 0, lost: 0, received: 0, rejected: 0 }),
    r_factor: z.number().default(0),
    src_addr: z.string(),
    src_port: z.number().int(),
    started_at: TimestampSchema,
    terminated_at: TimestampSchema.optional()
});

export type IReportDocument = z.infer<typeof ReportDocumentSchema>;

/**
 * Validates raw store documents. Documents that do not match the report shape
 * are dropped with a warning; their order is otherwise preserved.
 */
export function parseReportDocuments(documents: Record<string, unknown>[], source: string): IReportDocument[] {
    const reports: IReportDocument[] = [];

    for (const document of documents) {
        const result = ReportDocumentSchema.safeParse(document);

        if (result.success) {
            reports.push(result.data);
        } else {
            logger.warn(`Skipping malformed ${source} document`, {
                id: document._id,
                issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
            });
        }
    }

    return reports;
}

/**
 * End of the interval a report covers. Index documents carry their own
 * termination time; raw reports only a duration.
 */
export function terminatedAt(report: IReportDocument): number {
    return report.terminated_at ?? report.started_at + report.duration;
}
