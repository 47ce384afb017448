/**
 * Session request parsing shared by the call and media session services
 */

import { z } from 'zod';

import { SessionRequest } from '../../../shared/types';
import { MissingFieldError, ValidationError } from '../types/errors';

// Shape checks only; presence is enforced by requireSessionRequest
export const SessionRequestSchema = z.object({
    call_id: z.union([ z.string().min(1), z.array(z.string().min(1)) ])
        .transform(value => (Array.isArray(value) ? value : [ value ]))
        .optional(),
    created_at: z.number().int().nonnegative().optional(),
    terminated_at: z.number().int().nonnegative().optional()
});

export type IPartialSessionRequest = z.infer<typeof SessionRequestSchema>;

/**
 * Parses a request body. Wrong types are a {@link ValidationError}; `null`
 * fields count as absent.
 */
export function parseSessionRequest(body: unknown): IPartialSessionRequest {
    const normalized = typeof body === 'object' && body !== null
        ? Object.fromEntries(Object.entries(body).filter(([ , value ]) => value !== null))
        : body;
    const result = SessionRequestSchema.safeParse(normalized);

    if (!result.success) {
        throw new ValidationError('Invalid session request', result.error.issues.map(issue => ({
            field: issue.path.join('.'),
            message: issue.message
        })));
    }

    return result.data;
}

/**
 * Fails with a {@link MissingFieldError} naming the first absent field, in
 * the order `created_at`, `terminated_at`, `call_id`.
 */
export function requireSessionRequest(req: IPartialSessionRequest): SessionRequest {
    if (req.created_at === undefined) {
        throw new MissingFieldError('created_at');
    }
    if (req.terminated_at === undefined) {
        throw new MissingFieldError('terminated_at');
    }
    if (req.call_id === undefined) {
        throw new MissingFieldError('call_id');
    }

    return {
        call_id: req.call_id,
        created_at: req.created_at,
        terminated_at: req.terminated_at
    };
}
