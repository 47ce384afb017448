/**
 * Session API routes
 */
import { Request, Response, Router } from 'express';

import { sendError } from '../middleware/apiResponse';
import { CallSessionService } from '../services/call/CallSessionService';
import { MediaSessionService } from '../services/media/MediaSessionService';
import { parseSessionRequest } from '../services/SessionRequest';

export interface ISessionsRouterOptions {
    callSessionService: CallSessionService;
    mediaSessionService: MediaSessionService;
}

export function createSessionsRouter({ callSessionService, mediaSessionService }: ISessionsRouterOptions): Router {
    const router = Router();

    // POST /session/media - RTP/RTCP legs with block statistics
    router.post('/media', async (req: Request, res: Response) => {
        try {
            const details = await mediaSessionService.details(parseSessionRequest(req.body));

            res.apiSuccess(details);
        } catch (error) {
            sendError(res, error, 'Failed to build media session details');
        }
    });

    // POST /session/call - Raw SIP call documents
    router.post('/call', async (req: Request, res: Response) => {
        try {
            const documents = await callSessionService.findInRaw(parseSessionRequest(req.body));

            res.apiSuccess(documents);
        } catch (error) {
            sendError(res, error, 'Failed to find call documents');
        }
    });

    return router;
}
