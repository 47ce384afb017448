/**
 * Host API routes
 */
import { getLogger } from '@jitsi/logger';
import { Request, Response, Router } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';

import { Host } from '../../../shared/types';
import { sendError } from '../middleware/apiResponse';
import { HostListSchema, HostSchema } from '../services/host/HostSchema';
import { HostService } from '../services/host/HostService';
import { ApiErrorCode, HttpStatus, IHostResponse } from '../types/api';
import { ValidationError } from '../types/errors';

const logger = getLogger('backend/src/routes/hosts');

export interface IHostsRouterOptions {
    hostService: HostService;
    importMaxSize: number; // bytes
}

function toResponse(host: Host): IHostResponse {
    return {
        media: host.media,
        name: host.name,
        sip: host.sip
    };
}

function validationError(message: string, error: ZodError): ValidationError {
    return new ValidationError(message, error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message
    })));
}

function parseHost(body: unknown): Host {
    const result = HostSchema.safeParse(body);

    if (!result.success) {
        throw validationError('Invalid host', result.error);
    }

    return result.data;
}

function parseHostFile(content: string): Host[] {
    let json: unknown;

    try {
        json = JSON.parse(content);
    } catch (error) {
        throw new ValidationError('Host file is not valid JSON', error instanceof Error ? error.message : undefined);
    }

    const result = HostListSchema.safeParse(json);

    if (!result.success) {
        throw validationError('Invalid host file', result.error);
    }

    return result.data;
}

export function createHostsRouter({ hostService, importMaxSize }: IHostsRouterOptions): Router {
    const router = Router();
    const upload = multer({
        limits: {
            fileSize: importMaxSize,
            files: 1
        },
        storage: multer.memoryStorage()
    });

    // GET /hosts - List all hosts
    router.get('/', async (_req: Request, res: Response) => {
        try {
            const hosts = await hostService.list();

            res.apiSuccess(hosts.map(toResponse));
        } catch (error) {
            sendError(res, error, 'Failed to fetch hosts');
        }
    });

    // POST /hosts/import - Replace or add hosts from an uploaded JSON array
    router.post('/import', upload.single('file'), async (req: Request, res: Response) => {
        try {
            if (!req.file) {
                return res.apiError({
                    code: ApiErrorCode.MISSING_PARAMETER,
                    field: 'file',
                    message: 'No file uploaded'
                }, HttpStatus.BAD_REQUEST);
            }

            logger.info(`Received host file ${req.file.originalname}`, { size: req.file.size });

            const hosts = parseHostFile(req.file.buffer.toString('utf8'));

            await hostService.saveAll(hosts);

            res.apiSuccess({ imported: hosts.length });
        } catch (error) {
            sendError(res, error, 'Failed to import hosts');
        }
    });

    // GET /hosts/:name - Get host by name
    router.get('/:name', async (req: Request, res: Response) => {
        try {
            const host = await hostService.getByName(req.params.name);

            res.apiSuccess(toResponse(host));
        } catch (error) {
            sendError(res, error, 'Failed to fetch host');
        }
    });

    // POST /hosts - Create a host
    router.post('/', async (req: Request, res: Response) => {
        try {
            const host = await hostService.create(parseHost(req.body));

            res.apiSuccess(toResponse(host));
        } catch (error) {
            sendError(res, error, 'Failed to create host');
        }
    });

    // PUT /hosts - Update a host found by name
    router.put('/', async (req: Request, res: Response) => {
        try {
            const host = await hostService.update(parseHost(req.body));

            res.apiSuccess(toResponse(host));
        } catch (error) {
            sendError(res, error, 'Failed to update host');
        }
    });

    // DELETE /hosts/:name - Delete host by name
    router.delete('/:name', async (req: Request, res: Response) => {
        try {
            await hostService.deleteByName(req.params.name);

            res.apiSuccess({ deleted: req.params.name });
        } catch (error) {
            sendError(res, error, 'Failed to delete host');
        }
    });

    return router;
}
