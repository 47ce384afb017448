/**
 * Global type augmentations for Express
 */

import { IApiError, IApiMetadata } from './api';

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace Express {
        // eslint-disable-next-line @typescript-eslint/naming-convention
        interface Response {
            apiError: (error: IApiError | string, status?: number, details?: unknown) => import('express').Response;
            apiSuccess: <T>(data: T, metadata?: Partial<IApiMetadata>, status?: number) => import('express').Response;
        }
        // eslint-disable-next-line @typescript-eslint/naming-convention
        interface Request {
            principal?: string;
            requestId: string;
            startTime: number;
        }
    }
}

export {};
