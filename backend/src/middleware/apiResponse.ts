/**
 * API Response wrapper middleware for standardized responses
 */
import { getLogger } from '@jitsi/logger';
import { NextFunction, Request, Response } from 'express';
import { MulterError } from 'multer';
import { v4 as uuidv4 } from 'uuid';

import {
    ApiErrorCode,
    HttpStatus,
    IApiError,
    IApiMetadata,
    IApiResponse
} from '../types/api';
import { ApiException } from '../types/errors';

const logger = getLogger('middleware/apiResponse');
const API_VERSION = '1.0.0';

export function apiResponseMiddleware(req: Request, res: Response, next: NextFunction): void {
    // Add request ID and timing
    req.requestId = uuidv4();
    req.startTime = Date.now();

    // Success response helper
    res.apiSuccess = function<T>(data: T, metadata: Partial<IApiMetadata> = {}, status = HttpStatus.OK): Response {
        const responseTime = Date.now() - req.startTime;

        const response: IApiResponse<T> = {
            success: true,
            data,
            metadata: {
                timestamp: new Date().toISOString(),
                version: API_VERSION,
                requestId: req.requestId,
                responseTime: `${responseTime}ms`,
                ...metadata
            }
        };

        logger.debug(`API Success: ${req.method} ${req.path} - ${status} (${responseTime}ms)`);

        return res.status(status).json(response);
    };

    // Error response helper
    res.apiError
        = function(error: IApiError | string, status = HttpStatus.INTERNAL_SERVER_ERROR, details?: unknown): Response {
            const responseTime = Date.now() - req.startTime;

            let apiError: IApiError;

            if (typeof error === 'string') {
                apiError = {
                    code: ApiErrorCode.INTERNAL_ERROR,
                    message: error,
                    details
                };
            } else {
                apiError = { ...error, details: details || error.details };
            }

            const response: IApiResponse = {
                success: false,
                error: apiError,
                metadata: {
                    timestamp: new Date().toISOString(),
                    version: API_VERSION,
                    requestId: req.requestId,
                    responseTime: `${responseTime}ms`
                }
            };

            logger.warn(`API Error: ${req.method} ${req.path} - ${status} (${responseTime}ms): ${apiError.message}`, {
                error: apiError,
                requestId: req.requestId
            });

            return res.status(status).json(response);
        };

    next();
}

/**
 * Converts a domain exception into an error envelope. Anything that is not an
 * {@link ApiException} is logged and answered with a 500.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string): Response {
    if (error instanceof ApiException) {
        const apiError: IApiError = {
            code: error.code,
            message: error.message
        };

        if (error.field !== undefined) {
            apiError.field = error.field;
        }
        if (error.details !== undefined) {
            apiError.details = error.details;
        }

        return res.apiError(apiError, error.status);
    }

    logger.error(`${fallbackMessage}:`, error);

    return res.apiError({
        code: ApiErrorCode.INTERNAL_ERROR,
        message: fallbackMessage
    }, HttpStatus.INTERNAL_SERVER_ERROR);
}

// Fallback for unmatched routes
export function notFoundHandler(req: Request, res: Response): void {
    res.apiError({
        code: ApiErrorCode.RESOURCE_NOT_FOUND,
        message: `Route ${req.method} ${req.path} not found`
    }, HttpStatus.NOT_FOUND);
}

function hasStatus(err: unknown): err is { status: number; message?: string } {
    return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

// Error handling middleware
export function globalErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
    const message = err instanceof Error ? err.message : String(err);

    logger.error(`Global error handler: ${message}`, {
        error: err,
        requestId: req.requestId,
        path: req.path,
        method: req.method
    });

    // Don't send error response if headers already sent
    if (res.headersSent) {
        return next(err);
    }

    if (err instanceof ApiException) {
        sendError(res, err, message);

        return;
    }

    if (err instanceof MulterError) {
        res.apiError({
            code: ApiErrorCode.INVALID_REQUEST,
            message: err.message,
            field: err.field
        }, err.code === 'LIMIT_FILE_SIZE' ? HttpStatus.PAYLOAD_TOO_LARGE : HttpStatus.BAD_REQUEST);

        return;
    }

    // body-parser failures carry their own 4xx status
    if (hasStatus(err) && err.status >= 400 && err.status < 500) {
        res.apiError({
            code: err.status === HttpStatus.NOT_FOUND ? ApiErrorCode.RESOURCE_NOT_FOUND : ApiErrorCode.INVALID_REQUEST,
            message
        }, err.status);

        return;
    }

    // Default internal server error
    res.apiError({
        code: ApiErrorCode.INTERNAL_ERROR,
        message: process.env.NODE_ENV === 'production'
            ? 'Internal server error'
            : message
    }, HttpStatus.INTERNAL_SERVER_ERROR);
}

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    logger.debug(`${req.method} ${req.path}`, {
        requestId: req.requestId,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
        query: req.query,
        body: req.method !== 'GET' ? req.body : undefined
    });

    next();
}
