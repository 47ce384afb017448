/**
 * Standardized API response types for consistent frontend integration
 */

export interface IApiResponse<T = unknown> {
    data?: T;
    error?: IApiError;
    metadata?: IApiMetadata;
    success: boolean;
}

export interface IApiError {
    code: string;
    details?: unknown;
    field?: string;
    message: string;
}

export interface IApiMetadata {
    requestId?: string;
    responseTime?: string;
    timestamp: string;
    version: string;
    warnings?: string[];
}

// HTTP Status Codes
export enum HttpStatus {
    OK = 200,
    CREATED = 201,
    NO_CONTENT = 204,
    BAD_REQUEST = 400,
    UNAUTHORIZED = 401,
    FORBIDDEN = 403,
    NOT_FOUND = 404,
    CONFLICT = 409,
    PAYLOAD_TOO_LARGE = 413,
    INTERNAL_SERVER_ERROR = 500,
    SERVICE_UNAVAILABLE = 503,
}

// Error Codes
export enum ApiErrorCode {
    // Security errors
    ACCESS_DENIED = 'ACCESS_DENIED',

    // System errors
    INTERNAL_ERROR = 'INTERNAL_ERROR',

    // Generic errors
    INVALID_REQUEST = 'INVALID_REQUEST',
    MISSING_PARAMETER = 'MISSING_PARAMETER',

    // Resource errors
    RESOURCE_ALREADY_EXISTS = 'RESOURCE_ALREADY_EXISTS',
    RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
}

// Host record as exposed over HTTP (internal id is never returned)
export interface IHostResponse {
    media: string[];
    name: string;
    sip: string[];
}

export interface IHealthResponse {
    services: {
        database: 'connected' | 'disconnected';
    };
    status: 'healthy' | 'degraded';
    timestamp: number;
}
