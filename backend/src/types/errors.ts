/**
 * Domain errors mapped onto the standard API error envelope
 */

import { ApiErrorCode, HttpStatus } from './api';

export class ApiException extends Error {
    public readonly code: ApiErrorCode;
    public readonly details?: unknown;
    public readonly field?: string;
    public readonly status: HttpStatus;

    constructor(message: string, status: HttpStatus, code: ApiErrorCode, field?: string, details?: unknown) {
        super(message);
        this.name = new.target.name;
        this.status = status;
        this.code = code;
        this.field = field;
        this.details = details;
    }
}

/**
 * Thrown when a required request field is absent. The field's key is carried
 * both in the message and in `field`.
 */
export class MissingFieldError extends ApiException {
    constructor(field: string) {
        super(field, HttpStatus.BAD_REQUEST, ApiErrorCode.MISSING_PARAMETER, field);
    }
}

export class ValidationError extends ApiException {
    constructor(message: string, details?: unknown) {
        super(message, HttpStatus.BAD_REQUEST, ApiErrorCode.INVALID_REQUEST, undefined, details);
    }
}

export class ResourceNotFoundError extends ApiException {
    constructor(message: string) {
        super(message, HttpStatus.NOT_FOUND, ApiErrorCode.RESOURCE_NOT_FOUND);
    }
}

export class DuplicateResourceError extends ApiException {
    constructor(message: string) {
        super(message, HttpStatus.CONFLICT, ApiErrorCode.RESOURCE_ALREADY_EXISTS);
    }
}

export class AccessDeniedError extends ApiException {
    constructor(message = 'Access denied') {
        super(message, HttpStatus.FORBIDDEN, ApiErrorCode.ACCESS_DENIED);
    }
}
