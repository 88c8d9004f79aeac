// src/utils/errors.ts

/**
 * Error codes surfaced to callers of the engine
 */
export enum ErrorCode {
    INVALID_BLOOD_TYPE = 'INVALID_BLOOD_TYPE',
    INVALID_SITE = 'INVALID_SITE',
    INVALID_URGENCY = 'INVALID_URGENCY',
    MISSING_FIELD = 'MISSING_FIELD',
    NO_COMPATIBLE_DONORS = 'NO_COMPATIBLE_DONORS',
    NO_ELIGIBLE_DONORS = 'NO_ELIGIBLE_DONORS',
    QUEUE_EMPTY = 'QUEUE_EMPTY'
}

/**
 * Base class for every recoverable engine failure
 *
 * None of these is fatal to engine state; the boundary reports them as-is.
 */
export class EngineError extends Error {
    public readonly code: ErrorCode;
    public readonly statusCode: number;

    constructor(message: string, code: ErrorCode, statusCode: number) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.statusCode = statusCode;

        Error.captureStackTrace(this, this.constructor);
    }
}

export class InvalidBloodTypeError extends EngineError {
    constructor(value: string) {
        super(`Invalid blood type: ${value}`, ErrorCode.INVALID_BLOOD_TYPE, 400);
    }
}

export class InvalidSiteError extends EngineError {
    constructor(value: string) {
        super(`Unknown site: ${value}`, ErrorCode.INVALID_SITE, 400);
    }
}

export class InvalidUrgencyError extends EngineError {
    constructor(value: unknown) {
        super(`Urgency must be an integer from 1 to 5, got ${String(value)}`, ErrorCode.INVALID_URGENCY, 400);
    }
}

export class MissingFieldError extends EngineError {
    public readonly field: string;

    constructor(field: string) {
        super(`Missing required field: ${field}`, ErrorCode.MISSING_FIELD, 400);
        this.field = field;
    }
}

export class NoCompatibleDonorsError extends EngineError {
    constructor(patientType: string) {
        super(`No compatible donors registered for ${patientType}`, ErrorCode.NO_COMPATIBLE_DONORS, 404);
    }
}

export class NoEligibleDonorsError extends EngineError {
    constructor(patientType: string) {
        super(`No eligible donor found for ${patientType}`, ErrorCode.NO_ELIGIBLE_DONORS, 404);
    }
}

export class QueueEmptyError extends EngineError {
    constructor() {
        super('No emergency requests in queue', ErrorCode.QUEUE_EMPTY, 404);
    }
}

/**
 * Failures that mean "request was valid but nobody can donate right now"
 */
export function isNoDonorError(error: unknown): error is NoCompatibleDonorsError | NoEligibleDonorsError {
    return error instanceof NoCompatibleDonorsError || error instanceof NoEligibleDonorsError;
}
