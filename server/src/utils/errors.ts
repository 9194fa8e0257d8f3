/**
 * Custom error classes for better error handling
 *
 * ERP failures share the ErpError base and carry an explicit `kind` and
 * `retryable` flag. The API client and the job queue switch on those fields,
 * never on the class hierarchy.
 */

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

// ============================================
// ERP ERROR TAXONOMY
// ============================================

export type ErpErrorKind = 'connection' | 'authentication' | 'api' | 'validation';

export abstract class ErpError extends Error implements CustomError {
    abstract readonly kind: ErpErrorKind;
    abstract readonly statusCode: number;
    readonly code: string;
    readonly retryable: boolean;
    readonly context: Record<string, unknown>;

    protected constructor(
        message: string,
        code: string,
        retryable: boolean,
        context: Record<string, unknown> = {},
        cause?: unknown,
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.code = code;
        this.retryable = retryable;
        this.context = context;
    }
}

export type ConnectionFailure =
    | 'TIMEOUT'
    | 'SSL_ERROR'
    | 'UNREACHABLE'
    | 'CONNECTION_FAILED'
    | 'MAX_RETRIES_EXCEEDED';

/**
 * Network, timeout or TLS failure. Transient.
 *
 * @example
 * throw new ConnectionError('Request timed out', 'TIMEOUT', { endpoint: 'Items' });
 */
export class ConnectionError extends ErpError {
    readonly name = 'ConnectionError' as const;
    readonly kind = 'connection' as const;
    readonly statusCode = 503 as const;

    constructor(
        message: string,
        code: ConnectionFailure = 'CONNECTION_FAILED',
        context: Record<string, unknown> = {},
        cause?: unknown,
    ) {
        super(message, code, true, context, cause);
        Object.setPrototypeOf(this, ConnectionError.prototype);
    }
}

export type AuthFailureReason =
    | 'session-expired'
    | 'no-session'
    | 'invalid-credentials'
    | 'forbidden'
    | 'license-exhausted'
    | 'company-not-found'
    | 'login-failed'
    | 'malformed-response';

/** Reasons the client recovers from by logging in again */
export const RETRYABLE_AUTH_REASONS: ReadonlySet<AuthFailureReason> = new Set(['session-expired', 'no-session']);

/**
 * Credential or session failure. Only an expired or missing session is
 * retryable.
 */
export class AuthenticationError extends ErpError {
    readonly name = 'AuthenticationError' as const;
    readonly kind = 'authentication' as const;
    readonly statusCode: 401 | 403;
    readonly reason: AuthFailureReason;

    constructor(reason: AuthFailureReason, message: string, context: Record<string, unknown> = {}) {
        super(message, reason, RETRYABLE_AUTH_REASONS.has(reason), context);
        this.reason = reason;
        this.statusCode = reason === 'forbidden' ? 403 : 401;
        Object.setPrototypeOf(this, AuthenticationError.prototype);
    }
}

/**
 * Domain rejection from the ERP (4xx/5xx other than 401/403). Not retried by
 * the client.
 */
export class ApiError extends ErpError {
    readonly name = 'ApiError' as const;
    readonly kind = 'api' as const;
    readonly statusCode = 502 as const;
    readonly httpStatus: number | null;
    readonly responseBody: unknown;

    constructor(
        message: string,
        httpStatus: number | null,
        code: string,
        responseBody: unknown = null,
        context: Record<string, unknown> = {},
    ) {
        super(message, code, false, context);
        this.httpStatus = httpStatus;
        this.responseBody = responseBody;
        Object.setPrototypeOf(this, ApiError.prototype);
    }

    get isNotFound(): boolean {
        return this.code === 'NOT_FOUND';
    }
}

/**
 * Pre-flight data problem. Never sent over the network and never retried.
 *
 * @example
 * throw new ValidationError('Order validation failed', ['Order has no items.']);
 */
export class ValidationError extends ErpError {
    readonly name = 'ValidationError' as const;
    readonly kind = 'validation' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null, context: Record<string, unknown> = {}) {
        super(message, 'VALIDATION_FAILED', false, context);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

// ============================================
// LOCAL ERRORS
// ============================================

/**
 * Not found error - thrown when a local resource is not found
 *
 * @example
 * throw new NotFoundError('Order not found', 'order', 5001);
 */
export class NotFoundError extends Error implements CustomError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | number | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | number | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * Conflict error - thrown when operation conflicts with current state
 *
 * @example
 * throw new ConflictError('Dead-letter entry already resolved', 'already_resolved');
 */
export class ConflictError extends Error implements CustomError {
    readonly name = 'ConflictError' as const;
    readonly statusCode = 409 as const;
    readonly conflictType: string | null;

    constructor(message: string = 'Conflict', conflictType: string | null = null) {
        super(message);
        this.conflictType = conflictType;
        Object.setPrototypeOf(this, ConflictError.prototype);
    }
}

/**
 * Storefront or other non-ERP upstream failure
 *
 * @example
 * throw new ExternalServiceError('Storefront request failed', 'storefront', error);
 */
export class ExternalServiceError extends Error implements CustomError {
    readonly name = 'ExternalServiceError' as const;
    readonly statusCode = 502 as const;
    readonly serviceName: string | null;
    readonly httpStatus: number | null;

    constructor(
        message: string,
        serviceName: string | null = null,
        cause: unknown = undefined,
        httpStatus: number | null = null
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.serviceName = serviceName;
        this.httpStatus = httpStatus;
        Object.setPrototypeOf(this, ExternalServiceError.prototype);
    }
}

// ============================================
// GUARDS
// ============================================

export function isCustomError(error: unknown): error is CustomError {
    return error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number';
}

export function isErpError(error: unknown): error is ErpError {
    return error instanceof ErpError;
}

/**
 * Whether a failed job should be rescheduled with backoff. Validation
 * failures, missing local records and mapping conflicts cannot succeed on a
 * later attempt.
 */
export function isJobRetryable(error: unknown): boolean {
    if (error instanceof NotFoundError || error instanceof ConflictError) return false;
    if (isErpError(error)) return error.kind !== 'validation';
    return true;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'Unknown error';
}
