/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import * as Sentry from '@sentry/node';
import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
    ConflictError,
    ErpError,
    ExternalServiceError,
    NotFoundError,
    ValidationError,
    errorMessage,
} from '../utils/errors.js';
import { httpLogger } from '../utils/logger.js';

const isDevelopment = process.env.NODE_ENV === 'development';

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    httpLogger.error(
        {
            method: req.method,
            path: req.path,
            error: errorMessage(err),
            type: err instanceof Error ? err.name : typeof err,
            ...(isDevelopment && err instanceof Error && { stack: err.stack }),
        },
        'Request failed',
    );

    if (err instanceof ValidationError) {
        res.status(400).json({
            error: err.message,
            type: 'ValidationError',
            details: err.details
        });
        return;
    }

    if (err instanceof ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            type: 'ValidationError',
            details: err.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message
            }))
        });
        return;
    }

    if (err instanceof NotFoundError) {
        res.status(404).json({
            error: err.message,
            type: 'NotFoundError',
            resourceType: err.resourceType,
            resourceId: err.resourceId
        });
        return;
    }

    if (err instanceof ConflictError) {
        res.status(409).json({
            error: err.message,
            type: 'ConflictError',
            conflictType: err.conflictType
        });
        return;
    }

    // ERP failures: the admin caller sees the ERP's status family, not ours
    if (err instanceof ErpError) {
        res.status(err.statusCode).json({
            error: err.message,
            type: err.name,
            kind: err.kind,
            code: err.code,
            retryable: err.retryable
        });
        return;
    }

    if (err instanceof ExternalServiceError) {
        res.status(502).json({
            error: err.message,
            type: 'ExternalServiceError',
            service: err.serviceName
        });
        return;
    }

    // Default 500 error
    Sentry.captureException(err, { extra: { method: req.method, path: req.path } });
    res.status(500).json({
        error: 'Internal server error',
        type: 'Error',
        ...(isDevelopment && { details: errorMessage(err) })
    });
};

export default errorHandler;
