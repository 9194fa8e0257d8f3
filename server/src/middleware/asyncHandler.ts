/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler: wraps async route handlers to catch errors automatically
 * typedRoute: combines Zod validation + asyncHandler for type-safe routes
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void | Response>;

/** Params and body after Zod validation */
export interface ValidatedInput<TParams, TBody> {
    params: TParams;
    body: TBody;
}

type TypedHandler<TParams, TBody> = (
    input: ValidatedInput<TParams, TBody>,
    req: Request,
    res: Response,
) => Promise<void | Response>;

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================
// asyncHandler: for unvalidated routes
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// typedRoute: Zod params/body validation + asyncHandler
// ============================================

function sendValidationError(res: Response, error: z.ZodError, fallback: string): void {
    res.status(400).json({
        error: error.issues[0]?.message || fallback,
        details: error.issues.map((issue: z.ZodIssue) => ({
            path: issue.path.join('.'),
            message: issue.message,
        })),
    });
}

/** For a route part that is not read */
export const noInput: Schema<unknown> = z.unknown();

/**
 * Validates params and body, then hands the parsed values to the handler.
 *
 * @example
 * router.post('/orders/:orderId/sync', typedRoute({ params: OrderParams, body: noInput }, async ({ params }, _req, res) => {
 *     const { orderId } = params; // ← number, from OrderParams
 *     res.json({ success: true });
 * }));
 */
export function typedRoute<TParams, TBody>(
    schemas: { params: Schema<TParams>; body: Schema<TBody> },
    handler: TypedHandler<TParams, TBody>,
): RequestHandler {
    return asyncHandler(async (req, res) => {
        const params = schemas.params.safeParse(req.params);
        if (!params.success) {
            sendValidationError(res, params.error, 'Invalid params');
            return;
        }

        const body = schemas.body.safeParse(req.body);
        if (!body.success) {
            sendValidationError(res, body.error, 'Validation failed');
            return;
        }

        await handler({ params: params.data, body: body.data }, req, res);
    });
}

export default asyncHandler;
