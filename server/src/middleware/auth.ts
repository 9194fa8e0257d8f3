import jwt from 'jsonwebtoken';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { httpLogger } from '../utils/logger.js';

const adminClaimsSchema = z.object({
    sub: z.string().min(1),
    role: z.string(),
});

export type AdminClaims = z.infer<typeof adminClaimsSchema>;

function bearerToken(req: Request): string | null {
    const authHeader = req.headers['authorization'];
    if (!authHeader) return null;
    const [scheme, token] = authHeader.split(' ');
    return scheme?.toLowerCase() === 'bearer' && token ? token : null;
}

/**
 * Middleware requiring a bearer token signed with `secret` whose role is
 * admin. Attaches the claims as `req.admin`.
 */
export function requireAdmin(secret: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const token = bearerToken(req);
        if (!token) {
            res.status(401).json({ error: 'Access token required' });
            return;
        }

        let decoded: string | jwt.JwtPayload;
        try {
            decoded = jwt.verify(token, secret);
        } catch (error: unknown) {
            httpLogger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Token rejected');
            res.status(403).json({ error: 'Invalid or expired token' });
            return;
        }

        const claims = adminClaimsSchema.safeParse(decoded);
        if (!claims.success) {
            res.status(403).json({ error: 'Invalid or expired token' });
            return;
        }
        if (claims.data.role !== 'admin') {
            res.status(403).json({ error: 'Admin access required' });
            return;
        }

        req.admin = claims.data;
        next();
    };
}
