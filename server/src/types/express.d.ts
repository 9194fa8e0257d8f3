// src/types/express.d.ts
import type { AdminClaims } from '../middleware/auth.js';

declare global {
    namespace Express {
        interface Request {
            admin?: AdminClaims;
        }
    }
}

declare module 'http' {
    interface IncomingMessage {
        /** Unparsed request body, captured by express.json for webhook signature checks */
        rawBody?: Buffer;
    }
}

export {};
