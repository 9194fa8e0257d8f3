/**
 * Storefront webhooks
 *
 * One endpoint for every topic; the x-wc-webhook-topic header selects the
 * event. Payloads are verified against the base64 HMAC-SHA256 of the raw
 * body, then turned into domain events.
 */

import crypto from 'crypto';
import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/asyncHandler.js';
import type { DomainEventHandlers } from '../events/domainEvents.js';
import { restOrderSchema, restProductSchema, toStorefrontOrder, toStorefrontProduct } from '../services/storefront/restSchemas.js';
import { storefrontLogger as log } from '../utils/logger.js';

export const WEBHOOK_SIGNATURE_HEADER = 'x-wc-webhook-signature';
export const WEBHOOK_TOPIC_HEADER = 'x-wc-webhook-topic';

const deletedProductSchema = z.object({ id: z.number().int().positive() });

export interface WebhookRouterDeps {
    /** Resolved per request so a settings reload takes effect at once */
    events: () => DomainEventHandlers;
    /** Unverified webhooks are accepted when unset */
    secret: string | undefined;
}

export function signWebhookBody(body: Buffer | string, secret: string): string {
    return crypto.createHmac('sha256', secret).update(body).digest('base64');
}

export function verifyWebhookSignature(rawBody: Buffer | undefined, signature: string | undefined, secret: string): boolean {
    if (!signature) return false;
    if (!rawBody) {
        log.error('Webhook rawBody not captured - signature verification will fail');
        return false;
    }

    const expected = Buffer.from(signWebhookBody(rawBody, secret));
    const received = Buffer.from(signature);
    return expected.length === received.length && crypto.timingSafeEqual(expected, received);
}

function verifyWebhook(secret: string | undefined) {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!secret) {
            log.warn('Webhook secret not configured - accepting unverified webhook');
            next();
            return;
        }

        if (!verifyWebhookSignature(req.rawBody, req.get(WEBHOOK_SIGNATURE_HEADER), secret)) {
            log.error({ topic: req.get(WEBHOOK_TOPIC_HEADER) }, 'Webhook verification failed');
            res.status(401).json({ error: 'Webhook verification failed' });
            return;
        }

        next();
    };
}

type TopicHandler = (events: DomainEventHandlers, body: unknown) => Promise<number | boolean | null>;

const TOPIC_HANDLERS: Record<string, TopicHandler> = {
    'order.created': (events, body) => events.onOrderCreated(toStorefrontOrder(restOrderSchema.parse(body))),
    // The payload carries no previous status
    'order.updated': (events, body) => {
        const order = toStorefrontOrder(restOrderSchema.parse(body));
        return events.onOrderStatusChanged(order, null, order.status);
    },
    'product.created': (events, body) => events.onProductSaved(toStorefrontProduct(restProductSchema.parse(body))),
    'product.updated': (events, body) => events.onProductSaved(toStorefrontProduct(restProductSchema.parse(body))),
    'product.deleted': (events, body) => events.onProductDeleted(deletedProductSchema.parse(body).id),
};

export function createWebhookRouter({ events, secret }: WebhookRouterDeps): Router {
    const router = Router();

    router.post('/', verifyWebhook(secret), asyncHandler(async (req, res) => {
        const topic = req.get(WEBHOOK_TOPIC_HEADER);

        // Delivery test sent when a webhook is first saved
        if (!topic) {
            log.info('Webhook ping received');
            res.json({ received: true });
            return;
        }

        const handler = TOPIC_HANDLERS[topic];
        if (!handler) {
            log.debug({ topic }, 'Ignoring webhook topic');
            res.json({ received: true, ignored: true });
            return;
        }

        const result = await handler(events(), req.body);
        log.info({ topic, result }, 'Webhook processed');
        res.json({ received: true, result });
    }));

    return router;
}
