import { randomUUID } from 'node:crypto';
import type { Context, MiddlewareHandler } from 'hono';
import { logger } from '@/shared/utils/logger';
import type { WideEvent, WideEventVariables } from '@/shared/types/wide-event.types';

/**
 * Wide Event Middleware
 *
 * Creates a single, context-rich log event per request that accumulates
 * business and technical context throughout the request lifecycle.
 *
 * Usage:
 * ```typescript
 * app.use('/*', wideEventMiddleware());
 *
 * // In route handler:
 * const wideEvent = getWideEvent(c);
 * if (wideEvent) wideEvent.geocoding = { operation: 'geocode', address };
 * ```
 */
export function wideEventMiddleware(): MiddlewareHandler<{ Variables: WideEventVariables }> {
    return async (c, next) => {
        const startTime = Date.now();

        const wideEvent: WideEvent = {
            timestamp: new Date().toISOString(),
            request_id: randomUUID(),
            service: process.env.SERVICE_NAME || 'maps-geocoder',
            version: process.env.npm_package_version || '1.0.0',
            http: {
                method: c.req.method,
                path: c.req.path,
                user_agent: c.req.header('user-agent') || 'unknown',
            },
            outcome: 'success',
            duration_ms: 0,
        };

        if (process.env.DEPLOYMENT_ID) {
            wideEvent.deployment_id = process.env.DEPLOYMENT_ID;
        }
        if (process.env.REGION) {
            wideEvent.region = process.env.REGION;
        }

        c.set('wideEvent', wideEvent);

        try {
            await next();

            wideEvent.http.status_code = c.res.status;

            if (c.res.status >= 200 && c.res.status < 300) {
                wideEvent.outcome = 'success';
            } else if (c.res.status >= 400 && c.res.status < 500) {
                wideEvent.outcome = 'rejected';
            } else {
                wideEvent.outcome = 'error';
            }
        } catch (error) {
            wideEvent.outcome = 'error';
            wideEvent.http.status_code = 500;

            if (error instanceof Error) {
                wideEvent.error = {
                    type: error.name,
                    message: error.message,
                };
                if (error.stack) {
                    wideEvent.error.stack = error.stack;
                }
            } else {
                wideEvent.error = {
                    type: 'UnknownError',
                    message: String(error),
                };
            }

            // Re-throw to let error handler deal with it
            throw error;
        } finally {
            wideEvent.duration_ms = Date.now() - startTime;

            // Emit the single canonical log line
            logger.info(wideEvent, `${wideEvent.http.method} ${wideEvent.http.path} - ${wideEvent.outcome}`);
        }
    };
}

/**
 * Get wide event from context
 * Returns undefined when the middleware is not mounted (e.g., in tests)
 */
export function getWideEvent(c: Context<{ Variables: WideEventVariables }>): WideEvent | undefined {
    return c.get('wideEvent');
}
