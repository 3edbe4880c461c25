import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logError } from '@/shared/utils/logger';
import { wideEventMiddleware } from '@/shared/middleware/wide-event.middleware';
import type { WideEventVariables } from '@/shared/types/wide-event.types';

/**
 * Create and configure the main Hono application
 *
 * @returns Configured Hono app
 */
export function createApp() {
    const app = new Hono<{ Variables: WideEventVariables }>();

    app.use('/*', cors({
        origin: '*',
        allowMethods: ['GET', 'OPTIONS'],
        allowHeaders: ['Content-Type', 'Authorization'],
    }));

    // Wide Event middleware - emits single canonical log line per request
    app.use('/*', wideEventMiddleware());

    app.onError((err, c) => {
        logError(err, {
            event: 'http.error',
            path: c.req.path,
            method: c.req.method,
        });

        return c.json(
            {
                success: false,
                error: 'Internal server error',
            },
            500
        );
    });

    app.notFound((c) => {
        return c.json(
            {
                success: false,
                error: 'Not found',
            },
            404
        );
    });

    return app;
}
