import { Hono } from 'hono';
import type { GeocodingAdapter } from '@/services/geocoding/geocoding.interface';
import { createGeocodingRoutes } from '@/services/geocoding/routes/geocoding.route';
import type { HealthCheckResponse } from '@/shared/types/common.types';
import type { WideEventVariables } from '@/shared/types/wide-event.types';
import { logger } from '@/shared/utils/logger';

/**
 * Create and configure all API routes
 *
 * @param geocoder - Geocoding adapter instance
 * @returns Hono app with all routes configured
 */
export function createRoutes(geocoder: GeocodingAdapter) {
    const app = new Hono<{ Variables: WideEventVariables }>();

    // Health check endpoint
    app.get('/health', async (c) => {
        const geocodingHealthy = await geocoder.validateCredentials();

        if (!geocodingHealthy) {
            logger.warn({
                event: 'health.geocoding.degraded',
            }, 'Geocoder credential validation failed');
        }

        const response: HealthCheckResponse = {
            status: geocodingHealthy ? 'healthy' : 'degraded',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            adapters: {
                geocoding: geocodingHealthy ? 'connected' : 'error',
            },
        };

        return c.json(response, geocodingHealthy ? 200 : 503);
    });

    app.route('/', createGeocodingRoutes(geocoder));

    return app;
}
