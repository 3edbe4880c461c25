import { serve } from '@hono/node-server';
import { createApp } from './api/app';
import { createRoutes } from './api/routes';
import { createGeocoder } from './services/geocoding/geocoder.factory';
import { loadConfig, logConfigSummary } from './shared/config/config';
import { logger } from './shared/utils/logger';

/**
 * Application entry point
 */
async function main() {
    try {
        logger.info('Starting geocoding service...');

        const config = loadConfig();
        logConfigSummary(config);

        const geocoder = createGeocoder(config.geocoder);

        // Validate credentials on startup
        logger.info('Validating geocoder credentials...');
        const credentialsValid = await geocoder.validateCredentials();

        logger.info({
            event: 'adapters.validated',
            status: { geocoding: credentialsValid },
        }, 'Adapter validation complete');

        if (!credentialsValid) {
            logger.warn(`Geocoding adapter validation failed - check GEOCODER_* settings for ${geocoder.auth.scheme} auth`);
        }

        const app = createApp();
        app.route('/', createRoutes(geocoder));

        const server = serve({
            port: config.server.port,
            fetch: app.fetch,
        });

        logger.info({
            event: 'server.started',
            port: config.server.port,
            env: config.server.env,
            url: `http://localhost:${config.server.port}`,
        }, `Server started on port ${config.server.port}`);

        const shutdown = (signal: string) => {
            logger.info(`Received ${signal}, shutting down gracefully...`);
            server.close(() => process.exit(0));
        };

        process.on('SIGINT', () => shutdown('SIGINT'));
        process.on('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        logger.error({
            event: 'startup.error',
            error,
        }, 'Failed to start server');
        process.exit(1);
    }
}

void main();
