import pino from 'pino';
import type { LogContext } from '../types/common.types';

/**
 * Create a logger instance with appropriate configuration
 */
function createLogger() {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const logLevel = process.env.LOG_LEVEL || 'info';

    const baseConfig = {
        level: logLevel,
        // Base fields for all logs
        base: {
            env: process.env.NODE_ENV,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    // Add pretty print transport only in development
    if (isDevelopment) {
        return pino({
            ...baseConfig,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return pino(baseConfig);
}

/**
 * Global logger instance
 */
export const logger = createLogger();

const SECRET_PARAMS = /([?&](?:key|signature)=)[^&]*/g;

/**
 * Mask `key` and `signature` values in a URL or query string
 */
export function redactQuery(url: string): string {
    return url.replace(SECRET_PARAMS, '$1[REDACTED]');
}

/**
 * Log outbound geocoding request
 */
export function logGeocodingRequest(data: {
    operation: 'geocode' | 'reverse_geocode' | 'request';
    url: string;
    scheme: string;
    requestId?: string | undefined;
}) {
    logger.debug({
        event: 'geocoding.request',
        operation: data.operation,
        url: redactQuery(data.url),
        scheme: data.scheme,
        requestId: data.requestId,
    }, 'Sending geocoding request');
}

/**
 * Log location lookup
 */
export function logLocationLookup(data: {
    latitude: number;
    longitude: number;
    address: string;
}) {
    logger.debug({
        event: 'location.lookup.success',
        latitude: data.latitude,
        longitude: data.longitude,
        address: data.address,
    }, 'Location lookup completed');
}

/**
 * Log error with context
 */
export function logError(error: Error, context?: LogContext) {
    logger.error({
        event: 'error',
        error: {
            message: error.message,
            name: error.name,
            stack: error.stack,
        },
        ...context,
    }, error.message);
}
