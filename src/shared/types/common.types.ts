/**
 * Common TypeScript types used across the geocoding service
 */

/**
 * Log context for structured logging
 */
export interface LogContext {
    /** Request ID for tracing */
    requestId?: string;
    /** Additional context */
    [key: string]: unknown;
}

/**
 * Application health check response
 */
export interface HealthCheckResponse {
    /** Overall status */
    status: 'healthy' | 'degraded';
    /** Current timestamp */
    timestamp: string;
    /** Uptime in seconds */
    uptime: number;
    /** Adapter health statuses */
    adapters: {
        geocoding: 'connected' | 'error';
    };
}

/**
 * Error body returned by every route
 */
export interface ErrorResponse {
    success: false;
    error: string;
    details?: string[] | undefined;
}

/**
 * Forward geocode response body
 */
export interface GeocodeResponse {
    success: true;
    data: {
        formatted_address: string;
        location: {
            lat: number;
            lng: number;
        };
    };
}

/**
 * Reverse geocode response body
 */
export interface ReverseGeocodeResponse {
    success: true;
    data: {
        formatted_address: string;
    };
}
