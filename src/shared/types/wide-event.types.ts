/**
 * Wide Event Types
 *
 * A wide event is a single, context-rich log event emitted per request that
 * contains all relevant business and technical context in one place.
 */

/**
 * Core wide event structure
 * Emitted once per request with full context
 */
export interface WideEvent {
    // ===== Request Metadata =====
    timestamp: string;
    request_id: string;
    service: string;
    version?: string;
    deployment_id?: string;
    region?: string;

    // ===== HTTP Context =====
    http: {
        method: string;
        path: string;
        status_code?: number;
        user_agent?: string;
    };

    // ===== Outcome =====
    outcome: 'success' | 'error' | 'rejected';
    duration_ms: number;

    // ===== Geocoding Context =====
    geocoding?: {
        operation: 'geocode' | 'reverse_geocode';
        address?: string;
        latitude?: number;
        longitude?: number;
        formatted_address?: string;
        zero_results?: boolean;
    };

    // ===== Error Context =====
    error?: {
        type: string;
        message: string;
        code?: string;
        stack?: string;
    };
}

/**
 * Variables stored on the Hono context
 */
export interface WideEventVariables {
    wideEvent: WideEvent;
}
