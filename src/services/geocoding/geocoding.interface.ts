import type { GeocodeResult, GeoPoint } from './types';

/**
 * Geocoding Adapter Interface
 *
 * Defines the contract for geocoding services that convert addresses to
 * coordinates and coordinates back to human-readable addresses
 *
 * Implementations: Google Maps
 */
export interface GeocodingAdapter {
    /**
     * Convert a human-readable address to coordinates
     *
     * @param address - Free-form address
     * @returns First matching result
     * @throws {ZeroResultsError} If the service has no match for the address
     * @throws {GeocodingError} If the request cannot complete
     */
    geocode(address: string): Promise<GeocodeResult>;

    /**
     * Convert coordinates to a human-readable address
     *
     * @returns Formatted address of the first matching result
     * @throws {ZeroResultsError} If the service has no match for the point
     * @throws {GeocodingError} If the request cannot complete
     */
    reverseGeocode(point: GeoPoint): Promise<string>;

    /**
     * Validate API key/credentials
     *
     * @returns True if credentials are accepted by the service
     */
    validateCredentials(): Promise<boolean>;
}

export type GeocodingErrorCode =
    | 'ZERO_RESULTS'
    | 'INVALID_CONFIGURATION'
    | 'TRANSPORT'
    | 'DECODE'
    | 'API';

/**
 * Base class for every error raised by the geocoder
 */
export class GeocodingError extends Error {
    constructor(
        message: string,
        public readonly code: GeocodingErrorCode,
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'GeocodingError';
    }
}

/**
 * The service answered but found nothing for the query
 */
export class ZeroResultsError extends GeocodingError {
    constructor() {
        super('ZERO_RESULTS', 'ZERO_RESULTS');
        this.name = 'ZeroResultsError';
    }
}

/**
 * Raised before any request is sent when the client is misconfigured
 */
export class GeocoderConfigError extends GeocodingError {
    constructor(message: string, cause?: unknown) {
        super(message, 'INVALID_CONFIGURATION', cause);
        this.name = 'GeocoderConfigError';
    }
}

export class InvalidPrivateKeyError extends GeocoderConfigError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidPrivateKeyError';
    }
}

/**
 * Network failure, timeout or non-2xx HTTP status
 */
export class GeocoderTransportError extends GeocodingError {
    constructor(
        message: string,
        public readonly statusCode?: number,
        cause?: unknown
    ) {
        super(message, 'TRANSPORT', cause);
        this.name = 'GeocoderTransportError';
    }
}

/**
 * Response body is not JSON or does not have the expected shape
 */
export class GeocoderDecodeError extends GeocodingError {
    constructor(message: string, cause?: unknown) {
        super(message, 'DECODE', cause);
        this.name = 'GeocoderDecodeError';
    }
}

/**
 * The service reported an error status such as REQUEST_DENIED
 */
export class GeocoderApiError extends GeocodingError {
    constructor(
        public readonly status: string,
        message?: string
    ) {
        super(message ? `${status}: ${message}` : status, 'API');
        this.name = 'GeocoderApiError';
    }
}

export function isZeroResultsError(error: unknown): error is ZeroResultsError {
    return error instanceof ZeroResultsError;
}
