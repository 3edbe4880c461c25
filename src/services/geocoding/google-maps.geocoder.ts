import type { GeocodingAdapter } from './geocoding.interface';
import { isZeroResultsError } from './geocoding.interface';
import { UnauthenticatedAuth, type AuthStrategy } from './auth/auth-strategies';
import type { GeocoderTransport } from './adapters/transport/transport.interface';
import { KyTransport } from './adapters/transport/ky.transport';
import { buildGeocodeQuery, buildReverseGeocodeQuery, withSensorParam } from './query';
import { interpretGeocodeResponse, interpretReverseGeocodeResponse } from './response-interpreter';
import type { GeocodeResult, GeoPoint } from './types';
import { logGeocodingRequest, logLocationLookup } from '@/shared/utils/logger';
import { DEFAULT_GEOCODE_URL, DEFAULT_TIMEOUT_MS } from '@/shared/config/constants';

export { DEFAULT_GEOCODE_URL, DEFAULT_TIMEOUT_MS };

/** Point used by validateCredentials */
const VALIDATION_POINT: GeoPoint = { lat: 40.714224, lng: -73.961452 };

export interface GoogleMapsGeocoderOptions {
    /** Geocoding JSON endpoint, without query */
    baseUrl?: string | undefined;
    /** Defaults to unauthenticated requests */
    auth?: AuthStrategy | undefined;
    /** Defaults to a ky transport with the default timeout */
    transport?: GeocoderTransport | undefined;
}

/**
 * Google Maps Geocoder
 *
 * Integrates with the Google Maps Geocoding API
 * API Docs: https://developers.google.com/maps/documentation/geocoding
 *
 * Instances are immutable; `withBaseUrl` and `withAuth` return new ones.
 */
export class GoogleMapsGeocoder implements GeocodingAdapter {
    readonly baseUrl: string;
    readonly auth: AuthStrategy;
    private readonly transport: GeocoderTransport;

    constructor(options: GoogleMapsGeocoderOptions = {}) {
        this.baseUrl = options.baseUrl ?? DEFAULT_GEOCODE_URL;
        this.auth = options.auth ?? new UnauthenticatedAuth();
        this.transport = options.transport ?? new KyTransport({ timeoutMs: DEFAULT_TIMEOUT_MS });
    }

    withBaseUrl(baseUrl: string): GoogleMapsGeocoder {
        return new GoogleMapsGeocoder({ baseUrl, auth: this.auth, transport: this.transport });
    }

    withAuth(auth: AuthStrategy): GoogleMapsGeocoder {
        return new GoogleMapsGeocoder({ baseUrl: this.baseUrl, auth, transport: this.transport });
    }

    /**
     * Send an arbitrary query to the geocoding endpoint.
     *
     * The query is sent as given: no `sensor` parameter and no credentials
     * are added.
     */
    async request(query: string): Promise<Uint8Array> {
        const url = `${this.baseUrl}?${query}`;
        logGeocodingRequest({ operation: 'request', url, scheme: this.auth.scheme });
        return this.transport.get(url);
    }

    /**
     * Convert an address to coordinates
     */
    async geocode(address: string): Promise<GeocodeResult> {
        const url = this.composeUrl(buildGeocodeQuery(address));
        logGeocodingRequest({ operation: 'geocode', url, scheme: this.auth.scheme });

        const body = await this.transport.get(url);
        const result = interpretGeocodeResponse(body);

        logLocationLookup({
            latitude: result.point.lat,
            longitude: result.point.lng,
            address: result.formattedAddress,
        });

        return result;
    }

    /**
     * Convert coordinates to the first matching address
     */
    async reverseGeocode(point: GeoPoint): Promise<string> {
        const url = this.composeUrl(buildReverseGeocodeQuery(point));
        logGeocodingRequest({ operation: 'reverse_geocode', url, scheme: this.auth.scheme });

        const body = await this.transport.get(url);
        const address = interpretReverseGeocodeResponse(body);

        logLocationLookup({
            latitude: point.lat,
            longitude: point.lng,
            address,
        });

        return address;
    }

    /**
     * Validate credentials by making a test request.
     * An empty result still means the request was accepted; callers decide
     * whether a failure is worth logging.
     */
    async validateCredentials(): Promise<boolean> {
        try {
            await this.reverseGeocode(VALIDATION_POINT);
            return true;
        } catch (error) {
            return isZeroResultsError(error);
        }
    }

    /**
     * Throws synchronously on bad credentials, before anything is sent
     */
    private composeUrl(params: string): string {
        const query = this.auth.finish(withSensorParam(params), this.baseUrl);
        return `${this.baseUrl}?${query}`;
    }
}
