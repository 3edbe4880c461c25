import { Hono, type Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';
import type { GeocodingAdapter } from '../geocoding.interface';
import { GeocodingError } from '../geocoding.interface';
import { validateGeocodeQuery, validateReverseGeocodeQuery } from '@/shared/utils/validators';
import { getWideEvent } from '@/shared/middleware/wide-event.middleware';
import { logger } from '@/shared/utils/logger';
import type { WideEventVariables } from '@/shared/types/wide-event.types';
import type { ErrorResponse, GeocodeResponse, ReverseGeocodeResponse } from '@/shared/types/common.types';

type Env = { Variables: WideEventVariables };

const STATUS_BY_CODE: Record<GeocodingError['code'], ContentfulStatusCode> = {
    ZERO_RESULTS: 404,
    INVALID_CONFIGURATION: 500,
    TRANSPORT: 502,
    DECODE: 502,
    API: 502,
};

/**
 * Map validation and geocoding errors to a JSON response.
 * Anything else is re-thrown to the app error handler.
 */
function handleError(c: Context<Env>, error: unknown) {
    if (error instanceof ZodError) {
        const body: ErrorResponse = {
            success: false,
            error: 'Invalid query',
            details: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        };
        return c.json(body, 400);
    }

    if (error instanceof GeocodingError) {
        const wideEvent = getWideEvent(c);
        if (wideEvent) {
            if (wideEvent.geocoding && error.code === 'ZERO_RESULTS') {
                wideEvent.geocoding.zero_results = true;
            }
            wideEvent.error = { type: error.name, message: error.message, code: error.code };
        }

        if (error.code !== 'ZERO_RESULTS') {
            logger.warn({
                event: 'geocoding.failed',
                code: error.code,
                error: error.message,
            }, 'Geocoding request failed');
        }

        const body: ErrorResponse = {
            success: false,
            error: error.code === 'ZERO_RESULTS' ? 'ZERO_RESULTS' : error.message,
        };
        return c.json(body, STATUS_BY_CODE[error.code]);
    }

    throw error;
}

/**
 * Create geocoding routes
 *
 * @param geocoder - Geocoding adapter instance
 * @returns Hono app with geocoding routes
 */
export function createGeocodingRoutes(geocoder: GeocodingAdapter) {
    const app = new Hono<Env>();

    /**
     * GET /geocode?address=...
     */
    app.get('/geocode', async (c) => {
        try {
            const { address } = validateGeocodeQuery(c.req.query());

            const wideEvent = getWideEvent(c);
            if (wideEvent) {
                wideEvent.geocoding = { operation: 'geocode', address };
            }

            const result = await geocoder.geocode(address);

            if (wideEvent?.geocoding) {
                wideEvent.geocoding.latitude = result.point.lat;
                wideEvent.geocoding.longitude = result.point.lng;
                wideEvent.geocoding.formatted_address = result.formattedAddress;
            }

            const body: GeocodeResponse = {
                success: true,
                data: {
                    formatted_address: result.formattedAddress,
                    location: {
                        lat: result.point.lat,
                        lng: result.point.lng,
                    },
                },
            };
            return c.json(body);
        } catch (error) {
            return handleError(c, error);
        }
    });

    /**
     * GET /reverse-geocode?lat=...&lng=...
     */
    app.get('/reverse-geocode', async (c) => {
        try {
            const { lat, lng } = validateReverseGeocodeQuery(c.req.query());

            const wideEvent = getWideEvent(c);
            if (wideEvent) {
                wideEvent.geocoding = { operation: 'reverse_geocode', latitude: lat, longitude: lng };
            }

            const address = await geocoder.reverseGeocode({ lat, lng });

            if (wideEvent?.geocoding) {
                wideEvent.geocoding.formatted_address = address;
            }

            const body: ReverseGeocodeResponse = {
                success: true,
                data: {
                    formatted_address: address,
                },
            };
            return c.json(body);
        } catch (error) {
            return handleError(c, error);
        }
    });

    return app;
}
