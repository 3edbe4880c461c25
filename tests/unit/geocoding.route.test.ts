import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { logger } from '@/shared/utils/logger';
import { createApp } from '@/api/app';
import { createRoutes } from '@/api/routes';
import type { GeocodingAdapter } from '@/services/geocoding/geocoding.interface';
import {
    GeocoderConfigError,
    GeocoderTransportError,
    InvalidPrivateKeyError,
    ZeroResultsError,
} from '@/services/geocoding/geocoding.interface';
import type { GeocodeResult, GeoPoint } from '@/services/geocoding/types';

// Mock adapter
class MockGeocoder implements GeocodingAdapter {
    public addresses: string[] = [];
    public points: GeoPoint[] = [];
    public failure: Error | undefined;
    public credentialsValid = true;

    async geocode(address: string): Promise<GeocodeResult> {
        this.addresses.push(address);
        if (this.failure) {
            throw this.failure;
        }
        return { point: { lat: 1, lng: 2 }, formattedAddress: '1 Main St' };
    }

    async reverseGeocode(point: GeoPoint): Promise<string> {
        this.points.push(point);
        if (this.failure) {
            throw this.failure;
        }
        return '277 Bedford Ave, Brooklyn, NY 11211, USA';
    }

    async validateCredentials(): Promise<boolean> {
        return this.credentialsValid;
    }
}

describe('Geocoding routes', () => {
    let geocoder: MockGeocoder;
    let app: ReturnType<typeof createApp>;

    beforeEach(() => {
        geocoder = new MockGeocoder();
        app = createApp();
        app.route('/', createRoutes(geocoder));
    });

    describe('GET /geocode', () => {
        it('should return the location of the address', async () => {
            const res = await app.request('/geocode?address=1%20Main%20St');

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                success: true,
                data: {
                    formatted_address: '1 Main St',
                    location: { lat: 1, lng: 2 },
                },
            });
            expect(geocoder.addresses).toEqual(['1 Main St']);
        });

        it('should reject a missing address', async () => {
            const res = await app.request('/geocode');

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                success: false,
                error: 'Invalid query',
                details: ['address: Required'],
            });
            expect(geocoder.addresses).toHaveLength(0);
        });

        it('should reject a blank address', async () => {
            const res = await app.request('/geocode?address=%20%20');

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                success: false,
                error: 'Invalid query',
                details: ['address: Address is required'],
            });
        });

        it('should answer 404 when nothing matches', async () => {
            geocoder.failure = new ZeroResultsError();

            const res = await app.request('/geocode?address=Nowhere');

            expect(res.status).toBe(404);
            expect(await res.json()).toEqual({ success: false, error: 'ZERO_RESULTS' });
        });

        it('should answer 502 on transport errors', async () => {
            geocoder.failure = new GeocoderTransportError('Geocoding request failed with status 503', 503);

            const res = await app.request('/geocode?address=Paris');

            expect(res.status).toBe(502);
            expect(await res.json()).toEqual({
                success: false,
                error: 'Geocoding request failed with status 503',
            });
        });

        it('should answer 500 on configuration errors', async () => {
            geocoder.failure = new InvalidPrivateKeyError('Private key contains characters outside the base64url alphabet');

            const res = await app.request('/geocode?address=Paris');

            expect(res.status).toBe(500);
            expect(await res.json()).toEqual({
                success: false,
                error: 'Private key contains characters outside the base64url alphabet',
            });
        });

        it('should hand unexpected errors to the app error handler', async () => {
            geocoder.failure = new Error('boom');

            const res = await app.request('/geocode?address=Paris');

            expect(res.status).toBe(500);
            expect(await res.json()).toEqual({ success: false, error: 'Internal server error' });
        });
    });

    describe('GET /reverse-geocode', () => {
        it('should return the address of the point', async () => {
            const res = await app.request('/reverse-geocode?lat=40.714224&lng=-73.961452');

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                success: true,
                data: { formatted_address: '277 Bedford Ave, Brooklyn, NY 11211, USA' },
            });
            expect(geocoder.points).toEqual([{ lat: 40.714224, lng: -73.961452 }]);
        });

        it('should reject coordinates that are not numbers', async () => {
            const res = await app.request('/reverse-geocode?lat=north&lng=2');

            expect(res.status).toBe(400);
            expect(geocoder.points).toHaveLength(0);
        });

        it('should reject missing coordinates', async () => {
            const res = await app.request('/reverse-geocode?lat=1');

            expect(res.status).toBe(400);
        });

        it('should answer 404 when nothing matches', async () => {
            geocoder.failure = new ZeroResultsError();

            const res = await app.request('/reverse-geocode?lat=0&lng=0');

            expect(res.status).toBe(404);
            expect(await res.json()).toEqual({ success: false, error: 'ZERO_RESULTS' });
        });

        it('should answer 500 on configuration errors', async () => {
            geocoder.failure = new GeocoderConfigError('Cannot parse request URL for signing: bad');

            const res = await app.request('/reverse-geocode?lat=0&lng=0');

            expect(res.status).toBe(500);
        });
    });

    describe('GET /health', () => {
        afterEach(() => {
            vi.restoreAllMocks();
        });

        it('should report healthy when credentials are valid', async () => {
            const res = await app.request('/health');

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({
                status: 'healthy',
                adapters: { geocoding: 'connected' },
            });
        });

        it('should report degraded when credentials are rejected', async () => {
            const warn = vi.spyOn(logger, 'warn');
            geocoder.credentialsValid = false;

            const res = await app.request('/health');

            expect(warn).toHaveBeenCalledWith(
                { event: 'health.geocoding.degraded' },
                'Geocoder credential validation failed'
            );

            expect(res.status).toBe(503);
            expect(await res.json()).toMatchObject({
                status: 'degraded',
                adapters: { geocoding: 'error' },
            });
        });
    });

    it('should answer 404 for unknown routes', async () => {
        const res = await app.request('/unknown');

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ success: false, error: 'Not found' });
    });
});
