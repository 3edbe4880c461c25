import { z } from 'zod';
import { GeocoderApiError, GeocoderDecodeError, ZeroResultsError } from './geocoding.interface';
import type { GeocodeResult } from './types';

/**
 * Statuses that are not errors. Anything else the service reports is.
 */
const NON_ERROR_STATUSES = new Set(['OK', 'ZERO_RESULTS']);

function lowercaseKeys(value: unknown): unknown {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return value;
    }
    return Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [key.toLowerCase(), entry])
    );
}

/**
 * Location keys are matched case-insensitively (`Lat` and `lat` both work)
 */
const locationSchema = z.preprocess(
    lowercaseKeys,
    z.object({
        lat: z.number(),
        lng: z.number(),
    })
);

const responseEnvelopeSchema = z.object({
    status: z.string().optional(),
    error_message: z.string().optional(),
});

export const geocodeResponseSchema = responseEnvelopeSchema.extend({
    results: z
        .array(
            z.object({
                formatted_address: z.string(),
                geometry: z.object({
                    location: locationSchema,
                }),
            })
        )
        .default([]),
});

export const reverseGeocodeResponseSchema = responseEnvelopeSchema.extend({
    results: z
        .array(
            z.object({
                formatted_address: z.string(),
            })
        )
        .default([]),
});

/**
 * Decode a UTF-8 JSON body
 *
 * @throws {GeocoderDecodeError} If the body is not valid JSON
 */
export function decodeJson(body: Uint8Array): unknown {
    const text = new TextDecoder().decode(body);
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new GeocoderDecodeError('Geocoding response is not valid JSON', error);
    }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new GeocoderDecodeError(
            `Unexpected geocoding response shape${where}: ${issue?.message ?? 'invalid'}`,
            parsed.error
        );
    }
    return parsed.data;
}

function ensureResults<T>(response: { status?: string | undefined; error_message?: string | undefined; results: T[] }): T {
    if (response.status !== undefined && !NON_ERROR_STATUSES.has(response.status)) {
        throw new GeocoderApiError(response.status, response.error_message);
    }

    const [first] = response.results;
    if (first === undefined) {
        throw new ZeroResultsError();
    }
    return first;
}

/**
 * Interpret a forward geocoding response
 *
 * An error `status` wins over an empty result list: `{"status":"REQUEST_DENIED","results":[]}`
 * is a GeocoderApiError, not a ZeroResultsError, so a rejected request never reads as "no match".
 *
 * @throws {ZeroResultsError} If there are no results
 * @throws {GeocoderApiError} If the service reported an error status
 * @throws {GeocoderDecodeError} If the body is malformed
 */
export function interpretGeocodeResponse(body: Uint8Array): GeocodeResult {
    const response = parseWith(geocodeResponseSchema, decodeJson(body));
    const first = ensureResults(response);

    return {
        point: {
            lat: first.geometry.location.lat,
            lng: first.geometry.location.lng,
        },
        formattedAddress: first.formatted_address,
    };
}

/**
 * Interpret a reverse geocoding response
 *
 * Same status precedence as interpretGeocodeResponse.
 *
 * @throws {ZeroResultsError} If there are no results
 * @throws {GeocoderApiError} If the service reported an error status
 * @throws {GeocoderDecodeError} If the body is malformed
 * @returns Formatted address of the first result
 */
export function interpretReverseGeocodeResponse(body: Uint8Array): string {
    const response = parseWith(reverseGeocodeResponseSchema, decodeJson(body));
    return ensureResults(response).formatted_address;
}
