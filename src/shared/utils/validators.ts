import { z } from 'zod';
import { DEFAULT_GEOCODE_URL, DEFAULT_TIMEOUT_MS } from '../config/constants';

/**
 * Environment variables validation schema
 */
export const envSchema = z
    .object({
        // Server
        PORT: z.string().default('3000').transform(Number),
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
        LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

        // Geocoder
        GEOCODER_BASE_URL: z.string().url('Geocoder base URL must be a URL').default(DEFAULT_GEOCODE_URL),
        GEOCODER_AUTH_SCHEME: z.enum(['unauthenticated', 'token', 'signed']).default('unauthenticated'),
        GEOCODER_API_KEY: z.string().optional(),
        GEOCODER_CLIENT_ID: z.string().optional(),
        GEOCODER_PRIVATE_KEY: z
            .string()
            .regex(/^[A-Za-z0-9_-]*={0,2}$/, 'Private key must be base64url encoded')
            .optional(),
        GEOCODER_CHANNEL: z.string().optional(),
        GEOCODER_TIMEOUT_MS: z.string().default(String(DEFAULT_TIMEOUT_MS)).transform(Number),
    })
    .superRefine((env, ctx) => {
        if (env.GEOCODER_AUTH_SCHEME === 'token' && !env.GEOCODER_API_KEY) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['GEOCODER_API_KEY'],
                message: 'API key is required for token auth',
            });
        }
        if (env.GEOCODER_AUTH_SCHEME === 'signed') {
            if (!env.GEOCODER_CLIENT_ID) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['GEOCODER_CLIENT_ID'],
                    message: 'Client ID is required for signed auth',
                });
            }
            if (!env.GEOCODER_PRIVATE_KEY) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['GEOCODER_PRIVATE_KEY'],
                    message: 'Private key is required for signed auth',
                });
            }
        }
    });

/**
 * Forward geocode query validation schema
 */
export const geocodeQuerySchema = z.object({
    address: z.string().trim().min(1, 'Address is required'),
});

const coordinateSchema = z.string().trim().min(1).pipe(z.coerce.number().finite());

/**
 * Reverse geocode query validation schema. Ranges are left to the service.
 */
export const reverseGeocodeQuerySchema = z.object({
    lat: coordinateSchema,
    lng: coordinateSchema,
});

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv) {
    return envSchema.parse(env);
}

export function validateGeocodeQuery(data: unknown) {
    return geocodeQuerySchema.parse(data);
}

export function validateReverseGeocodeQuery(data: unknown) {
    return reverseGeocodeQuerySchema.parse(data);
}

/**
 * Type exports for validated data
 */
export type ValidatedEnv = z.infer<typeof envSchema>;
export type ValidatedGeocodeQuery = z.infer<typeof geocodeQuerySchema>;
export type ValidatedReverseGeocodeQuery = z.infer<typeof reverseGeocodeQuerySchema>;
