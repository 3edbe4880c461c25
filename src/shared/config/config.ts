import { ZodError } from 'zod';
import { validateEnv, type ValidatedEnv } from '../utils/validators';
import type { ClientCredentials } from '@/services/geocoding/auth/auth-strategies';
import { logger } from '../utils/logger';

export interface GeocoderConfig {
    baseUrl: string;
    timeoutMs: number;
    credentials: ClientCredentials;
}

export interface AppConfig {
    server: {
        port: number;
        env: ValidatedEnv['NODE_ENV'];
        isDevelopment: boolean;
        isProduction: boolean;
    };
    logging: {
        level: ValidatedEnv['LOG_LEVEL'];
    };
    geocoder: GeocoderConfig;
}

/**
 * Load and validate environment variables
 */
function loadEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
    try {
        return validateEnv(env);
    } catch (error) {
        const issues = error instanceof ZodError
            ? error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            : [];
        logger.error({ event: 'config.invalid', issues }, 'Failed to validate environment variables');
        throw new Error('Invalid environment configuration. Check .env file.', { cause: error });
    }
}

function toCredentials(env: ValidatedEnv): ClientCredentials {
    switch (env.GEOCODER_AUTH_SCHEME) {
        case 'token':
            return { scheme: 'token', apiKey: env.GEOCODER_API_KEY ?? '' };
        case 'signed':
            return {
                scheme: 'signed',
                clientId: env.GEOCODER_CLIENT_ID ?? '',
                privateKey: env.GEOCODER_PRIVATE_KEY ?? '',
                channel: env.GEOCODER_CHANNEL,
            };
        case 'unauthenticated':
            return { scheme: 'unauthenticated' };
    }
}

/**
 * Build application configuration from environment variables
 *
 * @throws {Error} If the environment is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const validated = loadEnv(env);

    return {
        server: {
            port: validated.PORT,
            env: validated.NODE_ENV,
            isDevelopment: validated.NODE_ENV === 'development',
            isProduction: validated.NODE_ENV === 'production',
        },
        logging: {
            level: validated.LOG_LEVEL,
        },
        geocoder: {
            baseUrl: validated.GEOCODER_BASE_URL,
            timeoutMs: validated.GEOCODER_TIMEOUT_MS,
            credentials: toCredentials(validated),
        },
    };
}

/**
 * Log configuration summary (without sensitive data)
 */
export function logConfigSummary(config: AppConfig) {
    const { credentials } = config.geocoder;

    logger.info({
        server: {
            port: config.server.port,
            env: config.server.env,
        },
        logging: {
            level: config.logging.level,
        },
        geocoder: {
            baseUrl: config.geocoder.baseUrl,
            timeoutMs: config.geocoder.timeoutMs,
            scheme: credentials.scheme,
            clientId: credentials.scheme === 'signed' ? credentials.clientId : undefined,
            channel: credentials.scheme === 'signed' ? credentials.channel : undefined,
        },
    }, 'Configuration loaded');
}
