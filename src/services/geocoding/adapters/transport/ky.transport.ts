import ky, { HTTPError, TimeoutError, type KyInstance } from 'ky';
import type { GeocoderTransport } from './transport.interface';
import { GeocoderTransportError } from '../../geocoding.interface';
import { logger, redactQuery } from '@/shared/utils/logger';

export interface KyTransportOptions {
    /** Per-request timeout in milliseconds */
    timeoutMs: number;
    /** Custom fetch implementation (tests, proxies) */
    fetch?: typeof fetch | undefined;
}

/**
 * ky-backed transport
 *
 * Retries are disabled: a failed request is reported to the caller once.
 */
export class KyTransport implements GeocoderTransport {
    private client: KyInstance;

    constructor(options: KyTransportOptions) {
        this.client = ky.create({
            timeout: options.timeoutMs,
            retry: 0,
            ...(options.fetch ? { fetch: options.fetch } : {}),
            hooks: {
                afterResponse: [
                    (request, _options, response) => {
                        logger.debug({
                            event: 'geocoding.http.response',
                            url: redactQuery(request.url),
                            status: response.status,
                        }, 'Geocoding HTTP response received');
                    },
                ],
            },
        });
    }

    async get(url: string): Promise<Uint8Array> {
        try {
            const body = await this.client.get(url).arrayBuffer();
            return new Uint8Array(body);
        } catch (error) {
            if (error instanceof HTTPError) {
                throw new GeocoderTransportError(
                    `Geocoding request failed with status ${error.response.status}`,
                    error.response.status,
                    error
                );
            }
            if (error instanceof TimeoutError) {
                throw new GeocoderTransportError('Geocoding request timed out', undefined, error);
            }

            const message = error instanceof Error ? error.message : 'Unknown error';
            throw new GeocoderTransportError(`Geocoding request failed: ${message}`, undefined, error);
        }
    }
}
