import type { GeocoderConfig } from '@/shared/config/config';
import { createAuthStrategy } from './auth/auth-strategies';
import { KyTransport } from './adapters/transport/ky.transport';
import type { GeocoderTransport } from './adapters/transport/transport.interface';
import { GoogleMapsGeocoder } from './google-maps.geocoder';

/**
 * Build a geocoder from validated configuration
 *
 * @param transport - Override the default ky transport
 */
export function createGeocoder(config: GeocoderConfig, transport?: GeocoderTransport): GoogleMapsGeocoder {
    return new GoogleMapsGeocoder({
        baseUrl: config.baseUrl,
        auth: createAuthStrategy(config.credentials),
        transport: transport ?? new KyTransport({ timeoutMs: config.timeoutMs }),
    });
}
