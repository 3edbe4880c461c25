export { GoogleMapsGeocoder, DEFAULT_GEOCODE_URL, DEFAULT_TIMEOUT_MS } from './google-maps.geocoder';
export type { GoogleMapsGeocoderOptions } from './google-maps.geocoder';
export {
    GeocodingError,
    ZeroResultsError,
    GeocoderConfigError,
    InvalidPrivateKeyError,
    GeocoderTransportError,
    GeocoderDecodeError,
    GeocoderApiError,
    isZeroResultsError,
} from './geocoding.interface';
export type { GeocodingAdapter, GeocodingErrorCode } from './geocoding.interface';
export {
    UnauthenticatedAuth,
    TokenAuth,
    SignedAuth,
    createAuthStrategy,
} from './auth/auth-strategies';
export type { AuthScheme, AuthStrategy, ClientCredentials, SignedCredentials } from './auth/auth-strategies';
export { signUrl, toRequestTarget, decodeBase64Url, encodeBase64Url } from './auth/url-signer';
export { KyTransport } from './adapters/transport/ky.transport';
export type { KyTransportOptions } from './adapters/transport/ky.transport';
export type { GeocoderTransport } from './adapters/transport/transport.interface';
export { buildGeocodeQuery, buildReverseGeocodeQuery, queryEscape, withSensorParam } from './query';
export { interpretGeocodeResponse, interpretReverseGeocodeResponse, decodeJson } from './response-interpreter';
export type { GeoPoint, GeocodeResult } from './types';
