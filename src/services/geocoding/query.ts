import type { GeoPoint } from './types';

const UNRESERVED = /[A-Za-z0-9\-_.~]/;

/**
 * Percent-encode a value for use in a query component.
 *
 * Keeps `A-Z a-z 0-9 - _ . ~`, turns spaces into `+` and escapes every other
 * UTF-8 byte as `%XX`. Lone surrogates are encoded as U+FFFD.
 */
export function queryEscape(value: string): string {
    let escaped = '';
    for (const byte of new TextEncoder().encode(value)) {
        const char = String.fromCharCode(byte);
        if (byte < 0x80 && UNRESERVED.test(char)) {
            escaped += char;
        } else if (byte === 0x20) {
            escaped += '+';
        } else {
            escaped += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
        }
    }
    return escaped;
}

export function buildGeocodeQuery(address: string): string {
    return `address=${queryEscape(address)}`;
}

/**
 * Coordinates keep their shortest round-trip rendering, never a fixed number of decimals
 */
export function buildReverseGeocodeQuery(point: GeoPoint): string {
    return `latlng=${String(point.lat)},${String(point.lng)}`;
}

/**
 * Prefix the legacy `sensor=false` parameter ahead of the operation parameters
 */
export function withSensorParam(params: string): string {
    return `sensor=false&${params}`;
}
