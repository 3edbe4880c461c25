import { createHmac } from 'node:crypto';
import { GeocoderConfigError, InvalidPrivateKeyError } from '../geocoding.interface';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*={0,2}$/;

/**
 * Decode a base64url private key. Padding is optional; characters outside
 * the URL-safe alphabet (including `+` and `/`) are rejected.
 *
 * @throws {InvalidPrivateKeyError}
 */
export function decodeBase64Url(value: string): Buffer {
    if (!BASE64URL_PATTERN.test(value)) {
        throw new InvalidPrivateKeyError('Private key contains characters outside the base64url alphabet');
    }

    const unpadded = value.replace(/=+$/, '');
    const isPadded = unpadded.length !== value.length;

    if (unpadded.length % 4 === 1 || (isPadded && value.length % 4 !== 0)) {
        throw new InvalidPrivateKeyError('Private key has an invalid base64url length');
    }

    return Buffer.from(unpadded, 'base64url');
}

/**
 * base64url with `=` padding
 */
export function encodeBase64Url(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

/**
 * Strip scheme and host from a URL, keeping the path and the query exactly as written.
 * The fragment is never sent, so it is not part of the target.
 *
 * @throws {GeocoderConfigError} If the URL cannot be parsed
 */
export function toRequestTarget(fullUrl: string): string {
    let parsed: URL;
    try {
        parsed = new URL(fullUrl);
    } catch (error) {
        throw new GeocoderConfigError(`Cannot parse request URL for signing: ${fullUrl}`, error);
    }

    const fragmentStart = fullUrl.indexOf('#');
    const withoutFragment = fragmentStart === -1 ? fullUrl : fullUrl.slice(0, fragmentStart);

    const queryStart = withoutFragment.indexOf('?');
    if (queryStart === -1) {
        return parsed.pathname;
    }

    return `${parsed.pathname}?${withoutFragment.slice(queryStart + 1)}`;
}

/**
 * Sign a request URL with HMAC-SHA1.
 *
 * The signed payload is the request target (path + query) of `fullUrl`. The
 * returned signature is URL-safe and is appended to the query as-is.
 *
 * @param fullUrl - Absolute URL including every parameter except `signature`
 * @param base64UrlKey - Private key as issued, base64url encoded
 * @throws {GeocoderConfigError} If the URL or the key is invalid
 */
export function signUrl(fullUrl: string, base64UrlKey: string): string {
    const requestTarget = toRequestTarget(fullUrl);
    const key = decodeBase64Url(base64UrlKey);

    const digest = createHmac('sha1', key).update(requestTarget, 'utf8').digest();

    return encodeBase64Url(digest);
}
