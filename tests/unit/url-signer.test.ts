import { describe, it, expect } from 'vitest';
import {
    decodeBase64Url,
    encodeBase64Url,
    signUrl,
    toRequestTarget,
} from '@/services/geocoding/auth/url-signer';
import { GeocoderConfigError, InvalidPrivateKeyError } from '@/services/geocoding/geocoding.interface';

const TEST_KEY = 'dGVzdC1zZWNyZXQ='; // "test-secret"

describe('URL signer', () => {
    describe('signUrl', () => {
        it('should match the published signing example', () => {
            const signature = signUrl(
                'https://maps.googleapis.com/maps/api/geocode/json?address=New+York&client=clientID',
                'vNIXE0xscrmjlyV-12Nj_BvUPaw='
            );

            expect(signature).toBe('chaRF2hTJKOScPr-RQCEhZbSzIE=');
        });

        it('should sign only the path and query', () => {
            const path = '/maps/api/geocode/json?sensor=false&address=Paris&client=gme-acme';

            expect(signUrl(`https://maps.googleapis.com${path}`, TEST_KEY)).toBe('-SIuvkfy5LTkjVXnQXEF_RTpkys=');
            expect(signUrl(`http://other-host.test:8080${path}`, TEST_KEY)).toBe('-SIuvkfy5LTkjVXnQXEF_RTpkys=');
        });

        it('should be deterministic and change when one character changes', () => {
            const url = 'https://maps.googleapis.com/maps/api/geocode/json?sensor=false&address=Paris&client=gme-acme';
            const changed = 'https://maps.googleapis.com/maps/api/geocode/json?sensor=false&address=Paris&client=gme-acmf';

            expect(signUrl(url, TEST_KEY)).toBe(signUrl(url, TEST_KEY));
            expect(signUrl(changed, TEST_KEY)).not.toBe(signUrl(url, TEST_KEY));
        });

        it('should sign the same target with or without a fragment', () => {
            const url = 'https://maps.googleapis.com/maps/api/geocode/json?sensor=false&address=Paris&client=gme-acme';

            expect(signUrl(`${url}#ignored`, TEST_KEY)).toBe('-SIuvkfy5LTkjVXnQXEF_RTpkys=');
        });

        it('should produce a URL-safe padded signature', () => {
            const signature = signUrl('https://maps.googleapis.com/maps/api/geocode/json?sensor=false', TEST_KEY);

            expect(signature).toMatch(/^[A-Za-z0-9_-]{27}=$/);
        });

        it('should fail on an invalid key', () => {
            expect(() => signUrl('https://maps.googleapis.com/json?a=1', 'abc+/def')).toThrow(InvalidPrivateKeyError);
        });

        it('should fail on an unparseable URL', () => {
            expect(() => signUrl('not a url?a=1', TEST_KEY)).toThrow(GeocoderConfigError);
        });
    });

    describe('toRequestTarget', () => {
        it('should strip scheme and host', () => {
            expect(toRequestTarget('https://maps.googleapis.com/maps/api/geocode/json?sensor=false&address=New+York')).toBe(
                '/maps/api/geocode/json?sensor=false&address=New+York'
            );
        });

        it('should keep the query verbatim', () => {
            expect(toRequestTarget('https://example.test/geo?b=2&a=%7e|x')).toBe('/geo?b=2&a=%7e|x');
        });

        it('should leave the fragment out', () => {
            expect(toRequestTarget('https://example.test/geo?channel=web#x&client=gme-acme')).toBe('/geo?channel=web');
            expect(toRequestTarget('https://example.test/geo#section')).toBe('/geo');
        });

        it('should return the path when there is no query', () => {
            expect(toRequestTarget('https://example.test/geo')).toBe('/geo');
            expect(toRequestTarget('https://example.test')).toBe('/');
        });
    });

    describe('decodeBase64Url', () => {
        it('should decode padded and unpadded keys', () => {
            expect(decodeBase64Url(TEST_KEY).toString('utf8')).toBe('test-secret');
            expect(decodeBase64Url('dGVzdC1zZWNyZXQ').toString('utf8')).toBe('test-secret');
        });

        it('should decode URL-safe characters', () => {
            expect([...decodeBase64Url('-_8=')]).toEqual([0xfb, 0xff]);
        });

        it('should reject characters outside the base64url alphabet', () => {
            expect(() => decodeBase64Url('abc+')).toThrow(InvalidPrivateKeyError);
            expect(() => decodeBase64Url('abc/')).toThrow(InvalidPrivateKeyError);
            expect(() => decodeBase64Url('ab cd')).toThrow(InvalidPrivateKeyError);
            expect(() => decodeBase64Url('a===')).toThrow(InvalidPrivateKeyError);
        });

        it('should reject impossible lengths', () => {
            expect(() => decodeBase64Url('abcde')).toThrow('invalid base64url length');
            expect(() => decodeBase64Url('ab=')).toThrow('invalid base64url length');
        });

        it('should report a configuration error code', () => {
            try {
                decodeBase64Url('abc+');
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(GeocoderConfigError);
                expect(error).toMatchObject({ code: 'INVALID_CONFIGURATION' });
            }
        });
    });

    describe('encodeBase64Url', () => {
        it('should use the URL-safe alphabet and keep padding', () => {
            expect(encodeBase64Url(Uint8Array.from([0xfb, 0xff]))).toBe('-_8=');
        });
    });
});
