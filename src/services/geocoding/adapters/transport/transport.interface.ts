/**
 * Transport Interface
 *
 * Sends a fully composed GET request and returns the raw response body
 */
export interface GeocoderTransport {
    /**
     * @param url - Absolute URL, query included, sent without re-encoding
     * @returns Raw response body
     * @throws {GeocoderTransportError} If the request fails or the status is not 2xx
     */
    get(url: string): Promise<Uint8Array>;
}
