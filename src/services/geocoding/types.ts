/**
 * Geographic point. Ranges are not validated.
 */
export interface GeoPoint {
    readonly lat: number;
    readonly lng: number;
}

/**
 * Result of a forward geocode
 */
export interface GeocodeResult {
    /** Location of the first match */
    point: GeoPoint;
    /** Address as formatted by the service */
    formattedAddress: string;
}

