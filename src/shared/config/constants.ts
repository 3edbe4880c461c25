/**
 * Google Maps Geocoding JSON endpoint
 */
export const DEFAULT_GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

/** Per-request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 10_000;
