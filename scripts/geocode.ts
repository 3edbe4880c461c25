import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { loadConfig } from '../src/shared/config/config';
import { createGeocoder } from '../src/services/geocoding/geocoder.factory';
import { isZeroResultsError } from '../src/services/geocoding';

/**
 * Usage:
 *   tsx scripts/geocode.ts "1600 Amphitheatre Parkway, Mountain View"
 *   tsx scripts/geocode.ts --reverse 40.714224,-73.961452
 */

// Read .env file manually; real environment variables win
const envPath = join(process.cwd(), '.env');
const fileVars: Record<string, string> = existsSync(envPath)
    ? Object.fromEntries(
        readFileSync(envPath, 'utf-8')
            .split('\n')
            .filter((line) => line.trim() && !line.startsWith('#') && line.includes('='))
            .map((line) => {
                const [key = '', ...valueParts] = line.split('=');
                return [key.trim(), valueParts.join('=').trim()];
            })
    )
    : {};

const args = process.argv.slice(2);
if (args.length === 0) {
    console.error('Usage: geocode "<address>" | geocode --reverse <lat>,<lng>');
    process.exit(1);
}

const config = loadConfig({ ...fileVars, ...process.env });
const geocoder = createGeocoder(config.geocoder);

try {
    if (args[0] === '--reverse') {
        const [lat, lng] = (args[1] ?? '').split(',').map(Number);
        if (lat === undefined || lng === undefined || Number.isNaN(lat) || Number.isNaN(lng)) {
            console.error('❌ Expected coordinates as <lat>,<lng>');
            process.exit(1);
        }
        const address = await geocoder.reverseGeocode({ lat, lng });
        console.log(address);
    } else {
        const result = await geocoder.geocode(args.join(' '));
        console.log(JSON.stringify({
            formatted_address: result.formattedAddress,
            lat: result.point.lat,
            lng: result.point.lng,
        }, null, 2));
    }
} catch (error) {
    if (isZeroResultsError(error)) {
        console.error('🔍 No results');
        process.exit(2);
    }
    console.error('❌ Geocoding failed:', error instanceof Error ? error.message : String(error));
    process.exit(1);
}
