import { getEnv } from '../env.js';
import type { Coordinates, Geocoder } from '../types.js';
import { getNumeric, isRecord, isValidLatitude, isValidLongitude, requestJson, roundCoordinate } from './shared.js';

/** Resolves a US ZIP code to its centroid, or null when Nominatim does not know it. */
export async function geocodeZipCode(zipCode: string, signal: AbortSignal): Promise<Coordinates | null> {
  const env = getEnv();
  const url = new URL('/search', env.NOMINATIM_API_URL);
  url.searchParams.set('postalcode', zipCode.slice(0, 5));
  url.searchParams.set('countrycodes', 'us');
  url.searchParams.set('format', 'json');
  url.searchParams.set('limit', '1');

  const payload = await requestJson('nominatim', url, {
    method: 'GET',
    headers: {
      Accept: 'application/json',
      // Nominatim's usage policy rejects requests without an identifying agent.
      'User-Agent': env.NOMINATIM_USER_AGENT
    },
    signal
  });

  const first: unknown = Array.isArray(payload) ? payload[0] : undefined;
  if (!isRecord(first)) return null;

  const latitude = getNumeric(first, 'lat');
  const longitude = getNumeric(first, 'lon');
  if (latitude === undefined || longitude === undefined) return null;
  if (!isValidLatitude(latitude) || !isValidLongitude(longitude)) return null;

  return { latitude: roundCoordinate(latitude), longitude: roundCoordinate(longitude) };
}

export const nominatimGeocoder: Geocoder = {
  geocode: geocodeZipCode
};
