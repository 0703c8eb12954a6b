import pLimit from 'p-limit';
import { getEnv } from '../env.js';
import { classifyGoogleTypes, googleTypesFor } from '../catalog.js';
import { MalformedRecordError, ProviderUnavailableError, errorMessage } from '../errors.js';
import type { CandidateLocation, LocationProvider, OperationalStatus, ProviderQuery } from '../types.js';
import {
  getNested,
  getNumeric,
  getString,
  getStringArray,
  isRecord,
  isValidLatitude,
  isValidLongitude,
  normalizeWhitespace,
  requestJson,
  roundCoordinate
} from './shared.js';

// searchNearby rejects circles larger than 50 km and pages larger than 20 places.
const MAX_RADIUS_METERS = 50_000;
const MAX_RESULT_COUNT = 20;

const FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.location',
  'places.nationalPhoneNumber',
  'places.internationalPhoneNumber',
  'places.websiteUri',
  'places.googleMapsUri',
  'places.rating',
  'places.userRatingCount',
  'places.businessStatus',
  'places.primaryType',
  'places.types'
].join(',');

const STATUS_MAP: Record<string, OperationalStatus> = {
  OPERATIONAL: 'operational',
  CLOSED_TEMPORARILY: 'closed_temporarily',
  CLOSED_PERMANENTLY: 'closed_permanently'
};

/** Maps one Places API place onto the canonical candidate shape. */
export function normalizeGooglePlace(raw: unknown): CandidateLocation {
  if (!isRecord(raw)) throw new MalformedRecordError('google_places', 'place is not an object');

  const id = getString(raw, 'id');
  if (!id) throw new MalformedRecordError('google_places', 'place has no id');

  const displayName = getNested(raw, 'displayName');
  const name = displayName ? getString(displayName, 'text') : undefined;
  if (!name) throw new MalformedRecordError('google_places', `place ${id} has no name`);

  const location = getNested(raw, 'location');
  const latitude = location ? getNumeric(location, 'latitude') : undefined;
  const longitude = location ? getNumeric(location, 'longitude') : undefined;
  if (latitude === undefined || longitude === undefined || !isValidLatitude(latitude) || !isValidLongitude(longitude)) {
    throw new MalformedRecordError('google_places', `place ${id} has no usable coordinates`);
  }

  const types = getStringArray(raw, 'types');
  const primaryType = getString(raw, 'primaryType') ?? types[0];

  const rating = getNumeric(raw, 'rating');
  const reviewCount = getNumeric(raw, 'userRatingCount');
  const businessStatus = getString(raw, 'businessStatus');

  return {
    provider: 'google_places',
    providerId: id,
    placeId: id,
    name: normalizeWhitespace(name),
    category: primaryType ?? 'unknown',
    detailedCategory: types.slice(0, 3).join(', '),
    address: normalizeWhitespace(getString(raw, 'formattedAddress') ?? ''),
    latitude: roundCoordinate(latitude),
    longitude: roundCoordinate(longitude),
    phone: getString(raw, 'nationalPhoneNumber') ?? getString(raw, 'internationalPhoneNumber'),
    website: getString(raw, 'websiteUri'),
    mapsUrl: getString(raw, 'googleMapsUri'),
    rating: rating !== undefined && rating >= 0 && rating <= 5 ? rating : undefined,
    reviewCount: reviewCount !== undefined && reviewCount >= 0 ? Math.floor(reviewCount) : undefined,
    operationalStatus: (businessStatus && STATUS_MAP[businessStatus]) || 'unknown',
    buildingTypes: classifyGoogleTypes(types, name),
    sources: ['google_places']
  };
}

/** One searchNearby request per distinct set of place types, so each venue class gets its own page of results. */
export function buildTypeGroups(query: ProviderQuery): string[][] {
  const groups = new Map<string, string[]>();
  for (const buildingType of query.buildingTypes) {
    const types = googleTypesFor(buildingType).sort();
    if (types.length === 0) continue;
    groups.set(types.join('|'), types);
  }
  return [...groups.values()];
}

async function searchNearby(apiKey: string, query: ProviderQuery, includedTypes: string[], signal: AbortSignal) {
  const env = getEnv();
  const url = new URL('/v1/places:searchNearby', env.GOOGLE_PLACES_API_BASE_URL);

  const payload = await requestJson('google_places', url, {
    method: 'POST',
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'X-Goog-Api-Key': apiKey,
      'X-Goog-FieldMask': FIELD_MASK
    },
    body: JSON.stringify({
      includedTypes,
      maxResultCount: MAX_RESULT_COUNT,
      rankPreference: 'POPULARITY',
      locationRestriction: {
        circle: {
          center: { latitude: query.center.latitude, longitude: query.center.longitude },
          radius: Math.min(query.radiusMeters, MAX_RADIUS_METERS)
        }
      }
    }),
    signal
  });

  if (!isRecord(payload) || !Array.isArray(payload.places)) return [];
  const places: unknown[] = payload.places;
  return places;
}

async function search(query: ProviderQuery, signal: AbortSignal): Promise<unknown[]> {
  const env = getEnv();
  const apiKey = env.GOOGLE_PLACES_API_KEY;
  if (!apiKey) {
    throw new ProviderUnavailableError('google_places', 'GOOGLE_PLACES_API_KEY is not configured');
  }

  const groups = buildTypeGroups(query);
  if (groups.length === 0) return [];

  const limit = pLimit(env.GOOGLE_PLACES_CONCURRENCY);
  const settled = await Promise.allSettled(
    groups.map((includedTypes) => limit(() => searchNearby(apiKey, query, includedTypes, signal)))
  );

  const places: unknown[] = [];
  const failures: string[] = [];
  settled.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      places.push(...outcome.value);
      return;
    }
    failures.push(`${(groups[index] ?? []).join(',')}: ${errorMessage(outcome.reason)}`);
  });

  if (failures.length === groups.length) {
    const first = settled.find((o): o is PromiseRejectedResult => o.status === 'rejected');
    throw first?.reason instanceof Error ? first.reason : new ProviderUnavailableError('google_places', failures[0] ?? 'all requests failed');
  }
  if (failures.length > 0) {
    console.warn('[providers] google_places partially failed', { failed: failures.length, total: groups.length, failures });
  }

  return places;
}

export const googlePlacesProvider: LocationProvider = {
  name: 'google_places',
  maxRadiusMeters: MAX_RADIUS_METERS,
  search
};
