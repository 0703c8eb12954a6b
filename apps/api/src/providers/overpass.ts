import { getEnv } from '../env.js';
import { classifyOsmTags, osmTagsFor } from '../catalog.js';
import { MalformedRecordError } from '../errors.js';
import type { CandidateLocation, Coordinates, LocationProvider, OperationalStatus, ProviderQuery } from '../types.js';
import {
  getNested,
  getNumeric,
  getString,
  isRecord,
  isValidLatitude,
  isValidLongitude,
  normalizeWhitespace,
  requestJson,
  roundCoordinate
} from './shared.js';

const CATEGORY_KEYS = ['amenity', 'shop', 'building', 'leisure', 'tourism', 'healthcare', 'office', 'man_made', 'landuse'];

export function buildOverpassQuery(center: Coordinates, radiusMeters: number, osmTags: readonly string[]): string {
  const around = `(around:${Math.round(radiusMeters)},${center.latitude},${center.longitude})`;
  const statements = osmTags.flatMap((tag) => {
    const [key, value] = tag.split('=');
    const filter = value === undefined ? `["${key}"]` : `["${key}"="${value}"]`;
    return [`node${filter}${around};`, `way${filter}${around};`];
  });

  return ['[out:json][timeout:25];', '(', ...statements.map((s) => `  ${s}`), ');', 'out center tags;'].join('\n');
}

function getTags(element: Record<string, unknown>): Record<string, string> {
  const raw = getNested(element, 'tags') ?? {};
  const tags: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' && value.trim().length > 0) tags[key] = value.trim();
  }
  return tags;
}

function extractCoordinates(element: Record<string, unknown>): Coordinates | undefined {
  const center = getNested(element, 'center');
  const latitude = getNumeric(element, 'lat') ?? (center ? getNumeric(center, 'lat') : undefined);
  const longitude = getNumeric(element, 'lon') ?? (center ? getNumeric(center, 'lon') : undefined);
  if (latitude === undefined || longitude === undefined) return undefined;
  if (!isValidLatitude(latitude) || !isValidLongitude(longitude)) return undefined;
  return { latitude: roundCoordinate(latitude), longitude: roundCoordinate(longitude) };
}

function extractAddress(tags: Record<string, string>): string {
  const street = [tags['addr:housenumber'], tags['addr:street'], tags['addr:unit'] ? `#${tags['addr:unit']}` : undefined]
    .filter((p): p is string => typeof p === 'string')
    .join(' ');
  const locale = [tags['addr:city'], tags['addr:state']].filter((p): p is string => typeof p === 'string').join(', ');

  const base = normalizeWhitespace([street, locale].filter((p) => p.length > 0).join(', '));
  const postal = tags['addr:postcode'];
  if (base.length === 0) return tags['addr:full'] ?? '';
  return postal ? `${base} ${postal}` : base;
}

function extractCategory(tags: Record<string, string>): { category: string; detailedCategory: string } {
  const key = CATEGORY_KEYS.find((k) => tags[k] !== undefined);
  if (!key) return { category: 'unknown', detailedCategory: '' };

  const value = tags[key] ?? '';
  const detail = [value, tags.cuisine].filter((p): p is string => typeof p === 'string').join(', ');
  return { category: `${key}:${value}`, detailedCategory: detail };
}

function extractStatus(tags: Record<string, string>): OperationalStatus {
  if (tags.disused === 'yes' || tags.abandoned === 'yes') return 'closed_permanently';
  return 'unknown';
}

/** Maps one Overpass element (node or way) onto the canonical candidate shape. */
export function normalizeOverpassElement(raw: unknown): CandidateLocation {
  if (!isRecord(raw)) throw new MalformedRecordError('overpass', 'element is not an object');

  const type = getString(raw, 'type');
  const id = getNumeric(raw, 'id');
  if (!type || id === undefined) throw new MalformedRecordError('overpass', 'missing element type or id');

  const tags = getTags(raw);
  const name = tags.name ? normalizeWhitespace(tags.name) : undefined;
  if (!name) throw new MalformedRecordError('overpass', `osm ${type}/${id} has no name`);

  const coordinates = extractCoordinates(raw);
  if (!coordinates) throw new MalformedRecordError('overpass', `osm ${type}/${id} has no usable coordinates`);

  return {
    provider: 'overpass',
    providerId: `osm:${type}:${id}`,
    name,
    ...extractCategory(tags),
    address: extractAddress(tags),
    ...coordinates,
    phone: tags.phone ?? tags['contact:phone'],
    email: tags.email ?? tags['contact:email'],
    website: tags.website ?? tags['contact:website'],
    operationalStatus: extractStatus(tags),
    buildingTypes: classifyOsmTags(tags, name),
    sources: ['overpass']
  };
}

async function search(query: ProviderQuery, signal: AbortSignal): Promise<unknown[]> {
  const env = getEnv();
  const tags = osmTagsFor(query.buildingTypes);
  if (tags.length === 0) return [];

  const payload = await requestJson('overpass', new URL(env.OVERPASS_API_URL), {
    method: 'POST',
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/x-www-form-urlencoded'
    },
    body: new URLSearchParams({ data: buildOverpassQuery(query.center, query.radiusMeters, tags) }),
    signal
  });

  if (!isRecord(payload) || !Array.isArray(payload.elements)) return [];
  return payload.elements;
}

export const overpassProvider: LocationProvider = {
  name: 'overpass',
  search
};
