import { randomUUID } from 'node:crypto';
import admin from 'firebase-admin';
import { z } from 'zod';
import { PersistenceFailureError } from '../errors.js';
import { getFirestore, timestampToIso } from '../firebase.js';
import { RECENT_LOCATIONS_LIMIT, selectRecentLocations, type RecentLocation } from '../locator/activity.js';
import { radiusSchema } from '../locator/parameters.js';
import {
  BUILDING_TYPES,
  FOOT_TRAFFIC_LEVELS,
  MACHINE_TYPES,
  OPERATIONAL_STATUSES,
  PROVIDER_NAMES,
  type HistoryWriter,
  type ScoredCandidate,
  type SearchHistoryRecord
} from '../types.js';

const COLLECTION = 'searchHistory';
const LOCATIONS = 'locations';

const coordinatesSchema = z.object({ latitude: z.number(), longitude: z.number() });

const storedSearchSchema = z.object({
  operatorId: z.string(),
  zipCode: z.string(),
  radius: radiusSchema,
  machineType: z.enum(MACHINE_TYPES),
  buildingTypesFilter: z.array(z.enum(BUILDING_TYPES)).default([]),
  resultCount: z.number().int().nonnegative(),
  searchParameters: z.object({
    center: coordinatesSchema.nullable().default(null),
    maxResults: z.number().int(),
    resultLimit: z.number().int(),
    minimumRating: z.number(),
    requireContactInfo: z.boolean(),
    excludedCategories: z.array(z.string()).default([]),
    providerErrors: z
      .object({ overpass: z.string(), google_places: z.string(), nominatim: z.string() })
      .partial()
      .default({}),
    providerRadiusMeters: z
      .object({ overpass: z.number(), google_places: z.number() })
      .partial()
      .default({})
  }),
  createdAt: z.unknown()
});

const storedLocationSchema = z.object({
  rank: z.number().int(),
  provider: z.enum(PROVIDER_NAMES),
  providerId: z.string(),
  placeId: z.string().optional(),
  name: z.string(),
  category: z.string(),
  detailedCategory: z.string(),
  address: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  phone: z.string().optional(),
  email: z.string().optional(),
  website: z.string().optional(),
  mapsUrl: z.string().optional(),
  rating: z.number().optional(),
  reviewCount: z.number().optional(),
  operationalStatus: z.enum(OPERATIONAL_STATUSES),
  footTraffic: z.enum(FOOT_TRAFFIC_LEVELS).optional(),
  buildingTypes: z.array(z.enum(BUILDING_TYPES)),
  sources: z.array(z.enum(PROVIDER_NAMES)),
  priorityScore: z.number(),
  contactCompleteness: z.enum(['both', 'phone_only', 'email_only', 'none'])
});

export interface StoredSearch extends SearchHistoryRecord {
  id: string;
}

export interface StoredSearchWithLocations extends StoredSearch {
  locations: ScoredCandidate[];
}

function toStoredSearch(id: string, data: unknown): StoredSearch | null {
  const parsed = storedSearchSchema.safeParse(data);
  if (!parsed.success) {
    console.warn('[history] skipped malformed search record', { searchId: id, error: parsed.error.message });
    return null;
  }
  const { createdAt, ...fields } = parsed.data;
  return { id, ...fields, createdAt: timestampToIso(createdAt) ?? '' };
}

// Zero-padded so document ids list in rank order.
function locationDocId(rank: number): string {
  return String(rank).padStart(3, '0');
}

/** Writes the search record and its ranked locations in one batch. */
export async function createSearchHistory(
  record: SearchHistoryRecord,
  locations: readonly ScoredCandidate[]
): Promise<{ searchId: string }> {
  const db = getFirestore();
  const searchId = randomUUID();
  const searchRef = db.collection(COLLECTION).doc(searchId);
  const batch = db.batch();

  batch.set(searchRef, {
    ...record,
    createdAt: admin.firestore.Timestamp.fromDate(new Date(record.createdAt))
  });

  const locationsCol = searchRef.collection(LOCATIONS);
  locations.forEach((location, index) => {
    const rank = index + 1;
    batch.set(locationsCol.doc(locationDocId(rank)), { ...location, rank });
  });

  try {
    await batch.commit();
  } catch (err) {
    throw new PersistenceFailureError('search history write', err);
  }
  return { searchId };
}

/** Newest first. */
export async function listOperatorSearches(operatorId: string, limit = 10): Promise<StoredSearch[]> {
  const db = getFirestore();
  const snap = await db
    .collection(COLLECTION)
    .where('operatorId', '==', operatorId)
    .orderBy('createdAt', 'desc')
    .limit(limit)
    .get();

  return snap.docs.flatMap((d) => {
    const search = toStoredSearch(d.id, d.data());
    return search ? [search] : [];
  });
}

/** Every search of the operator, newest first; only those at or after `since` when given. */
export async function listAllOperatorSearches(operatorId: string, since?: Date): Promise<StoredSearch[]> {
  const db = getFirestore();
  let query = db.collection(COLLECTION).where('operatorId', '==', operatorId);
  if (since) query = query.where('createdAt', '>=', admin.firestore.Timestamp.fromDate(since));
  const snap = await query.orderBy('createdAt', 'desc').get();

  return snap.docs.flatMap((d) => {
    const search = toStoredSearch(d.id, d.data());
    return search ? [search] : [];
  });
}

async function readLocations(searchId: string): Promise<ScoredCandidate[]> {
  const snap = await getFirestore().collection(COLLECTION).doc(searchId).collection(LOCATIONS).orderBy('rank').get();
  return snap.docs.flatMap((d) => {
    const parsed = storedLocationSchema.safeParse(d.data());
    if (!parsed.success) {
      console.warn('[history] skipped malformed location', { searchId, docId: d.id });
      return [];
    }
    const { rank: _rank, ...location } = parsed.data;
    return [location];
  });
}

export async function getSearchHistory(searchId: string): Promise<StoredSearchWithLocations | null> {
  const searchSnap = await getFirestore().collection(COLLECTION).doc(searchId).get();
  if (!searchSnap.exists) return null;
  const search = toStoredSearch(searchId, searchSnap.data());
  if (!search) return null;

  return { ...search, locations: await readLocations(searchId) };
}

/** Locations found by the operator's searches since `since`, best first. */
export async function listRecentLocations(
  operatorId: string,
  since: Date,
  limit = RECENT_LOCATIONS_LIMIT
): Promise<RecentLocation[]> {
  const searches = await listAllOperatorSearches(operatorId, since);
  const perSearch = await Promise.all(
    searches.map(async (search) => {
      const locations = await readLocations(search.id);
      return locations.map((location) => ({ searchId: search.id, searchedAt: search.createdAt, location }));
    })
  );
  return selectRecentLocations(perSearch.flat(), limit);
}

export const firestoreHistoryWriter: HistoryWriter = {
  recordSearch: createSearchHistory
};
