import { beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';

process.env.PORT = process.env.PORT ?? '4000';

vi.mock('../src/providers/nominatim.js', () => {
  return {
    nominatimGeocoder: { geocode: vi.fn() }
  };
});

vi.mock('../src/providers/overpass.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/providers/overpass.js')>();
  return { ...actual, overpassProvider: { name: 'overpass', search: vi.fn() } };
});

vi.mock('../src/providers/googlePlaces.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/providers/googlePlaces.js')>();
  return { ...actual, googlePlacesProvider: { name: 'google_places', search: vi.fn() } };
});

vi.mock('../src/repositories/exclusionRepository.js', () => {
  return {
    firestoreExclusionReader: { listExcludedIds: vi.fn() },
    listExclusions: vi.fn(),
    addExclusion: vi.fn(),
    addExclusions: vi.fn(),
    countExclusions: vi.fn(),
    removeExclusion: vi.fn()
  };
});

vi.mock('../src/repositories/preferenceRepository.js', () => {
  return {
    firestorePreferenceReader: { getPreference: vi.fn() },
    getLocationPreference: vi.fn(),
    upsertLocationPreference: vi.fn()
  };
});

vi.mock('../src/repositories/searchHistoryRepository.js', () => {
  return {
    firestoreHistoryWriter: { recordSearch: vi.fn() },
    getSearchHistory: vi.fn(async () => null),
    listAllOperatorSearches: vi.fn(),
    listRecentLocations: vi.fn(),
    listOperatorSearches: vi.fn(async () => [])
  };
});

import { createApp } from '../src/app.js';
import { googlePlacesProvider } from '../src/providers/googlePlaces.js';
import { nominatimGeocoder } from '../src/providers/nominatim.js';
import { overpassProvider } from '../src/providers/overpass.js';
import { firestoreExclusionReader } from '../src/repositories/exclusionRepository.js';
import { firestorePreferenceReader } from '../src/repositories/preferenceRepository.js';
import {
  firestoreHistoryWriter,
  getSearchHistory,
  listOperatorSearches
} from '../src/repositories/searchHistoryRepository.js';
import type { SearchHistoryRecord } from '../src/types.js';
import { scored } from './helpers.js';

const app = createApp();

const quickStop = {
  id: 'ChIJ-1',
  displayName: { text: 'Quick Stop' },
  location: { latitude: 39.78, longitude: -89.65 },
  formattedAddress: '100 Main St',
  nationalPhoneNumber: '(217) 555-0100',
  rating: 4.2,
  userRatingCount: 75,
  businessStatus: 'OPERATIONAL',
  primaryType: 'gas_station',
  types: ['gas_station']
};

const body = { operator_id: 'op-1', zip_code: '62701', radius: 10, machine_type: 'snack' };

const storedRecord: SearchHistoryRecord = {
  operatorId: 'op-1',
  zipCode: '62701',
  radius: 10,
  machineType: 'snack_machine',
  buildingTypesFilter: [],
  resultCount: 1,
  searchParameters: {
    center: { latitude: 39.78, longitude: -89.65 },
    maxResults: 20,
    resultLimit: 20,
    minimumRating: 0,
    requireContactInfo: false,
    excludedCategories: [],
    providerErrors: {},
    providerRadiusMeters: {}
  },
  createdAt: '2026-03-01T12:00:00.000Z'
};

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.mocked(nominatimGeocoder.geocode).mockResolvedValue({ latitude: 39.78, longitude: -89.65 });
  vi.mocked(overpassProvider.search).mockResolvedValue([]);
  vi.mocked(googlePlacesProvider.search).mockResolvedValue([quickStop]);
  vi.mocked(firestoreExclusionReader.listExcludedIds).mockResolvedValue(new Set<string>());
  vi.mocked(firestorePreferenceReader.getPreference).mockResolvedValue(null);
  vi.mocked(firestoreHistoryWriter.recordSearch).mockResolvedValue({ searchId: 'search_test_1' });
});

describe('POST /v1/locations/search', () => {
  it('returns 400 on a malformed body', async () => {
    const res = await request(app).post('/v1/locations/search').send({ radius: 'ten' });
    expect(res.status).toBe(400);
    expect(res.body?.error).toBe('VALIDATION_ERROR');
  });

  it('reports domain validation failures with the field', async () => {
    const res = await request(app)
      .post('/v1/locations/search')
      .send({ ...body, radius: 12 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'INVALID_RADIUS',
      field: 'radius',
      message: 'Invalid radius: 12. Use one of 5, 10, 15, 20, 25, 30, 40 miles.'
    });
  });

  it('returns the ranked locations in snake_case', async () => {
    const res = await request(app).post('/v1/locations/search').send(body);

    expect(res.status).toBe(200);
    expect(res.body.search_id).toBe('search_test_1');
    expect(res.body.result_count).toBe(1);
    expect(res.body.provider_errors).toEqual({});
    expect(res.body.warnings).toEqual([]);
    expect(res.body.locations).toEqual([
      {
        provider: 'google_places',
        provider_id: 'ChIJ-1',
        place_id: 'ChIJ-1',
        name: 'Quick Stop',
        category: 'gas_station',
        detailed_category: 'gas_station',
        latitude: 39.78,
        longitude: -89.65,
        address: '100 Main St',
        phone: '(217) 555-0100',
        email: null,
        website: null,
        maps_url: null,
        rating: 4.2,
        review_count: 75,
        operational_status: 'operational',
        foot_traffic: 'very_high',
        priority_score: 85,
        contact_completeness: 'phone_only',
        building_types: ['gas_stations'],
        sources: ['google_places']
      }
    ]);
  });

  it('reports a failing provider alongside the results', async () => {
    vi.mocked(overpassProvider.search).mockRejectedValueOnce(new Error('overpass request failed (504): gateway'));

    const res = await request(app).post('/v1/locations/search').send(body);

    expect(res.status).toBe(200);
    expect(res.body.provider_errors).toEqual({ overpass: 'overpass request failed (504): gateway' });
    expect(res.body.result_count).toBe(1);
  });

  it('warns instead of failing when history cannot be written', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.mocked(firestoreHistoryWriter.recordSearch).mockRejectedValueOnce(new Error('deadline exceeded'));

    const res = await request(app).post('/v1/locations/search').send(body);

    expect(res.status).toBe(200);
    expect(res.body.search_id).toBeNull();
    expect(res.body.warnings).toEqual(['HISTORY_WRITE_FAILED']);
  });

  it('returns 503 when the preference store is unavailable', async () => {
    vi.mocked(firestorePreferenceReader.getPreference).mockRejectedValueOnce(new Error('firestore offline'));

    const res = await request(app).post('/v1/locations/search').send(body);

    expect(res.status).toBe(503);
    expect(res.body).toEqual({
      error: 'STORE_UNAVAILABLE',
      message: 'operator store unavailable: firestore offline'
    });
  });

  it('returns 400 for a ZIP code the geocoder does not know', async () => {
    vi.mocked(nominatimGeocoder.geocode).mockResolvedValueOnce(null);

    const res = await request(app).post('/v1/locations/search').send(body);

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('INVALID_ZIP_CODE');
    expect(res.body.field).toBe('zip_code');
  });

  it('stops the search when the client disconnects', async () => {
    vi.mocked(overpassProvider.search).mockImplementationOnce(
      (_query, signal) =>
        new Promise<unknown[]>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason), { once: true });
        })
    );

    await expect(request(app).post('/v1/locations/search').send(body).timeout(50)).rejects.toThrow(/Timeout/);

    await vi.waitFor(() =>
      expect(vi.mocked(console.info)).toHaveBeenCalledWith('[search] cancelled by client', { operatorId: 'op-1' })
    );
    const signal = vi.mocked(overpassProvider.search).mock.calls[0]?.[1];
    expect(signal?.aborted).toBe(true);
    expect(vi.mocked(firestoreHistoryWriter.recordSearch)).not.toHaveBeenCalled();
  });
});

describe('search history', () => {
  it('validates the limit', async () => {
    const res = await request(app).get('/v1/operators/op-1/searches?limit=100');
    expect(res.status).toBe(400);
    expect(res.body?.error).toBe('VALIDATION_ERROR');
  });

  it('lists an operator’s recent searches', async () => {
    vi.mocked(listOperatorSearches).mockResolvedValueOnce([{ id: 'search_1', ...storedRecord }]);

    const res = await request(app).get('/v1/operators/op-1/searches');

    expect(res.status).toBe(200);
    expect(vi.mocked(listOperatorSearches)).toHaveBeenCalledWith('op-1', 10);
    expect(res.body.searches).toEqual([
      {
        id: 'search_1',
        operator_id: 'op-1',
        zip_code: '62701',
        radius: 10,
        machine_type: 'snack_machine',
        building_types_filter: [],
        result_count: 1,
        search_parameters: {
          center: { latitude: 39.78, longitude: -89.65 },
          max_results: 20,
          result_limit: 20,
          minimum_rating: 0,
          require_contact_info: false,
          excluded_categories: [],
          provider_errors: {},
          provider_radius_meters: {}
        },
        created_at: '2026-03-01T12:00:00.000Z'
      }
    ]);
  });

  it('returns 404 for an unknown search', async () => {
    const res = await request(app).get('/v1/searches/missing');
    expect(res.status).toBe(404);
    expect(res.body?.error).toBe('NOT_FOUND');
  });

  it('returns a stored search with its locations', async () => {
    vi.mocked(getSearchHistory).mockResolvedValueOnce({
      id: 'search_1',
      ...storedRecord,
      locations: [scored({ providerId: 'ChIJ-9', placeId: 'ChIJ-9', priorityScore: 70 })]
    });

    const res = await request(app).get('/v1/searches/search_1');

    expect(res.status).toBe(200);
    expect(res.body.id).toBe('search_1');
    expect(res.body.locations).toHaveLength(1);
    expect(res.body.locations[0].provider_id).toBe('ChIJ-9');
    expect(res.body.locations[0].priority_score).toBe(70);
  });

  it('downloads a stored search as CSV', async () => {
    vi.mocked(getSearchHistory).mockResolvedValueOnce({
      id: 'search_1',
      ...storedRecord,
      locations: [scored({ providerId: 'ChIJ-9', placeId: 'ChIJ-9', priorityScore: 70 })]
    });

    const res = await request(app).get('/v1/searches/search_1/export?format=csv');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="vending_locations_62701.csv"');
    expect(res.text.split('\n')[1]).toBe(
      'Corner Market,"1 Main St, Springfield, IL 62701",,,,,,,convenience_store,None,70,,39.7817,-89.6501'
    );
  });

  it('rejects an unknown export format', async () => {
    const res = await request(app).get('/v1/searches/search_1/export?format=pdf');
    expect(res.status).toBe(400);
    expect(res.body?.error).toBe('VALIDATION_ERROR');
  });

  it('returns 404 when exporting an unknown search', async () => {
    const res = await request(app).get('/v1/searches/missing/export');
    expect(res.status).toBe(404);
  });
});
