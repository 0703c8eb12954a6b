import { describe, expect, it, vi } from 'vitest';
import {
  InvalidRadiusError,
  InvalidZipCodeError,
  MissingSearchParameterError,
  SearchCancelledError,
  StoreUnavailableError
} from '../src/errors.js';
import {
  HISTORY_WRITE_FAILED,
  PROVIDER_RADIUS_CLAMPED,
  searchLocations,
  type SearchDependencies
} from '../src/locator/search.js';
import type {
  LocationProvider,
  ProviderName,
  ProviderQuery,
  ScoredCandidate,
  SearchHistoryRecord,
  SearchRequest
} from '../src/types.js';

const SNACK_VENUES = [
  'restaurants',
  'fast_food',
  'coffee_shops',
  'convenience_stores',
  'gas_stations',
  'office_buildings',
  'hospitals',
  'schools',
  'gyms',
  'ymcas'
];

const googleDiner = {
  id: 'g-diner',
  displayName: { text: "Joe's Diner" },
  location: { latitude: 39.78, longitude: -89.65 },
  formattedAddress: '12 Elm St, Springfield, IL 62701, USA',
  nationalPhoneNumber: '(217) 555-0123',
  rating: 4.6,
  userRatingCount: 150,
  businessStatus: 'OPERATIONAL',
  primaryType: 'restaurant',
  types: ['restaurant']
};

const googleGas = {
  id: 'g-gas',
  displayName: { text: 'Quick Stop' },
  location: { latitude: 39.79, longitude: -89.64 },
  rating: 3.9,
  userRatingCount: 40,
  businessStatus: 'OPERATIONAL',
  primaryType: 'gas_station',
  types: ['gas_station']
};

const osmDiner = {
  type: 'node',
  id: 1,
  lat: 39.7801,
  lon: -89.65,
  tags: { name: 'Joes Diner', amenity: 'restaurant', email: 'joe@example.com' }
};

const osmPark = { type: 'node', id: 2, lat: 39.77, lon: -89.66, tags: { name: 'Lincoln Park', leisure: 'park' } };

const request: SearchRequest = {
  operatorId: 'op-1',
  zipCode: '62701',
  radius: 10,
  machineType: 'snack_machine'
};

function fakeProvider(name: ProviderName, records: unknown[]) {
  const search = vi.fn(async (_query: ProviderQuery, _signal: AbortSignal): Promise<unknown[]> => records);
  const provider: LocationProvider = { name, search };
  return { provider, search };
}

function hangingProvider(name: ProviderName): LocationProvider {
  return { name, search: () => new Promise<unknown[]>(() => undefined) };
}

function setup(overrides: Partial<SearchDependencies> = {}) {
  const overpass = fakeProvider('overpass', [osmDiner, osmPark]);
  const google = fakeProvider('google_places', [googleDiner, googleGas]);
  const recordSearch = vi.fn(async (_record: SearchHistoryRecord, _locations: ScoredCandidate[]) => ({
    searchId: 'search-1'
  }));
  const geocode = vi.fn(async (_zip: string, _signal: AbortSignal) => ({ latitude: 39.78, longitude: -89.65 }));

  const deps: SearchDependencies = {
    geocoder: { geocode },
    providers: [overpass.provider, google.provider],
    exclusions: { listExcludedIds: async () => new Set<string>() },
    preferences: { getPreference: async () => null },
    history: { recordSearch },
    config: {
      providerTimeoutMs: 1000,
      includePermanentlyClosed: true,
      now: () => new Date('2026-03-01T12:00:00.000Z')
    },
    ...overrides
  };

  return { deps, overpass, google, recordSearch, geocode };
}

describe('searchLocations', () => {
  it('merges, scores, filters and ranks provider results', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deps, recordSearch, geocode } = setup();

    const result = await searchLocations(request, deps);

    expect(result.locations.map((c) => c.providerId)).toEqual(['g-diner', 'g-gas']);
    expect(result.locations.map((c) => c.priorityScore)).toEqual([115, 50]);
    expect(result.locations[0]?.sources).toEqual(['overpass', 'google_places']);
    expect(result.locations[0]?.email).toBe('joe@example.com');
    expect(result.locations[0]?.contactCompleteness).toBe('both');
    expect(result.resultCount).toBe(2);
    expect(result.searchId).toBe('search-1');
    expect(result.warnings).toEqual([]);
    expect(result.providerErrors).toEqual({});

    expect(geocode).toHaveBeenCalledWith('62701', expect.any(AbortSignal));
    expect(recordSearch).toHaveBeenCalledTimes(1);
    const [record, locations] = recordSearch.mock.calls[0] ?? [];
    expect(record?.resultCount).toBe(2);
    expect(record?.createdAt).toBe('2026-03-01T12:00:00.000Z');
    expect(locations).toEqual(result.locations);
  });

  it('asks providers for every venue of the machine type when no filter is set', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deps, google } = setup();

    await searchLocations(request, deps);

    expect(google.search).toHaveBeenCalledWith(
      {
        center: { latitude: 39.78, longitude: -89.65 },
        radiusMeters: 10 * 1609.34,
        buildingTypes: SNACK_VENUES
      },
      expect.any(AbortSignal)
    );
  });

  it('never returns excluded places', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deps } = setup({ exclusions: { listExcludedIds: async () => new Set(['g-diner']) } });

    const result = await searchLocations(request, deps);

    expect(result.locations.map((c) => c.providerId)).toEqual(['g-gas']);
  });

  it('drops a merged place when its map record is excluded', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deps } = setup({ exclusions: { listExcludedIds: async () => new Set(['osm:node:1']) } });

    const result = await searchLocations(request, deps);

    expect(result.locations.map((c) => c.providerId)).toEqual(['g-gas']);
  });

  it('honours require_contact_info', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deps } = setup();

    const result = await searchLocations({ ...request, requireContactInfo: true }, deps);

    expect(result.locations.map((c) => c.providerId)).toEqual(['g-diner']);
  });

  it('truncates to max_results', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deps } = setup();

    const result = await searchLocations({ ...request, maxResults: 1 }, deps);

    expect(result.resultCount).toBe(1);
    expect(result.locations[0]?.providerId).toBe('g-diner');
  });

  it('reports a failing provider and keeps the other results', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const overpass = fakeProvider('overpass', [osmDiner]);
    const failing: LocationProvider = {
      name: 'google_places',
      search: async () => {
        throw new Error('quota exceeded');
      }
    };
    const { deps } = setup({ providers: [overpass.provider, failing] });

    const result = await searchLocations(request, deps);

    expect(result.providerErrors).toEqual({ google_places: 'quota exceeded' });
    expect(result.locations.map((c) => c.providerId)).toEqual(['osm:node:1']);
  });

  it('returns an empty result when both providers time out', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const base = setup();
    const deps: SearchDependencies = {
      ...base.deps,
      providers: [hangingProvider('overpass'), hangingProvider('google_places')],
      config: { ...base.deps.config, providerTimeoutMs: 20 }
    };

    const result = await searchLocations(request, deps);

    expect(result.resultCount).toBe(0);
    expect(result.locations).toEqual([]);
    expect(result.providerErrors).toEqual({
      overpass: 'overpass timed out after 20 ms',
      google_places: 'google_places timed out after 20 ms'
    });
  });

  it('reports a geocoder outage as a provider error with no results', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { deps, overpass, recordSearch } = setup({
      geocoder: {
        geocode: async () => {
          throw new Error('nominatim down');
        }
      }
    });

    const result = await searchLocations(request, deps);

    expect(result.providerErrors).toEqual({ nominatim: 'nominatim down' });
    expect(result.locations).toEqual([]);
    expect(overpass.search).not.toHaveBeenCalled();
    expect(recordSearch.mock.calls[0]?.[0].searchParameters.center).toBeNull();
  });

  it('rejects a ZIP code the geocoder does not know', async () => {
    const { deps, recordSearch } = setup({ geocoder: { geocode: async () => null } });

    await expect(searchLocations(request, deps)).rejects.toBeInstanceOf(InvalidZipCodeError);
    expect(recordSearch).not.toHaveBeenCalled();
  });

  it('fails when the exclusion store cannot be read', async () => {
    const { deps, geocode } = setup({
      exclusions: {
        listExcludedIds: async () => {
          throw new Error('firestore offline');
        }
      }
    });

    await expect(searchLocations(request, deps)).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(geocode).not.toHaveBeenCalled();
  });

  it('returns the results with a warning when history cannot be written', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { deps } = setup({
      history: {
        recordSearch: async () => {
          throw new Error('write quota');
        }
      }
    });

    const result = await searchLocations(request, deps);

    expect(result.searchId).toBeNull();
    expect(result.warnings).toEqual([HISTORY_WRITE_FAILED]);
    expect(result.resultCount).toBe(2);
    expect(error).toHaveBeenCalledWith('[history] failed to record search', {
      operatorId: 'op-1',
      error: 'write quota'
    });
  });

  it('stops and persists nothing when the caller cancels', async () => {
    const controller = new AbortController();
    const cancelling: LocationProvider = {
      name: 'overpass',
      search: async () => {
        controller.abort();
        return [];
      }
    };
    const { deps, recordSearch } = setup({ providers: [cancelling] });

    await expect(searchLocations(request, deps, controller.signal)).rejects.toBeInstanceOf(SearchCancelledError);
    expect(recordSearch).not.toHaveBeenCalled();
  });

  it('takes radius and machine type from the stored preference', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deps, google } = setup({
      preferences: {
        getPreference: async () => ({
          operatorId: 'op-1',
          preferredMachineTypes: ['coffee_machine'],
          preferredRadius: 5,
          preferredBuildingTypes: [],
          excludedCategories: [],
          minimumRating: 0,
          requireContactInfo: false
        })
      }
    });

    const result = await searchLocations({ operatorId: 'op-1', zipCode: '62701' }, deps);

    expect(result.parameters.machineType).toBe('coffee_machine');
    expect(result.parameters.radius).toBe(5);
    expect(google.search.mock.calls[0]?.[0].radiusMeters).toBe(5 * 1609.34);
  });

  it('requires radius when neither the request nor a preference has one', async () => {
    const { deps } = setup();
    await expect(searchLocations({ ...request, radius: undefined }, deps)).rejects.toBeInstanceOf(
      MissingSearchParameterError
    );
  });
  it('rejects an invalid request before reading the operator store', async () => {
    const getPreference = vi.fn(async () => {
      throw new Error('firestore offline');
    });
    const { deps } = setup({ preferences: { getPreference } });

    await expect(searchLocations({ ...request, radius: 7 }, deps)).rejects.toBeInstanceOf(InvalidRadiusError);
    await expect(searchLocations({ ...request, zipCode: '6270' }, deps)).rejects.toBeInstanceOf(InvalidZipCodeError);
    expect(getPreference).not.toHaveBeenCalled();
  });

  it('logs what each stage removed', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const { deps } = setup();

    await searchLocations(request, deps);

    expect(info).toHaveBeenCalledWith('[search] completed', {
      operatorId: 'op-1',
      zipCode: '62701',
      resultCount: 2,
      malformed: {},
      merged: 1,
      dropped: { machine_type_mismatch: 1 },
      providerRadiusMeters: {},
      providerErrors: {}
    });
  });

  it('records providers that searched a narrower circle than requested', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const google = fakeProvider('google_places', [googleGas]);
    const { deps, recordSearch } = setup({
      providers: [{ ...google.provider, maxRadiusMeters: 50_000 }]
    });

    const result = await searchLocations({ ...request, radius: 40 }, deps);

    expect(result.warnings).toEqual([PROVIDER_RADIUS_CLAMPED]);
    expect(recordSearch.mock.calls[0]?.[0].searchParameters.providerRadiusMeters).toEqual({
      google_places: 50_000
    });
  });
});
