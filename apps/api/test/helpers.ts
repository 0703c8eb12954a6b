import type { CandidateLocation, ScoredCandidate } from '../src/types.js';

export function candidate(overrides: Partial<CandidateLocation> = {}): CandidateLocation {
  return {
    provider: 'google_places',
    providerId: 'place-1',
    placeId: 'place-1',
    name: 'Corner Market',
    category: 'convenience_store',
    detailedCategory: 'convenience_store',
    address: '1 Main St, Springfield, IL 62701',
    latitude: 39.7817,
    longitude: -89.6501,
    operationalStatus: 'operational',
    buildingTypes: ['convenience_stores'],
    sources: ['google_places'],
    ...overrides
  };
}

export function scored(overrides: Partial<ScoredCandidate> = {}): ScoredCandidate {
  return {
    ...candidate(overrides),
    priorityScore: 50,
    contactCompleteness: 'none',
    ...overrides
  };
}
