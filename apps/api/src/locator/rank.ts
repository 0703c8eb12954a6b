import type {
  Coordinates,
  ProviderErrors,
  ProviderName,
  ResolvedSearchParameters,
  ScoredCandidate,
  SearchHistoryRecord
} from '../types.js';

/** Hard cap on the number of locations a single search returns. */
export const RESULT_CEILING = 100;

/** Score descending, then review count descending, then name, then provider id. */
export function compareRanked(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.priorityScore !== b.priorityScore) return b.priorityScore - a.priorityScore;

  const reviewsA = a.reviewCount ?? 0;
  const reviewsB = b.reviewCount ?? 0;
  if (reviewsA !== reviewsB) return reviewsB - reviewsA;

  const byName = a.name.localeCompare(b.name, 'en');
  if (byName !== 0) return byName;

  if (a.providerId === b.providerId) return 0;
  return a.providerId < b.providerId ? -1 : 1;
}

export function resultLimit(maxResults: number): number {
  return Math.min(maxResults, RESULT_CEILING);
}

export function rankCandidates(candidates: readonly ScoredCandidate[], maxResults: number): ScoredCandidate[] {
  return [...candidates].sort(compareRanked).slice(0, resultLimit(maxResults));
}

export interface RankingInput {
  parameters: ResolvedSearchParameters;
  candidates: readonly ScoredCandidate[];
  center: Coordinates | null;
  providerErrors: ProviderErrors;
  providerRadiusMeters?: Partial<Record<ProviderName, number>>;
  now: Date;
}

export interface RankingOutput {
  locations: ScoredCandidate[];
  history: SearchHistoryRecord;
}

/** Orders and truncates the filtered candidates and builds the audit record for the search. */
export function assembleRanking(input: RankingInput): RankingOutput {
  const { parameters } = input;
  const locations = rankCandidates(input.candidates, parameters.maxResults);

  return {
    locations,
    history: {
      operatorId: parameters.operatorId,
      zipCode: parameters.zipCode,
      radius: parameters.radius,
      machineType: parameters.machineType,
      buildingTypesFilter: [...parameters.buildingTypes],
      resultCount: locations.length,
      searchParameters: {
        center: input.center,
        maxResults: parameters.maxResults,
        resultLimit: resultLimit(parameters.maxResults),
        minimumRating: parameters.minimumRating,
        requireContactInfo: parameters.requireContactInfo,
        excludedCategories: [...parameters.excludedCategories],
        providerErrors: { ...input.providerErrors },
        providerRadiusMeters: { ...input.providerRadiusMeters }
      },
      createdAt: input.now.toISOString()
    }
  };
}
