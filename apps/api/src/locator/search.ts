import { queryBuildingTypes } from '../catalog.js';
import {
  InvalidZipCodeError,
  SearchCancelledError,
  SearchValidationError,
  StoreUnavailableError,
  errorMessage
} from '../errors.js';
import { METERS_PER_MILE } from '../providers/shared.js';
import type {
  Coordinates,
  ExclusionReader,
  Geocoder,
  HistoryWriter,
  LocationProvider,
  PreferenceReader,
  ProviderErrors,
  ProviderName,
  ResolvedSearchParameters,
  ScoredCandidate,
  SearchRequest,
  SearchResult,
  UserLocationPreference
} from '../types.js';
import { collectFromProviders, runWithDeadline } from './collect.js';
import { deduplicateCandidates, type CandidateMatcher } from './dedupe.js';
import { applyPreferenceFilter, type DropReason } from './filter.js';
import { withFootTraffic } from './footTraffic.js';
import { normalizeBatch } from './normalize.js';
import { resolveSearchParameters, validateSearchRequest } from './parameters.js';
import { assembleRanking } from './rank.js';
import { DEFAULT_SCORING_WEIGHTS, scoreCandidates, type ScoringWeights } from './score.js';

export const HISTORY_WRITE_FAILED = 'HISTORY_WRITE_FAILED';
export const PROVIDER_RADIUS_CLAMPED = 'PROVIDER_RADIUS_CLAMPED';

export interface SearchConfig {
  providerTimeoutMs: number;
  includePermanentlyClosed: boolean;
  weights?: ScoringWeights;
  matcher?: CandidateMatcher;
  now?: () => Date;
}

export interface SearchDependencies {
  geocoder: Geocoder;
  providers: readonly LocationProvider[];
  exclusions: ExclusionReader;
  preferences: PreferenceReader;
  history: HistoryWriter;
  config: SearchConfig;
}

async function readOperatorContext(
  deps: SearchDependencies,
  operatorId: string
): Promise<[Set<string>, UserLocationPreference | null]> {
  try {
    return await Promise.all([
      deps.exclusions.listExcludedIds(operatorId),
      deps.preferences.getPreference(operatorId)
    ]);
  } catch (err) {
    if (err instanceof StoreUnavailableError) throw err;
    throw new StoreUnavailableError('operator store', err);
  }
}

async function locateZipCode(
  deps: SearchDependencies,
  zipCode: string,
  signal: AbortSignal,
  providerErrors: ProviderErrors
): Promise<Coordinates | null> {
  let center: Coordinates | null;
  try {
    center = await runWithDeadline(
      'nominatim',
      (s) => deps.geocoder.geocode(zipCode, s),
      signal,
      deps.config.providerTimeoutMs
    );
  } catch (err) {
    if (err instanceof SearchCancelledError || err instanceof SearchValidationError) throw err;
    const reason = errorMessage(err);
    console.warn('[providers] nominatim failed', { provider: 'nominatim', reason });
    providerErrors.nominatim = reason;
    return null;
  }

  if (!center) throw new InvalidZipCodeError(zipCode);
  return center;
}

interface CandidateFunnel {
  kept: ScoredCandidate[];
  malformed: Partial<Record<ProviderName, number>>;
  merged: number;
  dropped: Partial<Record<DropReason, number>>;
}

/** Providers whose own limit is below the requested radius, with the radius they actually search. */
export function clampedProviderRadii(
  providers: readonly LocationProvider[],
  radiusMeters: number
): Partial<Record<ProviderName, number>> {
  const clamped: Partial<Record<ProviderName, number>> = {};
  for (const provider of providers) {
    if (provider.maxRadiusMeters !== undefined && provider.maxRadiusMeters < radiusMeters) {
      clamped[provider.name] = provider.maxRadiusMeters;
    }
  }
  return clamped;
}

async function findCandidates(
  deps: SearchDependencies,
  parameters: ResolvedSearchParameters,
  center: Coordinates,
  excludedIds: ReadonlySet<string>,
  signal: AbortSignal,
  providerErrors: ProviderErrors
): Promise<CandidateFunnel> {
  const collected = await collectFromProviders(
    deps.providers,
    {
      center,
      radiusMeters: parameters.radius * METERS_PER_MILE,
      buildingTypes: queryBuildingTypes(parameters.machineType, parameters.buildingTypes)
    },
    signal,
    deps.config.providerTimeoutMs
  );
  Object.assign(providerErrors, collected.providerErrors);

  const malformed: Partial<Record<ProviderName, number>> = {};
  const normalized = collected.batches.flatMap((batch) => {
    const result = normalizeBatch(batch.provider, batch.records);
    if (result.malformed > 0) malformed[batch.provider] = result.malformed;
    return result.candidates;
  });
  const unique = deduplicateCandidates(normalized, { excludedIds, matcher: deps.config.matcher }).map(withFootTraffic);
  const scored = scoreCandidates(unique, deps.config.weights ?? DEFAULT_SCORING_WEIGHTS);

  const { kept, dropped } = applyPreferenceFilter(scored, {
    machineType: parameters.machineType,
    buildingTypes: parameters.buildingTypes,
    minimumRating: parameters.minimumRating,
    requireContactInfo: parameters.requireContactInfo,
    excludedCategories: parameters.excludedCategories,
    includePermanentlyClosed: deps.config.includePermanentlyClosed
  });

  return { kept, malformed, merged: normalized.length - unique.length, dropped };
}

/**
 * Runs one location search for an operator: resolves the parameters against
 * the stored preference, geocodes the ZIP code, queries every provider and
 * returns the ranked, filtered list. The search is recorded in history only
 * once it has fully completed; a caller abort ends it with SearchCancelledError.
 */
export async function searchLocations(
  request: SearchRequest,
  deps: SearchDependencies,
  signal: AbortSignal = new AbortController().signal
): Promise<SearchResult> {
  const operatorId = validateSearchRequest(request);
  const [excludedIds, preference] = await readOperatorContext(deps, operatorId);
  const parameters = resolveSearchParameters(request, preference);
  if (signal.aborted) throw new SearchCancelledError();

  const providerErrors: ProviderErrors = {};
  const providerRadiusMeters = clampedProviderRadii(deps.providers, parameters.radius * METERS_PER_MILE);
  const center = await locateZipCode(deps, parameters.zipCode, signal, providerErrors);
  const funnel = center
    ? await findCandidates(deps, parameters, center, excludedIds, signal, providerErrors)
    : null;

  if (signal.aborted) throw new SearchCancelledError();

  const { locations, history } = assembleRanking({
    parameters,
    candidates: funnel?.kept ?? [],
    center,
    providerErrors,
    providerRadiusMeters,
    now: deps.config.now?.() ?? new Date()
  });

  const warnings: string[] = [];
  if (Object.keys(providerRadiusMeters).length > 0) warnings.push(PROVIDER_RADIUS_CLAMPED);

  let searchId: string | null = null;
  try {
    ({ searchId } = await deps.history.recordSearch(history, locations));
  } catch (err) {
    console.error('[history] failed to record search', { operatorId, error: errorMessage(err) });
    warnings.push(HISTORY_WRITE_FAILED);
  }

  console.info('[search] completed', {
    operatorId,
    zipCode: parameters.zipCode,
    resultCount: locations.length,
    malformed: funnel?.malformed ?? {},
    merged: funnel?.merged ?? 0,
    dropped: funnel?.dropped ?? {},
    providerRadiusMeters,
    providerErrors
  });

  return {
    searchId,
    locations,
    resultCount: locations.length,
    providerErrors,
    warnings,
    parameters
  };
}
