import type { Response } from 'express';
import { LocatorError, errorMessage } from '../errors.js';
import type { OperatorStats, RecentLocation } from '../locator/activity.js';
import type { StoredSearch } from '../repositories/searchHistoryRepository.js';
import type {
  ExcludedLocation,
  ScoredCandidate,
  SearchResult,
  UserLocationPreference
} from '../types.js';

export function sendError(res: Response, err: unknown, fallbackCode: string) {
  if (err instanceof LocatorError) {
    return res.status(err.status).json(err.toJSON());
  }
  return res.status(500).json({ error: fallbackCode, message: errorMessage(err) });
}

export function toLocationResponse(location: ScoredCandidate) {
  return {
    provider: location.provider,
    provider_id: location.providerId,
    place_id: location.placeId ?? null,
    name: location.name,
    category: location.category,
    detailed_category: location.detailedCategory,
    latitude: location.latitude,
    longitude: location.longitude,
    address: location.address,
    phone: location.phone ?? null,
    email: location.email ?? null,
    website: location.website ?? null,
    maps_url: location.mapsUrl ?? null,
    rating: location.rating ?? null,
    review_count: location.reviewCount ?? null,
    operational_status: location.operationalStatus,
    foot_traffic: location.footTraffic ?? null,
    priority_score: location.priorityScore,
    contact_completeness: location.contactCompleteness,
    building_types: location.buildingTypes,
    sources: location.sources
  };
}

export function toSearchResponse(result: SearchResult) {
  return {
    search_id: result.searchId,
    locations: result.locations.map(toLocationResponse),
    result_count: result.resultCount,
    provider_errors: result.providerErrors,
    warnings: result.warnings
  };
}

export function toSearchHistoryResponse(search: StoredSearch) {
  const p = search.searchParameters;
  return {
    id: search.id,
    operator_id: search.operatorId,
    zip_code: search.zipCode,
    radius: search.radius,
    machine_type: search.machineType,
    building_types_filter: search.buildingTypesFilter,
    result_count: search.resultCount,
    search_parameters: {
      center: p.center,
      max_results: p.maxResults,
      result_limit: p.resultLimit,
      minimum_rating: p.minimumRating,
      require_contact_info: p.requireContactInfo,
      excluded_categories: p.excludedCategories,
      provider_errors: p.providerErrors,
      provider_radius_meters: p.providerRadiusMeters
    },
    created_at: search.createdAt
  };
}

export function toPreferenceResponse(preference: UserLocationPreference) {
  return {
    operator_id: preference.operatorId,
    preferred_machine_types: preference.preferredMachineTypes,
    preferred_radius: preference.preferredRadius,
    preferred_building_types: preference.preferredBuildingTypes,
    excluded_categories: preference.excludedCategories,
    minimum_rating: preference.minimumRating,
    require_contact_info: preference.requireContactInfo,
    created_at: preference.createdAt ?? null,
    updated_at: preference.updatedAt ?? null
  };
}

export function toExclusionResponse(exclusion: ExcludedLocation) {
  return {
    operator_id: exclusion.operatorId,
    place_id: exclusion.placeId,
    location_name: exclusion.locationName,
    reason: exclusion.reason,
    notes: exclusion.notes,
    created_at: exclusion.createdAt
  };
}

export function toStatsResponse(stats: OperatorStats) {
  return {
    total_searches: stats.totalSearches,
    total_locations_found: stats.totalLocationsFound,
    searches_this_month: stats.searchesThisMonth,
    locations_this_month: stats.locationsThisMonth,
    favorite_machine_type: stats.favoriteMachineType,
    average_results_per_search: stats.averageResultsPerSearch,
    top_zip_codes: stats.topZipCodes.map((z) => ({ zip_code: z.zipCode, count: z.count })),
    excluded_locations_count: stats.excludedLocationsCount
  };
}

export function toRecentLocationResponse(recent: RecentLocation) {
  return {
    ...toLocationResponse(recent.location),
    search_id: recent.searchId,
    searched_at: recent.searchedAt
  };
}
