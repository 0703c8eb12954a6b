import { MACHINE_TYPES, type MachineType, type ScoredCandidate, type SearchHistoryRecord } from '../types.js';
import { compareRanked } from './rank.js';

export const RECENT_WINDOW_DAYS = 30;
export const RECENT_LOCATIONS_LIMIT = 50;
export const TOP_ZIP_CODES = 5;

type SearchSummary = Pick<SearchHistoryRecord, 'machineType' | 'zipCode' | 'resultCount' | 'createdAt'>;

export interface ZipCodeCount {
  zipCode: string;
  count: number;
}

export interface OperatorStats {
  totalSearches: number;
  totalLocationsFound: number;
  searchesThisMonth: number;
  locationsThisMonth: number;
  favoriteMachineType: MachineType | null;
  averageResultsPerSearch: number;
  topZipCodes: ZipCodeCount[];
  excludedLocationsCount: number;
}

export interface RecentLocation {
  searchId: string;
  searchedAt: string;
  location: ScoredCandidate;
}

function startOfMonthUtc(now: Date): number {
  return Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1);
}

export function recentWindowStart(now: Date): Date {
  return new Date(now.getTime() - RECENT_WINDOW_DAYS * 24 * 60 * 60 * 1000);
}

function favoriteMachineType(searches: readonly SearchSummary[]): MachineType | null {
  const counts = new Map<MachineType, number>();
  for (const s of searches) counts.set(s.machineType, (counts.get(s.machineType) ?? 0) + 1);

  // Ties go to the earlier machine type in catalog order.
  let best: MachineType | null = null;
  let bestCount = 0;
  for (const type of MACHINE_TYPES) {
    const count = counts.get(type) ?? 0;
    if (count > bestCount) {
      best = type;
      bestCount = count;
    }
  }
  return best;
}

function topZipCodes(searches: readonly SearchSummary[]): ZipCodeCount[] {
  const counts = new Map<string, number>();
  for (const s of searches) counts.set(s.zipCode, (counts.get(s.zipCode) ?? 0) + 1);

  return [...counts.entries()]
    .map(([zipCode, count]) => ({ zipCode, count }))
    .sort((a, b) => b.count - a.count || (a.zipCode < b.zipCode ? -1 : a.zipCode > b.zipCode ? 1 : 0))
    .slice(0, TOP_ZIP_CODES);
}

/** Aggregates an operator's search history. Months are calendar months in UTC. */
export function summarizeSearches(
  searches: readonly SearchSummary[],
  excludedLocationsCount: number,
  now: Date
): OperatorStats {
  const monthStart = startOfMonthUtc(now);
  const thisMonth = searches.filter((s) => Date.parse(s.createdAt) >= monthStart);
  const totalLocationsFound = searches.reduce((sum, s) => sum + s.resultCount, 0);

  return {
    totalSearches: searches.length,
    totalLocationsFound,
    searchesThisMonth: thisMonth.length,
    locationsThisMonth: thisMonth.reduce((sum, s) => sum + s.resultCount, 0),
    favoriteMachineType: favoriteMachineType(searches),
    averageResultsPerSearch: searches.length > 0 ? Math.round((totalLocationsFound / searches.length) * 10) / 10 : 0,
    topZipCodes: topZipCodes(searches),
    excludedLocationsCount
  };
}

/** Highest priority first; among equals the most recent search wins. */
export function selectRecentLocations(entries: readonly RecentLocation[], limit = RECENT_LOCATIONS_LIMIT): RecentLocation[] {
  return [...entries]
    .sort(
      (a, b) =>
        b.location.priorityScore - a.location.priorityScore ||
        Date.parse(b.searchedAt) - Date.parse(a.searchedAt) ||
        compareRanked(a.location, b.location)
    )
    .slice(0, limit);
}
