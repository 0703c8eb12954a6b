import {
  BUILDING_TYPES,
  PROVIDER_NAMES,
  type CandidateLocation,
  type Coordinates,
  type ProviderName
} from '../types.js';
import { distanceMeters, nameSimilarity } from './similarity.js';

/**
 * Decides whether two candidates that do not share a commercial place id
 * describe the same physical business. Candidates further apart than
 * `maxDistanceMeters` are never compared.
 */
export interface CandidateMatcher {
  readonly maxDistanceMeters: number;
  matches(a: CandidateLocation, b: CandidateLocation): boolean;
}

export interface ProximityNameMatcherOptions {
  maxDistanceMeters: number;
  minNameSimilarity: number;
}

export const DEFAULT_MATCHER_OPTIONS: ProximityNameMatcherOptions = {
  maxDistanceMeters: 30,
  minNameSimilarity: 0.85
};

export function proximityNameMatcher(options: ProximityNameMatcherOptions = DEFAULT_MATCHER_OPTIONS): CandidateMatcher {
  return {
    maxDistanceMeters: options.maxDistanceMeters,
    matches(a, b) {
      if (distanceMeters(a, b) > options.maxDistanceMeters) return false;
      return nameSimilarity(a.name, b.name) >= options.minNameSimilarity;
    }
  };
}

// Lower rank wins: the commercial source carries the richer rating and contact data.
const PROVIDER_RANK: Record<ProviderName, number> = {
  google_places: 0,
  overpass: 1
};

function fingerprint(c: CandidateLocation): string {
  return JSON.stringify([
    c.name,
    c.address,
    c.latitude,
    c.longitude,
    c.phone ?? '',
    c.email ?? '',
    c.website ?? '',
    c.rating ?? -1,
    c.reviewCount ?? -1,
    c.operationalStatus,
    c.category,
    c.detailedCategory
  ]);
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Total order over candidates; repeated records of one provider id are ordered by content. */
export function compareCanonical(a: CandidateLocation, b: CandidateLocation): number {
  const byProvider = PROVIDER_RANK[a.provider] - PROVIDER_RANK[b.provider];
  if (byProvider !== 0) return byProvider;
  return compareStrings(a.providerId, b.providerId) || compareStrings(fingerprint(a), fingerprint(b));
}

function unionDetail(primary: string, secondary: string): string {
  const parts = [...primary.split(','), ...secondary.split(',')].map((p) => p.trim()).filter((p) => p.length > 0);
  return [...new Set(parts)].join(', ');
}

/**
 * Merges two records of the same business. The canonical-first record (the
 * commercial one when present) keeps its identity, name, position, address and
 * review data; every other field is filled from whichever side has it.
 */
export function mergeCandidates(a: CandidateLocation, b: CandidateLocation): CandidateLocation {
  const [primary, secondary] = compareCanonical(a, b) <= 0 ? [a, b] : [b, a];

  return {
    provider: primary.provider,
    providerId: primary.providerId,
    placeId: primary.placeId ?? secondary.placeId,
    name: primary.name,
    category: primary.category !== 'unknown' ? primary.category : secondary.category,
    detailedCategory: unionDetail(primary.detailedCategory, secondary.detailedCategory),
    address: primary.address || secondary.address,
    latitude: primary.latitude,
    longitude: primary.longitude,
    phone: primary.phone ?? secondary.phone,
    email: primary.email ?? secondary.email,
    website: primary.website ?? secondary.website,
    mapsUrl: primary.mapsUrl ?? secondary.mapsUrl,
    rating: primary.rating ?? secondary.rating,
    reviewCount: primary.reviewCount ?? secondary.reviewCount,
    operationalStatus: primary.operationalStatus !== 'unknown' ? primary.operationalStatus : secondary.operationalStatus,
    footTraffic: primary.footTraffic ?? secondary.footTraffic,
    buildingTypes: BUILDING_TYPES.filter((t) => primary.buildingTypes.includes(t) || secondary.buildingTypes.includes(t)),
    sources: PROVIDER_NAMES.filter((p) => primary.sources.includes(p) || secondary.sources.includes(p))
  };
}

function identityKey(candidate: CandidateLocation): string {
  return candidate.placeId ?? `${candidate.provider}:${candidate.providerId}`;
}

/** A merged business plus the ids of every record folded into it. */
interface Cluster {
  candidate: CandidateLocation;
  memberIds: ReadonlySet<string>;
}

function toCluster(candidate: CandidateLocation): Cluster {
  const ids = candidate.placeId ? [candidate.providerId, candidate.placeId] : [candidate.providerId];
  return { candidate, memberIds: new Set(ids) };
}

function mergeClusters(a: Cluster, b: Cluster): Cluster {
  return {
    candidate: mergeCandidates(a.candidate, b.candidate),
    memberIds: new Set([...a.memberIds, ...b.memberIds])
  };
}

function compareClusters(a: Cluster, b: Cluster): number {
  return compareCanonical(a.candidate, b.candidate);
}

function mergeByIdentity(sorted: readonly Cluster[]): Cluster[] {
  const byKey = new Map<string, Cluster>();
  for (const cluster of sorted) {
    const key = identityKey(cluster.candidate);
    const existing = byKey.get(key);
    byKey.set(key, existing ? mergeClusters(existing, cluster) : cluster);
  }
  return [...byKey.values()];
}

function canMerge(a: CandidateLocation, b: CandidateLocation, matcher: CandidateMatcher): boolean {
  // Two different commercial ids are two businesses, however close they sit.
  if (a.placeId && b.placeId && a.placeId !== b.placeId) return false;
  return matcher.matches(a, b);
}

const METERS_PER_DEGREE = 111_320;

/**
 * Grid of cells at least `maxDistanceMeters` wide, so two records the matcher
 * can accept always sit in the same or adjacent cells.
 */
class ClusterGrid {
  private readonly cells = new Map<string, Set<number>>();
  private readonly latStep: number;
  private readonly lonStep: number;

  constructor(maxDistanceMeters: number, maxAbsLatitude: number) {
    // Slack over the haversine distance the matcher measures.
    const span = Math.max(maxDistanceMeters, 1) * 1.5;
    this.latStep = span / METERS_PER_DEGREE;
    this.lonStep = this.latStep / Math.max(Math.cos((Math.min(maxAbsLatitude, 89) * Math.PI) / 180), 0.01);
  }

  private cell(c: Coordinates): [number, number] {
    return [Math.floor(c.latitude / this.latStep), Math.floor(c.longitude / this.lonStep)];
  }

  add(id: number, c: Coordinates): void {
    const [row, col] = this.cell(c);
    const key = `${row}:${col}`;
    const ids = this.cells.get(key) ?? new Set<number>();
    ids.add(id);
    this.cells.set(key, ids);
  }

  remove(id: number, c: Coordinates): void {
    const [row, col] = this.cell(c);
    this.cells.get(`${row}:${col}`)?.delete(id);
  }

  /** Ids in the cell of `c` and its eight neighbours, ascending. */
  near(c: Coordinates): number[] {
    const [row, col] = this.cell(c);
    const found: number[] = [];
    for (let dr = -1; dr <= 1; dr++) {
      for (let dc = -1; dc <= 1; dc++) {
        const ids = this.cells.get(`${row + dr}:${col + dc}`);
        if (ids) found.push(...ids);
      }
    }
    return found.sort((a, b) => a - b);
  }
}

function mergeByProximity(clusters: readonly Cluster[], matcher: CandidateMatcher): Cluster[] {
  const sorted = [...clusters].sort(compareClusters);
  const maxAbsLatitude = sorted.reduce((max, c) => Math.max(max, Math.abs(c.candidate.latitude)), 0);
  const grid = new ClusterGrid(matcher.maxDistanceMeters, maxAbsLatitude);

  const live = new Map<number, Cluster>();
  sorted.forEach((cluster, id) => {
    live.set(id, cluster);
    grid.add(id, cluster.candidate);
  });

  // A merged record takes the primary's position, which can bring it within
  // range of another cluster, so it goes back on the queue.
  const queue = [...live.keys()];
  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    if (id === undefined) continue;
    const cluster = live.get(id);
    if (!cluster) continue;

    for (const otherId of grid.near(cluster.candidate)) {
      const other = live.get(otherId);
      if (otherId === id || !other || !canMerge(cluster.candidate, other.candidate, matcher)) continue;

      const keep = Math.min(id, otherId);
      const drop = Math.max(id, otherId);
      const merged = mergeClusters(cluster, other);
      grid.remove(id, cluster.candidate);
      grid.remove(otherId, other.candidate);
      live.delete(drop);
      live.set(keep, merged);
      grid.add(keep, merged.candidate);
      queue.push(keep);
      break;
    }
  }

  return [...live.values()].sort(compareClusters);
}

/** True when the place id, provider id or any merged-in record id is excluded. */
function isExcluded(cluster: Cluster, excludedIds: ReadonlySet<string>): boolean {
  for (const id of cluster.memberIds) {
    if (excludedIds.has(id)) return true;
  }
  return false;
}

export interface DeduplicateOptions {
  excludedIds?: ReadonlySet<string>;
  matcher?: CandidateMatcher;
}

/**
 * Collapses records of the same business across providers and drops the
 * operator's excluded places. A merged business is dropped when any record
 * folded into it is excluded. The result does not depend on input order and
 * is a fixed point: deduplicating it again returns the same list.
 */
export function deduplicateCandidates(
  candidates: readonly CandidateLocation[],
  options: DeduplicateOptions = {}
): CandidateLocation[] {
  const matcher = options.matcher ?? proximityNameMatcher();
  const excludedIds = options.excludedIds ?? new Set<string>();

  const sorted = candidates.map(toCluster).sort(compareClusters);
  return mergeByProximity(mergeByIdentity(sorted), matcher)
    .filter((cluster) => !isExcluded(cluster, excludedIds))
    .map((cluster) => cluster.candidate);
}
