import { buildingTypesForMachine } from '../catalog.js';
import type { BuildingType, CandidateLocation, MachineType } from '../types.js';
import { classifyContact } from './score.js';

export type DropReason =
  | 'below_minimum_rating'
  | 'missing_contact_info'
  | 'excluded_category'
  | 'machine_type_mismatch'
  | 'building_type_mismatch'
  | 'permanently_closed';

export interface FilterCriteria {
  machineType: MachineType;
  buildingTypes: readonly BuildingType[];
  minimumRating: number;
  requireContactInfo: boolean;
  excludedCategories: readonly string[];
  includePermanentlyClosed: boolean;
}

export interface FilterOutcome<T> {
  kept: T[];
  dropped: Partial<Record<DropReason, number>>;
}

/** Why a candidate is filtered out, or null when it stays. */
export function dropReason(candidate: CandidateLocation, criteria: FilterCriteria): DropReason | null {
  // Unrated places are not failing the floor, there is just nothing to compare.
  if (candidate.rating !== undefined && candidate.rating < criteria.minimumRating) {
    return 'below_minimum_rating';
  }

  if (criteria.requireContactInfo && classifyContact(candidate) === 'none') {
    return 'missing_contact_info';
  }

  const detail = candidate.detailedCategory.toLowerCase();
  if (criteria.excludedCategories.some((c) => c.length > 0 && detail.includes(c.toLowerCase()))) {
    return 'excluded_category';
  }

  const venues = buildingTypesForMachine(criteria.machineType);
  if (!candidate.buildingTypes.some((t) => venues.includes(t))) {
    return 'machine_type_mismatch';
  }

  if (criteria.buildingTypes.length > 0 && !candidate.buildingTypes.some((t) => criteria.buildingTypes.includes(t))) {
    return 'building_type_mismatch';
  }

  if (!criteria.includePermanentlyClosed && candidate.operationalStatus === 'closed_permanently') {
    return 'permanently_closed';
  }

  return null;
}

export function applyPreferenceFilter<T extends CandidateLocation>(
  candidates: readonly T[],
  criteria: FilterCriteria
): FilterOutcome<T> {
  const kept: T[] = [];
  const dropped: Partial<Record<DropReason, number>> = {};

  for (const candidate of candidates) {
    const reason = dropReason(candidate, criteria);
    if (reason === null) {
      kept.push(candidate);
      continue;
    }
    dropped[reason] = (dropped[reason] ?? 0) + 1;
  }

  return { kept, dropped };
}
