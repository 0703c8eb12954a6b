import { z } from 'zod';
import { isBuildingType, parseMachineType } from '../catalog.js';
import {
  InvalidBuildingTypeError,
  InvalidMachineTypeError,
  InvalidRadiusError,
  InvalidSearchParameterError,
  InvalidZipCodeError,
  MissingSearchParameterError
} from '../errors.js';
import {
  MACHINE_TYPES,
  RADIUS_MILES,
  type BuildingType,
  type MachineType,
  type RadiusMiles,
  type ResolvedSearchParameters,
  type SearchRequest,
  type UserLocationPreference
} from '../types.js';

export const DEFAULT_MAX_RESULTS = 20;

const ZIP_CODE_PATTERN = /^\d{5}(-\d{4})?$/;

export function isRadius(value: number): value is RadiusMiles {
  return (RADIUS_MILES as readonly number[]).includes(value);
}

export const radiusSchema = z.number().refine(isRadius, { message: 'Unsupported radius' });

export function requireOperatorId(request: SearchRequest): string {
  const operatorId = request.operatorId?.trim();
  if (!operatorId) throw new MissingSearchParameterError('operator_id');
  return operatorId;
}

function resolveZipCode(request: SearchRequest): string {
  const zipCode = request.zipCode?.trim();
  if (!zipCode) throw new MissingSearchParameterError('zip_code');
  if (!ZIP_CODE_PATTERN.test(zipCode)) throw new InvalidZipCodeError(zipCode);
  return zipCode;
}

function resolveRadius(request: SearchRequest, preference: UserLocationPreference | null): RadiusMiles {
  if (request.radius !== undefined) {
    if (!isRadius(request.radius)) throw new InvalidRadiusError(request.radius);
    return request.radius;
  }
  if (preference) return preference.preferredRadius;
  throw new MissingSearchParameterError('radius');
}

function resolveMachineType(request: SearchRequest, preference: UserLocationPreference | null): MachineType {
  if (request.machineType !== undefined) {
    const parsed = parseMachineType(request.machineType);
    if (!parsed) throw new InvalidMachineTypeError(request.machineType);
    return parsed;
  }
  const preferred = preference ? MACHINE_TYPES.find((t) => preference.preferredMachineTypes.includes(t)) : undefined;
  if (preferred) return preferred;
  throw new MissingSearchParameterError('machine_type');
}

function resolveBuildingTypes(request: SearchRequest, preference: UserLocationPreference | null): BuildingType[] {
  const requested = request.buildingTypes ?? [];
  if (requested.length > 0) {
    const out: BuildingType[] = [];
    for (const raw of requested) {
      const value = raw.trim().toLowerCase();
      if (!isBuildingType(value)) throw new InvalidBuildingTypeError(raw);
      if (!out.includes(value)) out.push(value);
    }
    return out;
  }
  return preference ? [...preference.preferredBuildingTypes] : [];
}

function resolveMaxResults(request: SearchRequest): number {
  if (request.maxResults === undefined) return DEFAULT_MAX_RESULTS;
  if (!Number.isInteger(request.maxResults) || request.maxResults < 1) {
    throw new InvalidSearchParameterError('max_results', 'must be a positive integer');
  }
  return request.maxResults;
}

function resolveMinimumRating(request: SearchRequest, preference: UserLocationPreference | null): number {
  const value = request.minimumRating ?? preference?.minimumRating ?? 0;
  if (!Number.isFinite(value) || value < 0 || value > 5) {
    throw new InvalidSearchParameterError('minimum_rating', 'must be between 0 and 5');
  }
  return value;
}

/**
 * Checks every value the request supplies itself, so a malformed request is
 * rejected before any stored preference is read. Returns the operator id.
 */
export function validateSearchRequest(request: SearchRequest): string {
  const operatorId = requireOperatorId(request);
  resolveZipCode(request);
  if (request.radius !== undefined) resolveRadius(request, null);
  if (request.machineType !== undefined) resolveMachineType(request, null);
  resolveBuildingTypes(request, null);
  resolveMaxResults(request);
  if (request.minimumRating !== undefined) resolveMinimumRating(request, null);
  return operatorId;
}

/**
 * Combines the request with the operator's stored defaults. Explicit request
 * values always win; a value neither side supplies is a validation failure.
 */
export function resolveSearchParameters(
  request: SearchRequest,
  preference: UserLocationPreference | null
): ResolvedSearchParameters {
  return {
    operatorId: requireOperatorId(request),
    zipCode: resolveZipCode(request),
    radius: resolveRadius(request, preference),
    machineType: resolveMachineType(request, preference),
    buildingTypes: resolveBuildingTypes(request, preference),
    maxResults: resolveMaxResults(request),
    minimumRating: resolveMinimumRating(request, preference),
    requireContactInfo: request.requireContactInfo ?? preference?.requireContactInfo ?? false,
    excludedCategories: (preference?.excludedCategories ?? [])
      .map((c) => c.trim().toLowerCase())
      .filter((c) => c.length > 0)
  };
}
