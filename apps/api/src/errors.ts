import { RADIUS_MILES, type ProviderName } from './types.js';

export class LocatorError extends Error {
  public readonly code: string;
  public readonly status: number;

  constructor(message: string, code: string, status = 500) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.status = status;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.code, message: this.message };
  }
}

/** Request validation failures. Fatal to the call and reported with the offending field. */
export class SearchValidationError extends LocatorError {
  public readonly field: string;

  constructor(message: string, code: string, field: string) {
    super(message, code, 400);
    this.field = field;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.code, field: this.field, message: this.message };
  }
}

export class MissingSearchParameterError extends SearchValidationError {
  constructor(field: string) {
    super(`Missing search parameter: ${field}`, 'MISSING_SEARCH_PARAMETER', field);
  }
}

export class InvalidRadiusError extends SearchValidationError {
  constructor(radius: unknown) {
    super(`Invalid radius: ${String(radius)}. Use one of ${RADIUS_MILES.join(', ')} miles.`, 'INVALID_RADIUS', 'radius');
  }
}

export class InvalidMachineTypeError extends SearchValidationError {
  constructor(machineType: unknown) {
    super(`Invalid machine type: ${String(machineType)}`, 'INVALID_MACHINE_TYPE', 'machine_type');
  }
}

export class InvalidBuildingTypeError extends SearchValidationError {
  constructor(buildingType: unknown) {
    super(`Invalid building type: ${String(buildingType)}`, 'INVALID_BUILDING_TYPE', 'building_types');
  }
}

export class InvalidZipCodeError extends SearchValidationError {
  constructor(zipCode: string) {
    super(`Invalid ZIP code: ${zipCode}`, 'INVALID_ZIP_CODE', 'zip_code');
  }
}

export class InvalidSearchParameterError extends SearchValidationError {
  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`, 'INVALID_SEARCH_PARAMETER', field);
  }
}

export class MalformedRecordError extends LocatorError {
  public readonly provider: ProviderName;

  constructor(provider: ProviderName, reason: string) {
    super(`Malformed ${provider} record: ${reason}`, 'MALFORMED_RECORD', 502);
    this.provider = provider;
  }
}

export class ProviderUnavailableError extends LocatorError {
  public readonly provider: string;

  constructor(provider: string, reason: string) {
    super(reason, 'PROVIDER_UNAVAILABLE', 503);
    this.provider = provider;
  }
}

export class PersistenceFailureError extends LocatorError {
  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, 'PERSISTENCE_FAILURE', 500);
  }
}

export class StoreUnavailableError extends LocatorError {
  constructor(store: string, cause: unknown) {
    super(`${store} unavailable: ${errorMessage(cause)}`, 'STORE_UNAVAILABLE', 503);
  }
}

export class ExclusionExistsError extends LocatorError {
  constructor(placeId: string) {
    super(`Location ${placeId} is already excluded`, 'EXCLUSION_EXISTS', 409);
  }
}

export class SearchCancelledError extends LocatorError {
  constructor() {
    super('Search cancelled by caller', 'SEARCH_CANCELLED', 499);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
