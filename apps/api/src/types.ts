export const RADIUS_MILES = [5, 10, 15, 20, 25, 30, 40] as const;
export type RadiusMiles = (typeof RADIUS_MILES)[number];

export const MACHINE_TYPES = [
  'snack_machine',
  'drink_machine',
  'combo_machine',
  'healthy_snack_machine',
  'fresh_food_machine',
  'hot_food_kiosk',
  'ice_cream_machine',
  'coffee_machine',
  'claw_machine',
  'toy_machine'
] as const;
export type MachineType = (typeof MACHINE_TYPES)[number];

export const BUILDING_TYPES = [
  'churches',
  'factories',
  'hotels',
  'rehabilitation_centers',
  'gyms',
  'ymcas',
  'hospitals',
  'towing_companies',
  'laundromats',
  'office_buildings',
  'industrial_facilities',
  'daycares',
  'restaurants',
  'fast_food',
  'barbershops',
  'gas_stations',
  'coffee_shops',
  'convenience_stores',
  'schools',
  'universities',
  'libraries',
  'parks',
  'attractions',
  'bars',
  'ice_cream_shops',
  'car_washes'
] as const;
export type BuildingType = (typeof BUILDING_TYPES)[number];

export const PROVIDER_NAMES = ['overpass', 'google_places'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export const OPERATIONAL_STATUSES = ['operational', 'closed_temporarily', 'closed_permanently', 'unknown'] as const;
export type OperationalStatus = (typeof OPERATIONAL_STATUSES)[number];

export const FOOT_TRAFFIC_LEVELS = ['very_low', 'low', 'moderate', 'high', 'very_high'] as const;
export type FootTraffic = (typeof FOOT_TRAFFIC_LEVELS)[number];

export type ContactCompleteness = 'both' | 'phone_only' | 'email_only' | 'none';

export const EXCLUSION_REASONS = ['already_contacted', 'not_interested', 'poor_location', 'closed', 'other'] as const;
export type ExclusionReason = (typeof EXCLUSION_REASONS)[number];

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface CandidateLocation extends Coordinates {
  provider: ProviderName;
  providerId: string; // osm:<type>:<id> or the Google place id
  placeId?: string; // commercial place id, when known

  name: string;
  category: string;
  detailedCategory: string;
  address: string;

  phone?: string;
  email?: string;
  website?: string;
  mapsUrl?: string;

  rating?: number;
  reviewCount?: number;
  operationalStatus: OperationalStatus;
  footTraffic?: FootTraffic;

  buildingTypes: BuildingType[];
  sources: ProviderName[];
}

export interface ScoredCandidate extends CandidateLocation {
  priorityScore: number;
  contactCompleteness: ContactCompleteness;
}

/** Raw search input as received from the caller, before defaulting and validation. */
export interface SearchRequest {
  operatorId?: string;
  zipCode?: string;
  radius?: number;
  machineType?: string;
  buildingTypes?: string[];
  maxResults?: number;
  minimumRating?: number;
  requireContactInfo?: boolean;
}

export interface ResolvedSearchParameters {
  operatorId: string;
  zipCode: string;
  radius: RadiusMiles;
  machineType: MachineType;
  buildingTypes: BuildingType[];
  maxResults: number;
  minimumRating: number;
  requireContactInfo: boolean;
  excludedCategories: string[];
}

export interface UserLocationPreference {
  operatorId: string;
  preferredMachineTypes: MachineType[];
  preferredRadius: RadiusMiles;
  preferredBuildingTypes: BuildingType[];
  excludedCategories: string[];
  minimumRating: number;
  requireContactInfo: boolean;
  createdAt?: string; // ISO
  updatedAt?: string; // ISO
}

export interface ExcludedLocation {
  operatorId: string;
  placeId: string;
  locationName: string;
  reason: ExclusionReason;
  notes: string;
  createdAt: string; // ISO
}

export type ProviderErrors = Partial<Record<ProviderName | 'nominatim', string>>;

export interface SearchHistoryRecord {
  operatorId: string;
  zipCode: string;
  radius: RadiusMiles;
  machineType: MachineType;
  buildingTypesFilter: BuildingType[];
  resultCount: number;
  searchParameters: {
    center: Coordinates | null;
    maxResults: number;
    resultLimit: number;
    minimumRating: number;
    requireContactInfo: boolean;
    excludedCategories: string[];
    providerErrors: ProviderErrors;
    /** Providers that searched a smaller circle than requested, with the radius they used. */
    providerRadiusMeters: Partial<Record<ProviderName, number>>;
  };
  createdAt: string; // ISO
}

export interface SearchResult {
  searchId: string | null;
  locations: ScoredCandidate[];
  resultCount: number;
  providerErrors: ProviderErrors;
  warnings: string[];
  parameters: ResolvedSearchParameters;
}

export interface ProviderQuery {
  center: Coordinates;
  radiusMeters: number;
  buildingTypes: BuildingType[];
}

/** A geographic data source queried for raw, provider-native records. */
export interface LocationProvider {
  readonly name: ProviderName;
  /** Largest circle the provider accepts; larger queries are narrowed to it. */
  readonly maxRadiusMeters?: number;
  search(query: ProviderQuery, signal: AbortSignal): Promise<unknown[]>;
}

export interface Geocoder {
  geocode(zipCode: string, signal: AbortSignal): Promise<Coordinates | null>;
}

export interface ExclusionReader {
  listExcludedIds(operatorId: string): Promise<Set<string>>;
}

export interface PreferenceReader {
  getPreference(operatorId: string): Promise<UserLocationPreference | null>;
}

export interface HistoryWriter {
  recordSearch(record: SearchHistoryRecord, locations: ScoredCandidate[]): Promise<{ searchId: string }>;
}
