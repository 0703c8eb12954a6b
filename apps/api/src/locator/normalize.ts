import { MalformedRecordError, errorMessage } from '../errors.js';
import { normalizeGooglePlace } from '../providers/googlePlaces.js';
import { normalizeOverpassElement } from '../providers/overpass.js';
import type { CandidateLocation, ProviderName } from '../types.js';

/** Share of one provider's records that may be malformed before it is worth a warning. */
export const CORRUPTION_THRESHOLD = 0.25;

export function normalizeRecord(provider: ProviderName, raw: unknown): CandidateLocation {
  switch (provider) {
    case 'overpass':
      return normalizeOverpassElement(raw);
    case 'google_places':
      return normalizeGooglePlace(raw);
  }
}

export interface NormalizedBatch {
  provider: ProviderName;
  candidates: CandidateLocation[];
  malformed: number;
}

/**
 * Normalizes every record of one provider. Malformed records are dropped and
 * counted; anything else thrown by a normalizer is a bug and propagates.
 */
export function normalizeBatch(provider: ProviderName, records: readonly unknown[]): NormalizedBatch {
  const candidates: CandidateLocation[] = [];
  const reasons: string[] = [];

  for (const raw of records) {
    try {
      candidates.push(normalizeRecord(provider, raw));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      reasons.push(errorMessage(err));
    }
  }

  if (records.length > 0 && reasons.length / records.length > CORRUPTION_THRESHOLD) {
    console.warn('[normalize] dropped malformed records', {
      provider,
      malformed: reasons.length,
      total: records.length,
      sample: reasons.slice(0, 3)
    });
  }

  return { provider, candidates, malformed: reasons.length };
}
