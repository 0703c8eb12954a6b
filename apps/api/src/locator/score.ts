import type {
  CandidateLocation,
  ContactCompleteness,
  FootTraffic,
  OperationalStatus,
  ScoredCandidate
} from '../types.js';

export interface Threshold {
  min: number;
  points: number;
}

export interface ScoringWeights {
  contact: Record<ContactCompleteness, number>;
  /** Checked in order; the first threshold the value reaches applies. */
  reviews: readonly Threshold[];
  rating: readonly Threshold[];
  footTraffic: Record<FootTraffic, number>;
  status: Record<OperationalStatus, number>;
}

// Changing any value reorders the results of searches already on record.
export const DEFAULT_SCORING_WEIGHTS = {
  contact: { both: 50, phone_only: 30, email_only: 20, none: 10 },
  reviews: [
    { min: 100, points: 20 },
    { min: 50, points: 15 },
    { min: 10, points: 10 }
  ],
  rating: [
    { min: 4.5, points: 15 },
    { min: 4.0, points: 10 },
    { min: 3.5, points: 5 }
  ],
  footTraffic: { very_high: 20, high: 15, moderate: 10, low: 5, very_low: 0 },
  status: { operational: 10, closed_temporarily: 5, unknown: 5, closed_permanently: 0 }
} as const satisfies ScoringWeights;

function present(value: string | undefined): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

export function classifyContact(candidate: Pick<CandidateLocation, 'phone' | 'email'>): ContactCompleteness {
  const phone = present(candidate.phone);
  const email = present(candidate.email);
  if (phone && email) return 'both';
  if (phone) return 'phone_only';
  if (email) return 'email_only';
  return 'none';
}

function thresholdPoints(value: number | undefined, thresholds: readonly Threshold[]): number {
  if (value === undefined) return 0;
  return thresholds.find((t) => value >= t.min)?.points ?? 0;
}

export function scoreCandidate(candidate: CandidateLocation, weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS): number {
  return (
    weights.contact[classifyContact(candidate)] +
    thresholdPoints(candidate.reviewCount, weights.reviews) +
    thresholdPoints(candidate.rating, weights.rating) +
    (candidate.footTraffic ? weights.footTraffic[candidate.footTraffic] : 0) +
    weights.status[candidate.operationalStatus]
  );
}

export function scoreCandidates(
  candidates: readonly CandidateLocation[],
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): ScoredCandidate[] {
  return candidates.map((candidate) => ({
    ...candidate,
    priorityScore: scoreCandidate(candidate, weights),
    contactCompleteness: classifyContact(candidate)
  }));
}
