import type { CandidateLocation, FootTraffic } from '../types.js';

const HIGH_TRAFFIC_CATEGORIES = [
  'gas_station',
  'fuel',
  'convenience',
  'grocery',
  'supermarket',
  'shopping_mall',
  'hospital',
  'school',
  'university',
  'restaurant',
  'fast_food',
  'transit_station',
  'airport'
];

const MEDIUM_TRAFFIC_CATEGORIES = ['office', 'hotel', 'gym', 'fitness', 'cafe', 'coffee', 'bank', 'laundry'];

function ratingPoints(rating: number | undefined): number {
  if (rating === undefined) return 0;
  if (rating >= 4.5) return 15;
  if (rating >= 4.0) return 10;
  if (rating >= 3.5) return 5;
  return 0;
}

function reviewPoints(reviewCount: number | undefined): number {
  if (reviewCount === undefined) return 0;
  if (reviewCount >= 500) return 20;
  if (reviewCount >= 100) return 15;
  if (reviewCount >= 50) return 10;
  if (reviewCount >= 10) return 5;
  return 0;
}

function categoryPoints(candidate: CandidateLocation): number {
  const haystack = `${candidate.category} ${candidate.detailedCategory}`.toLowerCase();
  if (HIGH_TRAFFIC_CATEGORIES.some((c) => haystack.includes(c))) return 15;
  if (MEDIUM_TRAFFIC_CATEGORIES.some((c) => haystack.includes(c))) return 8;
  return 0;
}

export function footTrafficPoints(candidate: CandidateLocation): number {
  return (
    ratingPoints(candidate.rating) +
    reviewPoints(candidate.reviewCount) +
    categoryPoints(candidate) +
    (candidate.operationalStatus === 'operational' ? 10 : 0)
  );
}

/** Coarse foot-traffic class from popularity, venue kind and status. */
export function estimateFootTraffic(candidate: CandidateLocation): FootTraffic {
  const points = footTrafficPoints(candidate);
  if (points >= 40) return 'very_high';
  if (points >= 25) return 'high';
  if (points >= 15) return 'moderate';
  if (points >= 5) return 'low';
  return 'very_low';
}

export function withFootTraffic(candidate: CandidateLocation): CandidateLocation {
  if (candidate.footTraffic) return candidate;
  return { ...candidate, footTraffic: estimateFootTraffic(candidate) };
}
