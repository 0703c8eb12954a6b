import type { Coordinates } from '../types.js';

const EARTH_RADIUS_METERS = 6_371_000;

function toRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

/** Great-circle distance (haversine). */
export function distanceMeters(a: Coordinates, b: Coordinates): number {
  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

function jaro(s1: string, s2: string): number {
  if (s1 === s2) return 1;
  if (s1.length === 0 || s2.length === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(s1.length, s2.length) / 2) - 1);
  const s1Matches: boolean[] = new Array<boolean>(s1.length).fill(false);
  const s2Matches: boolean[] = new Array<boolean>(s2.length).fill(false);

  let matches = 0;
  for (let i = 0; i < s1.length; i++) {
    const start = Math.max(0, i - window);
    const end = Math.min(i + window + 1, s2.length);
    for (let j = start; j < end; j++) {
      if (s2Matches[j] || s1[i] !== s2[j]) continue;
      s1Matches[i] = true;
      s2Matches[j] = true;
      matches++;
      break;
    }
  }
  if (matches === 0) return 0;

  let transpositions = 0;
  let k = 0;
  for (let i = 0; i < s1.length; i++) {
    if (!s1Matches[i]) continue;
    while (!s2Matches[k]) k++;
    if (s1[i] !== s2[k]) transpositions++;
    k++;
  }

  return (matches / s1.length + matches / s2.length + (matches - transpositions / 2) / matches) / 3;
}

export function jaroWinkler(s1: string, s2: string): number {
  const score = jaro(s1, s2);
  let prefix = 0;
  for (let i = 0; i < Math.min(4, s1.length, s2.length); i++) {
    if (s1[i] !== s2[i]) break;
    prefix++;
  }
  return score + prefix * 0.1 * (1 - score);
}

const LEADING_WORDS = new Set(['the', 'a', 'an']);
const TRAILING_WORDS = new Set(['inc', 'llc', 'ltd', 'co', 'corp', 'company']);
const STOP_WORDS = new Set(['and', 'of', 'at', 'the', 'in', 'on']);

/** Lowercase, strip accents/punctuation and corporate suffixes. */
export function normalizeName(name: string): string {
  const words = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/['’`]/g, '')
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(' ')
    .filter((w) => w.length > 0);

  while (words.length > 1 && LEADING_WORDS.has(words[0] ?? '')) words.shift();
  while (words.length > 1 && TRAILING_WORDS.has(words[words.length - 1] ?? '')) words.pop();
  return words.join(' ');
}

function tokens(normalized: string): string[] {
  return normalized.split(' ').filter((w) => w.length > 1 && !STOP_WORDS.has(w));
}

/**
 * Name similarity in [0, 1]: the better of Jaro-Winkler over the whole
 * normalized name and a fuzzy token overlap (for reordered words).
 */
export function nameSimilarity(a: string, b: string): number {
  const n1 = normalizeName(a);
  const n2 = normalizeName(b);
  if (n1.length === 0 || n2.length === 0) return 0;
  if (n1 === n2) return 1;

  const whole = jaroWinkler(n1, n2);

  const t1 = tokens(n1);
  const t2 = tokens(n2);
  if (t1.length === 0 || t2.length === 0) return whole;

  const used = new Set<number>();
  let matched = 0;
  for (const token of t1) {
    let best = 0;
    let bestIdx = -1;
    t2.forEach((other, idx) => {
      if (used.has(idx)) return;
      const sim = jaroWinkler(token, other);
      if (sim > best) {
        best = sim;
        bestIdx = idx;
      }
    });
    if (bestIdx !== -1 && best >= 0.9) {
      matched++;
      used.add(bestIdx);
    }
  }

  return Math.max(whole, (2 * matched) / (t1.length + t2.length));
}
