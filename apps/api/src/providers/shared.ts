import { ProviderUnavailableError } from '../errors.js';

export const METERS_PER_MILE = 1609.34;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  if (typeof v !== 'string') return undefined;
  const trimmed = v.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function getNumeric(obj: Record<string, unknown>, key: string): number | undefined {
  const v = obj[key];

  if (typeof v === 'number') {
    return Number.isFinite(v) ? v : undefined;
  }

  if (typeof v === 'string') {
    const trimmed = v.trim();
    if (trimmed.length === 0) return undefined;
    const n = Number(trimmed.replace(/,/g, ''));
    return Number.isFinite(n) ? n : undefined;
  }

  return undefined;
}

export function getNested(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const v = obj[key];
  return isRecord(v) ? v : undefined;
}

export function getStringArray(obj: Record<string, unknown>, key: string): string[] {
  const v = obj[key];
  if (!Array.isArray(v)) return [];
  return v.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/** Coordinates are kept at six decimal places (about 11 cm). */
export function roundCoordinate(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function isValidLatitude(value: number): boolean {
  return value >= -90 && value <= 90;
}

export function isValidLongitude(value: number): boolean {
  return value >= -180 && value <= 180;
}

export async function requestJson(provider: string, url: URL, init: RequestInit): Promise<unknown> {
  const res = await fetch(url, init);

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new ProviderUnavailableError(provider, `${provider} request failed (${res.status}): ${text}`.trim());
  }

  return (await res.json()) as unknown;
}
