import { z } from 'zod';
import { ExclusionExistsError } from '../errors.js';
import { getFirestore, nowTimestamp, timestampToIso } from '../firebase.js';
import { EXCLUSION_REASONS, type ExcludedLocation, type ExclusionReader, type ExclusionReason } from '../types.js';

const storedExclusionSchema = z.object({
  placeId: z.string().min(1),
  locationName: z.string().default(''),
  reason: z.enum(EXCLUSION_REASONS).catch('other'),
  notes: z.string().default(''),
  createdAt: z.unknown().optional()
});

function exclusionsCollection(operatorId: string) {
  return getFirestore().collection('operators').doc(operatorId).collection('exclusions');
}

// Place ids are provider-defined; keep them out of the document path syntax.
function docIdFor(placeId: string): string {
  return encodeURIComponent(placeId);
}

function toExclusion(operatorId: string, data: unknown): ExcludedLocation | null {
  const parsed = storedExclusionSchema.safeParse(data);
  if (!parsed.success) {
    console.warn('[exclusions] skipped malformed exclusion', { operatorId, error: parsed.error.message });
    return null;
  }
  const { createdAt, ...fields } = parsed.data;
  return { operatorId, ...fields, createdAt: timestampToIso(createdAt) ?? '' };
}

/** Newest first. */
export async function listExclusions(operatorId: string): Promise<ExcludedLocation[]> {
  const snap = await exclusionsCollection(operatorId).orderBy('createdAt', 'desc').get();
  return snap.docs.flatMap((d) => {
    const exclusion = toExclusion(operatorId, d.data());
    return exclusion ? [exclusion] : [];
  });
}

export async function listExcludedPlaceIds(operatorId: string): Promise<Set<string>> {
  const snap = await exclusionsCollection(operatorId).select('placeId').get();
  const ids = new Set<string>();
  for (const doc of snap.docs) {
    const placeId: unknown = doc.get('placeId');
    if (typeof placeId === 'string' && placeId) ids.add(placeId);
  }
  return ids;
}

export async function addExclusion(params: {
  operatorId: string;
  placeId: string;
  locationName: string;
  reason: ExclusionReason;
  notes: string;
}): Promise<ExcludedLocation> {
  const db = getFirestore();
  const ref = exclusionsCollection(params.operatorId).doc(docIdFor(params.placeId));
  const now = nowTimestamp();

  await db.runTransaction(async (tx) => {
    const snap = await tx.get(ref);
    if (snap.exists) throw new ExclusionExistsError(params.placeId);
    tx.set(ref, {
      placeId: params.placeId,
      locationName: params.locationName,
      reason: params.reason,
      notes: params.notes,
      createdAt: now
    });
  });

  return { ...params, createdAt: now.toDate().toISOString() };
}

export async function countExclusions(operatorId: string): Promise<number> {
  const snap = await exclusionsCollection(operatorId).count().get();
  return snap.data().count;
}

export interface ExclusionTarget {
  placeId: string;
  locationName: string;
}

/**
 * Excludes every target the operator has not excluded yet, in one transaction.
 * Existing exclusions are left untouched. Returns how many were created.
 */
export async function addExclusions(params: {
  operatorId: string;
  targets: readonly ExclusionTarget[];
  reason: ExclusionReason;
  notes: string;
}): Promise<number> {
  const unique = new Map<string, ExclusionTarget>();
  for (const target of params.targets) {
    if (!unique.has(target.placeId)) unique.set(target.placeId, target);
  }
  const targets = [...unique.values()];
  if (targets.length === 0) return 0;

  const db = getFirestore();
  const collection = exclusionsCollection(params.operatorId);
  const refs = targets.map((t) => collection.doc(docIdFor(t.placeId)));
  const now = nowTimestamp();

  return db.runTransaction(async (tx) => {
    const snaps = await tx.getAll(...refs);
    let created = 0;
    snaps.forEach((snap, i) => {
      const target = targets[i];
      if (snap.exists || !target) return;
      tx.set(snap.ref, {
        placeId: target.placeId,
        locationName: target.locationName,
        reason: params.reason,
        notes: params.notes,
        createdAt: now
      });
      created++;
    });
    return created;
  });
}

/** Returns false when there was nothing to remove. */
export async function removeExclusion(operatorId: string, placeId: string): Promise<boolean> {
  const db = getFirestore();
  const ref = exclusionsCollection(operatorId).doc(docIdFor(placeId));

  return db.runTransaction(async (tx) => {
    const snap = await tx.get(ref);
    if (!snap.exists) return false;
    tx.delete(ref);
    return true;
  });
}

export const firestoreExclusionReader: ExclusionReader = {
  listExcludedIds: listExcludedPlaceIds
};
