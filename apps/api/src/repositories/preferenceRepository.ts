import { z } from 'zod';
import { StoreUnavailableError } from '../errors.js';
import { getFirestore, nowTimestamp, timestampToIso } from '../firebase.js';
import { radiusSchema } from '../locator/parameters.js';
import {
  BUILDING_TYPES,
  MACHINE_TYPES,
  type PreferenceReader,
  type UserLocationPreference
} from '../types.js';

const COLLECTION = 'locationPreferences';

// Fields written by older clients may be missing; they fall back to the defaults below.
const storedPreferenceSchema = z.object({
  preferredMachineTypes: z.array(z.enum(MACHINE_TYPES)).default([]),
  preferredRadius: radiusSchema.default(10),
  preferredBuildingTypes: z.array(z.enum(BUILDING_TYPES)).default([]),
  excludedCategories: z.array(z.string()).default([]),
  minimumRating: z.number().min(0).max(5).default(0),
  requireContactInfo: z.boolean().default(false),
  createdAt: z.unknown().optional(),
  updatedAt: z.unknown().optional()
});

export type PreferenceUpdate = Partial<Omit<UserLocationPreference, 'operatorId' | 'createdAt' | 'updatedAt'>>;

function toPreference(operatorId: string, data: unknown): UserLocationPreference {
  const parsed = storedPreferenceSchema.safeParse(data);
  if (!parsed.success) {
    throw new StoreUnavailableError('preferences', `malformed preference for ${operatorId}: ${parsed.error.message}`);
  }

  const { createdAt, updatedAt, ...fields } = parsed.data;
  return {
    operatorId,
    ...fields,
    createdAt: timestampToIso(createdAt),
    updatedAt: timestampToIso(updatedAt)
  };
}

export async function getLocationPreference(operatorId: string): Promise<UserLocationPreference | null> {
  const db = getFirestore();
  const snap = await db.collection(COLLECTION).doc(operatorId).get();
  if (!snap.exists) return null;
  return toPreference(operatorId, snap.data());
}

/** Applies a partial update, creating the preference with defaults when the operator has none. */
export async function upsertLocationPreference(
  operatorId: string,
  update: PreferenceUpdate
): Promise<UserLocationPreference> {
  const db = getFirestore();
  const ref = db.collection(COLLECTION).doc(operatorId);

  return db.runTransaction(async (tx) => {
    const snap = await tx.get(ref);
    const now = nowTimestamp();
    const current = snap.exists ? snap.data() : { createdAt: now };

    const next = { ...current, ...update, updatedAt: now };
    tx.set(ref, next);
    return toPreference(operatorId, next);
  });
}

export const firestorePreferenceReader: PreferenceReader = {
  getPreference: getLocationPreference
};
