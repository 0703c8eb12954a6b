import { Router } from 'express';
import { z } from 'zod';
import { radiusSchema } from '../locator/parameters.js';
import {
  getLocationPreference,
  upsertLocationPreference,
  type PreferenceUpdate
} from '../repositories/preferenceRepository.js';
import { BUILDING_TYPES, MACHINE_TYPES } from '../types.js';
import { sendError, toPreferenceResponse } from './serializers.js';

const router = Router();

const preferenceBodySchema = z
  .object({
    preferred_machine_types: z.array(z.enum(MACHINE_TYPES)),
    preferred_radius: radiusSchema,
    preferred_building_types: z.array(z.enum(BUILDING_TYPES)),
    excluded_categories: z.array(z.string().trim().min(1).max(100)).max(50),
    minimum_rating: z.number().min(0).max(5),
    require_contact_info: z.boolean()
  })
  .partial()
  .strict();

router.get('/v1/operators/:operatorId/preferences', async (req, res) => {
  try {
    const preference = await getLocationPreference(req.params.operatorId);
    return res.json({ preferences: preference ? toPreferenceResponse(preference) : null });
  } catch (err) {
    return sendError(res, err, 'PREFERENCES_READ_FAILED');
  }
});

router.put('/v1/operators/:operatorId/preferences', async (req, res) => {
  const parsed = preferenceBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  const body = parsed.data;
  const update: PreferenceUpdate = {};
  if (body.preferred_machine_types) update.preferredMachineTypes = [...new Set(body.preferred_machine_types)];
  if (body.preferred_radius !== undefined) update.preferredRadius = body.preferred_radius;
  if (body.preferred_building_types) update.preferredBuildingTypes = [...new Set(body.preferred_building_types)];
  if (body.excluded_categories) update.excludedCategories = body.excluded_categories.map((c) => c.toLowerCase());
  if (body.minimum_rating !== undefined) update.minimumRating = body.minimum_rating;
  if (body.require_contact_info !== undefined) update.requireContactInfo = body.require_contact_info;

  try {
    const preference = await upsertLocationPreference(req.params.operatorId, update);
    return res.json({ preferences: toPreferenceResponse(preference) });
  } catch (err) {
    return sendError(res, err, 'PREFERENCES_WRITE_FAILED');
  }
});

export default router;
