import { Router } from 'express';
import { z } from 'zod';
import { addExclusion, addExclusions, listExclusions, removeExclusion } from '../repositories/exclusionRepository.js';
import { EXCLUSION_REASONS } from '../types.js';
import { sendError, toExclusionResponse } from './serializers.js';

const router = Router();

const exclusionBodySchema = z.object({
  place_id: z.string().trim().min(1).max(300),
  location_name: z.string().trim().max(200).default(''),
  reason: z.enum(EXCLUSION_REASONS).default('other'),
  notes: z.string().max(2000).default('')
});

const bulkExclusionBodySchema = z.object({
  locations: z
    .array(
      z.object({
        place_id: z.string().trim().min(1).max(300),
        location_name: z.string().trim().max(200).default('')
      })
    )
    .min(1)
    .max(100),
  reason: z.enum(EXCLUSION_REASONS).default('other'),
  notes: z.string().max(2000).default('')
});

router.get('/v1/operators/:operatorId/exclusions', async (req, res) => {
  try {
    const exclusions = await listExclusions(req.params.operatorId);
    return res.json({ exclusions: exclusions.map(toExclusionResponse) });
  } catch (err) {
    return sendError(res, err, 'EXCLUSIONS_READ_FAILED');
  }
});

router.post('/v1/operators/:operatorId/exclusions', async (req, res) => {
  const parsed = exclusionBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  try {
    const exclusion = await addExclusion({
      operatorId: req.params.operatorId,
      placeId: parsed.data.place_id,
      locationName: parsed.data.location_name,
      reason: parsed.data.reason,
      notes: parsed.data.notes
    });
    return res.status(201).json({ exclusion: toExclusionResponse(exclusion) });
  } catch (err) {
    return sendError(res, err, 'EXCLUSIONS_WRITE_FAILED');
  }
});

router.post('/v1/operators/:operatorId/exclusions/bulk', async (req, res) => {
  const parsed = bulkExclusionBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  const { locations, reason, notes } = parsed.data;
  try {
    const created = await addExclusions({
      operatorId: req.params.operatorId,
      targets: locations.map((l) => ({ placeId: l.place_id, locationName: l.location_name })),
      reason,
      notes
    });
    return res.json({
      message: `${created} locations excluded`,
      created,
      total_processed: locations.length
    });
  } catch (err) {
    return sendError(res, err, 'EXCLUSIONS_WRITE_FAILED');
  }
});

router.delete('/v1/operators/:operatorId/exclusions/:placeId', async (req, res) => {
  try {
    const removed = await removeExclusion(req.params.operatorId, req.params.placeId);
    if (!removed) return res.status(404).json({ error: 'NOT_FOUND' });
    return res.json({ ok: true });
  } catch (err) {
    return sendError(res, err, 'EXCLUSIONS_WRITE_FAILED');
  }
});

export default router;
