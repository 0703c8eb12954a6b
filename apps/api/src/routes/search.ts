import { Router } from 'express';
import { z } from 'zod';
import { getEnv } from '../env.js';
import { SearchCancelledError } from '../errors.js';
import { searchLocations, type SearchDependencies } from '../locator/search.js';
import { googlePlacesProvider } from '../providers/googlePlaces.js';
import { nominatimGeocoder } from '../providers/nominatim.js';
import { overpassProvider } from '../providers/overpass.js';
import { firestoreExclusionReader } from '../repositories/exclusionRepository.js';
import { firestorePreferenceReader } from '../repositories/preferenceRepository.js';
import {
  firestoreHistoryWriter,
  getSearchHistory,
  listOperatorSearches
} from '../repositories/searchHistoryRepository.js';
import { EXPORT_FORMATS, exportSearch } from '../searchExport.js';
import { sendError, toLocationResponse, toSearchHistoryResponse, toSearchResponse } from './serializers.js';

const router = Router();

// Shape only; catalog values and ranges are checked by the engine so each
// failure is reported with its own code and field.
const searchBodySchema = z.object({
  operator_id: z.string().optional(),
  zip_code: z.string().optional(),
  radius: z.number().optional(),
  machine_type: z.string().optional(),
  building_types: z.array(z.string()).optional(),
  max_results: z.number().optional(),
  minimum_rating: z.number().optional(),
  require_contact_info: z.boolean().optional()
});

const exportQuerySchema = z.object({
  format: z.enum(EXPORT_FORMATS).default('csv')
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10)
});

function searchDependencies(): SearchDependencies {
  const env = getEnv();
  return {
    geocoder: nominatimGeocoder,
    providers: [overpassProvider, googlePlacesProvider],
    exclusions: firestoreExclusionReader,
    preferences: firestorePreferenceReader,
    history: firestoreHistoryWriter,
    config: {
      providerTimeoutMs: env.PROVIDER_TIMEOUT_MS,
      includePermanentlyClosed: env.INCLUDE_PERMANENTLY_CLOSED
    }
  };
}

router.post('/v1/locations/search', async (req, res) => {
  const parsed = searchBodySchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  // Client went away before we answered: stop the provider calls.
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });

  const body = parsed.data;
  try {
    const result = await searchLocations(
      {
        operatorId: body.operator_id,
        zipCode: body.zip_code,
        radius: body.radius,
        machineType: body.machine_type,
        buildingTypes: body.building_types,
        maxResults: body.max_results,
        minimumRating: body.minimum_rating,
        requireContactInfo: body.require_contact_info
      },
      searchDependencies(),
      controller.signal
    );
    return res.json(toSearchResponse(result));
  } catch (err) {
    if (err instanceof SearchCancelledError) {
      console.info('[search] cancelled by client', { operatorId: body.operator_id });
    }
    return sendError(res, err, 'SEARCH_FAILED');
  }
});

router.get('/v1/operators/:operatorId/searches', async (req, res) => {
  const parsed = historyQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  try {
    const searches = await listOperatorSearches(req.params.operatorId, parsed.data.limit);
    return res.json({ searches: searches.map(toSearchHistoryResponse) });
  } catch (err) {
    return sendError(res, err, 'HISTORY_READ_FAILED');
  }
});

router.get('/v1/searches/:searchId', async (req, res) => {
  try {
    const search = await getSearchHistory(req.params.searchId);
    if (!search) return res.status(404).json({ error: 'NOT_FOUND' });
    return res.json({
      ...toSearchHistoryResponse(search),
      locations: search.locations.map(toLocationResponse)
    });
  } catch (err) {
    return sendError(res, err, 'HISTORY_READ_FAILED');
  }
});

router.get('/v1/searches/:searchId/export', async (req, res) => {
  const parsed = exportQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
  }

  try {
    const search = await getSearchHistory(req.params.searchId);
    if (!search) return res.status(404).json({ error: 'NOT_FOUND' });
    const exported = await exportSearch(search, parsed.data.format);
    res.setHeader('Content-Type', exported.mimeType);
    res.setHeader('Content-Disposition', `attachment; filename="${exported.filename}"`);
    return res.send(exported.data);
  } catch (err) {
    return sendError(res, err, 'EXPORT_FAILED');
  }
});

export default router;
