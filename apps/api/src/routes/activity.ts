import { Router } from 'express';
import { recentWindowStart, summarizeSearches } from '../locator/activity.js';
import { countExclusions } from '../repositories/exclusionRepository.js';
import { listAllOperatorSearches, listRecentLocations } from '../repositories/searchHistoryRepository.js';
import { sendError, toRecentLocationResponse, toStatsResponse } from './serializers.js';

const router = Router();

router.get('/v1/operators/:operatorId/stats', async (req, res) => {
  const { operatorId } = req.params;
  try {
    const [searches, excluded] = await Promise.all([listAllOperatorSearches(operatorId), countExclusions(operatorId)]);
    return res.json({ stats: toStatsResponse(summarizeSearches(searches, excluded, new Date())) });
  } catch (err) {
    return sendError(res, err, 'STATS_READ_FAILED');
  }
});

router.get('/v1/operators/:operatorId/locations/recent', async (req, res) => {
  try {
    const recent = await listRecentLocations(req.params.operatorId, recentWindowStart(new Date()));
    return res.json({ locations: recent.map(toRecentLocationResponse) });
  } catch (err) {
    return sendError(res, err, 'HISTORY_READ_FAILED');
  }
});

export default router;
