import { Router, type RequestHandler } from 'express';
import type { Env } from '../env.js';
import { sendError } from '../http.js';
import { errorMessage } from '../records.js';
import { deleteSearch, getSearch, listRecentSearches } from '../repositories/searchRepository.js';

const RECENT_SEARCHES_LIMIT = 10;

export function createHistoryRouter(env: Env) {
  const router = Router();

  const requireHistory: RequestHandler = (_req, res, next) => {
    if (!env.SEARCH_HISTORY_ENABLED) {
      res.status(404).json({ error: 'HISTORY_DISABLED', message: 'Search history is not enabled' });
      return;
    }
    next();
  };

  router.use('/v1/searches', requireHistory);

  router.get('/v1/searches', async (_req, res) => {
    try {
      const searches = await listRecentSearches(RECENT_SEARCHES_LIMIT);
      return res.json({ searches });
    } catch (err) {
      return sendError(res, err, 'HISTORY_FAILED');
    }
  });

  router.get('/v1/searches/:searchId', async (req, res) => {
    try {
      const search = await getSearch(req.params.searchId);
      if (!search) return res.status(404).json({ error: 'NOT_FOUND' });

      const { result, ...record } = search;
      return res.json({ ...record, bounding_box: result.bounding_box, listings: result.listings });
    } catch (err) {
      return sendError(res, err, 'HISTORY_FAILED');
    }
  });

  router.delete('/v1/searches/:searchId', async (req, res) => {
    const searchId = req.params.searchId;
    try {
      await deleteSearch(searchId);
      return res.json({ ok: true });
    } catch (err) {
      console.error('[history] delete failed', { searchId, error: errorMessage(err) });
      return sendError(res, err, 'DELETE_FAILED');
    }
  });

  return router;
}
