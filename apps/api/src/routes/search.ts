import { Router } from 'express';
import { z } from 'zod';
import type { Env } from '../env.js';
import { InvalidParametersError } from '../errors.js';
import { boundingBox, MAX_CORRECTED_LATITUDE } from '../geo.js';
import { isoDateSchema, queryNumber, sendError } from '../http.js';
import { searchStays } from '../providers/airbnb.js';
import { errorMessage } from '../records.js';
import { createSearchWithResults, findRecentSearchByQueryKey } from '../repositories/searchRepository.js';
import { searchComps, type CompsQuery } from '../services/comps.js';
import type { BoxPolicy } from '../types.js';

const RECENT_SEARCH_CACHE_MAX_AGE_MS = 15 * 60 * 1000;
const DEFAULT_RADIUS_MI = 5;
const MAX_RADIUS_MI = 100;

function makeSearchQuerySchema(policy: BoxPolicy) {
  const maxLat = policy === 'corrected' ? MAX_CORRECTED_LATITUDE : 90;

  return z
    .object({
      lat: queryNumber(z.coerce.number().min(-maxLat).max(maxLat)),
      lon: queryNumber(z.coerce.number().min(-180).max(180)),
      radius: queryNumber(z.coerce.number().positive().max(MAX_RADIUS_MI).default(DEFAULT_RADIUS_MI)),
      check_in: isoDateSchema.optional(),
      check_out: isoDateSchema.optional(),
      price_min: queryNumber(z.coerce.number().int().nonnegative().optional()),
      price_max: queryNumber(z.coerce.number().int().nonnegative().optional())
    })
    .superRefine((q, ctx) => {
      if ((q.check_in === undefined) !== (q.check_out === undefined)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['check_out'], message: 'check_in and check_out go together' });
      } else if (q.check_in && q.check_out && q.check_out <= q.check_in) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['check_out'], message: 'check_out must be after check_in' });
      }
      if (q.price_min !== undefined && q.price_max !== undefined && q.price_min > q.price_max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['price_max'], message: 'price_max must be >= price_min' });
      }
    });
}

type SearchQuery = z.infer<ReturnType<typeof makeSearchQuerySchema>>;

export function makeCompsQueryKey(q: SearchQuery, policy: BoxPolicy): string {
  return [
    `comps:${q.lat.toFixed(4)},${q.lon.toFixed(4)}`,
    `r:${q.radius}`,
    `dates:${q.check_in ?? ''}-${q.check_out ?? ''}`,
    `price:${q.price_min ?? ''}-${q.price_max ?? ''}`,
    `box:${policy}`
  ].join('|');
}

export function createSearchRouter(env: Env) {
  const router = Router();
  const schema = makeSearchQuerySchema(env.BBOX_POLICY);
  const deps = { policy: env.BBOX_POLICY, searchStays };

  router.get('/v1/search', async (req, res) => {
    const parsed = schema.safeParse(req.query);
    if (!parsed.success) {
      return sendError(res, new InvalidParametersError(parsed.error.flatten()));
    }

    const q = parsed.data;
    const query: CompsQuery = {
      center: { lat: q.lat, lon: q.lon },
      radiusMi: q.radius,
      filters: { checkIn: q.check_in, checkOut: q.check_out, priceMin: q.price_min, priceMax: q.price_max }
    };

    try {
      if (!env.SEARCH_HISTORY_ENABLED) {
        return res.json(await searchComps(query, deps));
      }

      const queryKey = makeCompsQueryKey(q, env.BBOX_POLICY);
      const cached = await findRecentSearchByQueryKey({ queryKey, maxAgeMs: RECENT_SEARCH_CACHE_MAX_AGE_MS });
      if (cached) {
        // The key rounds the center, so echo this request's point and box.
        res.setHeader('X-Cache', 'HIT');
        return res.json({
          searchId: cached.searchId,
          ...cached.result,
          center: query.center,
          radius_mi: query.radiusMi,
          bounding_box: boundingBox(query.center, query.radiusMi, env.BBOX_POLICY),
          cached: true
        });
      }

      const result = await searchComps(query, deps);
      const { searchId } = await createSearchWithResults({
        query: `${q.lat},${q.lon} within ${q.radius} mi`,
        queryKey,
        result
      });

      return res.json({ searchId, ...result });
    } catch (err) {
      console.error('[search] comps search failed', {
        center: query.center,
        radiusMi: query.radiusMi,
        error: errorMessage(err)
      });
      return sendError(res, err, 'SEARCH_FAILED');
    }
  });

  return router;
}
