import { Router } from 'express';
import { z } from 'zod';
import { InvalidParametersError } from '../errors.js';
import { isoDateSchema, queryNumber, sendError } from '../http.js';
import { errorMessage } from '../records.js';
import { getListingSnapshot } from '../services/listing.js';

const calendarQuerySchema = z
  .object({
    room: z.string().regex(/^\d{1,20}$/, 'Expected a numeric listing id'),
    check_in: isoDateSchema,
    check_out: isoDateSchema,
    adults: queryNumber(z.coerce.number().int().min(1).max(16).default(2))
  })
  .refine((q) => q.check_out > q.check_in, { path: ['check_out'], message: 'check_out must be after check_in' });

export function createCalendarRouter() {
  const router = Router();

  router.get('/v1/calendar', async (req, res) => {
    const parsed = calendarQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendError(res, new InvalidParametersError(parsed.error.flatten()));
    }

    const { room, check_in, check_out, adults } = parsed.data;
    try {
      const snapshot = await getListingSnapshot({ roomId: room, checkIn: check_in, checkOut: check_out, adults });
      return res.json(snapshot);
    } catch (err) {
      console.error('[calendar] listing snapshot failed', { room, error: errorMessage(err) });
      return sendError(res, err, 'CALENDAR_FAILED');
    }
  });

  return router;
}
