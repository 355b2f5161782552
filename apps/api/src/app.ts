import express from 'express';
import cors from 'cors';
import { getEnv, type Env } from './env.js';
import { getFirestore } from './firebase.js';
import { requireToken } from './middleware/auth.js';
import { createCalendarRouter } from './routes/calendar.js';
import { createHistoryRouter } from './routes/history.js';
import { createSearchRouter } from './routes/search.js';

export function createApp(env: Env = getEnv()) {
  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // If not configured, allow all origins.
        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      }
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.get('/health/firestore', async (_req, res) => {
    if (!env.SEARCH_HISTORY_ENABLED) {
      return res.json({ ok: true, enabled: false });
    }
    try {
      const db = getFirestore();
      // Read-only check: attempt to read a non-existent doc.
      await db.doc('_health/ping').get();
      return res.json({ ok: true, enabled: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      return res.status(500).json({ ok: false, error: 'FIRESTORE_UNAVAILABLE', message });
    }
  });

  app.use('/v1', requireToken(env.API_TOKEN));
  app.use(createSearchRouter(env));
  app.use(createCalendarRouter());
  app.use(createHistoryRouter(env));

  return app;
}
