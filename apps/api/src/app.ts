import express from 'express';
import cors from 'cors';
import activityRouter from './routes/activity.js';
import exclusionsRouter from './routes/exclusions.js';
import preferencesRouter from './routes/preferences.js';
import searchRouter from './routes/search.js';
import { getEnv } from './env.js';
import { errorMessage } from './errors.js';
import { getFirestore } from './firebase.js';

export function createApp() {
  const env = getEnv();

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser requests (curl/health checks) may omit Origin.
        if (!origin) return callback(null, true);

        // Unconfigured: allow every origin.
        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      }
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.get('/health/firestore', async (_req, res) => {
    try {
      const db = getFirestore();
      // Read-only check: attempt to read a non-existent doc.
      await db.doc('_health/ping').get();
      return res.json({ ok: true });
    } catch (err) {
      return res.status(503).json({ ok: false, error: 'FIRESTORE_UNAVAILABLE', message: errorMessage(err) });
    }
  });

  app.use(searchRouter);
  app.use(preferencesRouter);
  app.use(exclusionsRouter);
  app.use(activityRouter);

  return app;
}
