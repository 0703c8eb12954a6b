import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';
import { getEnv } from './env.js';
import { createApp } from './app.js';

// Repo-root .env (three levels above apps/api/src) first; a .env in the working
// directory overrides it.
dotenv.config({ path: fileURLToPath(new URL('../../../.env', import.meta.url)) });
dotenv.config({ override: true });

const env = getEnv();

const app = createApp();

app.listen(env.PORT, () => {
  console.info(`[api] vending locator listening on http://localhost:${env.PORT}`, {
    providerTimeoutMs: env.PROVIDER_TIMEOUT_MS,
    googlePlaces: env.GOOGLE_PLACES_API_KEY ? 'enabled' : 'disabled'
  });
});
