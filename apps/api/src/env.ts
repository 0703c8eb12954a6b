import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),

  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().optional(),

  OVERPASS_API_URL: z.string().url().default('https://overpass-api.de/api/interpreter'),
  NOMINATIM_API_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
  NOMINATIM_USER_AGENT: z.string().min(1).default('vending-locator/0.1'),

  GOOGLE_PLACES_API_BASE_URL: z.string().url().default('https://places.googleapis.com'),
  GOOGLE_PLACES_API_KEY: z.string().min(1).optional(),
  GOOGLE_PLACES_CONCURRENCY: z.coerce.number().int().positive().default(3),

  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  INCLUDE_PERMANENTLY_CLOSED: booleanFlag.default('true')
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}
