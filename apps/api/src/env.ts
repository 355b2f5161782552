import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),

  API_TOKEN: z.string().min(1),
  BBOX_POLICY: z.enum(['flat', 'corrected']).default('flat'),

  AIRBNB_BASE_URL: z.string().url().default('https://www.airbnb.com'),
  AIRBNB_CURRENCY: z.string().length(3).default('USD'),
  AIRBNB_LANGUAGE: z.string().min(2).default('en'),
  AIRBNB_SEARCH_HASH: z.string().min(1).optional(),
  AIRBNB_CALENDAR_HASH: z.string().min(1).optional(),
  AIRBNB_PDP_HASH: z.string().min(1).optional(),
  AIRBNB_SEARCH_MAX_PAGES: z.coerce.number().int().min(1).max(20).default(5),

  SEARCH_HISTORY_ENABLED: flag,
  FIREBASE_PROJECT_ID: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_JSON: z.string().optional(),
  FIREBASE_SERVICE_ACCOUNT_PATH: z.string().optional()
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}
