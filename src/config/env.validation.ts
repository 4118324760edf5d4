import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  DATABASE_HOST: z.string().default('localhost'),
  DATABASE_PORT: z.coerce.number().int().positive().default(5432),
  DATABASE_USERNAME: z.string().default('postgres'),
  DATABASE_PASSWORD: z.string().default('postgres'),
  DATABASE_NAME: z.string().default('asset_insights'),
  DATABASE_SSL: booleanFlag.default('false'),

  ADMIN_API_TOKEN: z.string().optional(),
  SESSION_TTL_HOURS: z.coerce.number().positive().default(168),

  FINNHUB_API_KEY: z.string().optional(),
  CMC_API_KEY: z.string().optional(),
  COINGECKO_BASE_URL: z.string().url().default('https://api.coingecko.com/api/v3'),
  NEWSDATA_API_KEY: z.string().optional(),
  NEWS_CATEGORY: z.string().default('business'),
  NEWS_LANGUAGE: z.string().default('en'),
  NEWS_FETCH_LIMIT: z.coerce.number().int().positive().default(30),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  AI_API_KEY: z.string().optional(),
  AI_BASE_URL: z
    .string()
    .url()
    .default('https://generativelanguage.googleapis.com/v1beta/openai/'),
  AI_MODEL: z.string().default('gemini-2.0-flash'),

  INGESTION_ENABLED: booleanFlag,
  PREDICTION_MODEL: z.enum(['random', 'trend']).default('random'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Empty strings from a .env file count as unset so optional keys stay
 * undefined instead of failing `url()` or `enum()` checks.
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const cleaned = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== ''),
  );
  return envSchema.parse(cleaned);
}
