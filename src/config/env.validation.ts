import { z } from 'zod';

/**
 * Environment schema.
 *
 * Database settings default to a local Postgres. PPA settings stay raw
 * strings here; FinancialConfigService parses them and falls back per field.
 */
export const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().default('admin'),
  DB_PASSWORD: z.string().default('admin'),
  DB_DATABASE: z.string().default('solar_db'),
  DB_SSL: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  DEFAULT_PPA_RATE: z.string().optional(),
  SITE_PPA_RATES: z.string().optional(),
  FINANCIAL_CONFIG_PATH: z.string().optional(),

  /** Pins "now" for demos, see getCurrentDate() */
  DEMO_DATE: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * `validate` hook for ConfigModule.forRoot.
 *
 * @throws Error listing every invalid variable
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
