import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

export const envSchema = z.object({
  PORT: z.coerce.number().default(4001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  FRONTEND_URL: z.string().url().optional(),

  // Error reporting is off unless a DSN is provided
  SENTRY_DSN: z.string().url().optional(),

  // Processing defaults (callers may override per request)
  DEFAULT_DECIMALS: z.coerce.number().int().min(2).max(8).default(6),
  PROTECT_HEADERS: z.enum(['true', 'false']).default('true'),

  // Upload / payload limits
  MAX_UPLOAD_MB: z.coerce.number().positive().default(20),
  BODY_LIMIT_MB: z.coerce.number().positive().default(20),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;
