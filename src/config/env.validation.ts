import 'dotenv/config';
import { z } from 'zod';

const currencyCode = (fallback: string) =>
  z
    .string()
    .trim()
    .min(1)
    .default(fallback)
    .transform((v) => v.toUpperCase());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  API_PREFIX: z.string().default('/api'),

  DATABASE_PATH: z.string().min(1).default('investments.db'),

  // Prices quoted in BASE_CURRENCY are converted into TARGET_CURRENCY
  BASE_CURRENCY: currencyCode('USD'),
  TARGET_CURRENCY: currencyCode('KRW'),

  EXCHANGE_RATE_API_URL: z.string().url().default('https://api.exchangerate-api.com/v4/latest'),
  CRYPTO_PRICE_API_URL: z.string().url().default('https://api.binance.com/api/v3/ticker/price'),
  CRYPTO_QUOTE_ASSET: currencyCode('USDT'),
  STOCK_LOOKBACK_DAYS: z.coerce.number().int().positive().default(5),
  PRICE_CONCURRENCY: z.coerce.number().int().positive().default(4),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  ERROR_LOG_PATH: z.string().min(1).default('investment_errors.log'),
  ERROR_LOG_LEVEL: z.enum(['warn', 'error']).default('warn'),

  REPORT_DIR: z.string().min(1).default('.'),
  // empty string in .env means "not set"
  ASSET_SOURCE_FILE: z.preprocess((v) => (v === '' ? undefined : v), z.string().min(1).optional()),
});

export const env = envSchema.parse(process.env);
export type Env = z.infer<typeof envSchema>;
