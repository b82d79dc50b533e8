/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  // OpenAI / Azure OpenAI
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(100),
  AZURE_OPENAI_ENDPOINT: optionalString, // Optional: switches the client to Azure
  AZURE_OPENAI_API_VERSION: z.string().default('2024-02-01'),

  // Sources
  SEARCH_API_URL: z.string().url().default('https://hn.algolia.com/api/v1/search'),
  SEARCH_KEYWORDS_FILE: z.string().default('./keywords.txt'),
  SOCIAL_API_URL: z.string().url().default('https://www.reddit.com'),
  SOCIAL_SUBREDDITS: z.string().default(''),
  SOCIAL_LIMIT: z.coerce.number().int().positive().default(25),
  FEEDS_FILE: z.string().default('./feeds.json'),
  USER_AGENT: z.string().default('Mozilla/5.0 (compatible; NewsDigestBot/1.0)'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Digest
  DIGEST_WINDOW_HOURS: z.coerce.number().positive().default(24),
  SUMMARY_MAX_CHARACTERS: z.coerce.number().int().positive().default(3000),
  DEDUPE_ACROSS_SOURCES: booleanFlag.default('true'),
  DIGEST_SUBJECT: z.string().default('Your News Digest'),
  DIGEST_OUTPUT_FILE: z.string().default('./digest.html'),

  // Summary cache
  CACHE_DIR: z.string().default('./cache'),
  CACHE_EMPTY_EXTRACTIONS: booleanFlag.default('false'),

  // Email delivery (optional: delivery is skipped when unset)
  SMTP_HOST: optionalString,
  SMTP_PORT: z.coerce.number().int().positive().default(465),
  SMTP_SECURE: booleanFlag.default('true'),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  DIGEST_FROM: optionalString,
  DIGEST_TO: optionalString,

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FILE: optionalString,

  // Scheduling
  CRON_SCHEDULE: z.string().default('0 7 * * *'),
  TZ: z.string().default('UTC'),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
