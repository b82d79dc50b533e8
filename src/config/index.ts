/**
 * Application configuration
 */

import { env } from './env.js';

const HOUR_MS = 60 * 60 * 1000;

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export const config = {
  app: {
    name: 'news-digest',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  openai: {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    maxTokens: env.OPENAI_MAX_TOKENS,
    azureEndpoint: env.AZURE_OPENAI_ENDPOINT, // Optional: Azure deployment
    azureApiVersion: env.AZURE_OPENAI_API_VERSION,
  },

  sources: {
    search: {
      apiUrl: env.SEARCH_API_URL,
      keywordsFile: env.SEARCH_KEYWORDS_FILE,
    },
    social: {
      apiUrl: env.SOCIAL_API_URL,
      subreddits: splitList(env.SOCIAL_SUBREDDITS),
      limit: env.SOCIAL_LIMIT,
    },
    feeds: {
      file: env.FEEDS_FILE,
    },
  },

  http: {
    userAgent: env.USER_AGENT,
    timeout: env.HTTP_TIMEOUT_MS,
  },

  digest: {
    windowMs: env.DIGEST_WINDOW_HOURS * HOUR_MS,
    maxCharacters: env.SUMMARY_MAX_CHARACTERS,
    dedupeAcrossSources: env.DEDUPE_ACROSS_SOURCES,
    subject: env.DIGEST_SUBJECT,
    outputFile: env.DIGEST_OUTPUT_FILE,
  },

  cache: {
    dir: env.CACHE_DIR,
    cacheEmptyExtractions: env.CACHE_EMPTY_EXTRACTIONS,
  },

  email: {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    user: env.SMTP_USER,
    password: env.SMTP_PASSWORD,
    from: env.DIGEST_FROM,
    to: env.DIGEST_TO,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
