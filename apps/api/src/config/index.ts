/**
 * API Configuration
 *
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

// Get monorepo root
const moduleDir = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(moduleDir, '../../../..');

// Load .env from monorepo root
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

// Helper to resolve relative paths from monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

const flag = (fallback: 'true' | 'false') =>
  z.string().transform(v => v !== 'false').default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.string().transform(Number).default('9117'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TRUST_PROXY: flag('true'),

  // Security
  API_KEY: z.string().min(1).default('relayarr'),
  PUBLIC_URL: z.string().url().default('http://localhost:9117'),
  CORS_ORIGINS: z.string().default('*'),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.string().transform(Number).default('60000'),
  RATE_LIMIT_MAX_REQUESTS: z.string().transform(Number).default('600'),

  // Content provider
  PROVIDER_BASE_URL: z.string().url().default('https://catalog.invalid'),
  PROVIDER_COOKIE_NAME: z.string().default(''),
  PROVIDER_COOKIE_VALUE: z.string().default(''),
  PROVIDER_MAX_TITLES: z.string().transform(Number).default('10'),
  PROVIDER_MAX_LINKS_PER_TITLE: z.string().transform(Number).default('15'),
  PROVIDER_PREFERRED_HOSTS: z.string().default(''),

  // Title resolution
  TMDB_API_KEY: z.string().default(''),
  TMDB_LANGUAGE: z.string().default('fr-FR'),

  // Download engine
  JDOWNLOADER_EMAIL: z.string().default(''),
  JDOWNLOADER_PASSWORD: z.string().default(''),
  JDOWNLOADER_DEVICE: z.string().default('relayarr'),
  JDOWNLOADER_API_URL: z.string().url().default('https://api.jdownloader.org'),
  JDOWNLOADER_APP_KEY: z.string().default('relayarr'),

  // Paths (relative to monorepo root)
  DOWNLOAD_ROOT: z.string().default('/output'),
  DATA_PATH: z.string().default('./data'),

  // Reconciliation
  POLL_INTERVAL_MS: z.string().transform(Number).default('15000'),
  POLL_CONCURRENCY: z.string().transform(Number).default('4'),
  BRIDGE_RETRY_ATTEMPTS: z.string().transform(Number).default('5'),
  BRIDGE_RETRY_BASE_MS: z.string().transform(Number).default('5000'),
  BRIDGE_RETRY_MAX_MS: z.string().transform(Number).default('60000'),
  BRIDGE_TIMEOUT_MS: z.string().transform(Number).default('15000'),
  JOB_RETENTION_HOURS: z.string().transform(Number).default('24'),

  // Link verification
  VERIFY_TIMEOUT_MS: z.string().transform(Number).default('8000'),
  VERIFY_FRESHNESS_MS: z.string().transform(Number).default('600000'),
  VERIFY_CONCURRENCY: z.string().transform(Number).default('5'),
  VERIFY_ON_SUBMIT: flag('true'),

  // Queue protocol
  LABELS: z.string().default('radarr,sonarr,lidarr,radarr-anime,sonarr-anime'),
});

const list = (value: string): string[] =>
  value.split(',').map(s => s.trim()).filter(s => s.length > 0);

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    console.error('Invalid environment configuration:');
    console.error(parseResult.error.format());
    process.exit(1);
  }

  const env = parseResult.data;

  return {
    nodeEnv: env.NODE_ENV,
    host: env.API_HOST,
    port: env.API_PORT,
    logLevel: env.LOG_LEVEL,
    trustProxy: env.TRUST_PROXY,

    // Security
    apiKey: env.API_KEY,
    publicUrl: env.PUBLIC_URL.replace(/\/+$/, ''),
    corsOrigins: env.CORS_ORIGINS === '*' ? true : list(env.CORS_ORIGINS),

    // Rate limiting
    rateLimitMax: env.RATE_LIMIT_MAX_REQUESTS,
    rateLimitWindow: `${env.RATE_LIMIT_WINDOW_MS} milliseconds`,

    provider: {
      baseUrl: env.PROVIDER_BASE_URL,
      cookieName: env.PROVIDER_COOKIE_NAME,
      cookieValue: env.PROVIDER_COOKIE_VALUE,
      maxTitles: env.PROVIDER_MAX_TITLES,
      maxLinksPerTitle: env.PROVIDER_MAX_LINKS_PER_TITLE,
      preferredHosts: list(env.PROVIDER_PREFERRED_HOSTS),
    },

    tmdb: {
      apiKey: env.TMDB_API_KEY,
      language: env.TMDB_LANGUAGE,
    },

    jdownloader: {
      apiUrl: env.JDOWNLOADER_API_URL,
      email: env.JDOWNLOADER_EMAIL,
      password: env.JDOWNLOADER_PASSWORD,
      deviceName: env.JDOWNLOADER_DEVICE,
      appKey: env.JDOWNLOADER_APP_KEY,
      timeoutMs: env.BRIDGE_TIMEOUT_MS,
    },

    bridge: {
      retryAttempts: env.BRIDGE_RETRY_ATTEMPTS,
      retryBaseMs: env.BRIDGE_RETRY_BASE_MS,
      retryMaxMs: env.BRIDGE_RETRY_MAX_MS,
    },

    // Paths
    downloadRoot: env.DOWNLOAD_ROOT,
    dataPath: resolvePath(env.DATA_PATH),

    poller: {
      intervalMs: env.POLL_INTERVAL_MS,
      concurrency: env.POLL_CONCURRENCY,
      retentionMs: env.JOB_RETENTION_HOURS * 60 * 60 * 1000,
    },

    verifier: {
      timeoutMs: env.VERIFY_TIMEOUT_MS,
      freshnessMs: env.VERIFY_FRESHNESS_MS,
      concurrency: env.VERIFY_CONCURRENCY,
      verifyOnSubmit: env.VERIFY_ON_SUBMIT,
    },

    labels: list(env.LABELS),
  };
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
