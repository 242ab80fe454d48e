import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from './errors.js';
import { ProviderIdSchema } from './types/index.js';

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

const positiveNumber = (fallback: string) =>
  z.string().default(fallback).pipe(z.coerce.number().positive());

// Environment schema
const EnvSchema = z.object({
  PORT: z.string().default('3000').pipe(z.coerce.number().int().positive()),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  TOMTOM_API_KEY: z.string().optional(),
  HERE_API_KEY: z.string().optional(),
  PROVIDER_PRIORITY: z
    .string()
    .default('tomtom,here')
    .transform((value) =>
      value
        .split(',')
        .map((name) => name.trim().toLowerCase())
        .filter((name) => name.length > 0)
    )
    .pipe(z.array(ProviderIdSchema).min(1)),
  HERE_CACHE_TTL_HOURS: positiveNumber('6'),
  PROVIDER_TIMEOUT_MS: positiveNumber('30000'),
  REDIS_URL: z
    .string()
    .optional()
    .transform((value) => value || undefined)
    .pipe(z.string().url().optional()),
  REDIS_KEY_PREFIX: z.string().default('location-cache:'),
  CACHE_DEFAULT_TTL_HOURS: positiveNumber('1'),
  CACHE_LOCAL_TTL_MINUTES: positiveNumber('5'),
  CACHE_LOCAL_MAX_ENTRIES: z.string().default('10000').pipe(z.coerce.number().int().positive()),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

function buildConfig(env: z.infer<typeof EnvSchema>) {
  return {
    // Server
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    logLevel: env.LOG_LEVEL,

    // TomTom API
    tomtom: {
      apiKey: env.TOMTOM_API_KEY || '',
      enabled: !!env.TOMTOM_API_KEY,
      baseUrl: 'https://api.tomtom.com',
      requestTimeoutMs: env.PROVIDER_TIMEOUT_MS,
    },

    // HERE API
    here: {
      apiKey: env.HERE_API_KEY || '',
      enabled: !!env.HERE_API_KEY,
      geocodingBaseUrl: 'https://geocode.search.hereapi.com',
      reverseGeocodeBaseUrl: 'https://revgeocode.search.hereapi.com',
      routingBaseUrl: 'https://router.hereapi.com',
      requestTimeoutMs: env.PROVIDER_TIMEOUT_MS,
      cacheTtlMs: env.HERE_CACHE_TTL_HOURS * HOUR_MS,
    },

    // Provider fallback order, first entry tried first
    providerPriority: [...new Set(env.PROVIDER_PRIORITY)],

    // Caching
    cache: {
      redisUrl: env.REDIS_URL,
      redisKeyPrefix: env.REDIS_KEY_PREFIX,
      defaultTtlMs: env.CACHE_DEFAULT_TTL_HOURS * HOUR_MS,
      localTtlCapMs: env.CACHE_LOCAL_TTL_MINUTES * MINUTE_MS,
      localMaxEntries: env.CACHE_LOCAL_MAX_ENTRIES,
    },
  } as const;
}

export type Config = ReturnType<typeof buildConfig>;

/**
 * Load `.env`, validate the environment and build the application config.
 * Throws a ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, options: { dotenv?: boolean } = {}): Config {
  if (options.dotenv ?? (env === process.env)) {
    dotenv.config();
  }

  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((error) => `${error.path.join('.')}: ${error.message}`)
    );
  }

  const parsed = result.data;
  if (!parsed.TOMTOM_API_KEY && !parsed.HERE_API_KEY) {
    throw new ConfigError(['At least one API key is required: TOMTOM_API_KEY or HERE_API_KEY']);
  }

  return buildConfig(parsed);
}
