import { z } from 'zod';

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

const breweryList = z
  .string({ required_error: 'BREWERIES is required' })
  .transform(value => value.split(',').map(id => id.trim()).filter(id => id.length > 0))
  .refine(ids => ids.length > 0, 'BREWERIES must name at least one brewery')
  .refine(ids => ids.every(id => /^\d+$/.test(id)), 'BREWERIES must be numeric brewery ids')
  .refine(ids => new Set(ids).size === ids.length, 'BREWERIES must not repeat a brewery id');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  BREWERIES: breweryList,
  DB_HOST: z.string().default('localhost'),
  DB_PORT: positiveInt(5434),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_NAME: z.string().default('checkins'),
  FEED_BASE_URL: z.string().url().default('https://untappd.com/rss/brewery'),
  UNTAPPD_BASE_URL: z.string().url().default('https://untappd.com'),
  FOURSQUARE_API_URL: z.string().url().default('https://api.foursquare.com/v2'),
  FOURSQUARE_CLIENT_ID: z.string().min(1).optional(),
  FOURSQUARE_CLIENT_SECRET: z.string().min(1).optional(),
  LOOKUP_MAX_ATTEMPTS: positiveInt(4),
  LOOKUP_BACKOFF_MS: nonNegativeInt(1000),
  UNTAPPD_MIN_INTERVAL_MS: nonNegativeInt(4000),
  FOURSQUARE_MIN_INTERVAL_MS: nonNegativeInt(750),
  HTTP_TIMEOUT_MS: positiveInt(30000),
  RESOLVER_FLUSH_EVERY: positiveInt(25),
  RETENTION_DAYS: nonNegativeInt(7),
});

export interface FoursquareCredentials {
  clientId: string;
  clientSecret: string;
}

export interface AppConfig {
  breweries: string[];
  db: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };
  feedBaseUrl: string;
  untappdBaseUrl: string;
  foursquareApiUrl: string;
  foursquare: FoursquareCredentials | null;
  lookup: {
    maxAttempts: number;
    backoffMs: number;
    timeoutMs: number;
    untappdMinIntervalMs: number;
    foursquareMinIntervalMs: number;
  };
  resolverFlushEvery: number;
  retentionDays: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  const hasId = e.FOURSQUARE_CLIENT_ID !== undefined;
  const hasSecret = e.FOURSQUARE_CLIENT_SECRET !== undefined;
  if (hasId !== hasSecret) {
    throw new ConfigError(['FOURSQUARE_CLIENT_ID and FOURSQUARE_CLIENT_SECRET must be set together']);
  }

  return {
    breweries: e.BREWERIES,
    db: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
    },
    feedBaseUrl: e.FEED_BASE_URL.replace(/\/+$/, ''),
    untappdBaseUrl: e.UNTAPPD_BASE_URL.replace(/\/+$/, ''),
    foursquareApiUrl: e.FOURSQUARE_API_URL.replace(/\/+$/, ''),
    foursquare: e.FOURSQUARE_CLIENT_ID !== undefined && e.FOURSQUARE_CLIENT_SECRET !== undefined
      ? { clientId: e.FOURSQUARE_CLIENT_ID, clientSecret: e.FOURSQUARE_CLIENT_SECRET }
      : null,
    lookup: {
      maxAttempts: e.LOOKUP_MAX_ATTEMPTS,
      backoffMs: e.LOOKUP_BACKOFF_MS,
      timeoutMs: e.HTTP_TIMEOUT_MS,
      untappdMinIntervalMs: e.UNTAPPD_MIN_INTERVAL_MS,
      foursquareMinIntervalMs: e.FOURSQUARE_MIN_INTERVAL_MS,
    },
    resolverFlushEvery: e.RESOLVER_FLUSH_EVERY,
    retentionDays: e.RETENTION_DAYS,
  };
}

export function requireFoursquare(config: AppConfig): FoursquareCredentials {
  if (!config.foursquare) {
    throw new ConfigError(['FOURSQUARE_CLIENT_ID and FOURSQUARE_CLIENT_SECRET are required for this stage']);
  }
  return config.foursquare;
}
