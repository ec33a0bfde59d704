/**
 * Configuration management
 * All behavior is driven by environment variables
 */

export type PositionType = 'intern' | 'fulltime' | 'both';

export interface Config {
  // Database
  databaseUrl: string;

  // HTTP behavior shared by all sources
  http: {
    timeoutMs: number;
    maxRetries: number;
  };

  positionType: PositionType;

  simplify: {
    enabled: boolean;
    url: string;
    selfHost: string;
  };

  jsearch: {
    enabled: boolean;
    apiKey: string | null;
    apiUrl: string;
    queries: string[];
    datePosted: string;
    requestDelayMs: number;
    maxRetries: number;
    backoffBaseMs: number;
  };

  sponsorship: {
    referenceFiles: string[];
    cacheFile: string;
    minCases: number;
    fuzzyThreshold: number;
    useFuzzy: boolean;
  };

  pipeline: {
    concurrentSources: boolean;
    requireData: boolean;
    snapshotPath: string | null;
  };

  // Run summary notifications, skipped when either value is missing
  telegram: {
    botToken: string | null;
    chatId: string | null;
  };
}

export const DEFAULT_SIMPLIFY_URL =
  'https://raw.githubusercontent.com/SimplifyJobs/Summer2026-Internships/dev/README.md';
export const DEFAULT_JSEARCH_URL = 'https://api.openwebninja.com/jsearch/search';
export const DEFAULT_JSEARCH_QUERIES = ['software', 'data science', 'marketing'];

export function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Integer from the environment, clamped into `[min, max]` when bounds are given
 */
export function parseNumber(
  value: string | undefined,
  defaultValue: number,
  bounds: { min?: number; max?: number } = {}
): number {
  const parsed = value ? parseInt(value, 10) : NaN;
  const number = isNaN(parsed) ? defaultValue : parsed;
  return Math.min(bounds.max ?? Infinity, Math.max(bounds.min ?? -Infinity, number));
}

function parsePositionType(value: string | undefined): PositionType {
  switch (value?.trim().toLowerCase()) {
    case 'fulltime':
      return 'fulltime';
    case 'both':
      return 'both';
    default:
      return 'intern';
  }
}

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const databaseUrl = env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error('Missing required environment variable: DATABASE_URL');
  }

  const httpMaxRetries = parseNumber(env.HTTP_MAX_RETRIES, 3, { min: 1 });
  const jsearchApiKey = optional(env.JSEARCH_API_KEY);

  return {
    databaseUrl,
    http: {
      timeoutMs: parseNumber(env.HTTP_TIMEOUT_MS, 10_000, { min: 1 }),
      maxRetries: httpMaxRetries,
    },
    positionType: parsePositionType(env.POSITION_TYPE),
    simplify: {
      enabled: parseBoolean(env.ENABLE_SIMPLIFY, true),
      url: env.SIMPLIFY_URL || DEFAULT_SIMPLIFY_URL,
      selfHost: env.SIMPLIFY_SELF_HOST || 'github.com',
    },
    jsearch: {
      // No key, no source
      enabled: parseBoolean(env.ENABLE_JSEARCH, true) && jsearchApiKey !== null,
      apiKey: jsearchApiKey,
      apiUrl: env.JSEARCH_API_URL || DEFAULT_JSEARCH_URL,
      queries: parseStringArray(env.JSEARCH_QUERIES, DEFAULT_JSEARCH_QUERIES),
      datePosted: env.JSEARCH_DATE_POSTED || 'week',
      requestDelayMs: parseNumber(env.JSEARCH_REQUEST_DELAY_MS, 2_000, { min: 0 }),
      maxRetries: parseNumber(env.JSEARCH_MAX_RETRIES, httpMaxRetries, { min: 1 }),
      backoffBaseMs: parseNumber(env.JSEARCH_BACKOFF_BASE_MS, 5_000, { min: 0 }),
    },
    sponsorship: {
      referenceFiles: parseStringArray(env.SPONSOR_REFERENCE_FILES, ['resources/Employer_info.csv']),
      cacheFile: env.SPONSOR_CACHE_FILE || 'cache/sponsors.json',
      minCases: parseNumber(env.SPONSOR_MIN_CASES, 3, { min: 1 }),
      fuzzyThreshold: parseNumber(env.SPONSOR_FUZZY_THRESHOLD, 90, { min: 0, max: 100 }),
      useFuzzy: parseBoolean(env.SPONSOR_USE_FUZZY, true),
    },
    pipeline: {
      concurrentSources: parseBoolean(env.PIPELINE_CONCURRENT_SOURCES, true),
      requireData: parseBoolean(env.PIPELINE_REQUIRE_DATA, false),
      snapshotPath: optional(env.JOBS_SNAPSHOT_PATH),
    },
    telegram: {
      botToken: optional(env.TELEGRAM_BOT_TOKEN),
      chatId: optional(env.TELEGRAM_CHAT_ID),
    },
  };
}
