export const TIMEOUT = {
  DEFAULT_FETCH_TIMEOUT_MS: 30000,
} as const;

export const FETCH_LIMITS = {
  MAX_REDIRECTS: 20,
  DEFAULT_CORS_CACHE_KEYS: 10000,
} as const;

export const DEFAULT_USER_AGENT = 'fetch-engine/0.1';
