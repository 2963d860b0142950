import { DEFAULT_USER_AGENT, FETCH_LIMITS, TIMEOUT } from './constants.js';
import { parseBoolean, parseInteger, parseLogLevel } from './env-parsers.js';

const { env } = process;

export const config = {
  fetcher: {
    timeout: parseInteger(
      env['FETCH_TIMEOUT_MS'],
      TIMEOUT.DEFAULT_FETCH_TIMEOUT_MS,
      1000,
      600000
    ),
    maxRedirects: FETCH_LIMITS.MAX_REDIRECTS,
    userAgent: env['USER_AGENT'] ?? DEFAULT_USER_AGENT,
  },
  corsCache: {
    maxKeys: parseInteger(
      env['CORS_CACHE_MAX_KEYS'],
      FETCH_LIMITS.DEFAULT_CORS_CACHE_KEYS,
      1
    ),
  },
  logging: {
    level: parseLogLevel(env['LOG_LEVEL']),
    enabled: parseBoolean(env['LOG_ENABLED'], env['NODE_ENV'] !== 'test'),
  },
};
