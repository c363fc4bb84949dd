/**
 * Environment Settings
 * Reads process configuration once at start-up and reports every invalid value
 */

export interface Settings {
  // Server
  ENVIRONMENT: string;
  DEBUG: boolean;
  APP_HOST: string;
  APP_PORT: number;
  ALLOWED_HOSTS: string[];
  TRUST_PROXY: boolean;

  // Redis
  REDIS_URL: string;
  REDIS_CONNECTION_TIMEOUT: number;   // seconds

  // Rate Limiting
  RATE_LIMIT_ENABLED: boolean;
  RATE_LIMIT_CALLS: number;
  RATE_LIMIT_PERIOD: number;          // seconds
  RATE_LIMIT_EXEMPT_PATHS: string[];
  RATE_LIMIT_MAX_CLIENTS: number;
  RATE_LIMIT_PURGE_INTERVAL: number;  // seconds

  // Background jobs
  HEALTH_CHECK_INTERVAL: number;      // seconds
  METRICS_COLLECTION_INTERVAL: number; // seconds
}

export type SettingsResult =
  | { ok: true; value: Readonly<Settings> }
  | { ok: false; errors: string[] };

type EnvSource = Record<string, string | undefined>;

// Largest whole-second delay setInterval accepts (2^31 - 1 ms)
export const MAX_INTERVAL_SECONDS = Math.floor(2 ** 31 / 1000) - 1;

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

class EnvReader {
  readonly errors: string[] = [];

  constructor(private readonly source: EnvSource) {}

  private raw(name: string): string | undefined {
    const value = this.source[name]?.trim();
    return value ? value : undefined;
  }

  string(name: string, fallback: string): string {
    return this.raw(name) ?? fallback;
  }

  boolean(name: string, fallback: boolean): boolean {
    const value = this.raw(name);
    if (value === undefined) {
      return fallback;
    }
    const normalized = value.toLowerCase();
    if (TRUE_VALUES.includes(normalized)) {
      return true;
    }
    if (FALSE_VALUES.includes(normalized)) {
      return false;
    }
    this.errors.push(`${name} must be a boolean, got "${value}"`);
    return fallback;
  }

  integer(name: string, fallback: number, min: number = 1, max: number = Number.MAX_SAFE_INTEGER): number {
    const value = this.raw(name);
    if (value === undefined) {
      return fallback;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      this.errors.push(`${name} must be an integer between ${min} and ${max}, got "${value}"`);
      return fallback;
    }
    return parsed;
  }

  list(name: string, fallback: string[]): string[] {
    const value = this.raw(name);
    if (value === undefined) {
      return fallback;
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }
}

/**
 * Build settings from an environment map.
 * Never throws: invalid values are collected into `errors`.
 */
export function loadSettings(source: EnvSource = process.env): SettingsResult {
  const reader = new EnvReader(source);

  const settings: Settings = {
    ENVIRONMENT: reader.string('ENVIRONMENT', 'development'),
    DEBUG: reader.boolean('DEBUG', true),
    APP_HOST: reader.string('APP_HOST', '0.0.0.0'),
    APP_PORT: reader.integer('APP_PORT', 8000, 1, 65535),
    ALLOWED_HOSTS: reader.list('ALLOWED_HOSTS', ['localhost', '127.0.0.1', '0.0.0.0']),
    TRUST_PROXY: reader.boolean('TRUST_PROXY', false),

    REDIS_URL: reader.string('REDIS_URL', 'redis://localhost:6379/0'),
    REDIS_CONNECTION_TIMEOUT: reader.integer('REDIS_CONNECTION_TIMEOUT', 30),

    RATE_LIMIT_ENABLED: reader.boolean('RATE_LIMIT_ENABLED', true),
    RATE_LIMIT_CALLS: reader.integer('RATE_LIMIT_CALLS', 100),
    RATE_LIMIT_PERIOD: reader.integer('RATE_LIMIT_PERIOD', 60),
    RATE_LIMIT_EXEMPT_PATHS: reader.list('RATE_LIMIT_EXEMPT_PATHS', ['/health', '/health/detailed']),
    RATE_LIMIT_MAX_CLIENTS: reader.integer('RATE_LIMIT_MAX_CLIENTS', 10000),
    RATE_LIMIT_PURGE_INTERVAL: reader.integer('RATE_LIMIT_PURGE_INTERVAL', 60, 1, MAX_INTERVAL_SECONDS),

    HEALTH_CHECK_INTERVAL: reader.integer('HEALTH_CHECK_INTERVAL', 300, 1, MAX_INTERVAL_SECONDS),
    METRICS_COLLECTION_INTERVAL: reader.integer('METRICS_COLLECTION_INTERVAL', 600, 1, MAX_INTERVAL_SECONDS),
  };

  const errors = [...reader.errors];

  if (!/^rediss?:\/\//.test(settings.REDIS_URL)) {
    errors.push(`REDIS_URL must start with redis:// or rediss://, got "${settings.REDIS_URL}"`);
  }

  if (settings.ENVIRONMENT === 'production' && settings.DEBUG) {
    errors.push('DEBUG must be disabled when ENVIRONMENT is production');
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return { ok: true, value: Object.freeze(settings) };
}
