export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  ssl: boolean;
}

export interface AuthConfig {
  enabled: boolean;
  apiKeys: string[];
}

export interface CalendarConfig {
  refreshEnabled: boolean;
  refreshOnStartup: boolean;
  refreshHourUtc: number;
  lookbackDays: number;
  lookaheadDays: number;
  enrichmentEnabled: boolean;
  enrichmentTimeoutMs: number;
}

export interface AppConfig {
  port: number;
  isDevelopment: boolean;
  corsOrigins: string[];
  database: DatabaseConfig;
  auth: AuthConfig;
  calendar: CalendarConfig;
}

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://127.0.0.1:3000'];

function toInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function toHour(value: string | undefined, fallback: number): number {
  const hour = toInt(value, fallback);
  return hour >= 0 && hour <= 23 ? hour : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

function toList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * CORS_ORIGINS admite un array JSON (["https://a", "https://b"]) o una lista
 * separada por comas.
 */
export function parseCorsOrigins(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return DEFAULT_CORS_ORIGINS;
  }
  const trimmed = value.trim();
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        return parsed.filter((item): item is string => typeof item === 'string');
      }
    } catch {
      // ["a", "b" mal cerrado: se cae a la lista separada por comas
      return toList(trimmed.replace(/[[\]"]/g, ''));
    }
  }
  return toList(trimmed);
}

export default function configuration(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: toInt(env.PORT, 8000),
    isDevelopment: env.NODE_ENV === 'development',
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
    database: {
      host: env.DATABASE_HOST || 'localhost',
      port: toInt(env.DATABASE_PORT, 5432),
      username: env.DATABASE_USER || 'postgres',
      password: env.DATABASE_PASSWORD || '',
      database: env.DATABASE_NAME || 'market_hours',
      synchronize: toBool(env.DATABASE_SYNCHRONIZE, true),
      ssl: env.NODE_ENV === 'production',
    },
    auth: {
      enabled: toBool(env.ENABLE_API_AUTH, false),
      apiKeys: toList(env.API_KEYS),
    },
    calendar: {
      refreshEnabled: toBool(env.CALENDAR_REFRESH_ENABLED, true),
      refreshOnStartup: toBool(env.CALENDAR_REFRESH_ON_STARTUP, true),
      refreshHourUtc: toHour(env.CALENDAR_REFRESH_HOUR, 6),
      lookbackDays: toInt(env.CALENDAR_LOOKBACK_DAYS, 30),
      lookaheadDays: toInt(env.CALENDAR_LOOKAHEAD_DAYS, 730),
      enrichmentEnabled: toBool(env.CALENDAR_ENRICHMENT_ENABLED, true),
      enrichmentTimeoutMs: toInt(env.CALENDAR_ENRICHMENT_TIMEOUT_MS, 30000),
    },
  };
}
