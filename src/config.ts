import { ConfigError } from './utils/errors';
import { parseAllowedEmails } from './auth/allowlist';

export type EnvSource = Record<string, unknown>;

export interface AppConfig {
  supabase: {
    url: string;
    anonKey: string;
  };
  allowedEmails: string[];
  metabase: {
    baseUrl: string;
    username: string;
    password: string;
    timeoutMs: number;
  };
  defaultQueries: {
    scheduleQueryId: number;
    tripQueryId: number;
  };
}

export const DEFAULT_METABASE_URL = '/metabase';
export const DEFAULT_SCHEDULE_QUERY_ID = 3021;
export const DEFAULT_TRIP_QUERY_ID = 3023;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

function readString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function parseQueryId(value: unknown): number | null {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isInteger(n) && n >= 1 ? n : null;
}

/**
 * Build the app configuration from Vite env variables.
 *
 * @throws ConfigError listing every missing or invalid variable
 */
export function readConfig(env: EnvSource): AppConfig {
  const problems: string[] = [];

  const required = (key: string): string => {
    const value = readString(env, key);
    if (!value) problems.push(`${key} is required`);
    return value ?? '';
  };

  const positiveInt = (key: string, fallback: number): number => {
    const raw = readString(env, key);
    if (raw === undefined) return fallback;
    const parsed = parseQueryId(raw);
    if (parsed === null) {
      problems.push(`${key} must be a positive integer (got "${raw}")`);
      return fallback;
    }
    return parsed;
  };

  const supabaseUrl = required('VITE_SUPABASE_URL');
  const supabaseKey = required('VITE_SUPABASE_ANON_KEY');
  const allowedEmails = parseAllowedEmails(required('VITE_ALLOWED_EMAILS'));
  const username = required('VITE_METABASE_USERNAME');
  const password = required('VITE_METABASE_PASSWORD');

  const config: AppConfig = {
    supabase: { url: supabaseUrl, anonKey: supabaseKey },
    allowedEmails,
    metabase: {
      baseUrl: (readString(env, 'VITE_METABASE_URL') ?? DEFAULT_METABASE_URL).replace(/\/+$/, ''),
      username,
      password,
      timeoutMs: positiveInt('VITE_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
    },
    defaultQueries: {
      scheduleQueryId: positiveInt('VITE_SCHEDULE_QUERY_ID', DEFAULT_SCHEDULE_QUERY_ID),
      tripQueryId: positiveInt('VITE_TRIP_QUERY_ID', DEFAULT_TRIP_QUERY_ID),
    },
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return config;
}

let configInstance: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = readConfig(import.meta.env);
  }
  return configInstance;
}
