export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type StoreType = 'postgres' | 'memory';

export interface Config {
  port: number;
  database_url: string;
  db_pool_max: number;
  db_connect_timeout_ms: number;
  node_env: string;
  api_key: string;
  log_level: LogLevel;
  store_type: StoreType;
  staleness_cron_interval: string;
  seed_on_start: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const STORE_TYPES: readonly StoreType[] = ['postgres', 'memory'];

function get_env(key: string, default_value?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (default_value !== undefined) {
      return default_value;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function get_enum_env<T extends string>(key: string, allowed: readonly T[], default_value: T): T {
  const value = process.env[key];
  return allowed.find((candidate) => candidate === value) ?? default_value;
}

function get_bool_env(key: string, default_value: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return default_value;
  }
  return ['1', 'true', 'yes'].includes(value.toLowerCase());
}

export function load_config(): Config {
  const store_type = get_enum_env('STORE_TYPE', STORE_TYPES, 'postgres');

  return {
    port: parseInt(get_env('PORT', '4000'), 10),
    // The in-process store never opens a connection
    database_url: store_type === 'postgres' ? get_env('DATABASE_URL') : get_env('DATABASE_URL', ''),
    db_pool_max: parseInt(get_env('DB_POOL_MAX', '10'), 10),
    db_connect_timeout_ms: parseInt(get_env('DB_CONNECT_TIMEOUT_MS', '5000'), 10),
    node_env: get_env('NODE_ENV', 'development'),
    api_key: get_env('API_KEY'),
    log_level: get_enum_env('LOG_LEVEL', LOG_LEVELS, 'info'),
    store_type,
    staleness_cron_interval: get_env('STALENESS_CRON_INTERVAL', '0 * * * *'),
    seed_on_start: get_bool_env('SEED_ON_START', true),
  };
}

export const config = load_config();
