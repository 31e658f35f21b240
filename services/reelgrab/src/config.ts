import { resolve } from 'path';

const DEFAULT_PORT = 3030;

export type EngineName = 'yt-dlp' | 'mock';

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function boolFromEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase().trim();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return fallback;
}

function engineFromEnv(env: Env): EngineName {
  const raw = (env.EXTRACTION_ENGINE || 'yt-dlp').trim().toLowerCase();
  if (raw === 'yt-dlp' || raw === 'mock') return raw;
  throw new Error(`EXTRACTION_ENGINE must be "yt-dlp" or "mock", got "${raw}"`);
}

export interface AppConfig {
  readonly port: number;
  readonly publicBaseUrl: string;
  readonly masterApiKey: string;
  readonly databaseUrl: string;
  readonly dbHost: string;
  readonly dbPort: number;
  readonly dbUser: string;
  readonly dbPassword: string;
  readonly dbName: string;
  readonly dbSsl: boolean;
  readonly redisUrl: string;
  readonly engine: EngineName;
  readonly ytDlpPath: string;
  readonly cookiesFile: string;
  readonly dailyDownloadLimit: number;
  readonly retentionHours: number;
  readonly sweepIntervalMs: number;
  readonly maxFileSizeMb: number;
  readonly storageRoot: string;
  readonly selectionTimeoutMs: number;
  readonly engineTimeoutMs: number;
  readonly engineRetries: number;
  readonly engineSocketTimeoutSeconds: number;
}

/**
 * Reads the service configuration once. Entry points call this at startup and
 * hand the result (or the slice a component needs) to every constructor.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = Number.parseInt(env.PORT || `${DEFAULT_PORT}`, 10) || DEFAULT_PORT;

  const config: AppConfig = {
    port,
    publicBaseUrl: env.PUBLIC_BASE_URL || `http://localhost:${port}`,
    masterApiKey: env.MASTER_API_KEY || '',
    databaseUrl: env.DATABASE_URL || '',
    dbHost: env.PGHOST || '',
    dbPort: Number.parseInt(env.PGPORT || '5432', 10) || 5432,
    dbUser: env.PGUSER || '',
    dbPassword: env.PGPASSWORD || '',
    dbName: env.PGDATABASE || '',
    dbSsl: boolFromEnv(env, 'DB_SSL', false),
    redisUrl: env.REDIS_URL || '',
    engine: engineFromEnv(env),
    ytDlpPath: env.YT_DLP_PATH || 'yt-dlp',
    cookiesFile: env.COOKIES_FILE || '',
    dailyDownloadLimit: intFromEnv(env, 'MAX_DOWNLOADS_PER_DAY', 50),
    retentionHours: intFromEnv(env, 'AUTO_CLEANUP_HOURS', 1),
    sweepIntervalMs: intFromEnv(env, 'SWEEP_INTERVAL_MS', 30 * 60 * 1000),
    maxFileSizeMb: intFromEnv(env, 'MAX_FILE_SIZE_MB', 25),
    storageRoot: resolve(process.cwd(), env.STORAGE_ROOT || 'data/downloads'),
    selectionTimeoutMs: intFromEnv(env, 'SELECTION_TIMEOUT_SECONDS', 300) * 1000,
    engineTimeoutMs: intFromEnv(env, 'ENGINE_TIMEOUT_SECONDS', 180) * 1000,
    engineRetries: intFromEnv(env, 'ENGINE_RETRIES', 10),
    engineSocketTimeoutSeconds: intFromEnv(env, 'ENGINE_SOCKET_TIMEOUT_SECONDS', 30),
  };

  if (!config.databaseUrl && !(config.dbHost && config.dbUser && config.dbName)) {
    throw new Error('DATABASE_URL or PGHOST/PGUSER/PGDATABASE is required');
  }

  if (!config.redisUrl) {
    throw new Error('REDIS_URL is required');
  }

  return Object.freeze(config);
}
