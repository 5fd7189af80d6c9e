import dotenv from 'dotenv';

dotenv.config();

export interface YieldConfig {
  port: number;
  mongodbUri: string | undefined;
  subtensorWsUrls: string[];
  blockIntervalSeconds: number;
  chainQueryTimeoutMs: number;
  sweepCron: string;
  metadataSyncCron: string;
  sweepSubnetConcurrency: number;
  sweepEnabled: boolean;
  readCacheTtlSeconds: number;
  defaultBatchSize: number;
  adminKey: string | undefined;
  publicBaseUrl: string;
}

export const DEFAULT_SUBTENSOR_WS_URL = 'wss://entrypoint-finney.opentensor.ai:443';

// Environment variable parsing with defaults
function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function getEnvString(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value && value.trim().length > 0 ? value.trim() : defaultValue;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() !== 'false';
}

function getOptionalEnv(key: string): string | undefined {
  const value = process.env[key];
  return value && value.length > 0 ? value : undefined;
}

export function loadYieldConfig(): YieldConfig {
  return {
    port: getEnvNumber('PORT', 3000),
    mongodbUri: getOptionalEnv('MONGODB_URI'),
    subtensorWsUrls: getEnvString('SUBTENSOR_WS_URLS', DEFAULT_SUBTENSOR_WS_URL)
      .split(',')
      .map(url => url.trim())
      .filter(url => url.length > 0),
    blockIntervalSeconds: getEnvNumber('BLOCK_INTERVAL_SECONDS', 12),
    chainQueryTimeoutMs: getEnvNumber('CHAIN_QUERY_TIMEOUT_MS', 30000),
    sweepCron: getEnvString('SWEEP_CRON', '*/30 * * * *'),
    metadataSyncCron: getEnvString('METADATA_SYNC_CRON', '0 * * * *'),
    sweepSubnetConcurrency: Math.max(1, Math.floor(getEnvNumber('SWEEP_SUBNET_CONCURRENCY', 4))),
    sweepEnabled: getEnvBoolean('SWEEP_ENABLED', true),
    readCacheTtlSeconds: Math.max(0, getEnvNumber('READ_CACHE_TTL_SECONDS', 60)),
    defaultBatchSize: Math.max(1, Math.floor(getEnvNumber('DEFAULT_BATCH_SIZE', 32))),
    adminKey: getOptionalEnv('ADMIN_KEY'),
    publicBaseUrl: getEnvString('PUBLIC_BASE_URL', `http://localhost:${getEnvNumber('PORT', 3000)}`)
  };
}
