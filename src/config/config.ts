import dotenv from 'dotenv';
import { type SulidVersion, isSulidVersion } from '../sulid/layout';
import { type RandomScope, isRandomScope } from '../sulid/random';

// Load environment variables
dotenv.config();

export type Env = Record<string, string | undefined>;

// 生成器配置
export interface SulidConfig {
  version: SulidVersion;
  dataCenterId: number; // v1
  machineId: number; // v1
  workerId: number; // v2
  strict: boolean;
  randomScope: RandomScope;
}

export interface AppConfig {
  port: number;
  logLevel: string;
  logDir?: string;
  maxBatchSize: number;
  sulid: SulidConfig;
}

// Get an optional environment variable with a default value
const getEnv = (env: Env, key: string, defaultValue: string): string => {
  return env[key] || defaultValue;
};

const getIntEnv = (env: Env, key: string, defaultValue: number): number => {
  const raw = getEnv(env, key, String(defaultValue));
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Environment variable ${key} must be a non-negative integer, got '${raw}'`);
  }
  return parseInt(raw, 10);
};

const getBoolEnv = (env: Env, key: string, defaultValue: boolean): boolean => {
  const raw = getEnv(env, key, String(defaultValue)).toLowerCase();
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`Environment variable ${key} must be true or false, got '${raw}'`);
};

/**
 * Build the application configuration from environment variables.
 * Identity ranges are checked by the generator, not here.
 */
export const loadConfig = (env: Env): AppConfig => {
  const version = getEnv(env, 'SULID_VERSION', 'v1');
  if (!isSulidVersion(version)) {
    throw new Error(`Environment variable SULID_VERSION must be v1 or v2, got '${version}'`);
  }

  const randomScope = getEnv(env, 'SULID_RANDOM_SCOPE', 'shared');
  if (!isRandomScope(randomScope)) {
    throw new Error(`Environment variable SULID_RANDOM_SCOPE must be shared or local, got '${randomScope}'`);
  }

  const maxBatchSize = getIntEnv(env, 'MAX_BATCH_SIZE', 100);
  if (maxBatchSize < 1) {
    throw new Error('Environment variable MAX_BATCH_SIZE must be at least 1');
  }

  return {
    port: getIntEnv(env, 'PORT', 3000),
    logLevel: getEnv(env, 'LOG_LEVEL', 'info'),
    logDir: env.LOG_DIR || undefined,
    maxBatchSize,
    sulid: {
      version,
      dataCenterId: getIntEnv(env, 'SULID_DATA_CENTER_ID', 0),
      machineId: getIntEnv(env, 'SULID_MACHINE_ID', 0),
      workerId: getIntEnv(env, 'SULID_WORKER_ID', 0),
      strict: getBoolEnv(env, 'SULID_STRICT', false),
      randomScope,
    },
  };
};

// Create the application configuration
const config: AppConfig = loadConfig(process.env);

export default config;
