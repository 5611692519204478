import * as os from 'os';
import * as path from 'path';
import { UsageError } from './lib/errors';
import { isLogLevel, type LogLevel } from './lib/logger';
import { IMGUR_API_BASE_URL } from './services/storage/adapters/ImgurAdapter';
import { SORT_ORDERS, type Privacy, type SortOrder } from './types/models';

export const APP_NAME = 'album-uploader';
export const CONFIG_FILE_NAME = 'config.json';

export interface AppConfig {
  configPath: string;
  apiBaseUrl: string;
  sortOrder: SortOrder;
  privacy: Privacy;
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  sortOrder?: string;
  public?: boolean;
  verbose?: boolean;
}

type Env = Record<string, string | undefined>;

/**
 * Per-user config file: ALBUM_UPLOADER_CONFIG, else under XDG_CONFIG_HOME,
 * else under ~/.config
 */
export function resolveConfigPath(env: Env = process.env, homeDir: string = os.homedir()): string {
  if (env.ALBUM_UPLOADER_CONFIG) {
    return path.resolve(env.ALBUM_UPLOADER_CONFIG);
  }

  const configHome = env.XDG_CONFIG_HOME || path.join(homeDir, '.config');
  return path.join(configHome, APP_NAME, CONFIG_FILE_NAME);
}

function parseSortOrder(value: string): SortOrder {
  const match = SORT_ORDERS.find(order => order === value);
  if (!match) {
    throw new UsageError(`Invalid sort order "${value}". Expected one of: ${SORT_ORDERS.join(', ')}`);
  }
  return match;
}

function parseLogLevel(value: string): LogLevel {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new UsageError(`Invalid LOG_LEVEL "${value}"`);
  }
  return normalized;
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): AppConfig {
  return {
    configPath: resolveConfigPath(env),
    apiBaseUrl: env.IMGUR_API_BASE_URL || IMGUR_API_BASE_URL,
    sortOrder: parseSortOrder(overrides.sortOrder ?? 'lexical'),
    privacy: overrides.public ? 'public' : 'hidden',
    logLevel: overrides.verbose ? 'debug' : parseLogLevel(env.LOG_LEVEL || 'warn'),
  };
}
