/**
 * tidings — Configuration Management
 *
 * Handles loading, validation, and path resolution for all configuration.
 * Precedence: defaults < config file < environment variables.
 *
 * @module config
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  type Config,
  type ConfigInput,
  ConfigSchema,
  LogLevelSchema,
  type Result,
  ok,
  err,
} from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_BASE_DIR = path.join(os.homedir(), '.tidings');
const CONFIG_FILE = 'config.json';

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getDataDir(config?: Pick<Config, 'dataDir'>): string {
  return expandPath(config?.dataDir ?? DEFAULT_BASE_DIR);
}

export function getConfigPath(): string {
  return path.join(DEFAULT_BASE_DIR, CONFIG_FILE);
}

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════

type Env = Record<string, string | undefined>;

function parseIdList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number)
    .filter((id) => Number.isInteger(id));
}

/**
 * Layer environment variables over a raw (pre-validation) config object.
 * Only variables that are set take effect.
 */
export function applyEnvOverrides(input: ConfigInput, env: Env = process.env): ConfigInput {
  const telegram = { ...input.telegram };
  const routes = { ...telegram.routes };
  const bins = { ...input.bins };
  const trains = { ...input.trains };
  const logging = { ...input.logging };

  if (env.TELEGRAM_BOT_TOKEN) telegram.botToken = env.TELEGRAM_BOT_TOKEN;
  if (env.TELEGRAM_ALLOWED_USER_IDS) telegram.allowedUserIds = parseIdList(env.TELEGRAM_ALLOWED_USER_IDS);
  if (env.TELEGRAM_BUDGET_CHAT_ID) routes.budget = env.TELEGRAM_BUDGET_CHAT_ID;
  if (env.TELEGRAM_BINS_CHAT_ID) routes.bins = env.TELEGRAM_BINS_CHAT_ID;
  if (env.TELEGRAM_TRAINS_CHAT_ID) routes.trains = env.TELEGRAM_TRAINS_CHAT_ID;
  if (env.BIN_FEED_URL) bins.feedUrl = env.BIN_FEED_URL;
  if (env.RAIL_API_URL) trains.apiUrl = env.RAIL_API_URL;
  if (env.RAIL_ACCESS_TOKEN) trains.accessToken = env.RAIL_ACCESS_TOKEN;
  if (env.DEFAULT_STATION) trains.defaultStation = env.DEFAULT_STATION.toUpperCase();
  const level = LogLevelSchema.safeParse(env.LOG_LEVEL);
  if (level.success) logging.level = level.data;

  return {
    ...input,
    ...(env.TIDINGS_DATA_DIR ? { dataDir: env.TIDINGS_DATA_DIR } : {}),
    logging,
    telegram: { ...telegram, routes },
    bins,
    trains,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Load configuration from file, layer env overrides, validate.
 * A missing file is not an error; an unreadable or invalid one is.
 */
export function loadConfig(customPath?: string, env: Env = process.env): Result<Config, Error> {
  try {
    const configPath = expandPath(customPath ?? getConfigPath());

    let fileConfig: unknown = {};
    if (fs.existsSync(configPath)) {
      fileConfig = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    }

    const fromFile = ConfigSchema.safeParse(fileConfig);
    if (!fromFile.success) {
      return err(new Error(`Invalid configuration in ${configPath}: ${fromFile.error.message}`));
    }

    const result = ConfigSchema.safeParse(applyEnvOverrides(fromFile.data, env));
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function ensureDataDir(config: Pick<Config, 'dataDir'>): Result<string, Error> {
  try {
    const dir = getDataDir(config);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    return ok(dir);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function setConfig(config: Config): void {
  cachedConfig = config;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
