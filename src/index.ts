/**
 * tidings — Main Exports
 *
 * Public API surface for embedding the scheduler kernel and its domains.
 *
 * @module tidings
 * @version 1.0.0
 */

// Types
export {
  type Alert,
  type AlertSeverity,
  type Config,
  type ConfigInput,
  type DomainName,
  type Result,
  AlertSchema,
  ConfigSchema,
  ok,
  err,
  isOk,
  isErr,
} from './types/index.js';

// Config
export {
  getConfig,
  setConfig,
  loadConfig,
  applyEnvOverrides,
  ensureDataDir,
  getDataDir,
  DEFAULT_CONFIG,
} from './config/config.js';

// Kernel
export * from './kernel/index.js';

// Scheduling
export * from './autonomous/index.js';

// Domains
export * from './plugins/budget/index.js';
export * from './plugins/bins/index.js';
export * from './plugins/trains/index.js';

// Telegram
export { TelegramSink, type TelegramMessageApi } from './integrations/telegram/index.js';
export { TelegramBot, createBot, type BotServices, type TelegramBotConfig } from './plugins/telegram-bot/index.js';

// Utilities
export { withRetry, type RetryOptions } from './utils/retry.js';
export { escapeHtml, splitMessage } from './utils/format.js';
