import type { Bot } from 'grammy';

import type { EventBus } from '../../kernel/event-bus.js';
import { createLogger, formatError } from '../../kernel/logger.js';
import { createBot } from './bot.js';
import type { BotServices, TelegramBotConfig } from './types.js';

export { createBot, HELP_TEXT } from './bot.js';
export type { BotDependencies } from './bot.js';
export type { BotServices, StatusSource, TelegramBotConfig, TrainServices } from './types.js';

const log = createLogger('telegram-bot');

// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM BOT LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Owns the grammY bot: long polling in the background, stopped on shutdown.
 * The bot's `api` doubles as the alert sink's transport.
 */
export class TelegramBot {
  readonly bot: Bot;
  private polling = false;

  constructor(eventBus: EventBus, services: BotServices, config: TelegramBotConfig) {
    this.bot = createBot({ eventBus, services, config });
  }

  get isPolling(): boolean {
    return this.polling;
  }

  /** Start long polling without blocking. Resolves once the bot identity is known. */
  async start(): Promise<void> {
    if (this.polling) return;

    await this.bot.init();
    log.info({ username: this.bot.botInfo.username }, 'Bot connected');

    this.polling = true;
    this.bot
      .start({ drop_pending_updates: false })
      .catch((error: unknown) => {
        log.error({ err: formatError(error) }, 'Long polling stopped unexpectedly');
      })
      .finally(() => {
        this.polling = false;
      });
  }

  async stop(): Promise<void> {
    if (!this.polling) return;
    await this.bot.stop();
    this.polling = false;
    log.info('Bot stopped');
  }
}
