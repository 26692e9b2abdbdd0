import { Bot } from 'grammy';

import type { EventBus } from '../../kernel/event-bus.js';
import { createLogger, formatError } from '../../kernel/logger.js';
import { handleBins } from './commands/bins.js';
import { handleAdd, handleBalance, handleHistory, handleSetWeekly, handleSubtract } from './commands/budget.js';
import { handleStatus } from './commands/status.js';
import { handleShortcut, handleShortcuts, handleTrains, handleUnwatch, handleWatch } from './commands/trains.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import type { BotServices, TelegramBotConfig } from './types.js';

const log = createLogger('telegram-bot');

// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM BOT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

export interface BotDependencies {
  eventBus: EventBus;
  services: BotServices;
  config: TelegramBotConfig;
}

export const HELP_TEXT =
  '<b>Commands</b>\n\n' +
  '<b>Budget</b>\n' +
  '/balance — current balance\n' +
  '/add &lt;amount&gt; [reason] — add funds\n' +
  '/sub &lt;amount&gt; [reason] — withdraw\n' +
  '/history — last transactions\n' +
  '/set &lt;amount&gt; — change weekly allowance\n\n' +
  '<b>Bins</b>\n' +
  '/bins — upcoming collections\n\n' +
  '<b>Trains</b>\n' +
  '/trains [station] — departures\n' +
  '/watch [HH:MM] [station] — alert on platform or status changes\n' +
  '/unwatch — stop watching\n' +
  '/shortcut add &lt;name&gt; &lt;CRS&gt; | remove &lt;name&gt;\n' +
  '/shortcuts — list station shortcuts\n\n' +
  '/status — scheduler overview';

/**
 * Creates the grammY bot with middleware chain:
 * auth → logging → commands
 *
 * Long polling only; no webhook server.
 */
export function createBot(deps: BotDependencies): Bot {
  const { eventBus, services, config } = deps;

  if (!config.botToken) {
    throw new Error('Telegram bot token not configured. Set TELEGRAM_BOT_TOKEN.');
  }

  const bot = new Bot(config.botToken);

  // ── Middleware chain ──────────────────────────────────────────────

  bot.use(createAuthMiddleware(config.allowedUserIds, eventBus));
  bot.use(createLoggingMiddleware(eventBus));

  // ── Command handlers ──────────────────────────────────────────────

  bot.command('start', async (ctx) => {
    await ctx.reply(`<b>Hello!</b> I send budget, bin and train alerts.\n\n${HELP_TEXT}`, { parse_mode: 'HTML' });
  });
  bot.command(['help', 'usage'], async (ctx) => {
    await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' });
  });

  bot.command('status', (ctx) => handleStatus(ctx, services.status));

  bot.command('balance', (ctx) => handleBalance(ctx, services.ledger));
  bot.command('add', (ctx) => handleAdd(ctx, services.ledger));
  bot.command(['sub', 'withdraw'], (ctx) => handleSubtract(ctx, services.ledger));
  bot.command('history', (ctx) => handleHistory(ctx, services.ledger));
  bot.command('set', (ctx) => handleSetWeekly(ctx, services.ledger));

  bot.command('bins', (ctx) => handleBins(ctx, services.bins));

  bot.command('trains', (ctx) => handleTrains(ctx, services.trains));
  bot.command('watch', (ctx) => handleWatch(ctx, services.trains));
  bot.command('unwatch', (ctx) => handleUnwatch(ctx, services.trains));
  bot.command('shortcut', (ctx) => handleShortcut(ctx, services.trains));
  bot.command('shortcuts', (ctx) => handleShortcuts(ctx, services.trains));

  bot.on('message:text', async (ctx) => {
    await ctx.reply('Use /help to see available commands.');
  });

  bot.catch((error) => {
    log.error({ err: formatError(error.error), updateId: error.ctx.update.update_id }, 'Unhandled bot error');
  });

  return bot;
}
