import type { Context, NextFunction } from 'grammy';

import type { EventBus } from '../../../kernel/event-bus.js';
import { createLogger } from '../../../kernel/logger.js';

const log = createLogger('telegram-bot');

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MIDDLEWARE — one event and one log line per command
// ═══════════════════════════════════════════════════════════════════════════════

/** "/watch@my_bot 08:15" → "watch"; null for plain text. */
export function commandName(text: string): string | null {
  if (!text.startsWith('/')) return null;
  const head = text.slice(1).split(/\s+/)[0] ?? '';
  return head.split('@')[0] || null;
}

export function createLoggingMiddleware(eventBus: EventBus) {
  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const command = commandName(ctx.message?.text ?? '');
    if (!command) {
      await next();
      return;
    }

    const userId = ctx.from?.id ?? 0;
    const chatId = ctx.chat?.id ?? 0;
    eventBus.emit('telegram:command_received', {
      command,
      userId,
      chatId,
      timestamp: new Date().toISOString(),
    });

    const started = Date.now();
    await next();
    log.info({ command, userId, chatId, durationMs: Date.now() - started }, 'Command handled');
  };
}
