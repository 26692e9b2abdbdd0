import type { Context, NextFunction } from 'grammy';

import type { EventBus } from '../../../kernel/event-bus.js';
import { createLogger } from '../../../kernel/logger.js';

const log = createLogger('telegram-auth');

// ═══════════════════════════════════════════════════════════════════════════════
// AUTH MIDDLEWARE — allowlist by Telegram user ID, silent reject
// ═══════════════════════════════════════════════════════════════════════════════

export function createAuthMiddleware(allowedUserIds: number[], eventBus: EventBus) {
  const allowed = new Set(allowedUserIds);

  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const userId = ctx.from?.id;
    if (userId === undefined) return;

    // Empty allowlist = open bot
    if (allowed.size > 0 && !allowed.has(userId)) {
      const chatId = ctx.chat?.id ?? 0;
      log.warn({ userId, chatId }, 'Rejected message from user outside the allowlist');
      eventBus.emit('telegram:auth_rejected', {
        userId,
        chatId,
        timestamp: new Date().toISOString(),
      });
      return;
    }

    await next();
  };
}
