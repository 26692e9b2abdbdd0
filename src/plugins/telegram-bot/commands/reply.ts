import type { Context } from 'grammy';

import { PersistenceError, TransientProviderError, isCommandError } from '../../../kernel/errors.js';
import { createLogger, formatError } from '../../../kernel/logger.js';
import { escapeHtml, splitMessage } from '../../../utils/format.js';

const log = createLogger('telegram-commands');

// ═══════════════════════════════════════════════════════════════════════════════
// Shared reply helpers
// ═══════════════════════════════════════════════════════════════════════════════

/** Words after the command, e.g. "/add 5 sweets" → ["5", "sweets"]. */
export function commandArgs(ctx: Context): string[] {
  const text = ctx.message?.text ?? '';
  return text.trim().split(/\s+/).slice(1);
}

export function contextIdOf(ctx: Context): string {
  return String(ctx.chat?.id ?? ctx.from?.id ?? 0);
}

export async function replyHtml(ctx: Context, text: string): Promise<void> {
  for (const chunk of splitMessage(text)) {
    await ctx.reply(chunk, { parse_mode: 'HTML' });
  }
}

export async function replyDisabled(ctx: Context, feature: string): Promise<void> {
  await ctx.reply(`${feature} is not configured.`);
}

/**
 * Command errors go back to the user verbatim; anything else is logged
 * and answered with a generic line.
 */
export async function replyError(ctx: Context, command: string, error: unknown): Promise<void> {
  if (isCommandError(error)) {
    await ctx.reply(`⚠️ ${escapeHtml(error.message)}`, { parse_mode: 'HTML' });
    return;
  }
  if (error instanceof TransientProviderError) {
    log.warn({ command, err: formatError(error) }, 'Provider unavailable for command');
    await ctx.reply('⚠️ The data source is unavailable right now. Try again shortly.');
    return;
  }
  if (error instanceof PersistenceError) {
    log.error({ command, err: formatError(error) }, 'Command change not saved');
    await ctx.reply('⚠️ Could not save that change. Please try again.');
    return;
  }
  log.error({ command, err: formatError(error) }, 'Command failed');
  await ctx.reply('⚠️ Something went wrong.');
}
