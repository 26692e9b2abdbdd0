import type { Context } from 'grammy';

import { formatBalance, formatHistory, formatManualEntry, formatMoney } from '../../budget/index.js';
import type { BudgetLedger } from '../../budget/index.js';
import { commandArgs, replyDisabled, replyError, replyHtml } from './reply.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /balance /add /sub /history /set — weekly allowance ledger
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleBalance(ctx: Context, ledger: BudgetLedger | null): Promise<void> {
  if (!ledger) return replyDisabled(ctx, 'Budget');

  try {
    const state = await ledger.balance();
    await replyHtml(ctx, formatBalance(state, ledger.currencySymbol));
  } catch (error) {
    await replyError(ctx, 'balance', error);
  }
}

export async function handleAdd(ctx: Context, ledger: BudgetLedger | null): Promise<void> {
  return handleManual(ctx, ledger, 'add');
}

export async function handleSubtract(ctx: Context, ledger: BudgetLedger | null): Promise<void> {
  return handleManual(ctx, ledger, 'sub');
}

async function handleManual(ctx: Context, ledger: BudgetLedger | null, command: 'add' | 'sub'): Promise<void> {
  if (!ledger) return replyDisabled(ctx, 'Budget');

  const [amount, ...rest] = commandArgs(ctx);
  if (!amount) {
    await ctx.reply(`Usage: /${command} <amount> [reason]`);
    return;
  }

  try {
    const comment = rest.join(' ');
    const { amountMinor, state } =
      command === 'add' ? await ledger.add(amount, comment) : await ledger.subtract(amount, comment);
    await replyHtml(ctx, formatManualEntry(amountMinor, state.balanceMinor, ledger.currencySymbol));
  } catch (error) {
    await replyError(ctx, command, error);
  }
}

export async function handleHistory(ctx: Context, ledger: BudgetLedger | null): Promise<void> {
  if (!ledger) return replyDisabled(ctx, 'Budget');

  try {
    const transactions = await ledger.history();
    await replyHtml(ctx, formatHistory(transactions, ledger.currencySymbol));
  } catch (error) {
    await replyError(ctx, 'history', error);
  }
}

export async function handleSetWeekly(ctx: Context, ledger: BudgetLedger | null): Promise<void> {
  if (!ledger) return replyDisabled(ctx, 'Budget');

  const [amount] = commandArgs(ctx);
  if (!amount) {
    await ctx.reply('Usage: /set <weekly amount>');
    return;
  }

  try {
    const state = await ledger.setWeeklyAmount(amount);
    await replyHtml(ctx, `⚙️ Weekly allowance set to ${formatMoney(state.weeklyAmountMinor, ledger.currencySymbol)}`);
  } catch (error) {
    await replyError(ctx, 'set', error);
  }
}
