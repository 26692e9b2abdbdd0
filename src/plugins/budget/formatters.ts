import { format } from 'date-fns';

import { escapeHtml } from '../../utils/format.js';
import { formatMoney } from './money.js';
import type { BudgetState, Transaction } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// BUDGET FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════════

export function accrualComment(weeks: number): string {
  return weeks === 1 ? '1 week accrued' : `${weeks} weeks accrued`;
}

export function formatAccrualAlert(
  amountMinor: number,
  weeks: number,
  balanceMinor: number,
  symbol: string,
): string {
  return (
    `Weekly allowance: added ${formatMoney(amountMinor, symbol)} (${accrualComment(weeks)}). ` +
    `Balance: ${formatMoney(balanceMinor, symbol)}`
  );
}

export function formatBalance(state: BudgetState, symbol: string): string {
  return (
    `💰 Balance: <b>${formatMoney(state.balanceMinor, symbol)}</b>\n` +
    `Weekly allowance: ${formatMoney(state.weeklyAmountMinor, symbol)}`
  );
}

export function formatTransaction(tx: Transaction, symbol: string): string {
  const when = format(new Date(tx.at), 'yyyy-MM-dd HH:mm');
  return `• ${when}: ${formatMoney(tx.amountMinor, symbol)} (${escapeHtml(tx.comment)})`;
}

export function formatHistory(transactions: Transaction[], symbol: string): string {
  if (transactions.length === 0) return '📜 No transactions yet.';
  return ['📜 <b>Recent history</b>', ...transactions.map((tx) => formatTransaction(tx, symbol))].join('\n');
}

export function formatManualEntry(amountMinor: number, balanceMinor: number, symbol: string): string {
  const action = amountMinor < 0 ? 'Subtracted' : 'Added';
  return `✅ ${action} ${formatMoney(Math.abs(amountMinor), symbol)}. New balance: ${formatMoney(balanceMinor, symbol)}`;
}
