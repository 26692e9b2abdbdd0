import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// BUDGET PLUGIN TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export const TransactionSchema = z.object({
  at: z.string().datetime(),
  /** Signed, in minor units (pence). */
  amountMinor: z.number().int(),
  comment: z.string(),
  kind: z.enum(['accrual', 'manual']),
  /** Weeks covered by an accrual transaction. */
  weeks: z.number().int().positive().optional(),
});
export type Transaction = z.infer<typeof TransactionSchema>;

export const BudgetStateSchema = z.object({
  balanceMinor: z.number().int(),
  weeklyAmountMinor: z.number().int().nonnegative(),
  lastAccrualAt: z.string().datetime(),
  transactions: z.array(TransactionSchema),
});
export type BudgetState = z.infer<typeof BudgetStateSchema>;

export interface BudgetOptions {
  /** Major units, e.g. 1.5 for £1.50. Only seeds a fresh record. */
  weeklyAmount: number;
  historyLimit: number;
  currencySymbol: string;
}

export interface AccrualDue {
  kind: 'accrual';
}
