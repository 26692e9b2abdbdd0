import { createAlert, unchanged } from '../../autonomous/domain-driver.js';
import type { Milestone, MilestoneDriver, MilestoneOutcome } from '../../autonomous/domain-driver.js';
import { createLogger } from '../../kernel/logger.js';
import { accrualComment, formatAccrualAlert } from './formatters.js';
import { toMinor } from './money.js';
import { BudgetStateSchema, WEEK_MS } from './types.js';
import type { AccrualDue, BudgetOptions, BudgetState, Transaction } from './types.js';

const log = createLogger('budget');

// ═══════════════════════════════════════════════════════════════════════════════
// BUDGET DRIVER — weekly allowance accrual
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Accrues the weekly allowance. Catch-up replays every missed week as one
 * combined transaction and moves `lastAccrualAt` forward by whole weeks
 * only, so a partial week carries over to the next cycle.
 */
export class BudgetDriver implements MilestoneDriver<BudgetState, AccrualDue> {
  readonly kind = 'budget' as const;
  readonly catchUpPolicy = 'replay' as const;
  readonly schema = BudgetStateSchema;
  readonly schemaVersion = 1;

  constructor(private readonly options: BudgetOptions) {}

  get currencySymbol(): string {
    return this.options.currencySymbol;
  }

  defaultState(now: Date): BudgetState {
    return {
      balanceMinor: 0,
      weeklyAmountMinor: toMinor(this.options.weeklyAmount),
      lastAccrualAt: now.toISOString(),
      transactions: [],
    };
  }

  nextMilestone(state: BudgetState): Milestone<AccrualDue> {
    return {
      at: new Date(Date.parse(state.lastAccrualAt) + WEEK_MS),
      payload: { kind: 'accrual' },
    };
  }

  onMilestone(state: BudgetState, now: Date): MilestoneOutcome<BudgetState> {
    return this.accrue(state, now);
  }

  reconcile(state: BudgetState, now: Date): MilestoneOutcome<BudgetState> {
    return this.accrue(state, now);
  }

  /** Credit every whole week since `lastAccrualAt` in a single transaction. */
  accrue(state: BudgetState, now: Date): MilestoneOutcome<BudgetState> {
    const last = Date.parse(state.lastAccrualAt);
    const weeks = Math.floor((now.getTime() - last) / WEEK_MS);
    if (weeks < 1) return unchanged(state);

    const amountMinor = weeks * state.weeklyAmountMinor;
    const next = this.appendTransaction(
      {
        ...state,
        balanceMinor: state.balanceMinor + amountMinor,
        lastAccrualAt: new Date(last + weeks * WEEK_MS).toISOString(),
      },
      { at: now.toISOString(), amountMinor, comment: accrualComment(weeks), kind: 'accrual', weeks },
    );

    log.info({ weeks, amountMinor, balanceMinor: next.balanceMinor }, 'Weekly allowance accrued');

    const alert = createAlert(
      'budget',
      formatAccrualAlert(amountMinor, weeks, next.balanceMinor, this.options.currencySymbol),
      { now },
    );
    return { state: next, alerts: [alert] };
  }

  // ── Commands (pure transforms, applied through the state handle) ──────

  applyManual(state: BudgetState, amountMinor: number, comment: string, now: Date): BudgetState {
    return this.appendTransaction(
      { ...state, balanceMinor: state.balanceMinor + amountMinor },
      {
        at: now.toISOString(),
        amountMinor,
        comment: comment.trim() || 'Manual entry',
        kind: 'manual',
      },
    );
  }

  setWeeklyAmount(state: BudgetState, amountMinor: number): BudgetState {
    if (state.weeklyAmountMinor === amountMinor) return state;
    return { ...state, weeklyAmountMinor: amountMinor };
  }

  private appendTransaction(state: BudgetState, tx: Transaction): BudgetState {
    return {
      ...state,
      transactions: [...state.transactions, tx].slice(-this.options.historyLimit),
    };
  }
}
