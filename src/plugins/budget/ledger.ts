import type { Clock } from '../../kernel/clock.js';
import { systemClock } from '../../kernel/clock.js';
import { InvalidCommandError } from '../../kernel/errors.js';
import type { DomainStateHandle } from '../../kernel/state-store.js';
import type { BudgetDriver } from './driver.js';
import { parseAmount } from './money.js';
import type { BudgetState, Transaction } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// BUDGET LEDGER — user commands over the budget record
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Every mutation goes through the same state handle the scheduler uses,
 * so a manual entry racing a weekly accrual never loses either.
 */
export class BudgetLedger {
  constructor(
    private readonly handle: DomainStateHandle<BudgetState>,
    private readonly driver: BudgetDriver,
    private readonly clock: Clock = systemClock,
  ) {}

  get currencySymbol(): string {
    return this.driver.currencySymbol;
  }

  async balance(): Promise<BudgetState> {
    return this.handle.read();
  }

  async history(): Promise<Transaction[]> {
    return (await this.handle.read()).transactions;
  }

  async add(amountText: string, comment = ''): Promise<{ amountMinor: number; state: BudgetState }> {
    return this.manual(requireAmount(amountText), comment);
  }

  async subtract(amountText: string, comment = ''): Promise<{ amountMinor: number; state: BudgetState }> {
    return this.manual(-requireAmount(amountText), comment);
  }

  async setWeeklyAmount(amountText: string): Promise<BudgetState> {
    const amountMinor = parseAmount(amountText);
    if (amountMinor === null) {
      throw new InvalidCommandError('Invalid amount. Use: /set 2.50');
    }
    return this.handle.update((current) => {
      const state = this.driver.setWeeklyAmount(current, amountMinor);
      return { state, result: state };
    });
  }

  private async manual(amountMinor: number, comment: string): Promise<{ amountMinor: number; state: BudgetState }> {
    return this.handle.update((current) => {
      const state = this.driver.applyManual(current, amountMinor, comment, this.clock.now());
      return { state, result: { amountMinor, state } };
    });
  }
}

function requireAmount(text: string): number {
  const amountMinor = parseAmount(text);
  if (amountMinor === null || amountMinor === 0) {
    throw new InvalidCommandError('Invalid amount. Use: /add 5.00 chocolate');
  }
  return amountMinor;
}
