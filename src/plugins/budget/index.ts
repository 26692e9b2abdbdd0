export { BudgetDriver } from './driver.js';
export { BudgetLedger } from './ledger.js';
export { formatMoney, parseAmount, toMinor } from './money.js';
export { formatAccrualAlert, formatBalance, formatHistory, formatManualEntry } from './formatters.js';
export { BudgetStateSchema, WEEK_MS } from './types.js';
export type { BudgetOptions, BudgetState, Transaction } from './types.js';
