import type { BinScheduleService } from '../bins/index.js';
import type { BudgetLedger } from '../budget/index.js';
import type { SessionRegistry, ShortcutBook, TrainWatchService } from '../trains/index.js';
import type { DomainStatus, RuntimeStats } from '../../autonomous/runtime.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM BOT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface TelegramBotConfig {
  botToken?: string;
  /** Empty = allow everyone. */
  allowedUserIds: number[];
}

export interface TrainServices {
  watch: TrainWatchService;
  shortcuts: ShortcutBook;
  sessions: SessionRegistry;
}

export interface StatusSource {
  status(): Promise<DomainStatus[]>;
  getStats(): RuntimeStats;
}

/** What the command handlers reach into. A null service means the domain is disabled. */
export interface BotServices {
  ledger: BudgetLedger | null;
  bins: BinScheduleService | null;
  trains: TrainServices | null;
  status: StatusSource;
}
