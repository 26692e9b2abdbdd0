import type { Clock } from '../../kernel/clock.js';
import { systemClock } from '../../kernel/clock.js';
import type { DomainStateHandle } from '../../kernel/state-store.js';
import type { BinDriver, BinScheduleProvider } from './driver.js';
import type { BinState, Collection } from './types.js';

/**
 * /bins: the cached schedule, fetched first (under the domain lock) when
 * the cache holds nothing upcoming.
 */
export class BinScheduleService {
  constructor(
    private readonly handle: DomainStateHandle<BinState>,
    private readonly driver: BinDriver,
    private readonly provider: BinScheduleProvider,
    private readonly clock: Clock = systemClock,
  ) {}

  async upcoming(): Promise<Collection[]> {
    const now = this.clock.now();
    return this.handle.update(async (current) => {
      const cached = this.driver.upcoming(current, now);
      if (cached.length > 0) return { state: current, result: cached };

      const schedule = await this.provider.fetchSchedule(now);
      const state: BinState = { ...current, schedule, fetchedAt: now.toISOString() };
      return { state, result: this.driver.upcoming(state, now) };
    });
  }
}
