import { addDays, format, parse, set } from 'date-fns';

import { createAlert, unchanged } from '../../autonomous/domain-driver.js';
import type { Milestone, MilestoneDriver, MilestoneOutcome } from '../../autonomous/domain-driver.js';
import { TransientProviderError } from '../../kernel/errors.js';
import { createLogger, formatError } from '../../kernel/logger.js';
import { formatReminder } from './formatters.js';
import { BinStateSchema } from './types.js';
import type { BinMilestonePayload, BinOptions, BinState, Collection } from './types.js';

const log = createLogger('bins');

// ═══════════════════════════════════════════════════════════════════════════════
// BIN DRIVER — night-before / morning-of reminders and schedule refresh
// ═══════════════════════════════════════════════════════════════════════════════

export interface BinScheduleProvider {
  fetchSchedule(now: Date): Promise<Collection[]>;
}

type BinMilestone = Milestone<BinMilestonePayload>;

/** Local instant `dayOffset` days from `date` at the HH:mm `clock` time. */
function atClock(date: string, clock: string, dayOffset: number): Date {
  const [hours, minutes] = clock.split(':').map(Number);
  const day = addDays(parse(date, 'yyyy-MM-dd', new Date()), dayOffset);
  return set(day, { hours, minutes, seconds: 0, milliseconds: 0 });
}

function pointerOf(state: BinState): number {
  return state.lastNotifiedMilestone ? Date.parse(state.lastNotifiedMilestone) : Number.NEGATIVE_INFINITY;
}

/**
 * Missed reminders are never replayed: catch-up moves the pointer past
 * everything before `now`, and a reminder that fires later than the grace
 * window is dropped instead of sent.
 */
export class BinDriver implements MilestoneDriver<BinState, BinMilestonePayload> {
  readonly kind = 'bins' as const;
  readonly catchUpPolicy = 'discard' as const;
  readonly schema = BinStateSchema;
  readonly schemaVersion = 1;

  constructor(
    private readonly provider: BinScheduleProvider,
    private readonly options: BinOptions,
  ) {}

  defaultState(): BinState {
    return { schedule: [], fetchedAt: null, lastNotifiedMilestone: null };
  }

  /** Every milestone derivable from the cached schedule, in time order. */
  milestones(schedule: Collection[]): BinMilestone[] {
    const byDate = new Map<string, string[]>();
    for (const item of schedule) {
      const types = byDate.get(item.date) ?? [];
      if (!types.includes(item.type)) types.push(item.type);
      byDate.set(item.date, types);
    }

    const result: BinMilestone[] = [];
    for (const [date, types] of byDate) {
      result.push(
        { at: atClock(date, this.options.nightBefore, -1), payload: { kind: 'night-before', collectionDate: date, types } },
        { at: atClock(date, this.options.morningOf, 0), payload: { kind: 'morning-of', collectionDate: date, types } },
        { at: atClock(date, this.options.refreshAt, 1), payload: { kind: 'refresh', collectionDate: date, types } },
      );
    }
    return result.sort((a, b) => a.at.getTime() - b.at.getTime());
  }

  nextMilestone(state: BinState, now: Date): BinMilestone {
    const pointer = pointerOf(state);
    const next = this.milestones(state.schedule).find((m) => m.at.getTime() > pointer);
    if (next) return next;

    // Nothing left in the cache: refresh, but no more often than retryDelayMs.
    const earliest = state.fetchedAt ? Date.parse(state.fetchedAt) + this.options.retryDelayMs : now.getTime();
    return {
      at: new Date(Math.max(now.getTime(), earliest)),
      payload: { kind: 'refresh', collectionDate: null, types: [] },
    };
  }

  async onMilestone(state: BinState, now: Date): Promise<MilestoneOutcome<BinState>> {
    const milestone = this.nextMilestone(state, now);
    if (milestone.at.getTime() > now.getTime()) return unchanged(state);

    const { kind, collectionDate, types } = milestone.payload;
    if (kind === 'refresh') {
      const schedule = await this.provider.fetchSchedule(now);
      return {
        state: {
          schedule,
          fetchedAt: now.toISOString(),
          lastNotifiedMilestone: collectionDate ? milestone.at.toISOString() : state.lastNotifiedMilestone,
        },
        alerts: [],
      };
    }

    const next: BinState = { ...state, lastNotifiedMilestone: milestone.at.toISOString() };
    const lateMs = now.getTime() - milestone.at.getTime();
    if (lateMs > this.options.staleGraceMinutes * 60_000) {
      log.warn({ kind, collectionDate, lateMs }, 'Stale bin reminder discarded');
      return { state: next, alerts: [] };
    }

    log.info({ kind, collectionDate, types }, 'Bin reminder due');
    return { state: next, alerts: [createAlert('bins', formatReminder(kind, types), { now })] };
  }

  async reconcile(state: BinState, now: Date): Promise<MilestoneOutcome<BinState>> {
    let current = state;

    const hasUpcoming = this.milestones(current.schedule).some((m) => m.at.getTime() >= now.getTime());
    const fetchedRecently =
      current.fetchedAt !== null && now.getTime() - Date.parse(current.fetchedAt) < this.options.retryDelayMs;

    if (!hasUpcoming && !fetchedRecently) {
      try {
        const schedule = await this.provider.fetchSchedule(now);
        current = { ...current, schedule, fetchedAt: now.toISOString() };
      } catch (error) {
        if (!(error instanceof TransientProviderError)) throw error;
        log.warn({ err: formatError(error) }, 'Bin feed unavailable during catch-up; keeping cached schedule');
      }
    }

    const pointer = pointerOf(current);
    const missed = this.milestones(current.schedule).filter(
      (m) => m.at.getTime() < now.getTime() && m.at.getTime() > pointer,
    );
    if (missed.length > 0) {
      const last = missed[missed.length - 1];
      log.info({ discarded: missed.length, pointer: last.at.toISOString() }, 'Discarding missed bin milestones');
      current = { ...current, lastNotifiedMilestone: last.at.toISOString() };
    }

    return unchanged(current);
  }

  /** Collections on or after today's date. */
  upcoming(state: BinState, now: Date): Collection[] {
    const today = format(now, 'yyyy-MM-dd');
    return state.schedule.filter((c) => c.date >= today);
  }
}
