/**
 * MilestoneScheduler — sleep-until-next-milestone loop, one task per domain.
 *
 * Each pass reads the domain state, asks the driver for its next milestone,
 * sleeps until then (cancellable, capped so clock jumps and suspends are
 * noticed), re-reads the clock and, if the milestone is due, runs the
 * driver's evaluation inside the state store's read-modify-write lock.
 * Alerts are dispatched only after the new state has been persisted.
 */

import type { Clock } from '../kernel/clock.js';
import { systemClock } from '../kernel/clock.js';
import { TransientProviderError } from '../kernel/errors.js';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../kernel/logger.js';
import type { DomainStateHandle } from '../kernel/state-store.js';
import type { AlertChannel } from './alert-dispatcher.js';
import type { MilestoneDriver } from './domain-driver.js';

const log = createLogger('milestone-scheduler');

export interface MilestoneSchedulerOptions {
  dispatcher: AlertChannel;
  clock?: Clock;
  eventBus?: EventBus;
  /** Wait after a failed pass before trying again (default: 1 hour). */
  retryDelayMs?: number;
  /** Longest single sleep (default: 6 hours). */
  maxSleepMs?: number;
}

export class MilestoneScheduler {
  private readonly dispatcher: AlertChannel;
  private readonly clock: Clock;
  private readonly eventBus: EventBus | undefined;
  private readonly retryDelayMs: number;
  private readonly maxSleepMs: number;

  constructor(options: MilestoneSchedulerOptions) {
    this.dispatcher = options.dispatcher;
    this.clock = options.clock ?? systemClock;
    this.eventBus = options.eventBus;
    this.retryDelayMs = options.retryDelayMs ?? 60 * 60 * 1000;
    this.maxSleepMs = options.maxSleepMs ?? 6 * 60 * 60 * 1000;
  }

  /**
   * Loop until `signal` aborts. Never rejects: every failure is logged and
   * followed by a `retryDelayMs` wait.
   */
  async run<S, P>(
    driver: MilestoneDriver<S, P>,
    handle: DomainStateHandle<S>,
    signal: AbortSignal,
  ): Promise<void> {
    const domain = driver.kind;
    log.info({ domain }, 'Scheduler started');
    this.eventBus?.emit('scheduler:started', { domain, timestamp: this.clock.now() });

    while (!signal.aborted) {
      try {
        await this.step(driver, handle, signal);
      } catch (error) {
        const transient = error instanceof TransientProviderError;
        if (transient) {
          log.warn({ domain, err: formatError(error), retryInMs: this.retryDelayMs }, 'Provider unavailable');
        } else {
          log.error({ domain, err: formatError(error), retryInMs: this.retryDelayMs }, 'Milestone evaluation failed');
        }
        this.eventBus?.emit('scheduler:error', {
          domain,
          error: error instanceof Error ? error.message : String(error),
          transient,
          timestamp: this.clock.now(),
        });
        await this.clock.sleep(this.retryDelayMs, signal);
      }
    }

    log.info({ domain }, 'Scheduler stopped');
    this.eventBus?.emit('scheduler:stopped', { domain, timestamp: this.clock.now() });
  }

  /**
   * One pass of the loop.
   * @returns true when a due milestone was evaluated
   */
  async step<S, P>(
    driver: MilestoneDriver<S, P>,
    handle: DomainStateHandle<S>,
    signal: AbortSignal,
  ): Promise<boolean> {
    const state = await handle.read();
    const now = this.clock.now();
    const milestone = driver.nextMilestone(state, now);

    const delayMs = Math.min(Math.max(0, milestone.at.getTime() - now.getTime()), this.maxSleepMs);
    if (delayMs > 0) {
      log.debug({ domain: driver.kind, at: milestone.at.toISOString(), delayMs }, 'Sleeping until next milestone');
      await this.clock.sleep(delayMs, signal);
    }
    if (signal.aborted) return false;

    // Sleeps are never exact; trust only a fresh reading.
    const wokeAt = this.clock.now();
    if (wokeAt.getTime() < milestone.at.getTime()) return false;

    const alerts = await handle.update(async (current) => {
      const outcome = await driver.onMilestone(current, wokeAt);
      return { state: outcome.state, result: outcome.alerts };
    });

    for (const alert of alerts) {
      this.dispatcher.dispatch(alert);
    }

    this.eventBus?.emit('scheduler:milestone', {
      domain: driver.kind,
      scheduledFor: milestone.at,
      ranAt: wokeAt,
      alerts: alerts.length,
    });
    return true;
  }
}
