/**
 * Catch-up reconciliation, run once per domain at startup before its
 * scheduler. The driver's own policy decides what missed milestones mean
 * (replay the cumulative effect, or discard and resync).
 */

import type { EventBus } from '../kernel/event-bus.js';
import { TransientProviderError } from '../kernel/errors.js';
import { createLogger, formatError } from '../kernel/logger.js';
import type { DomainStateHandle } from '../kernel/state-store.js';
import type { Alert } from '../types/index.js';
import type { AlertChannel } from './alert-dispatcher.js';
import type { MilestoneDriver } from './domain-driver.js';

const log = createLogger('catch-up');

export interface ReconcileResult<S> {
  state: S;
  alerts: Alert[];
  changed: boolean;
}

export class CatchUpReconciler {
  constructor(
    private readonly dispatcher: AlertChannel,
    private readonly eventBus?: EventBus,
  ) {}

  /**
   * Reconcile one domain. Persists before dispatching. A transient provider
   * failure leaves the state untouched and is not rethrown; the scheduler
   * retries on its own schedule.
   */
  async reconcile<S, P>(
    driver: MilestoneDriver<S, P>,
    handle: DomainStateHandle<S>,
    now: Date,
  ): Promise<ReconcileResult<S>> {
    let result: ReconcileResult<S>;
    try {
      result = await handle.update(async (current) => {
        const outcome = await driver.reconcile(current, now);
        const changed = outcome.state !== current;
        return {
          state: outcome.state,
          result: { state: outcome.state, alerts: outcome.alerts, changed },
        };
      });
    } catch (error) {
      if (!(error instanceof TransientProviderError)) throw error;
      log.warn({ domain: driver.kind, err: formatError(error) }, 'Provider unavailable during catch-up; keeping cached state');
      result = { state: await handle.read(), alerts: [], changed: false };
    }

    for (const alert of result.alerts) {
      this.dispatcher.dispatch(alert);
    }

    log.info(
      { domain: driver.kind, policy: driver.catchUpPolicy, changed: result.changed, alerts: result.alerts.length },
      'Catch-up complete',
    );
    this.eventBus?.emit('catchup:completed', {
      domain: driver.kind,
      policy: driver.catchUpPolicy,
      changed: result.changed,
      alerts: result.alerts.length,
    });
    return result;
  }
}
