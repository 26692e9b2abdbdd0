/**
 * Runtime — builds the kernel from configuration and owns its lifecycle.
 *
 * start(): load every domain record, run catch-up for each milestone
 * domain, start the dispatcher drain and one scheduler task per domain.
 * stop(): abort every sleep, let in-flight writes and ticks finish, end
 * watches, flush the dispatcher (bounded) and close the store.
 */

import path from 'node:path';

import { getDataDir } from '../config/config.js';
import type { Clock } from '../kernel/clock.js';
import { systemClock } from '../kernel/clock.js';
import { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../kernel/logger.js';
import { FileStateBacking, SqliteStateBacking } from '../kernel/state-backing.js';
import type { StateBacking } from '../kernel/state-backing.js';
import { StateStore } from '../kernel/state-store.js';
import type { DomainStateHandle } from '../kernel/state-store.js';
import { BinDriver, BinFeedClient, BinScheduleService } from '../plugins/bins/index.js';
import type { BinScheduleProvider, BinState } from '../plugins/bins/index.js';
import { BudgetDriver, BudgetLedger, formatMoney } from '../plugins/budget/index.js';
import type { BudgetState } from '../plugins/budget/index.js';
import { RailClient, SessionRegistry, ShortcutBook, TRAIN_STATE_SPEC, TrainWatchService } from '../plugins/trains/index.js';
import type { DepartureProvider } from '../plugins/trains/index.js';
import type { Config, DomainName } from '../types/index.js';
import { AlertDispatcher } from './alert-dispatcher.js';
import type { DeliverySink } from './alert-dispatcher.js';
import { CatchUpReconciler } from './catch-up.js';
import type { ReconcileResult } from './catch-up.js';
import { MilestoneScheduler } from './milestone-scheduler.js';

const log = createLogger('runtime');

const SHUTDOWN_FLUSH_MS = 10_000;

// ─── Types ───────────────────────────────────────────────────────────────────

/** The closed set of scheduled domains. Trains run on the watch machine instead. */
export type ScheduledDomain =
  | { kind: 'budget'; driver: BudgetDriver; handle: DomainStateHandle<BudgetState> }
  | { kind: 'bins'; driver: BinDriver; handle: DomainStateHandle<BinState> };

export interface RuntimeOptions {
  config: Config;
  /** Defaults to the backing named by `config.store.backend`. */
  backing?: StateBacking;
  clock?: Clock;
  eventBus?: EventBus;
  sinks?: DeliverySink[];
  binProvider?: BinScheduleProvider;
  rail?: DepartureProvider;
}

export interface DomainStatus {
  domain: DomainName;
  nextMilestone: Date | null;
  summary: string;
}

export interface RuntimeStats {
  startedAt: Date | null;
  milestones: number;
  alertsDelivered: number;
  alertsDropped: number;
  errors: Partial<Record<DomainName, number>>;
  corruptRecords: number;
}

export function createBacking(config: Config): StateBacking {
  const dataDir = getDataDir(config);
  return config.store.backend === 'sqlite'
    ? new SqliteStateBacking(path.join(dataDir, 'state.db'))
    : new FileStateBacking(path.join(dataDir, 'state'));
}

// ─── Runtime ─────────────────────────────────────────────────────────────────

export class Runtime {
  readonly eventBus: EventBus;
  readonly clock: Clock;
  readonly store: StateStore;
  readonly dispatcher: AlertDispatcher;
  readonly scheduler: MilestoneScheduler;
  readonly reconciler: CatchUpReconciler;

  readonly budget: { driver: BudgetDriver; handle: DomainStateHandle<BudgetState>; ledger: BudgetLedger } | null;
  readonly bins: { driver: BinDriver; handle: DomainStateHandle<BinState>; service: BinScheduleService } | null;
  readonly trains: { watch: TrainWatchService; shortcuts: ShortcutBook; sessions: SessionRegistry } | null;

  private readonly domains: ScheduledDomain[] = [];
  private controller: AbortController | null = null;
  private tasks: Promise<void>[] = [];
  private stopping: Promise<void> | null = null;
  private readonly stats: RuntimeStats = {
    startedAt: null,
    milestones: 0,
    alertsDelivered: 0,
    alertsDropped: 0,
    errors: {},
    corruptRecords: 0,
  };

  constructor(options: RuntimeOptions) {
    const { config } = options;
    this.eventBus = options.eventBus ?? new EventBus();
    this.clock = options.clock ?? systemClock;

    this.store = new StateStore({
      backing: options.backing ?? createBacking(config),
      clock: this.clock,
      eventBus: this.eventBus,
      writeAttempts: config.store.writeAttempts,
    });

    this.dispatcher = new AlertDispatcher({
      routes: config.telegram.routes,
      eventBus: this.eventBus,
      clock: this.clock,
      maxAttempts: config.dispatch.maxAttempts,
      initialDelayMs: config.dispatch.initialDelayMs,
      maxDelayMs: config.dispatch.maxDelayMs,
    });
    for (const sink of options.sinks ?? []) {
      this.dispatcher.register(sink);
    }

    this.scheduler = new MilestoneScheduler({
      dispatcher: this.dispatcher,
      clock: this.clock,
      eventBus: this.eventBus,
      retryDelayMs: config.scheduler.retryDelayMs,
      maxSleepMs: config.scheduler.maxSleepMs,
    });
    this.reconciler = new CatchUpReconciler(this.dispatcher, this.eventBus);

    this.budget = this.buildBudget(config);
    this.bins = this.buildBins(config, options.binProvider);
    this.trains = this.buildTrains(config, options.rail);

    this.trackStats();
  }

  /** Every scheduled domain, in start order. */
  get scheduledDomains(): readonly ScheduledDomain[] {
    return this.domains;
  }

  async start(): Promise<void> {
    if (this.controller) return;

    await this.load();
    await this.reconcileAll();

    this.controller = new AbortController();
    this.dispatcher.start();

    const { signal } = this.controller;
    this.tasks = this.domains.map((domain) => this.runDomain(domain, signal));
    this.stats.startedAt = this.clock.now();
    log.info({ domains: this.domains.map((d) => d.kind), trains: this.trains !== null }, 'Runtime started');
  }

  /** Safe to call more than once; later calls wait for the first. */
  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Load every domain record, recovering corrupt ones to defaults.
   * A domain whose record cannot be read or written stays scheduled; its
   * scheduler retries the write on its own schedule.
   */
  async load(): Promise<void> {
    for (const domain of this.domains) {
      try {
        await domain.handle.load();
      } catch (error) {
        this.loadFailed(domain.kind, error);
      }
    }
    if (this.trains) {
      try {
        await this.trains.shortcuts.load();
      } catch (error) {
        this.loadFailed('trains', error);
      }
    }
  }

  /** Catch-up for every scheduled domain. One domain's failure never stops the others. */
  async reconcileAll(): Promise<Array<{ domain: DomainName; result: ReconcileResult<unknown> | null }>> {
    const results: Array<{ domain: DomainName; result: ReconcileResult<unknown> | null }> = [];
    const now = this.clock.now();

    for (const domain of this.domains) {
      try {
        results.push({ domain: domain.kind, result: await this.reconcileDomain(domain, now) });
      } catch (error) {
        log.error({ domain: domain.kind, err: formatError(error) }, 'Catch-up failed; scheduler will retry');
        results.push({ domain: domain.kind, result: null });
      }
    }
    return results;
  }

  async status(): Promise<DomainStatus[]> {
    const now = this.clock.now();
    const result: DomainStatus[] = [];

    for (const domain of this.domains) {
      if (domain.kind === 'budget') {
        const state = await domain.handle.read();
        result.push({
          domain: 'budget',
          nextMilestone: domain.driver.nextMilestone(state).at,
          summary: `balance ${formatMoney(state.balanceMinor, domain.driver.currencySymbol)}, ${state.transactions.length} transactions`,
        });
      } else {
        const state = await domain.handle.read();
        const next = domain.driver.nextMilestone(state, now);
        result.push({
          domain: 'bins',
          nextMilestone: next.at,
          summary: `${state.schedule.length} collections cached, next: ${next.payload.kind}`,
        });
      }
    }

    if (this.trains) {
      result.push({
        domain: 'trains',
        nextMilestone: null,
        summary: `${this.trains.watch.activeCount()} active watch(es)`,
      });
    }
    return result;
  }

  getStats(): RuntimeStats {
    return { ...this.stats, errors: { ...this.stats.errors } };
  }

  // ── Private ────────────────────────────────────────────────────────────

  private loadFailed(domain: DomainName, error: unknown): void {
    log.error({ domain, err: formatError(error) }, 'Domain state unavailable at startup; other domains continue');
    this.stats.errors[domain] = (this.stats.errors[domain] ?? 0) + 1;
  }

  private reconcileDomain(domain: ScheduledDomain, now: Date): Promise<ReconcileResult<unknown>> {
    switch (domain.kind) {
      case 'budget':
        return this.reconciler.reconcile(domain.driver, domain.handle, now);
      case 'bins':
        return this.reconciler.reconcile(domain.driver, domain.handle, now);
    }
  }

  private runDomain(domain: ScheduledDomain, signal: AbortSignal): Promise<void> {
    switch (domain.kind) {
      case 'budget':
        return this.scheduler.run(domain.driver, domain.handle, signal);
      case 'bins':
        return this.scheduler.run(domain.driver, domain.handle, signal);
    }
  }

  private async shutdown(): Promise<void> {
    log.info('Runtime stopping');
    this.controller?.abort();
    await Promise.all(this.tasks);
    this.tasks = [];

    if (this.trains) {
      await this.trains.watch.stopAll();
    }

    const flushed = await this.dispatcher.flush(SHUTDOWN_FLUSH_MS);
    if (!flushed) {
      log.warn({ pending: this.dispatcher.getStats().queued }, 'Shutdown flush timed out');
    }
    await this.dispatcher.stop();
    await this.store.close();
    log.info('Runtime stopped');
  }

  private buildBudget(config: Config): Runtime['budget'] {
    if (!config.budget.enabled) return null;

    const driver = new BudgetDriver({
      weeklyAmount: config.budget.weeklyAmount,
      historyLimit: config.budget.historyLimit,
      currencySymbol: config.budget.currencySymbol,
    });
    const handle = this.store.domain('budget', {
      schema: driver.schema,
      defaults: (now) => driver.defaultState(now),
      schemaVersion: driver.schemaVersion,
    });
    this.domains.push({ kind: 'budget', driver, handle });
    return { driver, handle, ledger: new BudgetLedger(handle, driver, this.clock) };
  }

  private buildBins(config: Config, injected?: BinScheduleProvider): Runtime['bins'] {
    if (!config.bins.enabled) return null;

    const provider =
      injected ?? (config.bins.feedUrl ? new BinFeedClient(config.bins.feedUrl, { ignoreTypes: config.bins.ignoreTypes }) : null);
    if (!provider) {
      log.warn('Bin reminders enabled but no feed URL configured; bins domain disabled');
      return null;
    }

    const driver = new BinDriver(provider, {
      nightBefore: config.bins.nightBefore,
      morningOf: config.bins.morningOf,
      refreshAt: config.bins.refreshAt,
      staleGraceMinutes: config.bins.staleGraceMinutes,
      retryDelayMs: config.scheduler.retryDelayMs,
    });
    const handle = this.store.domain('bins', {
      schema: driver.schema,
      defaults: () => driver.defaultState(),
      schemaVersion: driver.schemaVersion,
    });
    this.domains.push({ kind: 'bins', driver, handle });
    return { driver, handle, service: new BinScheduleService(handle, driver, provider, this.clock) };
  }

  private buildTrains(config: Config, injected?: DepartureProvider): Runtime['trains'] {
    if (!config.trains.enabled) return null;

    const rail = injected ?? (config.trains.apiUrl ? new RailClient(config.trains.apiUrl, config.trains.accessToken) : null);
    if (!rail) {
      log.warn('Train watch enabled but no departure board URL configured; trains domain disabled');
      return null;
    }

    const shortcuts = new ShortcutBook(this.store.domain('trains', TRAIN_STATE_SPEC));
    const watch = new TrainWatchService({
      rail,
      shortcuts,
      dispatcher: this.dispatcher,
      clock: this.clock,
      eventBus: this.eventBus,
      options: {
        defaultStation: config.trains.defaultStation,
        pollIntervalMs: config.trains.pollIntervalSeconds * 1000,
        boardSize: config.trains.boardSize,
      },
    });
    return { watch, shortcuts, sessions: new SessionRegistry() };
  }

  private trackStats(): void {
    this.eventBus.on('scheduler:milestone', () => {
      this.stats.milestones++;
    });
    this.eventBus.on('scheduler:error', ({ domain }) => {
      this.stats.errors[domain] = (this.stats.errors[domain] ?? 0) + 1;
    });
    this.eventBus.on('alert:delivered', () => {
      this.stats.alertsDelivered++;
    });
    this.eventBus.on('alert:dropped', () => {
      this.stats.alertsDropped++;
    });
    this.eventBus.on('state:corrupt', () => {
      this.stats.corruptRecords++;
    });
  }
}
