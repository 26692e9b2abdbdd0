/**
 * Train watch state machine.
 *
 * Per chat: Inactive → Active(subscription) → Inactive. An active watch
 * polls the origin's departure board every `pollIntervalMs` and alerts
 * only on a real platform or status change. Departed or Cancelled, or the
 * train dropping off the board, ends the watch with one final alert.
 * /unwatch and replacement by a new /watch end it silently.
 */

import type { AlertChannel } from '../../autonomous/alert-dispatcher.js';
import { createAlert } from '../../autonomous/domain-driver.js';
import type { Clock } from '../../kernel/clock.js';
import { systemClock } from '../../kernel/clock.js';
import { InvalidSubscriptionError, NoContextError, TransientProviderError } from '../../kernel/errors.js';
import type { EventBus } from '../../kernel/event-bus.js';
import { createLogger, formatError } from '../../kernel/logger.js';
import type { DepartureProvider } from './api-client.js';
import { formatChangeAlert, formatVanishedAlert } from './formatters.js';
import type { WatchDelta } from './formatters.js';
import type { ShortcutBook } from './shortcuts.js';
import type { Board, Departure, SessionContext, TrainOptions, WatchSubscription } from './types.js';

const log = createLogger('train-watch');

const TERMINAL_STATUSES = ['departed', 'cancelled'];

// ─── Pure transitions ────────────────────────────────────────────────────────

export type WatchTickResult =
  | { kind: 'unchanged' }
  | { kind: 'changed'; subscription: WatchSubscription; alert: string }
  | { kind: 'ended'; reason: 'terminal' | 'vanished'; alert: string };

export function isTerminalStatus(status: string): boolean {
  const lower = status.toLowerCase();
  return TERMINAL_STATUSES.some((s) => lower.includes(s));
}

/** "8:15", "0815" and "08:15" all become "08:15"; anything else is returned trimmed. */
export function normaliseTrainIdentifier(text: string): string {
  const match = /^(\d{1,2}):?(\d{2})$/.exec(text.trim());
  if (!match) return text.trim();
  return `${match[1].padStart(2, '0')}:${match[2]}`;
}

/**
 * Matches on service ID when the target has one; only a target without an
 * ID falls back to scheduled time.
 */
export function findTrain(
  departures: Departure[],
  target: Pick<WatchSubscription, 'serviceId' | 'trainIdentifier'>,
): Departure | undefined {
  if (target.serviceId) {
    return departures.find((d) => d.serviceId === target.serviceId);
  }
  return departures.find((d) => d.std === target.trainIdentifier || d.serviceId === target.trainIdentifier);
}

/** One poll observation applied to an active subscription. */
export function evaluateTick(sub: WatchSubscription, departures: Departure[]): WatchTickResult {
  const train = findTrain(departures, sub);
  if (!train) {
    return { kind: 'ended', reason: 'vanished', alert: formatVanishedAlert(sub) };
  }

  const delta: WatchDelta = {};
  if (train.platform !== sub.lastKnownPlatform) {
    delta.platform = { from: sub.lastKnownPlatform, to: train.platform };
  }
  if (train.etd !== sub.lastKnownStatus) {
    delta.status = { from: sub.lastKnownStatus, to: train.etd };
  }

  if (isTerminalStatus(train.etd)) {
    return { kind: 'ended', reason: 'terminal', alert: formatChangeAlert(sub, delta, true) };
  }

  if (!delta.platform && !delta.status) {
    return { kind: 'unchanged' };
  }

  const next: WatchSubscription = {
    ...sub,
    lastKnownPlatform: train.platform,
    lastKnownStatus: train.etd,
  };
  return { kind: 'changed', subscription: next, alert: formatChangeAlert(sub, delta, false) };
}

// ─── Service ─────────────────────────────────────────────────────────────────

interface ActiveWatch {
  subscription: WatchSubscription;
  controller: AbortController;
  task: Promise<void> | null;
}

export interface TrainWatchServiceDeps {
  rail: DepartureProvider;
  shortcuts: ShortcutBook;
  dispatcher: AlertChannel;
  options: TrainOptions;
  clock?: Clock;
  eventBus?: EventBus;
}

export interface WatchRequest {
  trainIdentifier?: string;
  station?: string;
}

export class TrainWatchService {
  private readonly rail: DepartureProvider;
  private readonly shortcuts: ShortcutBook;
  private readonly dispatcher: AlertChannel;
  private readonly options: TrainOptions;
  private readonly clock: Clock;
  private readonly eventBus: EventBus | undefined;

  private readonly watches: Map<string, ActiveWatch> = new Map();
  private stopped = false;

  constructor(deps: TrainWatchServiceDeps) {
    this.rail = deps.rail;
    this.shortcuts = deps.shortcuts;
    this.dispatcher = deps.dispatcher;
    this.options = deps.options;
    this.clock = deps.clock ?? systemClock;
    this.eventBus = deps.eventBus;
  }

  /**
   * Fetch a board and make it the session's context.
   * Station: explicit → session's last station → configured default.
   */
  async board(session: SessionContext, station?: string): Promise<Board> {
    const crs = await this.resolveStation(session, station);
    const board = await this.rail.departures(crs, this.options.boardSize);
    session.lastStation = board.crs;
    session.lastBoard = board;
    return board;
  }

  /**
   * Start (or silently replace) the chat's watch.
   * @throws NoContextError when neither a train nor a board to pick from is known
   * @throws InvalidSubscriptionError when the train is not on the board
   */
  async watch(session: SessionContext, request: WatchRequest = {}): Promise<WatchSubscription> {
    if (this.stopped) {
      throw new InvalidSubscriptionError('Watches are unavailable while shutting down.');
    }

    let board: Board;
    let target: Pick<WatchSubscription, 'serviceId' | 'trainIdentifier'>;

    if (request.trainIdentifier) {
      board = await this.board(session, request.station);
      target = { serviceId: null, trainIdentifier: normaliseTrainIdentifier(request.trainIdentifier) };
    } else if (request.station) {
      board = await this.board(session, request.station);
      const first = board.departures[0];
      if (!first) {
        throw new InvalidSubscriptionError(`No departures on the ${board.crs} board to watch.`);
      }
      target = { serviceId: first.serviceId, trainIdentifier: first.std };
    } else {
      const lastBoard = session.lastBoard;
      const first = lastBoard?.departures[0];
      if (!lastBoard || !first) {
        throw new NoContextError('No recent departure board. Use /trains first, or /watch HH:MM.');
      }
      target = { serviceId: first.serviceId, trainIdentifier: first.std };
      board = await this.board(session, lastBoard.crs);
    }

    const train = findTrain(board.departures, target);
    if (!train) {
      throw new InvalidSubscriptionError(`No ${target.trainIdentifier} departure on the ${board.crs} board.`);
    }

    const subscription: WatchSubscription = {
      contextId: session.contextId,
      trainIdentifier: train.std,
      serviceId: train.serviceId,
      origin: board.crs,
      destination: train.destination,
      lastKnownPlatform: train.platform,
      lastKnownStatus: train.etd,
      createdAt: this.clock.now().toISOString(),
    };

    // stopAll() may have run while the board was in flight.
    if (this.stopped) {
      throw new InvalidSubscriptionError('Watches are unavailable while shutting down.');
    }

    this.end(session.contextId, 'replaced');

    const active: ActiveWatch = { subscription, controller: new AbortController(), task: null };
    this.watches.set(session.contextId, active);
    active.task = this.pollLoop(active);

    log.info(
      { contextId: session.contextId, train: subscription.trainIdentifier, origin: subscription.origin },
      'Watch started',
    );
    this.eventBus?.emit('watch:started', {
      contextId: session.contextId,
      trainIdentifier: subscription.trainIdentifier,
      origin: subscription.origin,
    });
    return subscription;
  }

  /** Clear the chat's watch without alerting. @returns the cleared subscription */
  unwatch(contextId: string): WatchSubscription | null {
    return this.end(contextId, 'unwatched');
  }

  get(contextId: string): WatchSubscription | null {
    return this.watches.get(contextId)?.subscription ?? null;
  }

  activeCount(): number {
    return this.watches.size;
  }

  /**
   * Poll once for the chat's watch. Returns null when no watch is active
   * (before or after the fetch).
   */
  async tick(contextId: string): Promise<WatchTickResult | null> {
    const active = this.watches.get(contextId);
    if (!active) return null;

    const { subscription } = active;
    let board: Board;
    try {
      board = await this.rail.departures(subscription.origin, this.options.boardSize);
    } catch (error) {
      if (!(error instanceof TransientProviderError)) throw error;
      log.warn({ contextId, err: formatError(error) }, 'Departure board unavailable; retrying next tick');
      return { kind: 'unchanged' };
    }

    // Unwatched or replaced while the board was in flight.
    if (this.watches.get(contextId) !== active) return null;

    const result = evaluateTick(active.subscription, board.departures);
    const now = this.clock.now();

    switch (result.kind) {
      case 'unchanged':
        break;
      case 'changed':
        active.subscription = result.subscription;
        this.dispatcher.dispatch(createAlert('trains', result.alert, { now, recipientId: contextId }));
        break;
      case 'ended':
        this.dispatcher.dispatch(
          createAlert('trains', result.alert, { now, recipientId: contextId, severity: 'warning' }),
        );
        this.end(contextId, result.reason);
        break;
    }
    return result;
  }

  /** Abort every poll loop and wait for in-flight ticks to settle. */
  async stopAll(): Promise<void> {
    this.stopped = true;
    const tasks: Promise<void>[] = [];
    for (const [contextId, active] of [...this.watches]) {
      if (active.task) tasks.push(active.task);
      this.end(contextId, 'shutdown');
    }
    await Promise.all(tasks);
  }

  // ── Private ────────────────────────────────────────────────────────────

  private async resolveStation(session: SessionContext, station?: string): Promise<string> {
    if (station) return this.shortcuts.resolve(station);
    const fallback = session.lastStation ?? this.options.defaultStation;
    if (!fallback) {
      throw new NoContextError('No station given and no recent or default station. Try /trains WAT.');
    }
    return fallback;
  }

  private end(
    contextId: string,
    reason: 'terminal' | 'vanished' | 'unwatched' | 'replaced' | 'shutdown',
  ): WatchSubscription | null {
    const active = this.watches.get(contextId);
    if (!active) return null;

    this.watches.delete(contextId);
    active.controller.abort();

    log.info({ contextId, train: active.subscription.trainIdentifier, reason }, 'Watch ended');
    this.eventBus?.emit('watch:ended', {
      contextId,
      trainIdentifier: active.subscription.trainIdentifier,
      reason,
    });
    return active.subscription;
  }

  private async pollLoop(active: ActiveWatch): Promise<void> {
    const { signal } = active.controller;
    const { contextId } = active.subscription;

    while (!signal.aborted) {
      await this.clock.sleep(this.options.pollIntervalMs, signal);
      if (signal.aborted) break;

      try {
        await this.tick(contextId);
      } catch (error) {
        log.error({ contextId, err: formatError(error) }, 'Watch tick failed');
      }
    }
  }
}
