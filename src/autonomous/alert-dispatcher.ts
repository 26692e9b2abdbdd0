/**
 * AlertDispatcher — decouples "an alert was produced" from delivery.
 *
 * Producers call dispatch() and return immediately. Alerts sit in an
 * in-memory FIFO channel drained by a single task, which resolves the
 * recipient, hands the payload to every matching sink and retries failed
 * deliveries with exponential backoff. A delivery that still fails is
 * logged and reported as `alert:dropped`; nothing is ever thrown back
 * into the scheduler or watch loop that produced the alert.
 */

import type { Clock } from '../kernel/clock.js';
import { systemClock } from '../kernel/clock.js';
import { DeliveryError } from '../kernel/errors.js';
import type { EventBus } from '../kernel/event-bus.js';
import { createLogger, formatError } from '../kernel/logger.js';
import type { Alert, DomainName } from '../types/index.js';
import { withRetry } from '../utils/retry.js';

const log = createLogger('alert-dispatcher');

// ─── Types ───────────────────────────────────────────────────────────────────

export type DeliveryResult =
  | { delivered: true }
  | { delivered: false; reason: string; retryable: boolean };

export interface DeliverySink {
  readonly name: string;
  send(recipientId: string, payload: string): Promise<DeliveryResult>;
}

/** The producer-facing half of the dispatcher. */
export interface AlertChannel {
  dispatch(alert: Alert): void;
}

export interface AlertDispatcherOptions {
  routes?: Partial<Record<DomainName, string>>;
  eventBus?: EventBus;
  clock?: Clock;
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

interface SinkRegistration {
  sink: DeliverySink;
  domains: ReadonlySet<DomainName> | null;
}

export interface DispatcherStats {
  queued: number;
  delivered: number;
  dropped: number;
}

// ─── Dispatcher ──────────────────────────────────────────────────────────────

export class AlertDispatcher implements AlertChannel {
  private readonly routes: Partial<Record<DomainName, string>>;
  private readonly eventBus: EventBus | undefined;
  private readonly clock: Clock;
  private readonly maxAttempts: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;

  private readonly sinks: Set<SinkRegistration> = new Set();
  private readonly queue: Alert[] = [];
  private draining: Promise<void> | null = null;
  private running = false;
  private abort = new AbortController();
  private delivered = 0;
  private dropped = 0;

  constructor(options: AlertDispatcherOptions = {}) {
    this.routes = options.routes ?? {};
    this.eventBus = options.eventBus;
    this.clock = options.clock ?? systemClock;
    this.maxAttempts = options.maxAttempts ?? 4;
    this.initialDelayMs = options.initialDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
  }

  /**
   * Register a sink for the given domains (all domains when omitted).
   * @returns Unregister function
   */
  register(sink: DeliverySink, options: { domains?: DomainName[] } = {}): () => void {
    const registration: SinkRegistration = {
      sink,
      domains: options.domains ? new Set(options.domains) : null,
    };
    this.sinks.add(registration);
    log.info({ sink: sink.name, domains: options.domains ?? 'all' }, 'Delivery sink registered');
    return () => {
      this.sinks.delete(registration);
    };
  }

  /** Enqueue an alert. Never throws and never waits for delivery. */
  dispatch(alert: Alert): void {
    this.queue.push(alert);
    log.debug({ alertId: alert.id, domain: alert.domain, queued: this.queue.length }, 'Alert queued');
    this.kick();
  }

  /** Start draining. Alerts dispatched before start() wait in the channel. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.abort = new AbortController();
    this.kick();
  }

  /**
   * Wait until the channel is empty.
   * @returns false if `timeoutMs` elapsed first or alerts remain undelivered
   */
  async flush(timeoutMs?: number): Promise<boolean> {
    const settle = async (): Promise<void> => {
      while (this.draining) {
        await this.draining;
      }
    };

    if (timeoutMs === undefined) {
      await settle();
      return this.queue.length === 0;
    }

    const timer = new AbortController();
    const finished = await Promise.race([
      settle().then(() => true),
      this.clock.sleep(timeoutMs, timer.signal).then(() => false),
    ]);
    timer.abort();
    return finished && this.queue.length === 0;
  }

  /** Stop after the alert in flight. Pending retry waits are cut short. */
  async stop(): Promise<void> {
    this.running = false;
    this.abort.abort();
    while (this.draining) {
      await this.draining;
    }
    if (this.queue.length > 0) {
      log.warn({ pending: this.queue.length }, 'Dispatcher stopped with undelivered alerts');
    }
  }

  getStats(): DispatcherStats {
    return { queued: this.queue.length, delivered: this.delivered, dropped: this.dropped };
  }

  // ── Private ────────────────────────────────────────────────────────────

  private kick(): void {
    if (this.draining || !this.running) return;

    this.draining = this.drain()
      .catch((error: unknown) => {
        log.error({ err: formatError(error) }, 'Alert drain failed');
      })
      .finally(() => {
        this.draining = null;
        if (this.running && this.queue.length > 0) {
          this.kick();
        }
      });
  }

  private async drain(): Promise<void> {
    // Deliver off the producer's call stack
    await Promise.resolve();

    let alert = this.running ? this.queue.shift() : undefined;
    while (alert) {
      await this.deliver(alert);
      alert = this.running ? this.queue.shift() : undefined;
    }
  }

  private async deliver(alert: Alert): Promise<void> {
    const recipientId = alert.recipientId ?? this.routes[alert.domain];
    if (!recipientId) {
      this.drop(alert, 'no-recipient', 0);
      return;
    }

    const targets = [...this.sinks].filter((r) => r.domains === null || r.domains.has(alert.domain));
    if (targets.length === 0) {
      this.drop(alert, 'no-sink', 0);
      return;
    }

    for (const { sink } of targets) {
      await this.deliverTo(sink, alert, recipientId);
    }
  }

  private async deliverTo(sink: DeliverySink, alert: Alert, recipientId: string): Promise<void> {
    let attempts = 0;

    try {
      await withRetry(
        async (attempt) => {
          attempts = attempt;
          let result: DeliveryResult;
          try {
            result = await sink.send(recipientId, alert.renderedPayload);
          } catch (error) {
            if (error instanceof DeliveryError) throw error;
            throw new DeliveryError(sink.name, error instanceof Error ? error.message : String(error), true, error);
          }
          if (!result.delivered) {
            throw new DeliveryError(sink.name, result.reason, result.retryable);
          }
        },
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.initialDelayMs,
          maxDelayMs: this.maxDelayMs,
          retryIf: (error) => !(error instanceof DeliveryError) || error.retryable,
          signal: this.abort.signal,
          sleep: (ms, signal) => this.clock.sleep(ms, signal),
          onRetry: (error, attempt, delayMs) => {
            log.warn(
              { alertId: alert.id, sink: sink.name, attempt, delayMs, err: formatError(error) },
              'Alert delivery failed, retrying',
            );
          },
        },
      );
    } catch (error) {
      this.drop(alert, error instanceof Error ? error.message : String(error), attempts, sink.name);
      return;
    }

    this.delivered++;
    log.info({ alertId: alert.id, domain: alert.domain, sink: sink.name, attempts }, 'Alert delivered');
    this.eventBus?.emit('alert:delivered', {
      alertId: alert.id,
      domain: alert.domain,
      sink: sink.name,
      attempts,
    });
  }

  private drop(alert: Alert, reason: string, attempts: number, sink?: string): void {
    this.dropped++;
    log.error(
      { alertId: alert.id, domain: alert.domain, sink, attempts, reason, action: 'dropped' },
      'Alert could not be delivered',
    );
    this.eventBus?.emit('alert:dropped', {
      alertId: alert.id,
      domain: alert.domain,
      ...(sink !== undefined ? { sink } : {}),
      reason,
      attempts,
    });
  }
}
