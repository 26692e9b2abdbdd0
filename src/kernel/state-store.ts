/**
 * StateStore — per-domain durable records with read-modify-write locking.
 *
 * Every mutation of a domain record (scheduled milestone, catch-up, user
 * command) runs through `update()`, which serialises on a per-domain
 * promise chain, re-reads the record from the backing, applies the change
 * and writes the new record before releasing the lock. Two writers on the
 * same domain therefore never lose each other's update.
 *
 * Record layout: { schemaVersion, revision, updatedAt, state }.
 * Corrupt records (bad JSON, schema mismatch, failed checksum) are moved
 * aside and the domain restarts from its defaults.
 */

import { z } from 'zod';

import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import { PersistenceError, StateCorruptionError } from './errors.js';
import type { EventBus } from './event-bus.js';
import { createLogger, formatError } from './logger.js';
import type { StateBacking } from './state-backing.js';
import { withRetry } from '../utils/retry.js';

const log = createLogger('state-store');

// ─── Types ───────────────────────────────────────────────────────────────────

const RecordSchema = z.object({
  schemaVersion: z.number().int().positive(),
  revision: z.number().int().nonnegative(),
  updatedAt: z.string(),
  state: z.unknown(),
});

export interface DomainStateSpec<S> {
  schema: z.ZodType<S, z.ZodTypeDef, unknown>;
  defaults: (now: Date) => S;
  schemaVersion?: number;
}

export interface UpdateOutcome<S, R> {
  /** Return the `current` object itself to signal "no change" (nothing is written). */
  state: S;
  result: R;
}

export interface StateStoreOptions {
  backing: StateBacking;
  clock?: Clock;
  eventBus?: EventBus;
  writeAttempts?: number;
  writeRetryDelayMs?: number;
}

interface LoadedRecord<S> {
  state: S;
  revision: number;
  /** True when nothing usable was on disk and `state` is the default. */
  needsWrite: boolean;
}

// ─── Domain handle ───────────────────────────────────────────────────────────

export class DomainStateHandle<S> {
  private lastRevision = 0;

  constructor(
    private readonly store: StateStore,
    readonly name: string,
    private readonly spec: DomainStateSpec<S>,
  ) {}

  get revision(): number {
    return this.lastRevision;
  }

  /**
   * Startup read. Writes defaults when the record is missing or was corrupt,
   * so the domain always has a valid record afterwards.
   */
  async load(): Promise<S> {
    return this.store.withLock(this.name, async () => {
      const loaded = await this.readRecord();
      if (loaded.needsWrite) {
        await this.writeRecord(loaded.state, loaded.revision);
      }
      return loaded.state;
    });
  }

  async read(): Promise<S> {
    return this.store.withLock(this.name, async () => (await this.readRecord()).state);
  }

  /**
   * Read-modify-write under the domain lock. The new state is durable
   * before this resolves; a failed write rejects with PersistenceError
   * and `result` is never returned.
   */
  async update<R>(
    fn: (current: S) => UpdateOutcome<S, R> | Promise<UpdateOutcome<S, R>>,
  ): Promise<R> {
    return this.store.withLock(this.name, async () => {
      const loaded = await this.readRecord();
      const outcome = await fn(loaded.state);

      if (outcome.state !== loaded.state || loaded.needsWrite) {
        await this.writeRecord(outcome.state, loaded.revision);
      }
      return outcome.result;
    });
  }

  // ── Private ────────────────────────────────────────────────────────────

  private async readRecord(): Promise<LoadedRecord<S>> {
    let text: string | null;
    try {
      text = await this.store.backing.read(this.name);
    } catch (error) {
      if (error instanceof StateCorruptionError) {
        return this.recover(error);
      }
      throw new PersistenceError(this.name, 'read failed', error);
    }

    if (text === null) {
      return { state: this.spec.defaults(this.store.clock.now()), revision: 0, needsWrite: true };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return this.recover(new StateCorruptionError(this.name, 'invalid JSON', error));
    }

    const record = RecordSchema.safeParse(raw);
    if (!record.success) {
      return this.recover(new StateCorruptionError(this.name, 'malformed record envelope', record.error));
    }

    const state = this.spec.schema.safeParse(record.data.state);
    if (!state.success) {
      return this.recover(
        new StateCorruptionError(this.name, `state failed validation: ${state.error.message}`, state.error),
      );
    }

    this.lastRevision = record.data.revision;
    return { state: state.data, revision: record.data.revision, needsWrite: false };
  }

  private async recover(error: StateCorruptionError): Promise<LoadedRecord<S>> {
    log.error(
      { domain: this.name, err: formatError(error), action: 'reset-to-default' },
      'Persisted state is corrupt; quarantining and starting from defaults',
    );
    this.store.eventBus?.emit('state:corrupt', {
      domain: this.name,
      reason: error.message,
      timestamp: this.store.clock.now(),
    });

    try {
      await this.store.backing.quarantine(this.name);
    } catch (quarantineError) {
      log.error({ domain: this.name, err: formatError(quarantineError) }, 'Failed to quarantine corrupt state');
    }

    return { state: this.spec.defaults(this.store.clock.now()), revision: 0, needsWrite: true };
  }

  private async writeRecord(state: S, previousRevision: number): Promise<void> {
    const valid = this.spec.schema.safeParse(state);
    if (!valid.success) {
      throw new PersistenceError(this.name, `refusing to write invalid state: ${valid.error.message}`);
    }

    const revision = previousRevision + 1;
    const text = JSON.stringify(
      {
        schemaVersion: this.spec.schemaVersion ?? 1,
        revision,
        updatedAt: this.store.clock.now().toISOString(),
        state,
      },
      null,
      2,
    );

    try {
      await withRetry(() => this.store.backing.write(this.name, text), {
        maxAttempts: this.store.writeAttempts,
        initialDelayMs: this.store.writeRetryDelayMs,
        sleep: (ms, signal) => this.store.clock.sleep(ms, signal),
        onRetry: (error, attempt) => {
          log.warn({ domain: this.name, attempt, err: formatError(error) }, 'State write failed, retrying');
        },
      });
    } catch (error) {
      log.error(
        { domain: this.name, err: formatError(error), attempts: this.store.writeAttempts },
        'State write failed permanently; dependent alerts will not be sent',
      );
      this.store.eventBus?.emit('state:persist_failed', {
        domain: this.name,
        error: error instanceof Error ? error.message : String(error),
        timestamp: this.store.clock.now(),
      });
      throw new PersistenceError(this.name, 'write failed', error);
    }

    this.lastRevision = revision;
    log.debug({ domain: this.name, revision }, 'State persisted');
  }
}

// ─── Store ───────────────────────────────────────────────────────────────────

export class StateStore {
  readonly backing: StateBacking;
  readonly clock: Clock;
  readonly eventBus: EventBus | undefined;
  readonly writeAttempts: number;
  readonly writeRetryDelayMs: number;

  private readonly locks: Map<string, Promise<void>> = new Map();
  private readonly names: Set<string> = new Set();

  constructor(options: StateStoreOptions) {
    this.backing = options.backing;
    this.clock = options.clock ?? systemClock;
    this.eventBus = options.eventBus;
    this.writeAttempts = options.writeAttempts ?? 3;
    this.writeRetryDelayMs = options.writeRetryDelayMs ?? 100;
  }

  /**
   * Create the handle for a domain record.
   * @throws Error when `name` already has a handle
   */
  domain<S>(name: string, spec: DomainStateSpec<S>): DomainStateHandle<S> {
    if (this.names.has(name)) {
      throw new Error(`State domain already registered: ${name}`);
    }
    this.names.add(name);
    return new DomainStateHandle(this, name, spec);
  }

  /**
   * Run `fn` after every earlier call for the same key has settled.
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  /** Resolves once no write is in flight for any domain. */
  async idle(): Promise<void> {
    while (this.locks.size > 0) {
      await Promise.all([...this.locks.values()]);
    }
  }

  async close(): Promise<void> {
    await this.idle();
    this.backing.close();
  }
}
