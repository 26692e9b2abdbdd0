import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { DeliveryResult, DeliverySink } from '../../../src/autonomous/alert-dispatcher.js';
import { Runtime } from '../../../src/autonomous/runtime.js';
import type { BinScheduleProvider, Collection } from '../../../src/plugins/bins/index.js';
import type { DepartureProvider } from '../../../src/plugins/trains/index.js';
import { ConfigSchema } from '../../../src/types/index.js';
import type { ConfigInput } from '../../../src/types/index.js';
import { ManualClock, settle } from '../../helpers/manual-clock.js';
import { MemoryBacking } from '../../helpers/memory-backing.js';

const NOW = '2026-03-02T09:00:00.000Z';
const HOUR = 60 * 60 * 1000;

class RecordingSink implements DeliverySink {
  readonly name = 'recording';
  readonly sent: Array<{ recipientId: string; payload: string }> = [];

  async send(recipientId: string, payload: string): Promise<DeliveryResult> {
    this.sent.push({ recipientId, payload });
    return { delivered: true };
  }
}

class StaticBinFeed implements BinScheduleProvider {
  calls = 0;
  failure: Error | null = null;

  constructor(private readonly schedule: Collection[]) {}

  async fetchSchedule(): Promise<Collection[]> {
    this.calls++;
    if (this.failure) throw this.failure;
    return this.schedule;
  }
}

const rail: DepartureProvider = {
  departures: async (crs) => ({
    crs,
    stationName: 'Test Station',
    departures: [{ serviceId: 'S1', std: '09:30', etd: 'On time', platform: '1', destination: 'Terminus' }],
  }),
};

function staleBudgetRecord(): string {
  return JSON.stringify({
    schemaVersion: 1,
    revision: 4,
    updatedAt: '2026-02-07T09:00:00.000Z',
    state: {
      balanceMinor: 0,
      weeklyAmountMinor: 500,
      lastAccrualAt: '2026-02-07T09:00:00.000Z',
      transactions: [],
    },
  });
}

describe('Runtime', () => {
  let clock: ManualClock;
  let backing: MemoryBacking;
  let sink: RecordingSink;
  let feed: StaticBinFeed;
  let runtime: Runtime | null;

  const input: ConfigInput = {
    telegram: { routes: { budget: '100', bins: 200 } },
  };

  function createRuntime(config: ConfigInput = input, withProviders = true): Runtime {
    runtime = new Runtime({
      config: ConfigSchema.parse(config),
      backing,
      clock,
      sinks: [sink],
      binProvider: withProviders ? feed : undefined,
      rail: withProviders ? rail : undefined,
    });
    return runtime;
  }

  beforeEach(() => {
    clock = new ManualClock(NOW);
    backing = new MemoryBacking();
    sink = new RecordingSink();
    feed = new StaticBinFeed([{ type: 'Food', date: '2026-03-10' }]);
    runtime = null;
  });

  afterEach(async () => {
    await runtime?.stop();
  });

  describe('construction', () => {
    it('should enable every domain that has a provider', () => {
      const rt = createRuntime();

      expect(rt.scheduledDomains.map((d) => d.kind)).toEqual(['budget', 'bins']);
      expect(rt.trains).not.toBeNull();
    });

    it('should leave out domains without a feed or board URL', () => {
      const rt = createRuntime(input, false);

      expect(rt.scheduledDomains.map((d) => d.kind)).toEqual(['budget']);
      expect(rt.bins).toBeNull();
      expect(rt.trains).toBeNull();
    });

    it('should leave out switched-off domains', () => {
      const rt = createRuntime({ ...input, budget: { enabled: false }, trains: { enabled: false } });

      expect(rt.budget).toBeNull();
      expect(rt.trains).toBeNull();
      expect(rt.scheduledDomains.map((d) => d.kind)).toEqual(['bins']);
    });
  });

  describe('start', () => {
    it('should catch up before scheduling and deliver the catch-up alert', async () => {
      backing.records.set('budget', staleBudgetRecord());
      const rt = createRuntime();

      await rt.start();
      await settle();

      expect(sink.sent).toEqual([
        { recipientId: '100', payload: 'Weekly allowance: added £15.00 (3 weeks accrued). Balance: £15.00' },
      ]);
      expect(backing.stateOf('budget')).toMatchObject({
        balanceMinor: 1500,
        lastAccrualAt: '2026-02-28T09:00:00.000Z',
      });
      expect(backing.stateOf('bins')).toMatchObject({ schedule: [{ type: 'Food', date: '2026-03-10' }] });
      expect(backing.stateOf('trains')).toEqual({ shortcuts: {} });
      expect(clock.pendingSleeps).toBe(2);
    });

    it('should run milestones on schedule', async () => {
      const rt = createRuntime();
      await rt.start();

      await clock.advance(7 * 24 * HOUR + 9 * HOUR);

      expect(sink.sent).toEqual([
        { recipientId: '100', payload: 'Weekly allowance: added £1.00 (1 week accrued). Balance: £1.00' },
        { recipientId: '200', payload: '🌙 <b>Night before</b> bin reminder\nItems: <b>Food</b>' },
      ]);
      expect(rt.getStats()).toMatchObject({ milestones: 2, alertsDelivered: 2, alertsDropped: 0 });
    });

    it('should keep other domains running when one fails', async () => {
      feed.failure = new Error('feed parser crashed');
      const rt = createRuntime();

      await rt.start();
      await settle();

      expect(backing.stateOf('budget')).toMatchObject({ balanceMinor: 0 });
      expect(rt.getStats().errors).toEqual({ bins: 1 });
      expect(clock.pendingSleeps).toBe(2);
    });

    it('should run the other domains when one record cannot be written', async () => {
      backing.records.set('budget', staleBudgetRecord());
      backing.failingKeys.add('bins');
      const rt = createRuntime({ ...input, store: { writeAttempts: 1 } });

      await rt.start();
      await settle();

      expect(backing.stateOf('budget')).toMatchObject({ balanceMinor: 1500 });
      expect(sink.sent).toEqual([
        { recipientId: '100', payload: 'Weekly allowance: added £15.00 (3 weeks accrued). Balance: £15.00' },
      ]);
      expect(backing.records.has('bins')).toBe(false);
      expect(rt.getStats().errors).toEqual({ bins: 2 });
      expect(clock.pendingSleeps).toBe(2);
    });

    it('should start when the shortcut record cannot be written', async () => {
      backing.failingKeys.add('trains');
      const rt = createRuntime({ ...input, store: { writeAttempts: 1 } });

      await rt.start();
      await settle();

      expect(rt.getStats().errors).toEqual({ trains: 1 });
      expect(backing.stateOf('bins')).toMatchObject({ schedule: [{ type: 'Food', date: '2026-03-10' }] });
      expect(clock.pendingSleeps).toBe(2);
    });

    it('should start only once', async () => {
      const rt = createRuntime();

      await rt.start();
      await rt.start();

      expect(feed.calls).toBe(1);
      expect(clock.pendingSleeps).toBe(2);
    });
  });

  describe('status', () => {
    it('should describe each domain', async () => {
      backing.records.set('budget', staleBudgetRecord());
      const rt = createRuntime();
      await rt.start();

      expect(await rt.status()).toEqual([
        {
          domain: 'budget',
          nextMilestone: new Date('2026-03-07T09:00:00.000Z'),
          summary: 'balance £15.00, 1 transactions',
        },
        {
          domain: 'bins',
          nextMilestone: new Date('2026-03-09T18:00:00.000Z'),
          summary: '1 collections cached, next: night-before',
        },
        { domain: 'trains', nextMilestone: null, summary: '0 active watch(es)' },
      ]);
    });
  });

  describe('stop', () => {
    it('should end every loop and tolerate repeated calls', async () => {
      const rt = createRuntime();
      await rt.start();

      await Promise.all([rt.stop(), rt.stop()]);
      await rt.stop();

      expect(clock.pendingSleeps).toBe(0);
    });

    it('should end active train watches', async () => {
      const rt = createRuntime({ ...input, trains: { defaultStation: 'TST' } });
      await rt.start();
      const trains = rt.trains;
      if (!trains) throw new Error('trains disabled');

      const sub = await trains.watch.watch(trains.sessions.get('100'), { station: 'TST' });
      expect(trains.watch.activeCount()).toBe(1);

      await rt.stop();

      expect(sub.origin).toBe('TST');
      expect(trains.watch.activeCount()).toBe(0);
      expect(clock.pendingSleeps).toBe(0);
    });
  });
});
