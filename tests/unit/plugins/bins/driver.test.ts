import { describe, it, expect, beforeEach } from 'vitest';

import { UnavailableError } from '../../../../src/kernel/errors.js';
import { BinDriver } from '../../../../src/plugins/bins/driver.js';
import type { BinScheduleProvider } from '../../../../src/plugins/bins/driver.js';
import type { BinState, Collection } from '../../../../src/plugins/bins/types.js';

const OPTIONS = {
  nightBefore: '18:00',
  morningOf: '07:00',
  refreshAt: '09:00',
  staleGraceMinutes: 120,
  retryDelayMs: 60 * 60 * 1000,
};

const SCHEDULE: Collection[] = [
  { type: 'Recycling', date: '2026-03-10' },
  { type: 'General', date: '2026-03-10' },
  { type: 'Garden', date: '2026-03-17' },
];

class FakeProvider implements BinScheduleProvider {
  calls = 0;

  constructor(private readonly responses: Array<Collection[] | Error> = []) {}

  async fetchSchedule(): Promise<Collection[]> {
    this.calls++;
    const next = this.responses.shift() ?? [];
    if (next instanceof Error) throw next;
    return next;
  }
}

function binState(overrides: Partial<BinState> = {}): BinState {
  return {
    schedule: SCHEDULE,
    fetchedAt: '2026-03-02T09:00:00.000Z',
    lastNotifiedMilestone: null,
    ...overrides,
  };
}

describe('BinDriver', () => {
  let provider: FakeProvider;
  let driver: BinDriver;

  beforeEach(() => {
    provider = new FakeProvider();
    driver = new BinDriver(provider, OPTIONS);
  });

  it('should derive three milestones per collection date', () => {
    const milestones = driver.milestones(SCHEDULE);

    expect(milestones.map((m) => [m.at.toISOString(), m.payload.kind])).toEqual([
      ['2026-03-09T18:00:00.000Z', 'night-before'],
      ['2026-03-10T07:00:00.000Z', 'morning-of'],
      ['2026-03-11T09:00:00.000Z', 'refresh'],
      ['2026-03-16T18:00:00.000Z', 'night-before'],
      ['2026-03-17T07:00:00.000Z', 'morning-of'],
      ['2026-03-18T09:00:00.000Z', 'refresh'],
    ]);
    expect(milestones[0].payload.types).toEqual(['Recycling', 'General']);
  });

  it('should pick the first milestone after the pointer', () => {
    const now = new Date('2026-03-05T00:00:00Z');

    expect(driver.nextMilestone(binState(), now).at.toISOString()).toBe('2026-03-09T18:00:00.000Z');
    expect(
      driver.nextMilestone(binState({ lastNotifiedMilestone: '2026-03-09T18:00:00.000Z' }), now).at.toISOString(),
    ).toBe('2026-03-10T07:00:00.000Z');
  });

  it('should send the night-before reminder once', async () => {
    const now = new Date('2026-03-09T18:00:00Z');

    const first = await driver.onMilestone(binState(), now);
    const second = await driver.onMilestone(first.state, now);

    expect(first.alerts).toHaveLength(1);
    expect(first.alerts[0].renderedPayload).toBe('🌙 <b>Night before</b> bin reminder\nItems: <b>Recycling, General</b>');
    expect(first.state.lastNotifiedMilestone).toBe('2026-03-09T18:00:00.000Z');
    expect(second.state).toBe(first.state);
    expect(second.alerts).toEqual([]);
  });

  it('should send the morning-of reminder', async () => {
    const outcome = await driver.onMilestone(
      binState({ lastNotifiedMilestone: '2026-03-09T18:00:00.000Z' }),
      new Date('2026-03-10T07:05:00Z'),
    );

    expect(outcome.alerts[0].renderedPayload).toBe('☀️ <b>Morning of</b> bin reminder\nItems: <b>Recycling, General</b>');
  });

  it('should discard a reminder that is past the grace window', async () => {
    const outcome = await driver.onMilestone(
      binState({ lastNotifiedMilestone: '2026-03-09T18:00:00.000Z' }),
      new Date('2026-03-10T10:00:00Z'),
    );

    expect(outcome.alerts).toEqual([]);
    expect(outcome.state.lastNotifiedMilestone).toBe('2026-03-10T07:00:00.000Z');
  });

  it('should refresh the schedule the day after a collection', async () => {
    const fresh: Collection[] = [{ type: 'Garden', date: '2026-03-17' }];
    provider = new FakeProvider([fresh]);
    driver = new BinDriver(provider, OPTIONS);
    const now = new Date('2026-03-11T09:00:00Z');

    const outcome = await driver.onMilestone(binState({ lastNotifiedMilestone: '2026-03-10T07:00:00.000Z' }), now);

    expect(outcome.alerts).toEqual([]);
    expect(outcome.state).toEqual({
      schedule: fresh,
      fetchedAt: '2026-03-11T09:00:00.000Z',
      lastNotifiedMilestone: '2026-03-11T09:00:00.000Z',
    });
  });

  it('should let a failed refresh propagate for the scheduler to retry', async () => {
    provider = new FakeProvider([new UnavailableError('bin feed', 'timeout')]);
    driver = new BinDriver(provider, OPTIONS);

    await expect(
      driver.onMilestone(
        binState({ lastNotifiedMilestone: '2026-03-10T07:00:00.000Z' }),
        new Date('2026-03-11T09:00:00Z'),
      ),
    ).rejects.toBeInstanceOf(UnavailableError);
  });

  describe('with nothing cached', () => {
    it('should refresh now when never fetched', () => {
      const now = new Date('2026-03-05T00:00:00Z');

      const next = driver.nextMilestone(binState({ schedule: [], fetchedAt: null }), now);

      expect(next.at).toEqual(now);
      expect(next.payload).toEqual({ kind: 'refresh', collectionDate: null, types: [] });
    });

    it('should space fallback refreshes by the retry delay', () => {
      const next = driver.nextMilestone(
        binState({ schedule: [], fetchedAt: '2026-03-05T00:00:00.000Z' }),
        new Date('2026-03-05T00:10:00Z'),
      );

      expect(next.at.toISOString()).toBe('2026-03-05T01:00:00.000Z');
    });

    it('should keep the pointer on a fallback refresh', async () => {
      provider = new FakeProvider([SCHEDULE]);
      driver = new BinDriver(provider, OPTIONS);

      const outcome = await driver.onMilestone(
        binState({ schedule: [], fetchedAt: null, lastNotifiedMilestone: '2026-03-01T07:00:00.000Z' }),
        new Date('2026-03-05T00:00:00Z'),
      );

      expect(outcome.state.schedule).toEqual(SCHEDULE);
      expect(outcome.state.lastNotifiedMilestone).toBe('2026-03-01T07:00:00.000Z');
    });
  });

  describe('reconcile', () => {
    it('should skip every missed milestone without alerting', async () => {
      const now = new Date('2026-03-12T12:00:00Z');

      const outcome = await driver.reconcile(binState(), now);

      expect(outcome.alerts).toEqual([]);
      expect(outcome.state.lastNotifiedMilestone).toBe('2026-03-11T09:00:00.000Z');
      expect(provider.calls).toBe(0);
      expect(driver.nextMilestone(outcome.state, now).at.toISOString()).toBe('2026-03-16T18:00:00.000Z');
    });

    it('should be idempotent', async () => {
      const now = new Date('2026-03-12T12:00:00Z');
      const first = await driver.reconcile(binState(), now);

      const second = await driver.reconcile(first.state, now);

      expect(second.state).toBe(first.state);
    });

    it('should fetch when nothing upcoming is cached', async () => {
      const fresh: Collection[] = [{ type: 'Food', date: '2026-03-24' }];
      provider = new FakeProvider([fresh]);
      driver = new BinDriver(provider, OPTIONS);
      const now = new Date('2026-03-20T12:00:00Z');

      const outcome = await driver.reconcile(binState(), now);

      expect(provider.calls).toBe(1);
      expect(outcome.state.schedule).toEqual(fresh);
      expect(outcome.state.fetchedAt).toBe('2026-03-20T12:00:00.000Z');
      expect(outcome.state.lastNotifiedMilestone).toBeNull();
    });

    it('should keep the cache and still resync when the feed is down', async () => {
      provider = new FakeProvider([new UnavailableError('bin feed', 'timeout')]);
      driver = new BinDriver(provider, OPTIONS);

      const outcome = await driver.reconcile(binState(), new Date('2026-03-20T12:00:00Z'));

      expect(outcome.state.schedule).toEqual(SCHEDULE);
      expect(outcome.state.lastNotifiedMilestone).toBe('2026-03-18T09:00:00.000Z');
    });

    it('should not refetch right after a fetch', async () => {
      const outcome = await driver.reconcile(
        binState({ schedule: [], fetchedAt: '2026-03-20T11:30:00.000Z' }),
        new Date('2026-03-20T12:00:00Z'),
      );

      expect(provider.calls).toBe(0);
      expect(outcome.alerts).toEqual([]);
    });
  });

  it('should list collections from today on', () => {
    expect(driver.upcoming(binState(), new Date('2026-03-10T20:00:00Z'))).toEqual(SCHEDULE);
    expect(driver.upcoming(binState(), new Date('2026-03-11T00:00:00Z'))).toEqual([
      { type: 'Garden', date: '2026-03-17' },
    ]);
  });
});
