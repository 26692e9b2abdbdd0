import { describe, it, expect, beforeEach } from 'vitest';

import { AlertDispatcher } from '../../../src/autonomous/alert-dispatcher.js';
import type { DeliveryResult, DeliverySink } from '../../../src/autonomous/alert-dispatcher.js';
import { createAlert } from '../../../src/autonomous/domain-driver.js';
import { EventBus } from '../../../src/kernel/event-bus.js';
import type { EventMap } from '../../../src/kernel/event-bus.js';
import { ManualClock, settle } from '../../helpers/manual-clock.js';

const NOW = new Date('2026-03-02T09:00:00Z');

class FakeSink implements DeliverySink {
  readonly calls: Array<{ recipientId: string; payload: string }> = [];

  constructor(
    readonly name: string,
    private readonly results: Array<DeliveryResult | Error> = [],
  ) {}

  async send(recipientId: string, payload: string): Promise<DeliveryResult> {
    this.calls.push({ recipientId, payload });
    const next = this.results.shift() ?? { delivered: true };
    if (next instanceof Error) throw next;
    return next;
  }
}

const unavailable: DeliveryResult = { delivered: false, reason: '503 Service Unavailable', retryable: true };
const forbidden: DeliveryResult = { delivered: false, reason: '403 Forbidden', retryable: false };

describe('AlertDispatcher', () => {
  let clock: ManualClock;
  let eventBus: EventBus;
  let delivered: Array<EventMap['alert:delivered']>;
  let dropped: Array<EventMap['alert:dropped']>;

  beforeEach(() => {
    clock = new ManualClock(NOW);
    eventBus = new EventBus();
    delivered = [];
    dropped = [];
    eventBus.on('alert:delivered', (e) => delivered.push(e));
    eventBus.on('alert:dropped', (e) => dropped.push(e));
  });

  function createDispatcher(initialDelayMs = 0): AlertDispatcher {
    return new AlertDispatcher({
      routes: { budget: '100', trains: '300' },
      eventBus,
      clock,
      maxAttempts: 3,
      initialDelayMs,
    });
  }

  it('should deliver to the domain route', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake');
    dispatcher.register(sink);
    dispatcher.start();

    const alert = createAlert('budget', 'Balance: £3.00', { now: NOW });
    dispatcher.dispatch(alert);

    expect(await dispatcher.flush()).toBe(true);
    expect(sink.calls).toEqual([{ recipientId: '100', payload: 'Balance: £3.00' }]);
    expect(delivered).toEqual([{ alertId: alert.id, domain: 'budget', sink: 'fake', attempts: 1 }]);
  });

  it('should prefer the alert\'s own recipient over the route', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake');
    dispatcher.register(sink);
    dispatcher.start();

    dispatcher.dispatch(createAlert('trains', 'Platform 9', { now: NOW, recipientId: '777' }));
    await dispatcher.flush();

    expect(sink.calls[0].recipientId).toBe('777');
  });

  it('should deliver a transiently failing alert exactly once', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake', [unavailable, unavailable]);
    dispatcher.register(sink);
    dispatcher.start();

    dispatcher.dispatch(createAlert('budget', 'hello', { now: NOW }));
    await dispatcher.flush();

    expect(sink.calls).toHaveLength(3);
    expect(delivered).toHaveLength(1);
    expect(delivered[0].attempts).toBe(3);
    expect(dropped).toEqual([]);
    expect(dispatcher.getStats()).toEqual({ queued: 0, delivered: 1, dropped: 0 });
  });

  it('should wait out the backoff between attempts', async () => {
    const dispatcher = createDispatcher(1000);
    const sink = new FakeSink('fake', [unavailable]);
    dispatcher.register(sink);
    dispatcher.start();

    dispatcher.dispatch(createAlert('budget', 'hello', { now: NOW }));
    await settle();
    expect(sink.calls).toHaveLength(1);

    await clock.advance(999);
    expect(sink.calls).toHaveLength(1);

    await clock.advance(1);
    await dispatcher.flush();
    expect(sink.calls).toHaveLength(2);
    expect(delivered).toHaveLength(1);
  });

  it('should not retry a non-retryable failure', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake', [forbidden]);
    dispatcher.register(sink);
    dispatcher.start();

    const alert = createAlert('budget', 'hello', { now: NOW });
    dispatcher.dispatch(alert);
    await dispatcher.flush();

    expect(sink.calls).toHaveLength(1);
    expect(dropped).toEqual([
      { alertId: alert.id, domain: 'budget', sink: 'fake', reason: 'fake delivery failed: 403 Forbidden', attempts: 1 },
    ]);
  });

  it('should treat a throwing sink as retryable and drop after the last attempt', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake', [new Error('socket hang up'), new Error('socket hang up'), new Error('socket hang up')]);
    dispatcher.register(sink);
    dispatcher.start();

    dispatcher.dispatch(createAlert('budget', 'hello', { now: NOW }));
    await dispatcher.flush();

    expect(sink.calls).toHaveLength(3);
    expect(dropped).toHaveLength(1);
    expect(dropped[0].reason).toBe('fake delivery failed: socket hang up');
    expect(dropped[0].attempts).toBe(3);
  });

  it('should drop an alert with no recipient without calling a sink', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake');
    dispatcher.register(sink);
    dispatcher.start();

    dispatcher.dispatch(createAlert('bins', 'Recycling tomorrow', { now: NOW }));
    await dispatcher.flush();

    expect(sink.calls).toEqual([]);
    expect(dropped[0].reason).toBe('no-recipient');
  });

  it('should drop an alert no sink accepts', async () => {
    const dispatcher = createDispatcher();
    dispatcher.register(new FakeSink('trains-only'), { domains: ['trains'] });
    dispatcher.start();

    dispatcher.dispatch(createAlert('budget', 'hello', { now: NOW }));
    await dispatcher.flush();

    expect(dropped[0].reason).toBe('no-sink');
  });

  it('should stop delivering to an unregistered sink', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake');
    const unregister = dispatcher.register(sink);
    unregister();
    dispatcher.start();

    dispatcher.dispatch(createAlert('budget', 'hello', { now: NOW }));
    await dispatcher.flush();

    expect(sink.calls).toEqual([]);
    expect(dropped[0].reason).toBe('no-sink');
  });

  it('should hold alerts until started, then deliver in order', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake');
    dispatcher.register(sink);

    dispatcher.dispatch(createAlert('budget', 'first', { now: NOW }));
    dispatcher.dispatch(createAlert('budget', 'second', { now: NOW }));
    await settle();
    expect(sink.calls).toEqual([]);
    expect(await dispatcher.flush(100)).toBe(false);

    dispatcher.start();
    await dispatcher.flush();
    expect(sink.calls.map((c) => c.payload)).toEqual(['first', 'second']);
  });

  it('should keep delivering after one alert is dropped', async () => {
    const dispatcher = createDispatcher();
    const sink = new FakeSink('fake', [forbidden]);
    dispatcher.register(sink);
    dispatcher.start();

    dispatcher.dispatch(createAlert('budget', 'lost', { now: NOW }));
    dispatcher.dispatch(createAlert('budget', 'kept', { now: NOW }));
    await dispatcher.flush();

    expect(dropped).toHaveLength(1);
    expect(delivered).toHaveLength(1);
    expect(sink.calls.map((c) => c.payload)).toEqual(['lost', 'kept']);
  });

  it('should cut a pending backoff short on stop', async () => {
    const dispatcher = createDispatcher(60_000);
    const sink = new FakeSink('fake', [unavailable, unavailable, unavailable]);
    dispatcher.register(sink);
    dispatcher.start();

    dispatcher.dispatch(createAlert('budget', 'hello', { now: NOW }));
    await settle();

    await dispatcher.stop();

    expect(clock.pendingSleeps).toBe(0);
    expect(dispatcher.getStats().dropped).toBe(1);
    expect(delivered).toEqual([]);
  });
});
