import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../../../src/kernel/event-bus.js';

const corrupt = { domain: 'budget', reason: 'invalid JSON', timestamp: new Date('2026-01-01T00:00:00Z') };

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  it('should subscribe and receive events', () => {
    const handler = vi.fn();

    eventBus.on('state:corrupt', handler);
    eventBus.emit('state:corrupt', corrupt);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(corrupt);
  });

  it('should unsubscribe via returned function', () => {
    const handler = vi.fn();

    const unsubscribe = eventBus.on('state:corrupt', handler);
    eventBus.emit('state:corrupt', corrupt);
    unsubscribe();
    eventBus.emit('state:corrupt', corrupt);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(eventBus.listenerCount('state:corrupt')).toBe(0);
  });

  it('should fire once() handler only once', () => {
    const handler = vi.fn();

    eventBus.once('state:corrupt', handler);
    eventBus.emit('state:corrupt', corrupt);
    eventBus.emit('state:corrupt', corrupt);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should isolate a throwing handler from the others', () => {
    const after = vi.fn();
    eventBus.on('state:corrupt', () => {
      throw new Error('handler failed');
    });
    eventBus.on('state:corrupt', after);

    expect(() => eventBus.emit('state:corrupt', corrupt)).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(eventBus.getHandlerErrorCount()).toBe(1);
  });

  it('should do nothing when no one listens', () => {
    expect(() => eventBus.emit('state:corrupt', corrupt)).not.toThrow();
  });

  it('should drop every listener on clear()', () => {
    const handler = vi.fn();
    eventBus.on('state:corrupt', handler);

    eventBus.clear();
    eventBus.emit('state:corrupt', corrupt);

    expect(handler).not.toHaveBeenCalled();
  });
});
