import { describe, it, expect, vi } from 'vitest';

import { EventBus } from '../../../../src/kernel/event-bus.js';
import type { EventMap } from '../../../../src/kernel/event-bus.js';
import { commandName, createLoggingMiddleware } from '../../../../src/plugins/telegram-bot/middleware/logging.js';

describe('commandName', () => {
  it('should strip the slash, bot mention and arguments', () => {
    expect(commandName('/watch@tidings_bot 08:15 WAT')).toBe('watch');
    expect(commandName('/balance')).toBe('balance');
  });

  it('should return null for plain text', () => {
    expect(commandName('hello')).toBeNull();
    expect(commandName('/')).toBeNull();
  });
});

describe('Logging Middleware', () => {
  it('should report each command once', async () => {
    const eventBus = new EventBus();
    const events: Array<EventMap['telegram:command_received']> = [];
    eventBus.on('telegram:command_received', (e) => events.push(e));
    const next = vi.fn(async () => undefined);

    await createLoggingMiddleware(eventBus)(
      { from: { id: 123 }, chat: { id: 100 }, message: { text: '/add 5 sweets' } } as never,
      next,
    );

    expect(next).toHaveBeenCalledTimes(1);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ command: 'add', userId: 123, chatId: 100 });
  });

  it('should pass plain messages through without an event', async () => {
    const eventBus = new EventBus();
    const listener = vi.fn();
    eventBus.on('telegram:command_received', listener);
    const next = vi.fn(async () => undefined);

    await createLoggingMiddleware(eventBus)(
      { from: { id: 123 }, chat: { id: 100 }, message: { text: 'hi' } } as never,
      next,
    );

    expect(next).toHaveBeenCalledTimes(1);
    expect(listener).not.toHaveBeenCalled();
  });
});
