import type { DomainName } from '../types/index.js';
import { createLogger } from './logger.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 * Operational events only: alerts travel through the dispatcher's own
 * channel, never through the bus.
 */
export interface EventMap {
  // ── Scheduler events ─────────────────────────────────────────────────────
  'scheduler:started': { domain: DomainName; timestamp: Date };
  'scheduler:milestone': { domain: DomainName; scheduledFor: Date; ranAt: Date; alerts: number };
  'scheduler:error': { domain: DomainName; error: string; transient: boolean; timestamp: Date };
  'scheduler:stopped': { domain: DomainName; timestamp: Date };

  // ── Catch-up events ──────────────────────────────────────────────────────
  'catchup:completed': { domain: DomainName; policy: 'replay' | 'discard'; changed: boolean; alerts: number };

  // ── State events ─────────────────────────────────────────────────────────
  'state:corrupt': { domain: string; reason: string; timestamp: Date };
  'state:persist_failed': { domain: string; error: string; timestamp: Date };

  // ── Alert events ─────────────────────────────────────────────────────────
  'alert:delivered': { alertId: string; domain: DomainName; sink: string; attempts: number };
  'alert:dropped': { alertId: string; domain: DomainName; sink?: string; reason: string; attempts: number };

  // ── Watch events ─────────────────────────────────────────────────────────
  'watch:started': { contextId: string; trainIdentifier: string; origin: string };
  'watch:ended': { contextId: string; trainIdentifier: string; reason: 'terminal' | 'vanished' | 'unwatched' | 'replaced' | 'shutdown' };

  // ── Telegram events ──────────────────────────────────────────────────────
  'telegram:command_received': { command: string; userId: number; chatId: number; timestamp: string };
  'telegram:auth_rejected': { userId: number; chatId: number; timestamp: string };
}

type Handler = (payload: unknown) => void;

/**
 * Typed pub/sub. A throwing handler is logged and never affects
 * the emitter or the other handlers.
 */
export class EventBus {
  private listeners: Map<string, Set<Handler>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void,
  ): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    handlers.add(handler as Handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void,
  ): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler as Handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        handler(payload);
      } catch (error) {
        this.handlerErrors++;
        log.error({ event: String(event), err: error }, 'Error in event handler');
      }
    }
  }

  once<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void,
  ): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
