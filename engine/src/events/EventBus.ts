import { LoggerManager } from '../logging/LoggerManager.js';
import { isEventOf, type EngineEvent, type EngineEventOf, type EngineEventType } from './EngineEvents.js';

/**
 * Event handler function signature
 */
export type EventHandler<E = EngineEvent> = (event: E) => void | Promise<void>;

/**
 * EventBus - pub/sub channel between the executor and its observers
 *
 * - Executors emit events at lifecycle moments
 * - Formatters, tests and host applications subscribe
 * - Handler failures are logged and never reach the executor
 * - onAny() subscribes to every event
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 *
 * bus.on(EngineEventType.STAGE_COMPLETED, (event) => {
 *   console.log(event.stageName, event.payload.durationMs);
 * });
 *
 * bus.onAny((event) => audit(event));
 * ```
 */
export class EventBus {
  private listeners: Map<EngineEventType, EventHandler[]> = new Map();
  private wildcardListeners: EventHandler[] = [];

  /**
   * Subscribe to one event type
   *
   * @returns Unsubscribe function
   */
  on<K extends EngineEventType>(eventType: K, handler: EventHandler<EngineEventOf<K>>): () => void {
    const typed: EventHandler = (event) => {
      if (isEventOf(event, eventType)) {
        return handler(event);
      }
      return undefined;
    };

    const handlers = this.listeners.get(eventType) ?? [];
    handlers.push(typed);
    this.listeners.set(eventType, handlers);

    return () => {
      const current = this.listeners.get(eventType);
      if (current) {
        this.listeners.set(
          eventType,
          current.filter((h) => h !== typed),
        );
      }
    };
  }

  /**
   * Subscribe to every event
   *
   * @returns Unsubscribe function
   */
  onAny(handler: EventHandler): () => void {
    this.wildcardListeners.push(handler);
    return () => {
      this.wildcardListeners = this.wildcardListeners.filter((h) => h !== handler);
    };
  }

  /**
   * Subscribe once, then auto-unsubscribe
   */
  once<K extends EngineEventType>(eventType: K, handler: EventHandler<EngineEventOf<K>>): () => void {
    const unsubscribe = this.on(eventType, (event) => {
      unsubscribe();
      return handler(event);
    });
    return unsubscribe;
  }

  /**
   * Emit an event to all subscribed handlers
   *
   * Handlers run in registration order, wildcard handlers last. Async
   * handlers are awaited; a throwing handler is logged and skipped.
   */
  async emit(event: EngineEvent): Promise<void> {
    const handlers = this.listeners.get(event.type) ?? [];
    const allHandlers = [...handlers, ...this.wildcardListeners];

    for (const handler of allHandlers) {
      try {
        await handler(event);
      } catch (error) {
        LoggerManager.getLogger().error(
          `[EventBus] Handler error for event '${event.type}'`,
          error instanceof Error ? error : new Error(String(error)),
        );
      }
    }
  }

  /**
   * Remove all handlers for one event type
   */
  off(eventType: EngineEventType): void {
    this.listeners.delete(eventType);
  }

  clear(): void {
    this.listeners.clear();
    this.wildcardListeners = [];
  }

  listenerCount(eventType: EngineEventType): number {
    return (this.listeners.get(eventType) ?? []).length;
  }

  hasListeners(eventType: EngineEventType): boolean {
    return this.listenerCount(eventType) > 0 || this.wildcardListeners.length > 0;
  }
}
