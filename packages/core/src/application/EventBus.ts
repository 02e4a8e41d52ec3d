import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import { isEventOfType } from '../domain/events/DomainEvents.js';

export type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

export type WildcardHandler = (event: DomainEvent) => void;

/**
 * Typed publish/subscribe channel for validation events. A handler registered
 * for one type is only ever called with events of that type.
 */
export class EventBus {
  // Typed handlers are stored behind a wrapper that narrows the event first.
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    if (!existing.has(handler)) {
      existing.set(handler, (event) => {
        if (isEventOfType(event, type)) handler(event);
      });
    }
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Deliver `event` to the handlers of its type, then to wildcard handlers.
   * Handlers registered while an event is delivered first see the next event.
   */
  emit(event: DomainEvent): void {
    const typed = this.handlers.get(event.type)?.values() ?? [];
    for (const handler of [...typed, ...this.wildcardHandlers]) {
      deliver(handler, event);
    }
  }
}

function deliver(handler: WildcardHandler, event: DomainEvent): void {
  try {
    handler(event);
  } catch {
    // A failing subscriber is isolated from the emitter and from other subscribers.
  }
}
