import { isEventOf } from '../domain/events/DomainEvents.js';
import { errorMessage } from '../domain/errors.js';
import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  // Typed handlers are stored behind a narrowing wrapper, keyed by the original for `off()`.
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });
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
   * Emit a domain event to all registered handlers. A throwing handler does not
   * prevent others from executing; its error is reported as a process warning.
   */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        this.dispatch(handler, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.dispatch(handler, event);
    }
  }

  private dispatch(handler: WildcardHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      process.emitWarning(`Handler for "${event.type}" threw: ${errorMessage(error)}`, 'EventHandlerWarning');
    }
  }
}
