import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import type { EventSink } from '../domain/ports/EventSink.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

type HandlerTable = { readonly [T in EventType]: Set<EventHandler<T>> };

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus implements EventSink {
  private readonly handlers: HandlerTable = {
    'schema:defined': new Set(),
    'reference:resolved': new Set(),
    'reference:failed': new Set(),
    'options:propagated': new Set(),
  };
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers[type].add(handler);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers[type].delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler does not prevent others from executing. */
  emit(event: DomainEvent): void {
    switch (event.type) {
      case 'schema:defined':
        notify(this.handlers['schema:defined'], event);
        break;
      case 'reference:resolved':
        notify(this.handlers['reference:resolved'], event);
        break;
      case 'reference:failed':
        notify(this.handlers['reference:failed'], event);
        break;
      case 'options:propagated':
        notify(this.handlers['options:propagated'], event);
        break;
    }

    notify(this.wildcardHandlers, event);
  }
}

function notify<E>(handlers: ReadonlySet<(event: E) => void>, event: E): void {
  for (const handler of handlers) {
    try {
      handler(event);
    } catch {
      // Handler errors are swallowed; the remaining handlers still run.
    }
  }
}
