import type { DomainEvent } from '../events/DomainEvents.js';

/** Receiver of domain events. Implemented by `EventBus`. */
export interface EventSink {
  emit(event: DomainEvent): void;
}
