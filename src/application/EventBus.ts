import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Receives an error thrown by a subscriber. */
export type HandlerErrorFn = (error: unknown, event: DomainEvent) => void;

function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

function warnHandlerError(error: unknown, event: DomainEvent): void {
  const message = error instanceof Error ? error.message : String(error);
  process.emitWarning(`Handler for '${event.type}' threw: ${message}`, 'EventHandlerWarning');
}

/**
 * Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`.
 *
 * A throwing subscriber does not stop the pipeline or the other subscribers;
 * its error is passed to `onHandlerError` (a process warning by default).
 */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<object, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();
  private readonly onHandlerError: HandlerErrorFn;

  constructor(onHandlerError: HandlerErrorFn = warnHandlerError) {
    this.onHandlerError = onHandlerError;
  }

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<object, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOfType(event, type)) handler(event);
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

  /** Emit a domain event to all registered handlers, typed ones first. */
  emit(event: DomainEvent): void {
    const typed = this.handlers.get(event.type);
    if (typed) {
      for (const handler of typed.values()) {
        this.invoke(handler, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.invoke(handler, event);
    }
  }

  private invoke(handler: WildcardHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      this.onHandlerError(error, event);
    }
  }
}
