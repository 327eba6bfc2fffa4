import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Receives errors thrown by subscribers. */
export type HandlerErrorHook = (error: unknown, event: DomainEvent) => void;

function isEventOf<T extends EventType>(type: T, event: DomainEvent): event is EventPayload<T> {
  return event.type === type;
}

/**
 * Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`.
 *
 * A throwing subscriber never stops delivery to the others; its error goes to
 * the optional `onHandlerError` hook.
 */
export class EventBus {
  private readonly handlers = new Map<EventType, Map<unknown, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly onHandlerError?: HandlerErrorHook) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, WildcardHandler>();
    existing.set(handler, (event) => {
      if (isEventOf(type, event)) handler(event);
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

  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type);
    if (handlers) {
      for (const handler of handlers.values()) {
        this.deliver(handler, event);
      }
    }

    for (const handler of this.wildcardHandlers) {
      this.deliver(handler, event);
    }
  }

  private deliver(handler: WildcardHandler, event: DomainEvent): void {
    try {
      handler(event);
    } catch (error) {
      this.onHandlerError?.(error, event);
    }
  }
}
