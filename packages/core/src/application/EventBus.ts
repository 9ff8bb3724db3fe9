/** Minimal shape of an event published on an `EventBus`. */
export interface BusEvent {
  readonly type: string;
}

export type EventOfType<E extends BusEvent, T extends E['type']> = Extract<E, { readonly type: T }>;

type Listener<E> = (event: E) => void;

/** Typed event bus. Subscribe with `on()`, publish with `emit()`. */
export class EventBus<E extends BusEvent> {
  // Keyed by the caller's handler so `off()` can find the narrowing wrapper.
  private readonly handlers = new Map<E['type'], Map<unknown, Listener<E>>>();
  private readonly wildcardHandlers = new Set<Listener<E>>();

  /** Subscribe to events of the given type. */
  on<T extends E['type']>(type: T, handler: Listener<EventOfType<E, T>>): void {
    const existing = this.handlers.get(type) ?? new Map<unknown, Listener<E>>();
    existing.set(handler, (event) => {
      if (isEventOfType(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: Listener<E>): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends E['type']>(type: T, handler: Listener<EventOfType<E, T>>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: Listener<E>): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Deliver an event to every registered handler.
   *
   * A throwing handler does not prevent the others from running; its error is
   * rethrown once all of them have been called (as an `AggregateError` when
   * several failed).
   */
  emit(event: E): void {
    const errors: unknown[] = [];
    const listeners = [...(this.handlers.get(event.type)?.values() ?? []), ...this.wildcardHandlers];

    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        errors.push(error);
      }
    }

    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `EventBus: ${String(errors.length)} handlers failed for '${event.type}'`);
    }
  }
}

function isEventOfType<E extends BusEvent, T extends E['type']>(event: E, type: T): event is EventOfType<E, T> {
  return event.type === type;
}
