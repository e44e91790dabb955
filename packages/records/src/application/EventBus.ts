import { isEventOfType } from '../domain/events/DomainEvents.js';
import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type Listener = (event: DomainEvent) => void;

/** Removes the subscription it was returned for. */
export type Unsubscribe = () => void;

export interface EventBusConfig {
  /** Receives errors thrown by listeners. Listener errors never reach the validator. */
  readonly onListenerError?: (error: unknown, event: DomainEvent) => void;
}

interface Subscription {
  /** `undefined` for wildcard subscriptions. */
  readonly type: EventType | undefined;
  readonly listener: Listener;
}

/** Delivers validation events to listeners in subscription order. */
export class EventBus {
  private readonly subscriptions = new Set<Subscription>();

  constructor(private readonly config: EventBusConfig = {}) {}

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): Unsubscribe {
    return this.subscribe(type, (event) => {
      if (isEventOfType(event, type)) handler(event);
    });
  }

  /** Subscribe to every event type. */
  onAny(handler: (event: DomainEvent) => void): Unsubscribe {
    return this.subscribe(undefined, handler);
  }

  emit(event: DomainEvent): void {
    for (const { type, listener } of [...this.subscriptions]) {
      if (type !== undefined && type !== event.type) continue;
      try {
        listener(event);
      } catch (error) {
        this.config.onListenerError?.(error, event);
      }
    }
  }

  /** Whether anything would receive an event of `type`. */
  hasListeners(type: EventType): boolean {
    for (const subscription of this.subscriptions) {
      if (subscription.type === undefined || subscription.type === type) return true;
    }
    return false;
  }

  private subscribe(type: EventType | undefined, listener: Listener): Unsubscribe {
    const subscription: Subscription = { type, listener };
    this.subscriptions.add(subscription);
    return () => {
      this.subscriptions.delete(subscription);
    };
  }
}
