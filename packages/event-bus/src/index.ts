import type { DomainEvents, DomainEventName } from "./events";

type Handler<E extends DomainEventName> = (payload: DomainEvents[E]) => void | Promise<void>;

export interface Subscription {
  unsubscribe: () => void;
}

type HandlerTable = { [E in DomainEventName]: Set<Handler<E>> };

export class EventBus {
  private readonly handlers: HandlerTable = {
    "dataset.loaded": new Set(),
    "persona.assigned": new Set(),
    "timeline.ready": new Set(),
    "persona.skipped": new Set(),
    "run.completed": new Set()
  };

  subscribe<E extends DomainEventName>(name: E, handler: Handler<E>): Subscription {
    const existing = this.handlers[name];
    existing.add(handler);

    return {
      unsubscribe: () => {
        existing.delete(handler);
      }
    };
  }

  async publish<E extends DomainEventName>(name: E, payload: DomainEvents[E]): Promise<void> {
    const listeners = new Set(this.handlers[name]);
    for (const handler of listeners) {
      try {
        await handler(payload);
      } catch (err) {
        console.error(`[event-bus] handler for ${name} failed`, err);
      }
    }
  }

  clear(): void {
    for (const listeners of Object.values(this.handlers)) {
      listeners.clear();
    }
  }
}

export const defaultEventBus = new EventBus();

export * from "./events";
