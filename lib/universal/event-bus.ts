// event-bus.ts
//
// Tiny, strongly-typed synchronous event bus. `Events` maps event names to
// their payload type; a `void` payload means the event carries no detail.

type MaybeArgs<Detail> = [Detail] extends [void] ? [] : [Detail];

export type EventListenerFn<Detail> = (detail: Detail) => void;

export interface EventBus<Events extends Record<string, unknown>> {
  on<K extends keyof Events & string>(
    type: K,
    listener: EventListenerFn<Events[K]>,
  ): () => void;
  once<K extends keyof Events & string>(
    type: K,
    listener: EventListenerFn<Events[K]>,
  ): () => void;
  off<K extends keyof Events & string>(
    type: K,
    listener: EventListenerFn<Events[K]>,
  ): void;
  /** Returns true when at least one listener received the event. */
  emit<K extends keyof Events & string>(
    type: K,
    ...detail: MaybeArgs<Events[K]>
  ): boolean;
  listenerCount(type: keyof Events & string): number;
}

export function eventBus<Events extends Record<string, unknown>>(): EventBus<
  Events
> {
  const listeners = new Map<string, Set<EventListenerFn<never>>>();

  const registered = (type: string) => {
    let set = listeners.get(type);
    if (!set) {
      set = new Set();
      listeners.set(type, set);
    }
    return set;
  };

  const bus: EventBus<Events> = {
    on(type, listener) {
      registered(type).add(listener);
      return () => bus.off(type, listener);
    },

    once(type, listener) {
      const wrapper: EventListenerFn<Events[typeof type]> = (detail) => {
        bus.off(type, wrapper);
        listener(detail);
      };
      return bus.on(type, wrapper);
    },

    off(type, listener) {
      listeners.get(type)?.delete(listener);
    },

    emit(type, ...detail) {
      const set = listeners.get(type);
      if (!set || set.size === 0) return false;
      // snapshot so `once` listeners can unsubscribe while we iterate
      for (const listener of [...set]) {
        (listener as EventListenerFn<unknown>)(detail[0]);
      }
      return true;
    },

    listenerCount(type) {
      return listeners.get(type)?.size ?? 0;
    },
  };

  return bus;
}
