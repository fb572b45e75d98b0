// ============================================
// Event Bus - Type-Safe Local Pub/Sub
// Carries simulation output to renderer and audio collaborators
// ============================================

import type { SimEvent } from '#shared';

type EventType = SimEvent['type'];
type EventOf<T extends EventType> = Extract<SimEvent, { type: T }>;
type EventHandler<T extends EventType> = (event: EventOf<T>) => void;

export class EventBus {
  // Per type: original handler -> type-narrowing wrapper
  private handlers = new Map<EventType, Map<object, (event: SimEvent) => void>>();

  /**
   * Subscribe to an event (type-safe)
   * @returns unsubscribe function
   */
  on<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    let byHandler = this.handlers.get(type);
    if (!byHandler) {
      byHandler = new Map();
      this.handlers.set(type, byHandler);
    }

    const isType = (event: SimEvent): event is EventOf<T> => event.type === type;
    byHandler.set(handler, (event) => {
      if (isType(event)) handler(event);
    });

    return () => this.off(type, handler);
  }

  /**
   * Subscribe to an event once (auto-unsubscribes after first call)
   */
  once<T extends EventType>(type: T, handler: EventHandler<T>): () => void {
    const wrappedHandler: EventHandler<T> = (event) => {
      this.off(type, wrappedHandler);
      handler(event);
    };
    return this.on(type, wrappedHandler);
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  emit(event: SimEvent): void {
    const byHandler = this.handlers.get(event.type);
    if (!byHandler) return;
    // Copy so handlers may unsubscribe while we iterate
    for (const wrapper of Array.from(byHandler.values())) {
      wrapper(event);
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}
