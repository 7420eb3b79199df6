/**
 * Simple in-memory pub/sub event bus.
 * The ledger publishes committed operations here; the WebSocket feed, the
 * liquidation monitor and the event log subscribe.
 */

export type EventType =
  | 'user.registered'
  | 'pool.created'
  | 'price.updated'
  | 'supply.deposited'
  | 'supply.withdrawn'
  | 'collateral.deposited'
  | 'collateral.withdrawn'
  | 'collateral.converted'
  | 'loan.opened'
  | 'loan.borrowed'
  | 'loan.collateral.added'
  | 'loan.repaid'
  | 'loan.closed'
  | 'loan.liquidated'
  | 'loan.transferred'
  | 'liquidation.shortfall'
  | 'credit.score.updated'
  | 'monitor.alert';

export type EventCallback = (event: EventType, data: unknown) => void;
export type ListenerErrorHandler = (event: EventType, error: unknown) => void;

export class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private errorHandler: ListenerErrorHandler = (event, error) => {
    console.error(`event listener for '${event}' failed`, error);
  };

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /** A failing listener is reported here and never reaches the publisher. */
  onListenerError(handler: ListenerErrorHandler): void {
    this.errorHandler = handler;
  }

  /**
   * Emit an event to all matching subscribers.
   */
  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];
    for (const cb of targets) {
      try {
        cb(event, data);
      } catch (error) {
        this.errorHandler(event, error);
      }
    }
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
