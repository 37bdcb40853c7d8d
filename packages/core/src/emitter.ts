/**
 * Type-safe EventEmitter for ScopeGate events
 *
 * Authorization decisions are published here; the server's metrics
 * subscribe per event type.
 */

import type { ScopeGateEvent, EventName } from "./events.js";

/**
 * Event listener callback type
 */
export type EventListener<T extends ScopeGateEvent = ScopeGateEvent> = (
  event: T
) => void | Promise<void>;

/**
 * Called when a listener throws; the emitter keeps going either way.
 */
export type ListenerErrorHandler = (event: ScopeGateEvent, error: unknown) => void;

const defaultErrorHandler: ListenerErrorHandler = (event, error) => {
  console.error(`[ScopeGateEmitter] Error in listener for ${event.type}:`, error);
};

export class ScopeGateEmitter {
  private listeners: Map<EventName, EventListener[]> = new Map();
  private readonly onListenerError: ListenerErrorHandler;

  constructor(onListenerError: ListenerErrorHandler = defaultErrorHandler) {
    this.onListenerError = onListenerError;
  }

  /**
   * Subscribe to events of a specific type. Returns the unsubscribe
   * function.
   */
  on<T extends EventName>(
    eventType: T,
    listener: EventListener<Extract<ScopeGateEvent, { type: T }>>
  ): () => void {
    const entry = listener as EventListener;
    const listeners = this.listeners.get(eventType) || [];
    listeners.push(entry);
    this.listeners.set(eventType, listeners);

    return () => {
      const current = this.listeners.get(eventType);
      if (!current) return;
      const index = current.indexOf(entry);
      if (index !== -1) current.splice(index, 1);
      if (current.length === 0) this.listeners.delete(eventType);
    };
  }

  /**
   * Call every listener for the event's type in subscription order.
   * A throwing listener is reported and does not stop the others.
   */
  async emit<T extends ScopeGateEvent>(event: T): Promise<void> {
    const eventType: EventName = event.type;
    const listeners = [...(this.listeners.get(eventType) || [])];

    for (const listener of listeners) {
      try {
        await listener(event);
      } catch (error) {
        this.onListenerError(event, error);
      }
    }
  }

  /**
   * Fire-and-forget emit for the request path.
   */
  emitSync<T extends ScopeGateEvent>(event: T): void {
    void this.emit(event);
  }
}

let globalEmitter: ScopeGateEmitter | null = null;

export function getGlobalEmitter(): ScopeGateEmitter {
  if (!globalEmitter) {
    globalEmitter = new ScopeGateEmitter();
  }
  return globalEmitter;
}

/**
 * Create a new isolated emitter instance
 */
export function createEmitter(onListenerError?: ListenerErrorHandler): ScopeGateEmitter {
  return new ScopeGateEmitter(onListenerError);
}
