import logger from '../utils/logger.js';

export type StateListener<Payload> = (payload: Payload) => void;

type ListenerSets<Events> = {
  [K in keyof Events]?: Set<StateListener<Events[K]>>;
};

/**
 * Typed observer surface for state managers.
 */
export interface IStateEmitter<Events> {
  on<K extends keyof Events>(type: K, listener: StateListener<Events[K]>): () => void;
  off<K extends keyof Events>(type: K, listener: StateListener<Events[K]>): void;
}

/**
 * Synchronous in-memory emitter.
 * Listeners run in registration order inside the emitting call.
 */
export class StateEmitter<Events> implements IStateEmitter<Events> {
  private listeners: ListenerSets<Events> = {};

  on<K extends keyof Events>(type: K, listener: StateListener<Events[K]>): () => void {
    let listeners: Set<StateListener<Events[K]>> | undefined = this.listeners[type];
    if (!listeners) {
      listeners = new Set<StateListener<Events[K]>>();
      this.listeners[type] = listeners;
    }
    listeners.add(listener);
    return () => this.off(type, listener);
  }

  off<K extends keyof Events>(type: K, listener: StateListener<Events[K]>): void {
    const listeners: Set<StateListener<Events[K]>> | undefined = this.listeners[type];
    if (!listeners) {
      return;
    }
    listeners.delete(listener);
    if (listeners.size === 0) {
      delete this.listeners[type];
    }
  }

  emit<K extends keyof Events>(type: K, payload: Events[K]): void {
    const listeners: Set<StateListener<Events[K]>> | undefined = this.listeners[type];
    if (!listeners) {
      return;
    }

    // Snapshot so a listener may unsubscribe itself mid-dispatch
    for (const listener of Array.from(listeners)) {
      try {
        listener(payload);
      } catch (err) {
        logger.error({ err, eventType: String(type) }, 'State listener execution failed');
      }
    }
  }

  listenerCount(type: keyof Events): number {
    return this.listeners[type]?.size ?? 0;
  }
}
