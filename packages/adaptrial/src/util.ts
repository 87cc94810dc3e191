type Listener<E> = (evt: E) => void;

export class EventEmitter<EventMap extends Record<string, unknown>> {
  protected listeners: {
    [K in keyof EventMap]?: Set<Listener<EventMap[K]>>;
  } = {};
  /** Add event listener */
  on<K extends keyof EventMap>(type: K, listener: Listener<EventMap[K]>) {
    (this.listeners[type] ??= new Set<Listener<EventMap[K]>>()).add(listener);
    return this;
  }
  /** Remove event listener */
  off<K extends keyof EventMap>(type: K, listener: Listener<EventMap[K]>) {
    this.listeners[type]?.delete(listener);
    return this;
  }
  /** Add one-time event listener, can not be removed manually */
  once<K extends keyof EventMap>(type: K, listener: Listener<EventMap[K]>) {
    const wrapper = (evt: EventMap[K]) => {
      try {
        listener(evt);
      } finally {
        this.off(type, wrapper);
      }
    };
    this.on(type, wrapper);
    return this;
  }
  /**
   * Emit event listeners
   *
   * @returns Number of called listeners
   */
  emit<K extends keyof EventMap>(type: K, e: EventMap[K]) {
    const listeners = this.listeners[type];
    if (!listeners) return 0;
    for (const listener of listeners) listener(e);
    return listeners.size;
  }
}
