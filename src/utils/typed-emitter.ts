/**
 * Minimal strongly typed event emitter. `T` maps each event name to the
 * tuple of arguments its listeners receive.
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown[] }> {
  private listeners: { [K in keyof T]?: Array<(...args: T[K]) => void> } = {};

  on<K extends keyof T>(event: K, listener: (...args: T[K]) => void): this {
    const existing = this.listeners[event] ?? [];
    this.listeners[event] = [...existing, listener];
    return this;
  }

  off<K extends keyof T>(event: K, listener: (...args: T[K]) => void): this {
    const existing = this.listeners[event];
    if (existing) {
      this.listeners[event] = existing.filter((l) => l !== listener);
    }
    return this;
  }

  once<K extends keyof T>(event: K, listener: (...args: T[K]) => void): this {
    const wrapper = (...args: T[K]): void => {
      this.off(event, wrapper);
      listener(...args);
    };
    return this.on(event, wrapper);
  }

  emit<K extends keyof T>(event: K, ...args: T[K]): boolean {
    const current = this.listeners[event];
    if (!current || current.length === 0) return false;
    for (const listener of current) {
      listener(...args);
    }
    return true;
  }

  removeAllListeners<K extends keyof T>(event?: K): this {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
    return this;
  }

  listenerCount<K extends keyof T>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }
}
