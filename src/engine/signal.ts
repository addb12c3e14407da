import { logger } from './logger';

/**
 * `forward`: listeners only see values emitted after they subscribe.
 * `replay`: the last emitted value is also delivered once to each late subscriber.
 */
export type DeliveryMode = 'forward' | 'replay';

export type Listener<T> = (value: T) => void;

export class Signal<T> {
  private readonly listeners = new Set<Listener<T>>();
  private last: { value: T } | null = null;

  constructor(readonly name: string, readonly mode: DeliveryMode = 'forward') {}

  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    if (this.mode === 'replay' && this.last) {
      this.deliver(listener, this.last.value);
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(value: T) {
    if (this.mode === 'replay') this.last = { value };
    for (const listener of [...this.listeners]) {
      this.deliver(listener, value);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  clear() {
    this.listeners.clear();
    this.last = null;
  }

  private deliver(listener: Listener<T>, value: T) {
    try {
      listener(value);
    } catch (err) {
      logger.error('signal', `Listener for "${this.name}" threw`, err);
    }
  }
}
