import { Logger } from "../logger.js";
import { asError } from "../errors.js";

export type CellListener<T> = (value: T) => void;

/**
 * Single-writer, many-reader value cell. `set()` replaces the value and
 * notifies every subscriber synchronously; a new subscriber is called
 * once with the current value straight away. A listener that throws is
 * logged and skipped, never propagated to the writer.
 */
export class WatchCell<T> {
  private value: T;
  private readonly listeners = new Set<CellListener<T>>();

  constructor(initial: T) {
    this.value = initial;
  }

  get(): T {
    return this.value;
  }

  set(next: T): void {
    this.value = next;
    for (const listener of [...this.listeners]) this.notify(listener, next);
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: CellListener<T>): () => void {
    this.listeners.add(listener);
    this.notify(listener, this.value);
    return () => { this.listeners.delete(listener); };
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }

  private notify(listener: CellListener<T>, value: T): void {
    try {
      listener(value);
    } catch (e: unknown) {
      Logger.warn(`[watch-cell] subscriber threw: ${asError(e).message}`);
    }
  }
}
