// @filename: events.ts
/**
 * @module EventBus
 */

import type { SubscriptionObserver } from './observable.ts';

import { Observable } from './observable.ts';
import { Symbol } from "./symbol.ts";

/**
 * A multicast bus that extends {@link Observable<T>}: every value passed to
 * {@link emit} reaches every subscriber active at that moment.
 *
 * @typeParam T - The type of values emitted by this bus.
 *
 * @remarks
 * - Subscribers only see values emitted after they subscribed (no replay).
 * - {@link close} completes all subscribers; later subscribers complete
 *   immediately and later emits are ignored.
 * - A subscriber that unsubscribes while an emit is in flight does not
 *   receive that value if its turn had not come yet.
 *
 * @example
 * ```ts
 * const bus = new EventBus<string>();
 *
 * bus.subscribe({
 *   next(msg) { console.log('Received:', msg); },
 *   complete() { console.log('Bus closed'); }
 * });
 *
 * bus.emit('hello');
 * bus.close();
 * ```
 */
export class EventBus<T> extends Observable<T> {
  /** Active subscribers receiving emitted values */
  #subscribers = new Set<SubscriptionObserver<T>>();
  #closed = false;

  constructor() {
    super(subscriber => {
      if (this.#closed) {
        subscriber.complete();
        return;
      }

      this.#subscribers.add(subscriber);
      return () => {
        this.#subscribers.delete(subscriber);
      };
    });
  }

  /** Whether {@link close} has been called. */
  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Deliver `value` to every active subscriber.
   */
  emit(value: T): void {
    if (this.#closed) return;
    for (const subscriber of [...this.#subscribers]) {
      if (this.#subscribers.has(subscriber)) subscriber.next(value);
    }
  }

  /**
   * Close the bus, completing all subscribers and preventing further emits.
   */
  close(): void {
    if (this.#closed) return;
    this.#closed = true;

    const subscribers = [...this.#subscribers];
    this.#subscribers.clear();

    for (const subscriber of subscribers) {
      subscriber.complete();
    }
  }

  /** Alias for {@link close}. */
  [Symbol.dispose](): void {
    this.close();
  }

  /** Alias for {@link close}. */
  [Symbol.asyncDispose](): Promise<void> {
    return Promise.resolve(this.close());
  }
}
