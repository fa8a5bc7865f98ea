// @filename: _types.ts
import type { SpecSubscription, SpecObserver } from "./_spec.ts";
import type { Symbol } from "./symbol.ts";

/**
 * Observer accepted by {@link Observable.subscribe}.
 *
 * @remarks
 * Same callbacks as {@link SpecObserver}, but `start()` receives the full
 * {@link Subscription} so it can inspect `closed`.
 *
 * @typeParam T - Type of values this observer can receive.
 *
 * @example
 * ```ts
 * const observer: Observer<Connection<Buffer, Buffer>> = {
 *   start(subscription) {
 *     console.log('Active:', !subscription.closed);
 *   },
 *   next(connection) {
 *     connection.write(Buffer.from('ping'));
 *   },
 *   error(err) {
 *     console.error('Could not connect', err);
 *   }
 * };
 * ```
 */
export interface Observer<T> extends SpecObserver<T> {
  start?(subscription: Subscription): void;
}

/**
 * Cancellation handle shared by data subscriptions and event registrations.
 *
 * @remarks
 * - `closed` flips to `true` once the handle is cancelled, or once the data
 *   subscription terminates.
 * - `unsubscribe()` is idempotent.
 * - Works in `using` / `await using` blocks.
 *
 * @example
 * ```ts
 * {
 *   using registration = stream.subscribeForEvents(metricsListener);
 *   await doRequests();
 * } // listener removed here
 * ```
 */
export interface Subscription extends SpecSubscription, Disposable, AsyncDisposable {
  readonly closed: boolean;

  [Symbol.dispose](): void;

  [Symbol.asyncDispose](): Promise<void>;

  readonly [Symbol.toStringTag]: "Subscription";
}

export type * from "./_spec.ts";
