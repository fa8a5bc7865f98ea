// @filename: observable.ts
/**
 * The cold-stream runtime connection streams are built on.
 *
 * An {@link Observable} stores a *subscriber function* and runs it once per
 * `subscribe()` call. The subscriber pushes values through a
 * {@link SubscriptionObserver}, then ends with exactly one terminal signal
 * (`error()` or `complete()`), and may return a {@link Teardown} that runs
 * when the subscription ends for any reason.
 *
 * ## Error Propagation Policy
 * 1. If the observer supplies an `error` callback, upstream errors go there.
 * 2. Otherwise the error is handed to `reportError()` (see `config.ts`), which
 *    surfaces it like an unhandled promise rejection.
 * 3. An exception thrown by the observer's `next()` terminates the
 *    subscription through `error()`; one thrown by `complete()` is routed to
 *    `error()` when present.
 * 4. Exceptions thrown by `error()` itself, or by a teardown, are reported.
 *
 * ## Lifecycle
 * ```text
 * (inactive) --subscribe()--> [ active ] --error()/complete()/unsubscribe()--> (closed)
 * ```
 * Teardown runs exactly once on the transition to closed, also when the
 * subscriber terminated synchronously before returning its teardown.
 *
 * @example
 * ```ts
 * const ticks = new Observable<number>(observer => {
 *   const id = setInterval(() => observer.next(Date.now()), 1000);
 *   return () => clearInterval(id);
 * });
 *
 * const subscription = ticks.subscribe({
 *   next(value) { console.log('tick', value); },
 * });
 *
 * subscription.unsubscribe();
 * ```
 *
 * @module
 */
import type { SpecObservable, ObservableProtocol, SpecSubscription } from "./_spec.ts";
import type { Observer, Subscription } from "./_types.ts";
import { reportError } from "./config.ts";
import { Symbol } from "./symbol.ts";

/**
 * Value a subscriber function may return to release its resources.
 *
 * - `() => void` – plain cleanup callback.
 * - `{ unsubscribe() }` – e.g. the subscription to an inner stream.
 * - `{ [Symbol.dispose]() }` / `{ [Symbol.asyncDispose]() }` – disposables.
 * - `undefined | null` – nothing to clean up.
 *
 * @example
 * ```ts
 * new Observable(observer => {
 *   const sub = inner.subscribe(observer);
 *   return sub;
 * });
 * ```
 */
export type Teardown = (() => void) | SpecSubscription | AsyncDisposable | Disposable | null | undefined | void;

/** Options accepted by `subscribe()`. */
export interface SubscribeOptions {
  /** Unsubscribes when the signal aborts. */
  signal?: AbortSignal;
}

/**
 * Internal state shared by a Subscription and its SubscriptionObserver.
 * @internal
 */
interface StateMap<T> {
  /** True once closed via unsubscribe, error, or complete */
  closed: boolean;

  /** Nulled on closure */
  observer: Observer<T> | null;

  cleanup: Teardown;

  removeAbortHandler: (() => void) | null;
}

/**
 * Creates the Subscription handed back from `subscribe()` together with the
 * state it shares with its SubscriptionObserver.
 *
 * @throws TypeError if observer methods are present but not functions
 * @internal
 */
function createSubscription<T>(observer: Observer<T>, opts: SubscribeOptions): [Subscription, StateMap<T>] {
  if (observer.next !== undefined && typeof observer.next !== 'function') {
    throw new TypeError('Observer.next must be a function');
  }
  if (observer.error !== undefined && typeof observer.error !== 'function') {
    throw new TypeError('Observer.error must be a function');
  }
  if (observer.complete !== undefined && typeof observer.complete !== 'function') {
    throw new TypeError('Observer.complete must be a function');
  }

  const state: StateMap<T> = {
    closed: false,
    observer,
    cleanup: null,
    removeAbortHandler: null,
  };

  const subscription: Subscription = {
    get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },

    get closed() { return state.closed; },

    unsubscribe(): void {
      if (state.closed) return;
      releaseSubscription(state);
    },

    [Symbol.dispose]() {
      this.unsubscribe();
    },

    [Symbol.asyncDispose]() {
      return Promise.resolve(this.unsubscribe());
    }
  };

  const signal = opts.signal;
  if (signal) {
    const abortHandler = () => subscription.unsubscribe();
    signal.addEventListener("abort", abortHandler, { once: true });
    state.removeAbortHandler = () => signal.removeEventListener("abort", abortHandler);
  }

  return [subscription, state];
}

/**
 * Marks the state closed, detaches the observer and runs the teardown.
 * Safe to call more than once: the teardown is taken out of the state before
 * it runs.
 * @internal
 */
function releaseSubscription<T>(state: StateMap<T>): void {
  state.closed = true;

  const cleanup = state.cleanup;
  const removeAbortHandler = state.removeAbortHandler;

  state.cleanup = null;
  state.observer = null;
  state.removeAbortHandler = null;

  removeAbortHandler?.();
  cleanupSubscription(cleanup);
}

/**
 * Runs a {@link Teardown} of any supported shape. Errors thrown while
 * cleaning up are reported instead of interrupting the caller.
 */
export function cleanupSubscription(cleanup: Teardown): void {
  if (!cleanup) return;

  try {
    if (typeof cleanup === 'function') cleanup();
    else if (typeof cleanup === 'object') {
      if ('unsubscribe' in cleanup) cleanup.unsubscribe();
      else if (Symbol.asyncDispose in cleanup) {
        Promise.resolve(cleanup[Symbol.asyncDispose]()).catch(reportError);
      }
      else if (Symbol.dispose in cleanup) cleanup[Symbol.dispose]();
    }
  } catch (err) {
    reportError(err);
  }
}

/**
 * Checks a subscriber's return value at run time.
 * @internal
 */
function isTeardown(value: unknown): value is Teardown {
  if (value === undefined || value === null || typeof value === 'function') return true;
  if (typeof value !== 'object') return false;

  return (
    ('unsubscribe' in value && typeof value.unsubscribe === 'function') ||
    (Symbol.dispose in value && typeof value[Symbol.dispose] === 'function') ||
    (Symbol.asyncDispose in value && typeof value[Symbol.asyncDispose] === 'function')
  );
}

/**
 * The producer-side handle a subscriber function pushes notifications into.
 *
 * @remarks
 * Guarantees the observer contract whatever the producer does:
 * - nothing is delivered once the subscription is closed;
 * - `error()` and `complete()` close the subscription and run its teardown;
 * - observer callbacks are invoked with the observer as `this`.
 *
 * Instances are created by `Observable.subscribe()` only.
 *
 * @typeParam T - The type of values delivered by the parent Observable.
 */
export class SubscriptionObserver<T> {
  #state: StateMap<T> | null;

  /** @internal */
  constructor(state: StateMap<T>) {
    this.#state = state;
  }

  /**
   * Whether the subscription has been closed. Long-running producers check
   * this before doing more work.
   */
  get closed(): boolean {
    return this.#state?.closed ?? true;
  }

  /**
   * Delivers a value. Ignored once closed. If the observer's `next()` throws,
   * the subscription is terminated with that error.
   */
  next(value: T): void {
    const state = this.#state;
    if (!state || state.closed) return;

    const observer = state.observer;
    if (!observer || typeof observer.next !== 'function') return;

    try {
      observer.next(value);
    } catch (err) {
      this.error(err);
    }
  }

  /**
   * Terminates the subscription with an error.
   *
   * @remarks
   * The observer's `error()` runs before the teardown. Without an `error()`
   * callback the error is reported to the host.
   */
  error(err: unknown): void {
    this.#terminate(observer => {
      if (typeof observer.error !== 'function') {
        reportError(err);
        return;
      }

      try { observer.error(err); }
      catch (innerErr) { reportError(innerErr); }
    });
  }

  /**
   * Terminates the subscription successfully.
   */
  complete(): void {
    this.#terminate(observer => {
      if (typeof observer.complete !== 'function') return;

      try {
        observer.complete();
      } catch (err) {
        if (typeof observer.error !== 'function') {
          reportError(err);
          return;
        }

        try { observer.error(err); }
        catch (innerErr) { reportError(innerErr); }
      }
    });
  }

  /**
   * Closes first, so re-entrant calls from inside the observer are ignored,
   * then notifies and releases.
   */
  #terminate(notify: (observer: Observer<T>) => void): void {
    const state = this.#state;
    if (!state || state.closed) return;

    const observer = state.observer;
    state.closed = true;
    this.#state = null;

    try {
      if (observer) notify(observer);
    } finally {
      releaseSubscription(state);
    }
  }

  get [Symbol.toStringTag](): "Subscription Observer" { return "Subscription Observer" as const; }
}

/**
 * A lazy, cold, push-based stream.
 *
 * Key guarantees:
 * 1. Nothing runs until `subscribe()` is called.
 * 2. Every `subscribe()` runs the subscriber function again, independently.
 * 3. Teardown runs exactly once per subscription.
 *
 * @typeParam T - Type of values emitted by this Observable
 */
export class Observable<T> implements SpecObservable<T>, ObservableProtocol<T> {
  #subscribeFn: (obs: SubscriptionObserver<T>) => Teardown;

  /**
   * @param subscribeFn - Called once per subscription with the observer to
   * push into; may return a {@link Teardown}.
   *
   * @throws TypeError if `subscribeFn` is not a function
   */
  constructor(subscribeFn: (obs: SubscriptionObserver<T>) => Teardown) {
    if (typeof subscribeFn !== 'function') {
      throw new TypeError('Observable initializer must be a function');
    }

    this.#subscribeFn = subscribeFn;
  }

  /** Interop hook: returns this Observable. */
  [Symbol.observable](): Observable<T> { return this; }

  /**
   * Subscribes with an observer object.
   *
   * @example
   * ```ts
   * const subscription = stream.subscribe({
   *   next(connection) { pool.add(connection); },
   *   error(err) { console.error('connect failed', err); },
   *   complete() { console.log('done'); },
   * }, { signal: AbortSignal.timeout(5_000) });
   * ```
   */
  subscribe(observer: Observer<T>, opts?: SubscribeOptions): Subscription;

  /**
   * Subscribes with callback functions.
   */
  subscribe(
    next: (value: T) => void,
    error?: (e: unknown) => void,
    complete?: () => void,
    opts?: SubscribeOptions,
  ): Subscription;

  subscribe(
    observerOrNext: Observer<T> | ((value: T) => void),
    errorOrOpts?: ((e: unknown) => void) | SubscribeOptions,
    complete?: () => void,
    _opts?: SubscribeOptions
  ): Subscription {
    const observer: Observer<T> = typeof observerOrNext === 'function'
      ? {
        next: observerOrNext,
        error: typeof errorOrOpts === 'function' ? errorOrOpts : undefined,
        complete,
      }
      : observerOrNext ?? {};

    const opts: SubscribeOptions = (
      typeof observerOrNext === 'function'
        ? _opts
        : typeof errorOrOpts === 'object' ? errorOrOpts : undefined
    ) ?? {};

    const [subscription, state] = createSubscription(observer, opts);
    const subObserver = new SubscriptionObserver<T>(state);

    if (opts.signal?.aborted) {
      subscription.unsubscribe();
      return subscription;
    }

    try {
      observer.start?.(subscription);
      if (subscription.closed) return subscription;
    } catch (err) {
      console.error(err);
      reportError(err);
      subscription.unsubscribe();
      return subscription;
    }

    try {
      const cleanup: unknown = this.#subscribeFn.call(undefined, subObserver);

      if (!isTeardown(cleanup)) {
        throw new TypeError('Expected subscriber to return a function, an unsubscribe object, a disposable, or undefined/null');
      }

      // The subscriber may have terminated before handing back its teardown
      if (state.closed) cleanupSubscription(cleanup);
      else state.cleanup = cleanup;
    } catch (err) {
      if (subObserver.closed) reportError(err);
      else subObserver.error(err);
    }

    return subscription;
  }

  /**
   * Converts an Observable-like, a promise, an iterable or an async iterable
   * into an Observable.
   */
  static readonly from: typeof from = from;

  /**
   * Emits the given values synchronously, then completes.
   */
  static readonly of: typeof of = of;

  get [Symbol.toStringTag](): "Observable" { return "Observable"; }
}

/**
 * Creates an Observable that synchronously emits `items` then completes.
 *
 * @example
 * ```ts
 * Observable.of(conn1, conn2).subscribe(connection => track(connection));
 * ```
 */
export function of<T>(...items: T[]): Observable<T> {
  return new Observable<T>(obs => {
    for (const item of items) {
      obs.next(item);
      if (obs.closed) return;
    }

    obs.complete();
  });
}

/**
 * Converts `input` into an Observable.
 *
 * Conversion rules, in order:
 * 1. `[Symbol.observable]()` – subscribes to the returned protocol.
 * 2. Promise-like – emits the resolved value then completes, or errors.
 * 3. Iterable – emits every item synchronously then completes.
 * 4. Async iterable – emits items as they arrive then completes.
 *
 * @throws TypeError if input is null, undefined, or not convertible
 *
 * @example
 * ```ts
 * const stream = Observable.from(otherLibraryConnections);
 * ```
 */
export function from<T>(
  input: SpecObservable<T> | PromiseLike<T> | Iterable<T> | AsyncIterable<T>
): Observable<T> {
  if (input === null || input === undefined) {
    throw new TypeError('Cannot convert undefined or null to Observable');
  }

  if (Symbol.observable in input) {
    const protocol = input[Symbol.observable]();
    if (!protocol || typeof protocol.subscribe !== 'function') {
      throw new TypeError('Object returned from [Symbol.observable]() does not implement subscribe method');
    }

    if (protocol instanceof Observable) return protocol;
    return new Observable<T>(obs => protocol.subscribe(obs));
  }

  if ('then' in input && typeof input.then === 'function') {
    const promise = input;
    return new Observable<T>(obs => {
      promise.then(
        value => {
          obs.next(value);
          obs.complete();
        },
        err => obs.error(err)
      );
    });
  }

  if (Symbol.iterator in input) {
    const iterable = input;
    return new Observable<T>(obs => {
      const iterator = iterable[Symbol.iterator]();

      try {
        for (let step = iterator.next(); !step.done; step = iterator.next()) {
          obs.next(step.value);
          if (obs.closed) break;
        }

        obs.complete();
      } catch (err) {
        obs.error(err);
      }

      return () => { iterator.return?.(); };
    });
  }

  if (Symbol.asyncIterator in input) {
    const asyncIterable = input;
    return new Observable<T>(obs => {
      const asyncIterator = asyncIterable[Symbol.asyncIterator]();

      (async () => {
        try {
          for (let step = await asyncIterator.next(); !step.done; step = await asyncIterator.next()) {
            obs.next(step.value);
            if (obs.closed) return;
          }

          obs.complete();
        } catch (err) {
          obs.error(err);
        }
      })();

      return () => { asyncIterator.return?.()?.then(undefined, reportError); };
    });
  }

  throw new TypeError('Input is not Observable, Iterable, AsyncIterable, or Promise');
}
