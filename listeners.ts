// @filename: listeners.ts
/**
 * Registry of event listeners with live forwarding onto other sinks.
 *
 * A {@link ListenerRegistry} is what lets a composed connection stream (a
 * pool, a load balancer, a retry layer) accept listeners long before it
 * knows which inner stream will actually produce connections. When the inner
 * stream is known, the registry is *linked* to it with
 * {@link ListenerRegistry.forwardAllTo}: every listener registered so far is
 * registered on the inner stream too, and so is every listener registered
 * later, for as long as the link stays open.
 *
 * @example
 * ```ts
 * const registry = new ListenerRegistry<MetricsListener>();
 * const early = registry.register(metrics);
 *
 * registry.forwardAllTo(innerStream);      // metrics now observes innerStream
 * const late = registry.register(tracing); // so does tracing
 *
 * early.unsubscribe(); // also removes metrics from innerStream
 * ```
 *
 * @module
 */
import type { SpecSubscription } from "./_spec.ts";
import type { Subscription } from "./_types.ts";
import { reportError } from "./config.ts";
import { ObservableError } from "./error.ts";
import { EventBus } from "./events.ts";
import { Symbol } from "./symbol.ts";

/**
 * Anything listeners can be registered on: a connection stream, or another
 * registry.
 *
 * @typeParam L - Listener type.
 */
export interface ListenerSink<L> {
  subscribeForEvents(listener: L): SpecSubscription;
}

/**
 * One registration. The object itself is the registration token, so the
 * same listener registered twice yields two independent entries.
 * @internal
 */
interface Entry<L> {
  readonly listener: L;

  /** Copies of this registration on every linked sink */
  readonly copies: Map<ListenerSink<L>, SpecSubscription>;
}

/**
 * Creates an idempotent cancellation handle that calls `onCancel` the first
 * time it is unsubscribed.
 */
export function createRegistration(onCancel?: () => void): Subscription {
  let closed = false;

  return {
    get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },

    get closed() { return closed; },

    unsubscribe(): void {
      if (closed) return;
      closed = true;
      onCancel?.();
    },

    [Symbol.dispose]() {
      this.unsubscribe();
    },

    [Symbol.asyncDispose]() {
      return Promise.resolve(this.unsubscribe());
    }
  };
}

/**
 * A handle with nothing behind it, already closed. Returned by sinks that
 * can never emit events.
 */
export function emptyRegistration(): Subscription {
  const registration = createRegistration();
  registration.unsubscribe();
  return registration;
}

/**
 * Releases the copy of `entry` held by `sink`, if any.
 * @internal
 */
function detach<L>(entry: Entry<L>, sink: ListenerSink<L>): void {
  const copy = entry.copies.get(sink);
  if (!copy) return;

  entry.copies.delete(sink);
  try {
    copy.unsubscribe();
  } catch (err) {
    reportError(err);
  }
}

/**
 * Holds event listeners and forwards them, present and future, to linked
 * sinks.
 *
 * @remarks
 * Re-entrancy: listeners and sinks may register, cancel or link while the
 * registry is iterating. Iteration works on a snapshot and re-checks
 * membership, so an entry cancelled before its turn is skipped and an entry
 * added mid-iteration is handled by the step that added it.
 *
 * @typeParam L - Listener type. Never inspected, only stored and forwarded.
 */
export class ListenerRegistry<L> implements ListenerSink<L>, Disposable {
  #entries = new Map<Entry<L>, Subscription>();
  #links = new Map<ListenerSink<L>, Subscription>();

  /** Every new entry is emitted here; each open link listens. */
  #added = new EventBus<Entry<L>>();

  /** Number of active registrations. */
  get size(): number {
    return this.#entries.size;
  }

  /**
   * Adds `listener` and forwards it to every linked sink.
   *
   * @remarks
   * Never throws. A linked sink that fails to accept the listener does not
   * affect the local registration; the failure is reported through
   * `reportError` as an {@link ObservableError}.
   *
   * @returns A handle removing this registration, and its forwarded copies.
   */
  register(listener: L): Subscription {
    const entry: Entry<L> = { listener, copies: new Map() };

    const registration = createRegistration(() => {
      this.#entries.delete(entry);
      for (const sink of [...entry.copies.keys()]) detach(entry, sink);
    });

    this.#entries.set(entry, registration);
    this.#added.emit(entry);
    return registration;
  }

  /**
   * Alias of {@link register}, so registries can be linked to each other.
   */
  subscribeForEvents(listener: L): Subscription {
    return this.register(listener);
  }

  /**
   * Links this registry to `sink`: registers every current listener on it,
   * and keeps registering listeners added later until the returned handle is
   * unsubscribed.
   *
   * @remarks
   * - Linking to a sink that is already linked returns the existing link.
   * - Unsubscribing the link removes every copy it forwarded.
   * - If `sink` rejects any current listener, the link is severed, the
   *   copies already made are removed, and the failures are thrown together.
   *
   * @throws TypeError if `sink` is this registry
   * @throws ObservableError (operator `"listeners:forward"`) aggregating the
   * errors thrown by `sink`
   */
  forwardAllTo(sink: ListenerSink<L>): Subscription {
    if (sink === this) {
      throw new TypeError('A listener registry cannot forward to itself');
    }

    const existing = this.#links.get(sink);
    if (existing) return existing;

    const attach = (entry: Entry<L>) => {
      if (!this.#entries.has(entry) || entry.copies.has(sink)) return;

      const copy = sink.subscribeForEvents(entry.listener);

      // The sink may have cancelled the entry, or severed this link, while
      // accepting the copy.
      if (!this.#entries.has(entry) || link.closed) {
        copy.unsubscribe();
        return;
      }
      entry.copies.set(sink, copy);
    };

    const additions = this.#added.subscribe(entry => {
      try {
        attach(entry);
      } catch (err) {
        reportError(ObservableError.from(err, "listeners:forward", entry.listener));
      }
    });

    const link = createRegistration(() => {
      additions.unsubscribe();
      this.#links.delete(sink);
      for (const entry of this.#entries.keys()) detach(entry, sink);
    });
    this.#links.set(sink, link);

    const snapshot = [...this.#entries.keys()];
    const errors: unknown[] = [];
    for (const entry of snapshot) {
      try {
        attach(entry);
      } catch (err) {
        errors.push(err);
      }
    }

    if (errors.length > 0) {
      link.unsubscribe();
      throw new ObservableError(
        errors,
        `Failed to forward ${errors.length} of ${snapshot.length} listener(s)`,
        { operator: "listeners:forward" }
      );
    }

    return link;
  }

  /**
   * Calls `fn` once for every listener registered when dispatch starts and
   * still registered when its turn comes.
   *
   * @remarks
   * Order between listeners is unspecified. A throwing listener does not stop
   * delivery to the others; its error is reported through `reportError`.
   *
   * @example
   * ```ts
   * registry.dispatch(listener => listener.onConnectSuccess?.(elapsedMs));
   * ```
   */
  dispatch(fn: (listener: L) => void): void {
    for (const entry of [...this.#entries.keys()]) {
      if (!this.#entries.has(entry)) continue;

      try {
        fn(entry.listener);
      } catch (err) {
        reportError(err);
      }
    }
  }

  /**
   * Severs every link and cancels every registration.
   */
  [Symbol.dispose](): void {
    for (const link of [...this.#links.values()]) link.unsubscribe();
    for (const registration of [...this.#entries.values()]) registration.unsubscribe();
  }
}
