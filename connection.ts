// @filename: connection.ts
/**
 * Connection streams: cold streams of client connections with an event
 * side channel.
 *
 * A {@link ConnectionStream} emits the connections a client opens and, next
 * to the data flow, accepts *event listeners* through
 * {@link ConnectionStream.subscribeForEvents}. A listener registered on a
 * stream observes every connection that stream creates, from every data
 * subscription, without being wired into each connection by hand.
 *
 * The two lifelines are independent: cancelling a data subscription leaves
 * event registrations in place, and cancelling a registration leaves data
 * subscriptions running.
 *
 * Streams that obtain their connections from *another* connection stream (a
 * pool picking a host, a retry layer re-subscribing) extend
 * {@link DelegatingSubscriptionHandler}, which forwards its listeners onto
 * whichever inner stream it resolves.
 *
 * @example
 * ```ts
 * class PooledHandler extends DelegatingSubscriptionHandler<Buffer, Buffer, ClientListener> {
 *   constructor(private readonly hosts: ConnectionStream<Buffer, Buffer, ClientListener>[]) {
 *     super();
 *   }
 *
 *   protected doSubscribe(subscriber, forwardListeners) {
 *     const inner = this.hosts[Math.floor(Math.random() * this.hosts.length)];
 *     forwardListeners(inner);
 *     return inner.subscribe(subscriber);
 *   }
 * }
 *
 * const pooled = ConnectionStream.createNew(new PooledHandler(hosts));
 * pooled.subscribeForEvents(metrics);
 * pooled.subscribe(connection => connection.write(Buffer.from('ping')));
 * ```
 *
 * @module
 */
import type { SpecObservable } from "./_spec.ts";
import type { Subscription } from "./_types.ts";
import type { SubscriptionObserver, Teardown } from "./observable.ts";
import { reportError } from "./config.ts";
import { ListenerRegistry, emptyRegistration } from "./listeners.ts";
import { Observable, cleanupSubscription } from "./observable.ts";

/**
 * A bidirectional channel to a peer, as produced by a connection stream.
 * Connection streams relay connections untouched; they never read from or
 * write to them.
 *
 * @typeParam R - Type of messages read from the connection.
 * @typeParam W - Type of messages written to the connection.
 */
export interface Connection<R, W> {
  /** Messages read from the peer. */
  readonly input: SpecObservable<R>;

  /** Writes one message to the peer. */
  write(message: W): unknown;
}

/**
 * The pluggable logic behind a {@link ConnectionStream}.
 *
 * @typeParam R - Type of messages read from produced connections.
 * @typeParam W - Type of messages written to produced connections.
 * @typeParam L - Event listener type.
 */
export interface SubscriptionHandler<R, W, L = unknown> {
  /**
   * Runs once per data subscription: emits zero or more connections to
   * `subscriber`, then exactly one `complete()` or `error()`.
   *
   * @returns What to release when the data subscription ends.
   */
  produce(subscriber: SubscriptionObserver<Connection<R, W>>): Teardown;

  /**
   * Registers an event listener. Must succeed synchronously, whether or not
   * a data subscription exists.
   */
  registerListener(listener: L): Subscription;
}

/**
 * A cold stream of connections plus an event side channel.
 *
 * Immutable: a stream wraps exactly one {@link SubscriptionHandler}, fixed
 * at construction through {@link ConnectionStream.createNew} or
 * {@link ConnectionStream.forError}.
 *
 * @typeParam R - Type of messages read from produced connections.
 * @typeParam W - Type of messages written to produced connections.
 * @typeParam L - Event listener type.
 */
export class ConnectionStream<R, W, L = unknown> extends Observable<Connection<R, W>> {
  readonly #handler: SubscriptionHandler<R, W, L>;

  private constructor(handler: SubscriptionHandler<R, W, L>) {
    super(subscriber => handler.produce(subscriber));
    this.#handler = handler;
  }

  /**
   * Registers a listener for the events of every connection this stream
   * creates.
   *
   * @remarks
   * Callable at any time, any number of times; each call is an independent
   * registration.
   *
   * @returns Handle that removes this registration only.
   */
  subscribeForEvents(listener: L): Subscription {
    return this.#handler.registerListener(listener);
  }

  /**
   * A stream whose every subscription fails immediately with `error`.
   * `subscribeForEvents` on it returns an already-closed handle.
   *
   * @example
   * ```ts
   * if (!host) return ConnectionStream.forError(new Error('No host available'));
   * ```
   */
  static forError<R, W, L = unknown>(error: unknown): ConnectionStream<R, W, L> {
    return new ConnectionStream<R, W, L>(new ErrorSubscriptionHandler<R, W, L>(error));
  }

  /**
   * Wraps `handler` without changing its behavior.
   *
   * @throws TypeError if `handler` lacks `produce` or `registerListener`
   */
  static createNew<R, W, L = unknown>(handler: SubscriptionHandler<R, W, L>): ConnectionStream<R, W, L> {
    if (
      typeof handler?.produce !== 'function' ||
      typeof handler?.registerListener !== 'function'
    ) {
      throw new TypeError('Subscription handler must implement produce() and registerListener()');
    }

    return new ConnectionStream<R, W, L>(handler);
  }
}

/**
 * Handler that fails every subscription with the same error.
 */
export class ErrorSubscriptionHandler<R, W, L = unknown> implements SubscriptionHandler<R, W, L> {
  readonly #error: unknown;

  constructor(error: unknown) {
    this.#error = error;
  }

  produce(subscriber: SubscriptionObserver<Connection<R, W>>): void {
    subscriber.error(this.#error);
  }

  /** No connection is ever produced, so the listener can never be called. */
  registerListener(_listener: L): Subscription {
    return emptyRegistration();
  }
}

/**
 * The action handed to {@link DelegatingSubscriptionHandler.doSubscribe}:
 * links the handler's listeners to `inner` and returns the link. Calling it
 * again with an already linked stream returns the same link.
 */
export type ForwardListeners<R, W, L> = (inner: ConnectionStream<R, W, L>) => Subscription;

/**
 * Resolves a delivery failure: to the subscriber while it is open, to the
 * host once it has closed.
 * @internal
 */
function fail<T>(subscriber: SubscriptionObserver<T>, err: unknown): void {
  if (subscriber.closed) reportError(err);
  else subscriber.error(err);
}

/** @internal */
function isPromiseLike(value: Teardown | PromiseLike<Teardown>): value is PromiseLike<Teardown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Base for handlers that take their connections from another
 * {@link ConnectionStream}, chosen anew on every subscription.
 *
 * @remarks
 * Owns one {@link ListenerRegistry}, shared by all subscriptions. On every
 * subscription {@link doSubscribe} resolves the inner stream, calls
 * `forwardListeners(inner)` so that listeners registered on this handler
 * (before or after) reach the inner stream, and subscribes the subscriber to
 * it.
 *
 * Linking to the same inner stream again on a later subscription does not
 * duplicate deliveries. Unless unsubscribed, links live as long as the
 * handler, so connections from a finished subscription keep reporting
 * events. Every linked stream
 * receives a copy of each listener registered later; a handler that builds a
 * fresh inner stream per subscription (a retry layer, say) should unsubscribe
 * the link returned by `forwardListeners` once that stream's connections are
 * no longer in use.
 *
 * Errors thrown by `doSubscribe` (including forwarding failures) and
 * rejections of the promise it returns end the data subscription with that
 * error; `produce` itself never throws.
 *
 * @typeParam R - Type of messages read from produced connections.
 * @typeParam W - Type of messages written to produced connections.
 * @typeParam L - Event listener type.
 */
export abstract class DelegatingSubscriptionHandler<R, W, L = unknown> implements SubscriptionHandler<R, W, L> {
  readonly #listeners = new ListenerRegistry<L>();

  /** The listeners registered on this handler. */
  protected get listeners(): ListenerRegistry<L> {
    return this.#listeners;
  }

  produce(subscriber: SubscriptionObserver<Connection<R, W>>): Teardown {
    const forwardListeners: ForwardListeners<R, W, L> = inner =>
      this.#listeners.forwardAllTo(inner);

    let result: Teardown | PromiseLike<Teardown>;
    try {
      result = this.doSubscribe(subscriber, forwardListeners);
    } catch (err) {
      fail(subscriber, err);
      return;
    }

    if (!isPromiseLike(result)) return result;

    let cancelled = false;
    let teardown: Teardown = null;

    result.then(
      resolved => {
        if (cancelled) cleanupSubscription(resolved);
        else teardown = resolved;
      },
      err => fail(subscriber, err)
    );

    return () => {
      cancelled = true;
      cleanupSubscription(teardown);
      teardown = null;
    };
  }

  registerListener(listener: L): Subscription {
    return this.#listeners.register(listener);
  }

  /**
   * Resolves the inner stream for one subscription.
   *
   * Implementations must, once per call:
   * 1. determine the inner {@link ConnectionStream};
   * 2. call `forwardListeners(inner)`;
   * 3. subscribe `subscriber` to `inner` and return that subscription.
   *
   * May return a promise of the teardown when the inner stream is only known
   * asynchronously. Throwing, or rejecting, fails the subscription. An
   * asynchronous implementation should check `subscriber.closed` before
   * subscribing to `inner`: a subscription cancelled in the meantime would
   * otherwise open a connection only to drop it.
   */
  protected abstract doSubscribe(
    subscriber: SubscriptionObserver<Connection<R, W>>,
    forwardListeners: ForwardListeners<R, W, L>,
  ): Teardown | PromiseLike<Teardown>;
}
