/**
 * Connection streams for networking clients, with an event side channel that
 * survives composition.
 *
 * A client opens connections through a {@link ConnectionStream}: a cold
 * stream that emits connections when subscribed. Next to the data flow, the
 * stream accepts *event listeners* (metrics, tracing, circuit breakers)
 * through `subscribeForEvents`. A listener registered once observes every
 * connection the stream ever produces.
 *
 * ## Why This Exists
 * Real clients rarely open connections directly. A pool picks a host, a
 * load balancer picks a pool, a retry layer re-subscribes after failures;
 * each layer is itself a connection stream built from other connection
 * streams. Instrumentation must not care: a listener registered on the
 * outermost stream, before or after subscribing, has to reach whichever
 * inner stream ends up creating the connection.
 * {@link DelegatingSubscriptionHandler} does that bridging, backed by a
 * {@link ListenerRegistry} that forwards present *and future* listeners.
 *
 * @example Building a base stream
 * ```ts
 * import { ConnectionStream, ListenerRegistry } from './mod.ts';
 *
 * interface ClientListener {
 *   onConnect?(host: string): void;
 * }
 *
 * const listeners = new ListenerRegistry<ClientListener>();
 * const direct = ConnectionStream.createNew<Buffer, Buffer, ClientListener>({
 *   produce(subscriber) {
 *     const connection = openSocket(host);
 *     listeners.dispatch(l => l.onConnect?.(host));
 *     subscriber.next(connection);
 *     subscriber.complete();
 *   },
 *   registerListener: listener => listeners.register(listener),
 * });
 * ```
 *
 * @example Composing streams
 * ```ts
 * class FirstHealthy extends DelegatingSubscriptionHandler<Buffer, Buffer, ClientListener> {
 *   constructor(private readonly hosts: HostSet) { super(); }
 *
 *   protected async doSubscribe(subscriber, forwardListeners) {
 *     const inner = await this.hosts.pickHealthy();
 *     if (subscriber.closed) return;
 *     forwardListeners(inner);
 *     return inner.subscribe(subscriber);
 *   }
 * }
 *
 * const stream = ConnectionStream.createNew(new FirstHealthy(hosts));
 * using registration = stream.subscribeForEvents({
 *   onConnect: host => console.log('connected to', host),
 * });
 * stream.subscribe(connection => connection.write(Buffer.from('ping')));
 * ```
 *
 * ## Error Handling
 * - Connection failures end the data subscription through `error()`; they
 *   never reach event listeners.
 * - Failures while resolving or forwarding to an inner stream do the same.
 * - `subscribeForEvents` never fails. On `ConnectionStream.forError(...)`
 *   it returns a closed, no-op handle.
 * - Errors with nowhere to go are passed to `config.onUnhandledError`, or
 *   re-thrown on the microtask queue when it is not set.
 *
 * @module
 */
export * from "./observable.ts";
export * from "./connection.ts";
export * from "./listeners.ts";
export * from "./events.ts";
export * from "./error.ts";
export * from "./config.ts";
export { Symbol } from "./symbol.ts";

export type * from "./_types.ts";
