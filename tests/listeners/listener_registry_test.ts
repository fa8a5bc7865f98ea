import type { Subscription } from "../../_types.ts";
import type { ListenerSink } from "../../listeners.ts";
import type { TestListener } from "../_utils/_connections.ts";
import { test, expect, vi } from "vitest";

import { ObservableError } from "../../error.ts";
import { ListenerRegistry, createRegistration, emptyRegistration } from "../../listeners.ts";
import { Symbol } from "../../symbol.ts";
import { createRecorder } from "../_utils/_connections.ts";
import { captureReportedErrors, flush } from "../_utils/_reported.ts";

function fire(registry: ListenerRegistry<TestListener>, name: string): void {
  registry.dispatch((listener) => listener.onEvent(name));
}

/** Accepts every listener except `rejected`, storing the rest in `target`. */
function createPickySink(rejected: TestListener, failure: Error) {
  const target = new ListenerRegistry<TestListener>();
  const sink: ListenerSink<TestListener> = {
    subscribeForEvents(listener) {
      if (listener === rejected) throw failure;
      return target.register(listener);
    },
  };
  return { target, sink };
}

// -----------------------------------------------------------------------------
// Registration handles
// -----------------------------------------------------------------------------

test("createRegistration calls onCancel once", () => {
  const onCancel = vi.fn();
  const registration = createRegistration(onCancel);

  expect(registration.closed).toBe(false);
  registration.unsubscribe();
  registration[Symbol.dispose]();

  expect(onCancel).toHaveBeenCalledTimes(1);
  expect(registration.closed).toBe(true);
});

test("emptyRegistration is closed from the start", () => {
  const registration = emptyRegistration();

  expect(registration.closed).toBe(true);
  expect(() => registration.unsubscribe()).not.toThrow();
});

// -----------------------------------------------------------------------------
// register / dispatch
// -----------------------------------------------------------------------------

test("the same listener registered twice gives independent registrations", () => {
  const registry = new ListenerRegistry<TestListener>();
  const { listener, events } = createRecorder();

  const first = registry.register(listener);
  const second = registry.subscribeForEvents(listener);
  expect(registry.size).toBe(2);

  fire(registry, "a");
  first.unsubscribe();
  fire(registry, "b");

  expect(events).toEqual(["a", "a", "b"]);
  expect(first.closed).toBe(true);
  expect(second.closed).toBe(false);
  expect(registry.size).toBe(1);
});

test("cancelling a registration twice removes it once", () => {
  const registry = new ListenerRegistry<TestListener>();
  const registration = registry.register(createRecorder().listener);
  registry.register(createRecorder().listener);

  registration.unsubscribe();
  registration.unsubscribe();

  expect(registry.size).toBe(1);
});

test("a throwing listener is reported and the others are still called", async () => {
  const capture = captureReportedErrors();
  const failure = new Error("listener failed");
  const registry = new ListenerRegistry<TestListener>();
  const { listener, events } = createRecorder();

  try {
    registry.register({ onEvent: () => { throw failure; } });
    registry.register(listener);
    fire(registry, "connected");
    await flush();
  } finally {
    capture.restore();
  }

  expect(events).toEqual(["connected"]);
  expect(capture.errors).toEqual([failure]);
});

test("listeners cancelling each other during dispatch yield exactly one call", () => {
  const registry = new ListenerRegistry<TestListener>();
  let calls = 0;
  let first: Subscription | undefined;
  let second: Subscription | undefined;

  first = registry.register({ onEvent: () => { calls++; second?.unsubscribe(); } });
  second = registry.register({ onEvent: () => { calls++; first?.unsubscribe(); } });

  fire(registry, "e");

  expect(calls).toBe(1);
  expect(registry.size).toBe(1);
});

test("a listener registered during dispatch waits for the next one", () => {
  const registry = new ListenerRegistry<TestListener>();
  const late = createRecorder();

  registry.register({ onEvent: () => { registry.register(late.listener); } });
  fire(registry, "first");
  fire(registry, "second");

  expect(late.events).toEqual(["second"]);
});

// -----------------------------------------------------------------------------
// forwardAllTo
// -----------------------------------------------------------------------------

test("forwardAllTo forwards existing and later listeners", () => {
  const registry = new ListenerRegistry<TestListener>();
  const target = new ListenerRegistry<TestListener>();
  const early = createRecorder();
  const late = createRecorder();

  registry.register(early.listener);
  registry.forwardAllTo(target);
  registry.register(late.listener);

  fire(target, "connected");

  expect(target.size).toBe(2);
  expect(early.events).toEqual(["connected"]);
  expect(late.events).toEqual(["connected"]);
});

test("cancelling a registration removes its forwarded copy", () => {
  const registry = new ListenerRegistry<TestListener>();
  const target = new ListenerRegistry<TestListener>();
  const { listener, events } = createRecorder();

  const registration = registry.register(listener);
  registry.forwardAllTo(target);
  registration.unsubscribe();

  fire(target, "ignored");

  expect(target.size).toBe(0);
  expect(events).toEqual([]);
});

test("unsubscribing a link removes its copies and stops forwarding", () => {
  const registry = new ListenerRegistry<TestListener>();
  const target = new ListenerRegistry<TestListener>();

  registry.register(createRecorder().listener);
  const link = registry.forwardAllTo(target);
  expect(target.size).toBe(1);

  link.unsubscribe();
  registry.register(createRecorder().listener);

  expect(link.closed).toBe(true);
  expect(target.size).toBe(0);
  expect(registry.size).toBe(2);
});

test("linking to the same sink twice returns the existing link", () => {
  const registry = new ListenerRegistry<TestListener>();
  const target = new ListenerRegistry<TestListener>();
  const { listener, events } = createRecorder();
  registry.register(listener);

  const link = registry.forwardAllTo(target);
  const again = registry.forwardAllTo(target);
  fire(target, "once");

  expect(again).toBe(link);
  expect(target.size).toBe(1);
  expect(events).toEqual(["once"]);
});

test("a severed link can be re-established", () => {
  const registry = new ListenerRegistry<TestListener>();
  const target = new ListenerRegistry<TestListener>();
  registry.register(createRecorder().listener);

  const first = registry.forwardAllTo(target);
  first.unsubscribe();
  const second = registry.forwardAllTo(target);

  expect(second).not.toBe(first);
  expect(target.size).toBe(1);
});

test("forwarding to itself throws a TypeError", () => {
  const registry = new ListenerRegistry<TestListener>();

  expect(() => registry.forwardAllTo(registry)).toThrow(TypeError);
});

test("chained registries forward and cancel through every hop", () => {
  const outer = new ListenerRegistry<TestListener>();
  const middle = new ListenerRegistry<TestListener>();
  const leaf = new ListenerRegistry<TestListener>();
  const { listener, events } = createRecorder();

  outer.forwardAllTo(middle);
  middle.forwardAllTo(leaf);
  const registration = outer.register(listener);

  fire(leaf, "deep");
  registration.unsubscribe();

  expect(events).toEqual(["deep"]);
  expect(middle.size).toBe(0);
  expect(leaf.size).toBe(0);
});

test("a sink rejecting an existing listener severs the link and throws", () => {
  const registry = new ListenerRegistry<TestListener>();
  const accepted = createRecorder().listener;
  const rejected = createRecorder().listener;
  const failure = new Error("sink refused");
  const { target, sink } = createPickySink(rejected, failure);

  registry.register(accepted);
  registry.register(rejected);

  let thrown: unknown;
  try {
    registry.forwardAllTo(sink);
  } catch (err) {
    thrown = err;
  }

  expect(thrown).toBeInstanceOf(ObservableError);
  if (!(thrown instanceof ObservableError)) return;
  expect(thrown.operator).toBe("listeners:forward");
  expect(thrown.message).toBe("Failed to forward 1 of 2 listener(s)");
  expect(thrown.errors).toEqual([failure]);

  // The accepted copy was rolled back and nothing new is forwarded.
  registry.register(accepted);
  expect(target.size).toBe(0);
  expect(registry.size).toBe(3);
});

test("a sink rejecting a later listener is reported and the registration stays open", async () => {
  const capture = captureReportedErrors();
  const registry = new ListenerRegistry<TestListener>();
  const rejected = createRecorder();
  const failure = new Error("sink refused");
  const { target, sink } = createPickySink(rejected.listener, failure);

  let registration: Subscription | undefined;
  try {
    registry.forwardAllTo(sink);
    registration = registry.register(rejected.listener);
    registry.register(createRecorder().listener);
    await flush();
  } finally {
    capture.restore();
  }

  expect(registration?.closed).toBe(false);
  expect(registry.size).toBe(2);
  expect(target.size).toBe(1);
  expect(capture.errors).toHaveLength(1);

  const [reported] = capture.errors;
  expect(reported).toBeInstanceOf(ObservableError);
  if (!(reported instanceof ObservableError)) return;
  expect(reported.operator).toBe("listeners:forward");
  expect(reported.value).toBe(rejected.listener);
  expect(reported.errors).toEqual([failure]);
});

test("a registration cancelled while the sink accepts it leaves no copy behind", () => {
  const registry = new ListenerRegistry<TestListener>();
  const target = new ListenerRegistry<TestListener>();
  const { listener, events } = createRecorder();

  let registration: Subscription | undefined;
  const sink: ListenerSink<TestListener> = {
    subscribeForEvents(l) {
      const copy = target.register(l);
      registration?.unsubscribe();
      return copy;
    },
  };

  registration = registry.register(listener);
  registry.forwardAllTo(sink);
  fire(target, "after-cancel");

  expect(registry.size).toBe(0);
  expect(target.size).toBe(0);
  expect(events).toEqual([]);
});

test("a link severed while the sink accepts a later listener leaves no copy behind", () => {
  const registry = new ListenerRegistry<TestListener>();
  const target = new ListenerRegistry<TestListener>();

  let link: Subscription | undefined;
  const sink: ListenerSink<TestListener> = {
    subscribeForEvents(l) {
      const copy = target.register(l);
      link?.unsubscribe();
      return copy;
    },
  };

  link = registry.forwardAllTo(sink);
  registry.register(createRecorder().listener);

  expect(link.closed).toBe(true);
  expect(registry.size).toBe(1);
  expect(target.size).toBe(0);
});

test("dispose severs links and cancels every registration", () => {
  const registry = new ListenerRegistry<TestListener>();
  const target = new ListenerRegistry<TestListener>();

  const first = registry.register(createRecorder().listener);
  const second = registry.register(createRecorder().listener);
  const link = registry.forwardAllTo(target);

  registry[Symbol.dispose]();

  expect(registry.size).toBe(0);
  expect(target.size).toBe(0);
  expect(first.closed).toBe(true);
  expect(second.closed).toBe(true);
  expect(link.closed).toBe(true);
});
