import { config } from "../../config.ts";

/**
 * Routes errors passed to `reportError()` into an array until `restore()` is
 * called. Reports are asynchronous: await {@link flush} before asserting.
 */
export function captureReportedErrors() {
  const errors: unknown[] = [];
  const previous = config.onUnhandledError;
  config.onUnhandledError = (err) => { errors.push(err); };

  return {
    errors,
    restore() { config.onUnhandledError = previous; },
  };
}

/** Resolves after every queued microtask has run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
