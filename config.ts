// @filename: config.ts
/**
 * Global configuration for how the library surfaces errors that have no
 * observer to receive them.
 *
 * @module
 */

/**
 * Mutable, process-wide settings.
 */
export interface Config {
  /**
   * Receives errors that cannot be delivered to any observer: an observer
   * callback that throws with no `error()` handler, a teardown that throws,
   * a listener that throws while events are dispatched, or a late listener
   * that could not be forwarded to an inner stream.
   *
   * When `null`, such errors are re-thrown on the microtask queue, which
   * surfaces them the same way as an unhandled promise rejection.
   *
   * @default null
   *
   * @example
   * ```ts
   * config.onUnhandledError = (err) => logger.warn({ err }, 'stream error');
   * ```
   */
  onUnhandledError: ((err: unknown) => void) | null;
}

export const config: Config = {
  onUnhandledError: null,
};

/**
 * Reports an error to the host.
 *
 * @remarks
 * Delivery is always asynchronous so the caller's current job finishes
 * first. If the configured hook throws, that error is re-thrown on the
 * microtask queue instead.
 */
export function reportError(err: unknown): void {
  const handler = config.onUnhandledError;
  queueMicrotask(() => {
    if (typeof handler !== "function") throw err;
    handler(err);
  });
}
