// @filename: error.ts
/**
 * Error type for failures that happen while wiring connection streams
 * together, as opposed to errors produced by a connection source itself.
 *
 * @module
 */

/**
 * An error raised by the library, aggregating one or more underlying errors.
 *
 * @remarks
 * Used where several independent failures may happen in one step, such as
 * forwarding every registered listener onto an inner stream: each listener
 * that could not be forwarded contributes one entry to `errors`.
 *
 * Errors produced by a connection source (including `ConnectionStream.forError`
 * and a failing inner-stream resolution) are never wrapped; they reach the
 * subscriber unchanged.
 */
export class ObservableError extends AggregateError {
  /** Which step raised the error, e.g. `"listeners:forward"`. */
  readonly operator?: string;

  /** The value being processed when the error occurred. */
  readonly value?: unknown;

  constructor(
    errors: unknown,
    message: string,
    options?: {
      operator?: string;
      value?: unknown;
      cause?: unknown;
    }
  ) {
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = 'ObservableError';
    this.operator = options?.operator;
    this.value = options?.value;
  }

  /**
   * Wraps `error` unless it already is an `ObservableError`; an existing
   * `ObservableError` without an operator gets `operator` filled in.
   */
  static from(
    error: unknown,
    operator?: string,
    value?: unknown
  ): ObservableError {
    if (error instanceof ObservableError) {
      if (!error.operator && operator) {
        return new ObservableError(error.errors, error.message, {
          operator,
          value: error.value ?? value,
          cause: error.cause,
        });
      }
      return error;
    }

    return new ObservableError(
      error,
      error instanceof Error ? error.message : String(error),
      { operator, value, cause: error }
    );
  }
}
