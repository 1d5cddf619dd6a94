// @filename: error.ts
/**
 * Error types raised by the test publisher.
 *
 * Three kinds of fault exist and each one has its own class so tests can
 * tell them apart:
 *
 * - {@link MisuseError}: the caller broke the protocol (requested a
 *   non-positive amount, emitted `null` without the relaxation, passed a
 *   broken subscriber). Thrown synchronously to whoever made the call.
 * - {@link MissingDemandError}: the publisher was asked to deliver a value to
 *   a subscriber that had no outstanding demand. Never thrown; it is handed
 *   to that one subscriber through `onError`.
 * - {@link AssertionFailedError}: an `assert*` call on the publisher did not
 *   hold.
 *
 * @module
 */

/** Context attached to every {@link PublisherError}. */
export interface PublisherErrorOptions {
  /** The publisher or subscription operation that failed */
  operation?: string;
  /** The value being processed when the error occurred */
  value?: unknown;
  /** The underlying cause */
  cause?: unknown;
  /** A hint on how to fix the problem */
  tip?: unknown;
}

/**
 * Base class for everything the publisher raises, able to aggregate several
 * underlying errors.
 *
 * When a fan-out (`next`, `error`, `complete`) reaches several subscribers
 * and more than one of their callbacks throws, the failures are collected
 * into a single PublisherError so none of them is lost.
 */
export class PublisherError extends AggregateError {
  /** The operation where the error occurred */
  readonly operation?: string;

  /** The value being processed when the error occurred */
  readonly value?: unknown;

  /** Helpful potential fixes for errors */
  readonly tip?: unknown;

  /**
   * Creates a new PublisherError.
   *
   * @param errors - The error(s) that caused this error
   * @param message - The error message
   * @param options - Additional error context
   */
  constructor(
    errors: unknown,
    message: string,
    options?: PublisherErrorOptions
  ) {
    const errorArray: unknown[] = Array.isArray(errors) ? errors : [errors];
    const normalizedErrors = errorArray.map(err =>
      err instanceof Error ? err : new Error(String(err))
    );

    super(normalizedErrors, message, { cause: options?.cause });
    this.name = 'PublisherError';
    this.operation = options?.operation;
    this.value = options?.value;
    this.tip = options?.tip;
  }

  /**
   * Returns a string representation of the error including the operation
   * and value context if available.
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;

    if (this.operation) {
      result += `\n  in operation: ${this.operation}`;
    }

    if (this.value !== undefined) {
      result += `\n  processing value: ${describe(this.value)}`;
    }

    if (this.errors.length > 0) {
      result += '\n  with errors:';
      this.errors.forEach((err, i) => {
        result += `\n    ${i + 1}) ${err}`;
      });
    }

    if (this.tip) {
      result += `\n  tip: ${this.tip}`;
    }

    return result;
  }

  /**
   * Wraps any thrown value in a PublisherError, adding operation context
   * when the value is already a PublisherError without any.
   */
  static from(
    error: unknown,
    operation?: string,
    value?: unknown,
    tip?: unknown
  ): PublisherError {
    if (error instanceof PublisherError) {
      if (!error.operation && operation) {
        return new PublisherError(
          error.errors,
          error.message,
          {
            operation,
            value: error.value ?? value,
            cause: error.cause,
            tip: error.tip
          }
        );
      }
      return error;
    }

    return new PublisherError(
      error,
      error instanceof Error ? error.message : String(error),
      { operation, value, cause: error, tip }
    );
  }
}

/**
 * The caller used the publisher or a subscription in a way the protocol
 * forbids. The offending call has no effect on publisher state.
 */
export class MisuseError extends PublisherError {
  constructor(message: string, options?: PublisherErrorOptions) {
    super([], message, options);
    this.name = 'MisuseError';
  }
}

/**
 * Sent to a subscriber through `onError` when a value reached it with no
 * outstanding demand and the `request-overflow` relaxation was not enabled.
 * The subscriber is detached; other subscribers are unaffected.
 */
export class MissingDemandError extends PublisherError {
  constructor(value?: unknown) {
    super([], "Can't deliver value due to lack of requests", {
      operation: 'next',
      value,
      tip: 'call subscription.request(n) before emitting, or create the publisher with Violation.REQUEST_OVERFLOW',
    });
    this.name = 'MissingDemandError';
  }
}

/**
 * Raised by the publisher's `assert*` methods.
 *
 * `expected` and `actual` are picked up by Vitest and rendered as a diff.
 */
export class AssertionFailedError extends PublisherError {
  readonly expected: unknown;
  readonly actual: unknown;

  constructor(message: string, expected: unknown, actual: unknown) {
    super([], message, { operation: 'assert' });
    this.name = 'AssertionFailedError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Throws the errors collected during a fan-out, if any: a single error as-is,
 * several as one {@link PublisherError}.
 *
 * @internal
 */
export function rethrowCollected(errors: readonly unknown[], operation: string, value?: unknown): void {
  if (errors.length === 0) return;
  if (errors.length === 1) throw errors[0];

  throw new PublisherError(
    errors,
    `${errors.length} subscribers threw during ${operation}`,
    { operation, value }
  );
}

/** Checks if a value is a {@link PublisherError}, including subclasses. */
export function isPublisherError(value: unknown): value is PublisherError {
  return value instanceof PublisherError;
}

/** Checks if a value is a {@link MisuseError}. */
export function isMisuseError(value: unknown): value is MisuseError {
  return value instanceof MisuseError;
}

/** Checks if a value is a {@link MissingDemandError}. */
export function isMissingDemandError(value: unknown): value is MissingDemandError {
  return value instanceof MissingDemandError;
}

/** Checks if a value is an {@link AssertionFailedError}. */
export function isAssertionFailedError(value: unknown): value is AssertionFailedError {
  return value instanceof AssertionFailedError;
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    // Truncate long objects
    return (JSON.stringify(value) ?? String(value)).slice(0, 100);
  }
  return String(value);
}
