// @filename: subscription.ts
import type { Subscriber } from "./_spec.ts";
import type { InspectableSubscription, SubscriptionHost } from "./_types.ts";

import { MisuseError, MissingDemandError } from "./error.ts";
import { UNBOUNDED, Violation } from "./options.ts";
import { Symbol } from "./symbol.ts";

/**
 * Adds `n` to `current` without going past {@link UNBOUNDED}.
 */
export function addCap(current: number, n: number): number {
  if (current >= UNBOUNDED) return UNBOUNDED;
  return Math.min(UNBOUNDED, current + n);
}

/**
 * Checks that `n` is a valid amount of demand: a positive integer, or
 * `Infinity`.
 */
export function isValidRequest(n: number): boolean {
  return n > 0 && (Number.isInteger(n) || n === Infinity);
}

/**
 * Per-subscriber state of a {@link TestPublisher}: outstanding demand and
 * the cancelled flag.
 *
 * The subscriber gets this object through `onSubscribe` and talks back to
 * the publisher through `request` and `cancel`. The publisher pushes signals
 * into it through `deliver`, `error` and `complete`.
 *
 * Every method runs to completion before anything else touches the object,
 * so the counters need no locking. The only interleaving left is re-entrant:
 * the subscriber calling `request` or `cancel` from inside one of its own
 * callbacks. `deliver` consumes demand before calling `onNext` for that
 * reason.
 *
 * @typeParam T - Type of values delivered to the subscriber.
 */
export class TestPublisherSubscription<T> implements InspectableSubscription {
  readonly #actual: Subscriber<T>;
  readonly #host: SubscriptionHost<TestPublisherSubscription<T>>;

  #requested = 0;
  #cancelled = false;
  /** Set once a terminal signal went out; nothing is delivered afterwards */
  #done = false;

  constructor(actual: Subscriber<T>, host: SubscriptionHost<TestPublisherSubscription<T>>) {
    this.#actual = actual;
    this.#host = host;
  }

  /** Outstanding demand; {@link UNBOUNDED} once demand is unbounded. */
  get requested(): number {
    return this.#requested;
  }

  /** Whether `cancel()` was ever called. */
  get cancelled(): boolean {
    return this.#cancelled;
  }

  /**
   * Adds demand, saturating at {@link UNBOUNDED}.
   *
   * @throws {MisuseError} if `n` is zero, negative, fractional or NaN. Demand
   * is left untouched.
   */
  request(n: number): void {
    if (!isValidRequest(n)) {
      throw new MisuseError(`Cannot request a non strictly positive number: ${n}`, {
        operation: "request",
        value: n,
        tip: "request a positive integer, or Infinity for unbounded demand",
      });
    }

    this.#requested = addCap(this.#requested, n);
    this.#host.requested();
  }

  /**
   * Stops delivery to this subscriber and detaches it from the publisher.
   * Only the first call has any effect.
   */
  cancel(): void {
    if (this.#cancelled) return;
    this.#cancelled = true;

    this.#host.cancelled();
    this.#host.detach(this);
  }

  /**
   * Pushes one value to the subscriber, honouring its demand.
   *
   * With no demand left the value is delivered anyway under
   * `request-overflow` (and the overflow is recorded). Otherwise the
   * subscriber is detached and receives a {@link MissingDemandError} in
   * place of the value.
   *
   * @internal
   */
  deliver(value: T): void {
    if (this.#cancelled || this.#done) return;

    const r = this.#requested;
    if (r > 0) {
      if (r < UNBOUNDED) this.#requested = r - 1;
      this.#actual.onNext(value);
      return;
    }

    if (this.#host.violations.has(Violation.REQUEST_OVERFLOW)) {
      this.#host.overflowed();
      this.#actual.onNext(value);
      return;
    }

    this.#done = true;
    this.#host.detach(this);
    this.#actual.onError(new MissingDemandError(value));
  }

  /** @internal */
  error(err: unknown): void {
    if (this.#cancelled || this.#done) return;
    this.#done = true;
    this.#actual.onError(err);
  }

  /** @internal */
  complete(): void {
    if (this.#cancelled || this.#done) return;
    this.#done = true;
    this.#actual.onComplete();
  }

  // Support `using` disposal for automatic resource management
  [Symbol.dispose](): void {
    this.cancel();
  }

  // Support async disposal patterns
  [Symbol.asyncDispose](): Promise<void> {
    return Promise.resolve(this.cancel());
  }

  get [Symbol.toStringTag](): "TestPublisherSubscription" {
    return "TestPublisherSubscription" as const;
  }
}
