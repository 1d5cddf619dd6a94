// @filename: publisher.ts
/**
 * A hand-driven Publisher for testing subscribers.
 *
 * A test creates a publisher, hands it to the code under test, and then plays
 * the producer role itself: `next` values, `error` or `complete`. Afterwards
 * it checks what the subscribers did with the `assert*` methods (how many are
 * attached, how much they requested, whether they cancelled).
 *
 * Nothing is buffered or scheduled. Every call is synchronous, and a value
 * pushed with `next` reaches the subscribers before `next` returns, or is
 * turned into a {@link MissingDemandError} for each subscriber that did not
 * ask for it.
 *
 * ## Non-compliant mode
 * A publisher can be built to break some protocol rules on purpose, to check
 * how a subscriber copes with a misbehaving source:
 * - {@link Violation.ALLOW_NULL} lets `next(null)` through.
 * - {@link Violation.REQUEST_OVERFLOW} delivers values past the subscriber's
 *   demand and records that it did (see {@link TestPublisher.assertRequestOverflow}).
 *
 * ## Terminal signals
 * The first `error` or `complete` closes the publisher for good: attached
 * subscribers receive it exactly once, and every later subscriber receives
 * the same outcome immediately from `subscribe`. Further `error`/`complete`
 * calls are ignored and do not change the recorded outcome.
 *
 * ## Subscriber callbacks that throw
 * A fan-out always reaches every subscriber of its snapshot. Errors thrown by
 * subscriber callbacks are collected and rethrown once the fan-out is done:
 * a single error as-is, several as one {@link PublisherError}.
 *
 * @example
 * ```ts
 * const publisher = TestPublisher.create<string>();
 * const received: string[] = [];
 *
 * publisher.subscribe({
 *   onSubscribe(s) { s.request(2); },
 *   onNext(v) { received.push(v); },
 *   onError() {},
 *   onComplete() {}
 * });
 *
 * publisher
 *   .assertSubscribers(1)
 *   .assertMinRequested(2)
 *   .next("a", "b")
 *   .complete()
 *   .assertNoSubscribers();
 * ```
 *
 * @module
 */

import type { Publisher, Subscriber } from "./_spec.ts";
import type { PublisherSnapshot, SubscriptionHost, TestPublisherOptions } from "./_types.ts";

import * as asserts from "./asserts.ts";
import { MisuseError, rethrowCollected } from "./error.ts";
import { resolveViolations, Violation } from "./options.ts";
import { SubscriberRegistry } from "./registry.ts";
import { TestPublisherSubscription } from "./subscription.ts";
import { Symbol } from "./symbol.ts";

/** How the publisher ended; replayed to anyone subscribing afterwards. */
type Outcome =
  | { readonly kind: "error"; readonly error: unknown }
  | { readonly kind: "complete" };

/**
 * Publisher whose emissions are driven by the test, with bookkeeping for
 * assertions.
 *
 * @typeParam T - Type of values emitted. Include `null` in `T` when building
 * the publisher with {@link Violation.ALLOW_NULL}.
 */
export class TestPublisher<T> implements Publisher<T>, Disposable, AsyncDisposable {
  readonly #registry = new SubscriberRegistry<TestPublisherSubscription<T>>();
  readonly #violations: ReadonlySet<Violation>;
  readonly #host: SubscriptionHost<TestPublisherSubscription<T>>;

  #outcome: Outcome | null = null;
  #hasOverflown = false;
  #cancelCount = 0;
  #subscribeCount = 0;
  #wasRequested = false;

  /**
   * @throws {MisuseError} if `options.violations` names an unknown violation
   */
  constructor(options?: TestPublisherOptions | null) {
    this.#violations = resolveViolations(options);
    this.#host = {
      violations: this.#violations,
      cancelled: () => { this.#cancelCount++; },
      requested: () => { this.#wasRequested = true; },
      overflowed: () => { this.#hasOverflown = true; },
      detach: subscription => this.#registry.remove(subscription),
    };
  }

  /**
   * Attaches a subscriber.
   *
   * `onSubscribe` runs before the subscription is registered, so the
   * subscriber may `request` or `cancel` from inside it. A subscription
   * cancelled that early is dropped again right after registration. On a
   * publisher that already ended, the subscriber gets `onSubscribe` followed
   * by the recorded `onError` or `onComplete`, and is never registered.
   *
   * @throws {MisuseError} if `subscriber` is missing or lacks one of its
   * four callbacks
   */
  subscribe(subscriber: Subscriber<T>): void {
    assertSubscriber(subscriber);

    const subscription = new TestPublisherSubscription(subscriber, this.#host);
    this.#subscribeCount++;
    subscriber.onSubscribe(subscription);

    if (this.#registry.add(subscription)) {
      if (subscription.cancelled) {
        this.#registry.remove(subscription);
      }
      return;
    }

    const outcome = this.#outcome;
    if (outcome?.kind === "error") {
      subscriber.onError(outcome.error);
    } else {
      subscriber.onComplete();
    }
  }

  /**
   * Pushes one or more values, in order, to every attached subscriber.
   *
   * Each value goes to the subscribers attached when that value is pushed;
   * a subscriber attaching from inside `onNext` is not guaranteed to see the
   * value being delivered.
   *
   * @throws {MisuseError} if a value is `null` or `undefined` and
   * {@link Violation.ALLOW_NULL} is not enabled. Nothing is delivered in that
   * case.
   */
  next(value: T, ...rest: T[]): this {
    const values = [value, ...rest];
    this.#checkValues(values);

    const errors: unknown[] = [];
    for (const v of values) {
      for (const subscription of this.#registry.snapshot()) {
        try {
          subscription.deliver(v);
        } catch (err) {
          errors.push(err);
        }
      }
    }
    rethrowCollected(errors, "next", values.length === 1 ? value : values);

    return this;
  }

  /**
   * Pushes every value with {@link next}, then {@link complete}s.
   *
   * The publisher completes even when a subscriber callback throws during
   * the values; those errors are rethrown after completion.
   *
   * @throws {MisuseError} like {@link next}, before anything is delivered
   */
  emit(...values: T[]): this {
    this.#checkValues(values);

    const errors: unknown[] = [];
    if (values.length > 0) {
      const [first, ...rest] = values;
      try {
        this.next(first, ...rest);
      } catch (err) {
        errors.push(err);
      }
    }

    try {
      this.complete();
    } catch (err) {
      errors.push(err);
    }
    rethrowCollected(errors, "emit");

    return this;
  }

  #checkValues(values: readonly T[]): void {
    if (this.#violations.has(Violation.ALLOW_NULL)) return;

    values.forEach((v, index) => {
      if (v === null || v === undefined) {
        throw new MisuseError(`emitted values must be non-null, got ${v} at position ${index}`, {
          operation: "next",
          tip: "create the publisher with Violation.ALLOW_NULL to emit null values",
        });
      }
    });
  }

  /**
   * Ends the publisher with an error. Attached subscribers receive
   * `onError(err)`; later subscribers receive it from `subscribe`.
   *
   * @throws {MisuseError} if `err` is `null` or `undefined`
   */
  error(err: unknown): this {
    if (err === null || err === undefined) {
      throw new MisuseError("error must be non-null", {
        operation: "error",
        tip: "pass the error the subscribers should receive",
      });
    }

    if (!this.#registry.isTerminated) {
      this.#outcome = { kind: "error", error: err };
    }

    this.#terminate("error", subscription => subscription.error(err));
    return this;
  }

  /**
   * Ends the publisher normally. Attached subscribers receive
   * `onComplete()`; later subscribers receive it from `subscribe`.
   */
  complete(): this {
    if (!this.#registry.isTerminated) {
      this.#outcome = { kind: "complete" };
    }

    this.#terminate("complete", subscription => subscription.complete());
    return this;
  }

  #terminate(operation: string, signal: (subscription: TestPublisherSubscription<T>) => void): void {
    const errors: unknown[] = [];
    for (const subscription of this.#registry.terminate()) {
      try {
        signal(subscription);
      } catch (err) {
        errors.push(err);
      }
    }
    rethrowCollected(errors, operation);
  }

  /**
   * Takes a frozen snapshot of the publisher's bookkeeping.
   */
  inspect(): PublisherSnapshot {
    const members = this.#registry.snapshot();

    let minRequested = 0;
    let maxRequested = 0;
    members.forEach((subscription, index) => {
      const r = subscription.requested;
      if (index === 0 || r < minRequested) minRequested = r;
      if (index === 0 || r > maxRequested) maxRequested = r;
    });

    return Object.freeze({
      subscriberCount: members.length,
      subscribeCount: this.#subscribeCount,
      cancelCount: this.#cancelCount,
      minRequested,
      maxRequested,
      hasOverflown: this.#hasOverflown,
      wasRequested: this.#wasRequested,
      terminated: this.#registry.isTerminated,
      violations: this.#violations,
    });
  }

  /** Subscribers currently attached. */
  get subscriberCount(): number {
    return this.#registry.size;
  }

  /** `subscribe` calls accepted so far. */
  get subscribeCount(): number {
    return this.#subscribeCount;
  }

  get cancelCount(): number {
    return this.#cancelCount;
  }

  get wasSubscribed(): boolean {
    return this.#subscribeCount > 0;
  }

  get wasCancelled(): boolean {
    return this.#cancelCount > 0;
  }

  get wasRequested(): boolean {
    return this.#wasRequested;
  }

  get hasOverflown(): boolean {
    return this.#hasOverflown;
  }

  /** True once `error` or `complete` has been called. */
  get isTerminated(): boolean {
    return this.#registry.isTerminated;
  }

  /** The relaxations this publisher was built with. */
  get violations(): ReadonlySet<Violation> {
    return this.#violations;
  }

  /**
   * Asserts every attached subscriber has at least `n` outstanding demand.
   * Passes vacuously only for `n <= 0` when nobody is attached.
   */
  assertMinRequested(n: number): this {
    asserts.assertMinRequested(this.inspect(), n);
    return this;
  }

  /** Asserts no attached subscriber has more than `n` outstanding demand. */
  assertMaxRequested(n: number): this {
    asserts.assertMaxRequested(this.inspect(), n);
    return this;
  }

  /**
   * Asserts exactly `n` subscribers are attached, or at least one when `n`
   * is omitted.
   */
  assertSubscribers(n?: number): this {
    asserts.assertSubscribers(this.inspect(), n);
    return this;
  }

  assertNoSubscribers(): this {
    asserts.assertNoSubscribers(this.inspect());
    return this;
  }

  /**
   * Asserts exactly `n` cancellations happened, or at least one when `n` is
   * omitted.
   */
  assertCancelled(n?: number): this {
    asserts.assertCancelled(this.inspect(), n);
    return this;
  }

  assertNotCancelled(): this {
    asserts.assertNotCancelled(this.inspect());
    return this;
  }

  /** Asserts a value was delivered past a subscriber's demand at least once. */
  assertRequestOverflow(): this {
    asserts.assertRequestOverflow(this.inspect());
    return this;
  }

  assertNoRequestOverflow(): this {
    asserts.assertNoRequestOverflow(this.inspect());
    return this;
  }

  assertWasSubscribed(): this {
    asserts.assertWasSubscribed(this.inspect());
    return this;
  }

  assertNotSubscribed(): this {
    asserts.assertNotSubscribed(this.inspect());
    return this;
  }

  assertWasRequested(): this {
    asserts.assertWasRequested(this.inspect());
    return this;
  }

  assertWasNotRequested(): this {
    asserts.assertWasNotRequested(this.inspect());
    return this;
  }

  /**
   * Synchronous disposal method (for `using` syntax).
   *
   * Alias for {@link complete}.
   */
  [Symbol.dispose](): void {
    this.complete();
  }

  /**
   * Asynchronous disposal method.
   *
   * Alias for {@link complete}.
   */
  [Symbol.asyncDispose](): Promise<void> {
    this.complete();
    return Promise.resolve();
  }

  get [Symbol.toStringTag](): "TestPublisher" {
    return "TestPublisher" as const;
  }

  /** Creates a compliant publisher. See {@link createTestPublisher}. */
  static readonly create: typeof createTestPublisher = createTestPublisher;

  /**
   * Creates a publisher that breaks the given rules. See
   * {@link createNoncompliantTestPublisher}.
   */
  static readonly createNoncompliant: typeof createNoncompliantTestPublisher = createNoncompliantTestPublisher;
}

/**
 * Creates a publisher that follows every protocol rule.
 *
 * @example
 * ```ts
 * const publisher = createTestPublisher<number>();
 * ```
 */
export function createTestPublisher<T>(): TestPublisher<T> {
  return new TestPublisher<T>();
}

/**
 * Creates a publisher that is allowed to break the given protocol rules.
 *
 * @example
 * ```ts
 * const publisher = createNoncompliantTestPublisher<number | null>(
 *   Violation.ALLOW_NULL,
 *   Violation.REQUEST_OVERFLOW
 * );
 * publisher.next(null);
 * ```
 */
export function createNoncompliantTestPublisher<T>(first: Violation, ...rest: Violation[]): TestPublisher<T> {
  return new TestPublisher<T>({ violations: [first, ...rest] });
}

/**
 * Validates a subscriber passed to `subscribe`.
 *
 * @throws {MisuseError} if the subscriber is missing or a callback is not a
 * function
 */
function assertSubscriber<T>(subscriber: Subscriber<T>): void {
  if (subscriber === null || typeof subscriber !== "object") {
    throw new MisuseError("subscriber must be non-null", {
      operation: "subscribe",
      value: subscriber,
    });
  }

  for (const method of ["onSubscribe", "onNext", "onError", "onComplete"] as const) {
    if (typeof subscriber[method] !== "function") {
      throw new MisuseError(`Subscriber.${method} must be a function`, {
        operation: "subscribe",
      });
    }
  }
}
