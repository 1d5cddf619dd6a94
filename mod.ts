/**
 * A manually driven, instrumented Publisher for testing subscribers of a
 * backpressure-aware streaming protocol.
 *
 * The subscriber under test attaches to a {@link TestPublisher}; the test then
 * plays the producer (`next`, `error`, `complete`) and checks the outcome
 * with the publisher's `assert*` methods.
 *
 * ## What it checks
 * - **Demand** – a value pushed to a subscriber that did not request it is
 *   replaced by a `MissingDemandError` for that subscriber alone.
 * - **Cancellation** – every first `cancel()` is counted, and the subscriber
 *   is detached straight away, even from inside `onSubscribe`.
 * - **Terminal signals** – attached subscribers get exactly one `onError` or
 *   `onComplete`; late subscribers get the same outcome replayed.
 *
 * ## Deliberate misbehaviour
 * `TestPublisher.createNoncompliant(...)` builds a publisher that lets `null`
 * values through ({@link Violation.ALLOW_NULL}) or ignores demand
 * ({@link Violation.REQUEST_OVERFLOW}), to check how a subscriber handles a
 * broken source.
 *
 * @example Testing a subscriber that requests in batches
 * ```ts
 * import { TestPublisher } from "test-publisher";
 *
 * const publisher = TestPublisher.create<number>();
 * const seen: number[] = [];
 * let subscription!: Subscription;
 *
 * publisher.subscribe({
 *   onSubscribe(s) { subscription = s; s.request(2); },
 *   onNext(v) { seen.push(v); },
 *   onError(e) { throw e; },
 *   onComplete() {}
 * });
 *
 * publisher.assertMinRequested(2).next(1, 2).assertMinRequested(0);
 * subscription.cancel();
 * publisher.assertCancelled(1).assertNoSubscribers();
 * ```
 *
 * @module
 */

export type * from "./_types.ts";

export {
  TestPublisher,
  createTestPublisher,
  createNoncompliantTestPublisher,
} from "./publisher.ts";
export { TestPublisherSubscription, addCap, isValidRequest } from "./subscription.ts";
export { SubscriberRegistry, EMPTY, TERMINATED } from "./registry.ts";
export { Violation, UNBOUNDED, isViolation } from "./options.ts";
export * from "./asserts.ts";
export * from "./error.ts";
export { Symbol } from "./symbol.ts";
