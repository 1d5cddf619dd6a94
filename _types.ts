// @filename: _types.ts
import type { Subscription } from "./_spec.ts";
import type { Violation } from "./options.ts";

/**
 * Construction-time configuration for a {@link TestPublisher}.
 *
 * @example
 * ```ts
 * const publisher = new TestPublisher<string | null>({
 *   violations: [Violation.ALLOW_NULL]
 * });
 * publisher.next(null); // allowed
 * ```
 */
export interface TestPublisherOptions {
  /**
   * Protocol rules the publisher is allowed to break. Fixed for the
   * lifetime of the publisher.
   *
   * @defaultValue none, the publisher is fully compliant
   */
  violations?: Iterable<Violation>;
}

/**
 * A point-in-time, read-only view of a publisher's bookkeeping.
 *
 * Every `assert*` method on the publisher is a check over one of these.
 */
export interface PublisherSnapshot {
  /** Subscribers currently attached */
  readonly subscriberCount: number;
  /** `subscribe` calls ever accepted, including ones rejected by a terminated publisher */
  readonly subscribeCount: number;
  /** Completed cancellations across every subscriber ever attached */
  readonly cancelCount: number;
  /** Lowest outstanding demand among attached subscribers, 0 when none are attached */
  readonly minRequested: number;
  /** Highest outstanding demand among attached subscribers, 0 when none are attached */
  readonly maxRequested: number;
  /** Whether a value was ever delivered to a subscriber with no demand */
  readonly hasOverflown: boolean;
  /** Whether any subscriber ever made a valid `request` */
  readonly wasRequested: boolean;
  /** Whether an error or completion has been signalled */
  readonly terminated: boolean;
  /** The relaxations this publisher was built with */
  readonly violations: ReadonlySet<Violation>;
}

/**
 * The publisher-side hooks a {@link TestPublisherSubscription} reports to.
 *
 * Keeps the subscription independent from the publisher class and lets the
 * subscription be exercised on its own in tests.
 *
 * @internal
 */
export interface SubscriptionHost<S> {
  /** The relaxations in effect */
  readonly violations: ReadonlySet<Violation>;
  /** Called once per subscription, on its first `cancel()` */
  cancelled(): void;
  /** Called on every valid `request(n)` */
  requested(): void;
  /** Called when a value is delivered with no demand under the overflow relaxation */
  overflowed(): void;
  /** Removes the subscription from the registry, if present */
  detach(subscription: S): void;
}

/**
 * A Subscription as seen from the test side: the protocol methods plus
 * read-only access to its bookkeeping.
 */
export interface InspectableSubscription extends Subscription, Disposable, AsyncDisposable {
  /** Outstanding demand */
  readonly requested: number;
  /** Whether `cancel()` was ever called */
  readonly cancelled: boolean;
  readonly [Symbol.toStringTag]: "TestPublisherSubscription";
}

export type * from "./_spec.ts";
