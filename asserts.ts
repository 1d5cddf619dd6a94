import type { PublisherSnapshot } from "./_types.ts";
import { AssertionFailedError } from "./error.ts";

/**
 * Checks over a {@link PublisherSnapshot}.
 *
 * Each function throws an {@link AssertionFailedError} carrying the expected
 * and actual values when the check fails, and returns nothing otherwise. The
 * publisher's `assert*` methods are thin wrappers around these; they are
 * exported so a snapshot taken earlier in a test can be checked later.
 *
 * @example
 * ```ts
 * const before = publisher.inspect();
 * publisher.next(1);
 * assertNoSubscribers(before); // checks the state before `next`
 * ```
 *
 * @module
 */

/** Every attached subscriber has at least `n` outstanding demand. */
export function assertMinRequested(snapshot: PublisherSnapshot, n: number): void {
  const min = snapshot.minRequested;
  if (min < n) {
    throw new AssertionFailedError(`Expected minimum request of ${n}; got ${min}`, n, min);
  }
}

/** No attached subscriber has more than `n` outstanding demand. */
export function assertMaxRequested(snapshot: PublisherSnapshot, n: number): void {
  const max = snapshot.maxRequested;
  if (max > n) {
    throw new AssertionFailedError(`Expected maximum request of ${n}; got ${max}`, n, max);
  }
}

/**
 * With `n`: exactly `n` subscribers are attached. Without: at least one is.
 */
export function assertSubscribers(snapshot: PublisherSnapshot, n?: number): void {
  const count = snapshot.subscriberCount;
  if (n === undefined) {
    if (count === 0) {
      throw new AssertionFailedError("Expected subscribers", "at least 1", count);
    }
    return;
  }

  if (count !== n) {
    throw new AssertionFailedError(`Expected ${n} subscribers, got ${count}`, n, count);
  }
}

export function assertNoSubscribers(snapshot: PublisherSnapshot): void {
  const count = snapshot.subscriberCount;
  if (count !== 0) {
    throw new AssertionFailedError(`Expected no subscribers, got ${count}`, 0, count);
  }
}

/**
 * With `n`: exactly `n` cancellations happened. Without: at least one did.
 */
export function assertCancelled(snapshot: PublisherSnapshot, n?: number): void {
  const count = snapshot.cancelCount;
  if (n === undefined) {
    if (count === 0) {
      throw new AssertionFailedError("Expected at least 1 cancellation", "at least 1", count);
    }
    return;
  }

  if (count !== n) {
    throw new AssertionFailedError(`Expected ${n} cancellations, got ${count}`, n, count);
  }
}

export function assertNotCancelled(snapshot: PublisherSnapshot): void {
  const count = snapshot.cancelCount;
  if (count !== 0) {
    throw new AssertionFailedError("Expected no cancellation", 0, count);
  }
}

export function assertRequestOverflow(snapshot: PublisherSnapshot): void {
  if (!snapshot.hasOverflown) {
    throw new AssertionFailedError("Expected some request overflow", true, false);
  }
}

export function assertNoRequestOverflow(snapshot: PublisherSnapshot): void {
  if (snapshot.hasOverflown) {
    throw new AssertionFailedError("Unexpected request overflow", false, true);
  }
}

/** At least one `subscribe` call happened, attached or not. */
export function assertWasSubscribed(snapshot: PublisherSnapshot): void {
  if (snapshot.subscribeCount === 0) {
    throw new AssertionFailedError("Expected publisher to be subscribed to", "at least 1", 0);
  }
}

export function assertNotSubscribed(snapshot: PublisherSnapshot): void {
  const count = snapshot.subscribeCount;
  if (count !== 0) {
    throw new AssertionFailedError(`Expected publisher to not be subscribed to, got ${count} subscriptions`, 0, count);
  }
}

/** Some subscriber made a valid `request` at some point. */
export function assertWasRequested(snapshot: PublisherSnapshot): void {
  if (!snapshot.wasRequested) {
    throw new AssertionFailedError("Expected publisher to be requested", true, false);
  }
}

export function assertWasNotRequested(snapshot: PublisherSnapshot): void {
  if (snapshot.wasRequested) {
    throw new AssertionFailedError("Expected publisher to not be requested", false, true);
  }
}
