// @filename: registry.ts
/**
 * Copy-on-write membership list for the subscribers of one publisher.
 *
 * Membership is always a frozen array. Every mutation builds a new array and
 * publishes it with a single assignment, so a reader that grabbed the
 * previous array keeps iterating a list that never changes under it. This
 * is what makes it safe for a subscriber to cancel (or for a new subscriber
 * to attach) from inside `onNext` while the publisher is mid-fan-out.
 *
 * Two distinct empty arrays mark the two empty states: {@link EMPTY} (no
 * subscribers yet, or all of them left) and {@link TERMINATED} (closed for
 * good). Telling them apart is one identity comparison.
 *
 * @example
 * ```ts
 * const registry = new SubscriberRegistry<string>();
 * registry.add("a");
 * registry.add("b");
 *
 * for (const member of registry.snapshot()) {
 *   registry.remove(member); // safe, the snapshot is not affected
 * }
 *
 * registry.terminate(); // => []
 * registry.add("c");    // => false
 * ```
 *
 * @module
 */

/** Membership of a registry with nobody attached. */
export const EMPTY: readonly never[] = Object.freeze([]);

/** Membership of a registry that accepts no more subscribers. */
export const TERMINATED: readonly never[] = Object.freeze([]);

/**
 * Tracks the subscriptions attached to a publisher, with a one-way switch
 * into the terminated state.
 *
 * @typeParam S - The member type. Members are compared by identity.
 */
export class SubscriberRegistry<S> {
  #members: readonly S[] = EMPTY;

  /** Number of members currently attached. */
  get size(): number {
    return this.#members.length;
  }

  /** True once {@link terminate} has run. */
  get isTerminated(): boolean {
    return this.#members === TERMINATED;
  }

  /** True when nobody is attached. Also true once terminated. */
  get isEmpty(): boolean {
    return this.#members.length === 0;
  }

  /**
   * The current membership. The returned array is frozen and is never
   * mutated afterwards, so it can be iterated while members come and go.
   */
  snapshot(): readonly S[] {
    return this.#members;
  }

  /**
   * Appends a member.
   *
   * @returns `false` if the registry is terminated; the caller then owns
   * telling the would-be member how the publisher ended.
   */
  add(member: S): boolean {
    const current = this.#members;
    if (current === TERMINATED) return false;

    this.#members = Object.freeze([...current, member]);
    return true;
  }

  /**
   * Removes a member, matched by identity. Does nothing when the member is
   * absent, the registry is empty, or the registry is terminated.
   */
  remove(member: S): void {
    const current = this.#members;
    if (current === TERMINATED || current === EMPTY) return;

    const index = current.indexOf(member);
    if (index < 0) return;

    if (current.length === 1) {
      this.#members = EMPTY;
      return;
    }

    this.#members = Object.freeze([
      ...current.slice(0, index),
      ...current.slice(index + 1),
    ]);
  }

  /**
   * Switches to the terminated state.
   *
   * @returns The membership in place at the moment of the switch. Only the
   * first call gets the live members; every later call gets an empty array,
   * so nobody is notified twice.
   */
  terminate(): readonly S[] {
    const previous = this.#members;
    this.#members = TERMINATED;
    return previous;
  }
}
