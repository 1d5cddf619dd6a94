// @filename: options.ts
/**
 * Construction-time configuration: the protocol relaxations a publisher may
 * be built with, and the demand ceiling.
 *
 * @module
 */

import type { TestPublisherOptions } from "./_types.ts";
import { MisuseError } from "./error.ts";

/**
 * Protocol rules a non-compliant publisher is allowed to break.
 *
 * - `ALLOW_NULL`: `next(null)` and `next(undefined)` are delivered instead
 *   of being rejected.
 * - `REQUEST_OVERFLOW`: values are delivered even to subscribers with no
 *   outstanding demand; the publisher records that an overflow happened.
 *
 * @example
 * ```ts
 * const publisher = TestPublisher.createNoncompliant<number>(Violation.REQUEST_OVERFLOW);
 * ```
 */
export const Violation = {
  ALLOW_NULL: "allow-null",
  REQUEST_OVERFLOW: "request-overflow",
} as const;

export type Violation = typeof Violation[keyof typeof Violation];

/**
 * Demand at or above this value counts as unbounded and is never
 * decremented again.
 */
export const UNBOUNDED: number = Number.MAX_SAFE_INTEGER;

const KNOWN_VIOLATIONS: ReadonlySet<string> = new Set(Object.values(Violation));

/**
 * Narrows an arbitrary string to a {@link Violation}.
 */
export function isViolation(value: unknown): value is Violation {
  return typeof value === "string" && KNOWN_VIOLATIONS.has(value);
}

/**
 * Validates the configured relaxations and freezes them into a set.
 *
 * @throws {MisuseError} if a name is not a known {@link Violation}
 */
export function resolveViolations(options?: TestPublisherOptions | null): ReadonlySet<Violation> {
  const violations = new Set<Violation>();

  for (const violation of options?.violations ?? []) {
    if (!isViolation(violation)) {
      throw new MisuseError(`Unknown violation: ${String(violation)}`, {
        operation: "create",
        value: violation,
        tip: `use one of ${[...KNOWN_VIOLATIONS].join(", ")}`,
      });
    }
    violations.add(violation);
  }

  return violations;
}

